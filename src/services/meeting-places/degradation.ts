/**
 * Degradation model
 *
 * External lookups never throw into the pipeline. A failed or empty lookup
 * becomes an Outcome with ok=false, and the stage that absorbed it records a
 * DegradedReason so the host can see every step that ran on partial data.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';

export type PipelineStage = 'location' | 'search' | 'enrichment' | 'recommendation';

export type DegradationCode =
  | 'geocode_failed'
  | 'reverse_geocode_failed'
  | 'station_lookup_failed'
  | 'station_unknown'
  | 'anchor_unresolved'
  | 'search_failed'
  | 'enrichment_failed'
  | 'model_call_failed'
  | 'model_output_unparseable'
  | 'model_output_invalid';

export interface DegradedReason {
  stage: PipelineStage;
  code: DegradationCode;
  detail?: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: DegradedReason };

export function succeeded<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function degraded<T>(stage: PipelineStage, code: DegradationCode, detail?: string): Outcome<T> {
  return { ok: false, reason: detail === undefined ? { stage, code } : { stage, code, detail } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a collaborator call and fold a rejection, or a synchronous throw,
 * into a degraded Outcome.
 */
export async function settle<T>(
  task: () => Promise<T>,
  stage: PipelineStage,
  code: DegradationCode
): Promise<Outcome<T>> {
  try {
    return succeeded(await task());
  } catch (err) {
    return degraded(stage, code, errorMessage(err));
  }
}

/**
 * Collects the degradations of one pipeline run, in the order they occurred.
 */
export class DegradationLog {
  private readonly entries: DegradedReason[] = [];

  constructor(private readonly log: Logger = rootLogger) {}

  record(reason: DegradedReason, fields: Record<string, unknown> = {}): void {
    this.entries.push(reason);
    this.log.warn({
      event: 'pipeline_degraded',
      stage: reason.stage,
      code: reason.code,
      detail: reason.detail,
      ...fields
    }, `[MeetingPlaces] ${reason.stage} degraded: ${reason.code}`);
  }

  /** Unwrap an Outcome, recording the reason when it failed. */
  unwrap<T>(outcome: Outcome<T>, fields: Record<string, unknown> = {}): T | null {
    if (outcome.ok) return outcome.value;
    this.record(outcome.reason, fields);
    return null;
  }

  list(): DegradedReason[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

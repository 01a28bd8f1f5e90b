/**
 * LLM Recommender
 *
 * One ranking-model call per run. The reply is parsed and validated; when the
 * call fails or the reply cannot be used, a deterministic fallback built from
 * the first candidates is returned instead. Either way the caller gets a
 * RecommendationResult.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../lib/logger/structured-logger.js';
import { DEFAULT_TOP_N, FALLBACK_RECOMMENDATION_COUNT } from '../../../config/index.js';
import type { LLMProvider } from '../../../llm/types.js';
import {
  DegradationLog,
  degraded,
  errorMessage,
  succeeded,
  type DegradationCode,
  type DegradedReason,
  type Outcome,
} from '../degradation.js';
import { PURPOSE_LABELS } from '../preferences/preference-tags.js';
import type {
  MeetingContext,
  PlaceCandidate,
  PlaceDisplayFields,
  PlaceRecommendation,
  RecommendationResult,
} from '../types.js';
import { buildRecommendationMessages, meetingDistrict, RECOMMENDATION_PROMPT_VERSION } from './recommendation-prompt.js';
import { ModelResponseSchema, type ModelRecommendation, type ModelResponse } from './recommendation.schema.js';

const FALLBACK_SUMMARY = '기본 추천 결과입니다.';
const EMPTY_SUMMARY = '추천할 장소 후보가 없습니다.';

const FALLBACK_NOTES: Partial<Record<DegradationCode, string>> = {
  model_call_failed: '추천 모델 호출에 실패해 기본 추천이 제공되었습니다.',
  model_output_unparseable: '추천 모델 응답을 해석하지 못해 기본 추천이 제공되었습니다.',
  model_output_invalid: '추천 모델 응답 형식이 올바르지 않아 기본 추천이 제공되었습니다.',
};

/** "<district|미정> 지역, <n>명, <purpose label>" */
export function summarizeMeeting(context: MeetingContext): string {
  return `${meetingDistrict(context) ?? '미정'} 지역, ${context.expectedParticipantCount}명, ${PURPOSE_LABELS[context.purpose]}`;
}

/** Removes an optional ``` or ```json fence around the reply. */
export function stripCodeFence(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  return (fenced?.[1] ?? text).trim();
}

/**
 * Decode and validate a model reply.
 */
export function parseModelResponse(text: string): Outcome<ModelResponse> {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch (err) {
    return degraded('recommendation', 'model_output_unparseable', errorMessage(err));
  }

  const parsed = ModelResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return degraded('recommendation', 'model_output_invalid', detail);
  }
  return succeeded(parsed.data);
}

/** Last segment of a category path: "음식점 > 한식 > 국밥" → "국밥". */
function shortCategory(categoryName: string): string {
  const parts = categoryName.split('>').map(part => part.trim()).filter(Boolean);
  return parts[parts.length - 1] ?? '기타';
}

export function displayFields(candidate: PlaceCandidate): PlaceDisplayFields {
  const fields: PlaceDisplayFields = {
    address: candidate.address,
    latitude: candidate.latitude,
    longitude: candidate.longitude,
    url: candidate.url,
    category: candidate.categoryName,
  };
  if (candidate.roadAddress !== undefined) fields.roadAddress = candidate.roadAddress;
  if (candidate.phone !== undefined) fields.phone = candidate.phone;
  if (candidate.distanceMeters !== undefined) fields.distanceMeters = candidate.distanceMeters;
  return fields;
}

export function fallbackRecommendations(
  candidates: readonly PlaceCandidate[],
  code: DegradationCode
): PlaceRecommendation[] {
  const note = FALLBACK_NOTES[code] ?? FALLBACK_NOTES.model_output_unparseable ?? '';
  return candidates.slice(0, FALLBACK_RECOMMENDATION_COUNT).map((candidate, index) => ({
    placeId: candidate.id,
    placeName: candidate.name,
    rank: index + 1,
    reason: `${shortCategory(candidate.categoryName)} 카테고리의 장소입니다.`,
    matchedPreferences: [],
    considerations: [note],
    ...displayFields(candidate),
  }));
}

function resolveCandidate(
  rec: ModelRecommendation,
  byId: ReadonlyMap<string, PlaceCandidate>,
  byName: ReadonlyMap<string, PlaceCandidate>
): PlaceCandidate | undefined {
  return (rec.place_id ? byId.get(rec.place_id) : undefined)
    ?? (rec.place_name ? byName.get(rec.place_name.trim()) : undefined);
}

/**
 * Map validated model output onto candidates. Ordered by rank when every
 * entry has one, else by response order; one entry per place; ranks 1..k.
 */
export function toRecommendations(
  response: ModelResponse,
  candidates: readonly PlaceCandidate[],
  topN: number
): PlaceRecommendation[] {
  const byId = new Map<string, PlaceCandidate>();
  const byName = new Map<string, PlaceCandidate>();
  for (const candidate of candidates) {
    if (!byId.has(candidate.id)) byId.set(candidate.id, candidate);
    if (!byName.has(candidate.name)) byName.set(candidate.name, candidate);
  }

  const entries = [...response.recommendations];
  if (entries.every(rec => rec.rank !== undefined)) {
    entries.sort((a, b) => (a.rank ?? 0) - (b.rank ?? 0));
  }

  const seen = new Set<string>();
  const result: PlaceRecommendation[] = [];
  for (const rec of entries) {
    if (result.length >= topN) break;

    const candidate = resolveCandidate(rec, byId, byName);
    const placeId = candidate?.id ?? rec.place_id ?? '';
    const placeName = candidate?.name ?? rec.place_name ?? '';
    const key = placeId || `name:${placeName}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const recommendation: PlaceRecommendation = {
      placeId,
      placeName,
      rank: result.length + 1,
      reason: rec.reason,
      matchedPreferences: rec.matched_preferences,
      considerations: rec.considerations,
      ...(candidate ? displayFields(candidate) : {}),
    };
    if (rec.match_score !== undefined && rec.match_score !== null) {
      recommendation.matchScore = rec.match_score;
    }
    result.push(recommendation);
  }
  return result;
}

export interface RecommendOptions {
  traceId?: string;
  degradations?: DegradationLog;
}

export class LlmRecommender {
  constructor(
    private readonly llm: LLMProvider,
    private readonly log: Logger = rootLogger
  ) {}

  async recommend(
    context: MeetingContext,
    candidates: readonly PlaceCandidate[],
    topN: number = DEFAULT_TOP_N,
    options: RecommendOptions = {}
  ): Promise<RecommendationResult> {
    const degradations = options.degradations ?? new DegradationLog(this.log);
    const base = {
      meetingContextSummary: summarizeMeeting(context),
      totalCandidatesConsidered: candidates.length,
      modelUsed: this.llm.defaultModel,
    };

    if (candidates.length === 0 || topN <= 0) {
      return { ...base, recommendations: [], summary: EMPTY_SUMMARY, degraded: false };
    }

    const outcome = await this.rank(context, candidates, topN, options.traceId);
    if (outcome.ok) {
      const recommendations = toRecommendations(outcome.value, candidates, topN);
      if (recommendations.length > 0) {
        this.log.info({
          event: 'recommendation_completed',
          traceId: options.traceId,
          promptVersion: RECOMMENDATION_PROMPT_VERSION,
          candidates: candidates.length,
          recommended: recommendations.length,
        }, '[LlmRecommender] Recommendations ready');
        return { ...base, recommendations, summary: outcome.value.summary, degraded: false };
      }
    }

    const reason: DegradedReason = outcome.ok
      ? { stage: 'recommendation', code: 'model_output_invalid', detail: 'no usable recommendations' }
      : outcome.reason;
    degradations.record(reason, { traceId: options.traceId });

    return {
      ...base,
      recommendations: fallbackRecommendations(candidates, reason.code),
      summary: FALLBACK_SUMMARY,
      degraded: true,
    };
  }

  private async rank(
    context: MeetingContext,
    candidates: readonly PlaceCandidate[],
    topN: number,
    traceId: string | undefined
  ): Promise<Outcome<ModelResponse>> {
    const messages = buildRecommendationMessages(context, candidates, topN);
    let text: string;
    try {
      text = await this.llm.complete(messages, traceId ? { traceId } : undefined);
    } catch (err) {
      return degraded('recommendation', 'model_call_failed', errorMessage(err));
    }
    return parseModelResponse(text);
  }
}

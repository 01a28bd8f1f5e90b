/**
 * Meeting Place Pipeline
 *
 * preferences + location choice → context → keywords → places → candidates → recommendations
 *
 * Stages never throw for missing external data; every degraded step is
 * recorded on the run's DegradationLog and returned with the result.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../lib/logger/structured-logger.js';
import { DEFAULT_TOP_N } from '../../config/index.js';
import { DegradationLog, type DegradedReason } from './degradation.js';
import { PlaceEnricher } from './enrichment/place-enricher.js';
import { KeywordSynthesizer } from './keywords/keyword-synthesizer.js';
import { LocationResolver } from './location/location-resolver.js';
import { aggregatePreferences } from './preferences/preference-aggregator.js';
import { DEFAULT_PURPOSE, type MeetingPurpose } from './preferences/preference-tags.js';
import { LlmRecommender } from './recommendation/llm-recommender.js';
import { PlaceSearcher } from './search/place-searcher.js';
import type {
  LocationChoiceType,
  MeetingContext,
  ParticipantLocation,
  PerParticipantPreference,
  PlaceCandidate,
  RecommendationResult,
  SearchKeyword,
} from './types.js';

export interface PipelineInput {
  meetingId?: string;
  title?: string;
  description?: string;
  purpose?: MeetingPurpose;
  locationChoiceType: LocationChoiceType;
  participantLocations: ParticipantLocation[];
  preferences: PerParticipantPreference[];
  /** Defaults to the number of participants. */
  expectedCount?: number;
  topN?: number;
  preferredDistrict?: string;
  districtVotes?: Record<string, number>;
  preferredStation?: string;
  stationVotes?: Record<string, number>;
  candidateTimes?: string[];
  radiusMeters?: number;
  maxKeywords?: number;
  maxPerKeyword?: number;
  maxDetailed?: number;
  traceId?: string;
}

export interface AnalysisResult {
  context: MeetingContext;
  keywords: SearchKeyword[];
  degradations: DegradedReason[];
}

export interface PipelineResult extends AnalysisResult {
  places: PlaceCandidate[];
  recommendations: RecommendationResult;
}

export interface MeetingPlacePipelineDeps {
  locationResolver: LocationResolver;
  keywordSynthesizer: KeywordSynthesizer;
  placeSearcher: PlaceSearcher;
  placeEnricher: PlaceEnricher;
  recommender: LlmRecommender;
  logger?: Logger;
}

export function buildMeetingContext(input: PipelineInput): MeetingContext {
  const headCount = Math.max(1, input.participantLocations.length, input.preferences.length);
  const context: MeetingContext = {
    purpose: input.purpose ?? DEFAULT_PURPOSE,
    locationChoiceType: input.locationChoiceType,
    participantLocations: input.participantLocations.map(p => ({ ...p })),
    aggregatedPreferences: aggregatePreferences(input.preferences),
    expectedParticipantCount: Math.max(1, Math.floor(input.expectedCount ?? headCount)),
    candidateTimes: [...(input.candidateTimes ?? [])],
  };
  if (input.meetingId !== undefined) context.meetingId = input.meetingId;
  if (input.title !== undefined) context.title = input.title;
  if (input.description !== undefined) context.description = input.description;
  if (input.preferredDistrict !== undefined) context.preferredDistrict = input.preferredDistrict;
  if (input.districtVotes !== undefined) context.districtVotes = { ...input.districtVotes };
  if (input.preferredStation !== undefined) context.preferredStation = input.preferredStation;
  if (input.stationVotes !== undefined) context.stationVotes = { ...input.stationVotes };
  return context;
}

export class MeetingPlacePipeline {
  private readonly log: Logger;

  constructor(private readonly deps: MeetingPlacePipelineDeps) {
    this.log = deps.logger ?? rootLogger;
  }

  /**
   * Context and keywords only, no search.
   */
  async analyze(input: PipelineInput): Promise<AnalysisResult> {
    const runLog = this.runLogger(input.traceId);
    const degradations = new DegradationLog(runLog);
    const { context, keywords } = await this.prepare(input, degradations);
    return { context, keywords, degradations: degradations.list() };
  }

  async runFullPipeline(input: PipelineInput): Promise<PipelineResult> {
    const runLog = this.runLogger(input.traceId);
    const degradations = new DegradationLog(runLog);
    const startTime = Date.now();

    const { context, keywords } = await this.prepare(input, degradations);

    const places = await this.deps.placeSearcher.search(
      keywords,
      context.centerLocation,
      {
        ...(input.radiusMeters !== undefined ? { radiusMeters: input.radiusMeters } : {}),
        ...(input.maxPerKeyword !== undefined ? { maxPerKeyword: input.maxPerKeyword } : {}),
      },
      degradations
    );

    const district = context.centerLocation?.district ?? context.preferredDistrict;
    const candidates = await this.deps.placeEnricher.enrich(places, input.maxDetailed, district, degradations);

    const recommendations = await this.deps.recommender.recommend(
      context,
      candidates,
      input.topN ?? DEFAULT_TOP_N,
      input.traceId ? { traceId: input.traceId, degradations } : { degradations }
    );

    runLog.info({
      event: 'pipeline_completed',
      meetingId: context.meetingId,
      locationChoiceType: context.locationChoiceType,
      keywordCount: keywords.length,
      candidateCount: candidates.length,
      recommendationCount: recommendations.recommendations.length,
      degraded: recommendations.degraded,
      degradationCount: degradations.size,
      durationMs: Date.now() - startTime,
    }, '[MeetingPlaces] Pipeline completed');

    return {
      context,
      keywords,
      places: candidates,
      recommendations,
      degradations: degradations.list(),
    };
  }

  private async prepare(
    input: PipelineInput,
    degradations: DegradationLog
  ): Promise<{ context: MeetingContext; keywords: SearchKeyword[] }> {
    const context = buildMeetingContext(input);

    const centerLocation = await this.deps.locationResolver.resolve(context, degradations);
    if (centerLocation) context.centerLocation = centerLocation;

    const keywords = this.deps.keywordSynthesizer.generate(context, input.maxKeywords);
    return { context, keywords };
  }

  private runLogger(traceId: string | undefined): Logger {
    return traceId ? this.log.child({ traceId }) : this.log;
  }
}

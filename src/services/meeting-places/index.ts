export { MeetingPlacePipeline, buildMeetingContext } from './pipeline.js';
export type { AnalysisResult, PipelineInput, PipelineResult } from './pipeline.js';
export { assemblePipeline, createMeetingPlacePipeline } from './meeting-places.factory.js';
export type { PipelineCollaborators } from './meeting-places.factory.js';
export type { DegradedReason, DegradationCode, PipelineStage } from './degradation.js';
export type {
  AggregatedPreferences,
  CenterLocation,
  GeoPoint,
  KeywordCategory,
  LocationChoiceType,
  MeetingContext,
  ParticipantLocation,
  PerParticipantPreference,
  PlaceCandidate,
  PlaceDisplayFields,
  PlaceRecommendation,
  PlaceResult,
  RecommendationResult,
  SearchKeyword,
  TagCount,
  TagCounts,
} from './types.js';
export type { PlaceSearchProvider, ReviewSource } from './providers.js';

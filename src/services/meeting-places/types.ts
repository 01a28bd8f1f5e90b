/**
 * Meeting place pipeline types
 */

import { z } from 'zod';
import type {
  AtmosphereType,
  CategoryTags,
  ConditionType,
  FoodType,
  MeetingPurpose,
  PreferenceCategory,
} from './preferences/preference-tags.js';

export const LocationChoiceTypeSchema = z.enum(['CenterLocation', 'PreferenceArea', 'PreferenceSubway']);
export type LocationChoiceType = z.infer<typeof LocationChoiceTypeSchema>;

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

/**
 * Search anchor. (0, 0) is the sentinel for "district only, no real point".
 */
export interface CenterLocation extends GeoPoint {
  address?: string;
  district?: string;
}

export interface ParticipantLocation {
  participantId: string;
  address?: string;
  latitude?: number;
  longitude?: number;
  district?: string;
}

/** One participant's selections; lists may be empty. */
export interface PerParticipantPreference {
  foodTypes: FoodType[];
  atmospheres: AtmosphereType[];
  conditions: ConditionType[];
}

/** tag → number of participants who listed it, in first-seen order. */
export type TagCounts<T extends string> = Partial<Record<T, number>>;

/** foodTypes / atmospheres / conditions, each tag → participant count. */
export type AggregatedPreferences = {
  [C in PreferenceCategory]: TagCounts<CategoryTags[C]>;
};

export interface TagCount<T extends string> {
  tag: T;
  count: number;
}

export interface MeetingContext {
  meetingId?: string;
  title?: string;
  description?: string;
  purpose: MeetingPurpose;
  readonly locationChoiceType: LocationChoiceType;
  centerLocation?: CenterLocation;
  participantLocations: ParticipantLocation[];
  preferredDistrict?: string;
  districtVotes?: Record<string, number>;
  preferredStation?: string;
  stationVotes?: Record<string, number>;
  aggregatedPreferences: AggregatedPreferences;
  expectedParticipantCount: number;
  candidateTimes: string[];
}

export type KeywordCategory =
  | 'main'
  | 'atmosphere'
  | 'condition'
  | 'group'
  | 'general'
  | 'food_secondary'
  | 'purpose';

export interface SearchKeyword {
  keyword: string;
  /** 1 = highest */
  priority: number;
  category: KeywordCategory;
}

export interface PlaceResult {
  /** Provider place id; the dedup key across searches. */
  id: string;
  name: string;
  categoryName: string;
  address: string;
  roadAddress?: string;
  longitude: number;
  latitude: number;
  phone?: string;
  url: string;
  distanceMeters?: number;
}

export interface PlaceCandidate extends PlaceResult {
  enriched: boolean;
  reviewSnippets: string[];
  extractedKeywords: string[];
}

export interface PlaceDisplayFields {
  address?: string;
  roadAddress?: string;
  latitude?: number;
  longitude?: number;
  phone?: string;
  url?: string;
  category?: string;
  distanceMeters?: number;
}

export interface PlaceRecommendation extends PlaceDisplayFields {
  placeId: string;
  placeName: string;
  /** 1 = best */
  rank: number;
  reason: string;
  matchScore?: number;
  matchedPreferences: string[];
  considerations: string[];
}

export interface RecommendationResult {
  recommendations: PlaceRecommendation[];
  summary: string;
  meetingContextSummary: string;
  totalCandidatesConsidered: number;
  modelUsed: string;
  /** True when the deterministic fallback produced the list. */
  degraded: boolean;
}

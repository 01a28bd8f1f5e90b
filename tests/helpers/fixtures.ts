/**
 * Shared builders for meeting-place tests.
 */

import { aggregatePreferences } from '../../src/services/meeting-places/preferences/preference-aggregator.js';
import type {
  MeetingContext,
  PerParticipantPreference,
  PlaceCandidate,
  PlaceResult,
} from '../../src/services/meeting-places/types.js';

export function pref(overrides: Partial<PerParticipantPreference> = {}): PerParticipantPreference {
  return { foodTypes: [], atmospheres: [], conditions: [], ...overrides };
}

export function buildContext(
  overrides: Partial<MeetingContext> = {},
  preferences: PerParticipantPreference[] = []
): MeetingContext {
  return {
    purpose: 'dining',
    locationChoiceType: 'CenterLocation',
    participantLocations: [],
    aggregatedPreferences: aggregatePreferences(preferences),
    expectedParticipantCount: 4,
    candidateTimes: [],
    ...overrides,
  };
}

export function buildPlace(id: string, overrides: Partial<PlaceResult> = {}): PlaceResult {
  return {
    id,
    name: `place-${id}`,
    categoryName: '음식점 > 한식',
    address: '서울 강남구 역삼동',
    latitude: 37.5,
    longitude: 127.03,
    url: `http://place.example/${id}`,
    ...overrides,
  };
}

export function buildCandidate(id: string, overrides: Partial<PlaceCandidate> = {}): PlaceCandidate {
  return {
    ...buildPlace(id),
    enriched: false,
    reviewSnippets: [],
    extractedKeywords: [],
    ...overrides,
  };
}

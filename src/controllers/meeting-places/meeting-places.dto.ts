/**
 * Request DTO for the meeting place endpoints.
 */

import { z } from 'zod';
import { MAX_SEARCH_RADIUS_M } from '../../config/index.js';
import {
  AtmosphereTypeSchema,
  ConditionTypeSchema,
  DEFAULT_PURPOSE,
  FoodTypeSchema,
  MeetingPurposeSchema,
} from '../../services/meeting-places/preferences/preference-tags.js';
import { LocationChoiceTypeSchema } from '../../services/meeting-places/types.js';
import type { PipelineInput } from '../../services/meeting-places/pipeline.js';

const optionalText = z.string().trim().min(1).optional();

const PreferencesSchema = z.object({
  foodTypes: z.array(FoodTypeSchema).default([]),
  atmospheres: z.array(AtmosphereTypeSchema).default([]),
  conditions: z.array(ConditionTypeSchema).default([]),
}).default({});

const ParticipantSchema = z.object({
  participantId: optionalText,
  address: optionalText,
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
  district: optionalText,
  preferences: PreferencesSchema,
});

const VotesSchema = z.record(z.string(), z.number().int().nonnegative());

export const PlaceRecommendationRequestSchema = z.object({
  meetingId: optionalText,
  title: optionalText,
  description: optionalText,
  purpose: MeetingPurposeSchema.default(DEFAULT_PURPOSE),
  locationChoiceType: LocationChoiceTypeSchema,
  participants: z.array(ParticipantSchema).min(1),
  expectedCount: z.number().int().min(1).optional(),
  topN: z.number().int().min(1).max(10).default(3),
  preferredDistrict: optionalText,
  districtVotes: VotesSchema.optional(),
  preferredStation: optionalText,
  stationVotes: VotesSchema.optional(),
  candidateTimes: z.array(z.string()).default([]),
  radiusMeters: z.number().int().min(1).max(MAX_SEARCH_RADIUS_M).optional(),
  maxKeywords: z.number().int().min(1).max(10).optional(),
}).superRefine((body, ctx) => {
  if (body.locationChoiceType === 'PreferenceArea' && !body.preferredDistrict) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['preferredDistrict'],
      message: 'preferredDistrict is required for PreferenceArea',
    });
  }
  if (body.locationChoiceType === 'PreferenceSubway' && !body.preferredStation) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['preferredStation'],
      message: 'preferredStation is required for PreferenceSubway',
    });
  }
});

export type PlaceRecommendationRequest = z.infer<typeof PlaceRecommendationRequestSchema>;

export function toPipelineInput(body: PlaceRecommendationRequest, traceId: string): PipelineInput {
  return {
    meetingId: body.meetingId,
    title: body.title,
    description: body.description,
    purpose: body.purpose,
    locationChoiceType: body.locationChoiceType,
    participantLocations: body.participants.map((p, index) => ({
      participantId: p.participantId ?? `participant-${index + 1}`,
      address: p.address,
      latitude: p.latitude,
      longitude: p.longitude,
      district: p.district,
    })),
    preferences: body.participants.map(p => p.preferences),
    expectedCount: body.expectedCount,
    topN: body.topN,
    preferredDistrict: body.preferredDistrict,
    districtVotes: body.districtVotes,
    preferredStation: body.preferredStation,
    stationVotes: body.stationVotes,
    candidateTimes: body.candidateTimes,
    radiusMeters: body.radiusMeters,
    maxKeywords: body.maxKeywords,
    traceId,
  };
}

/**
 * Ranking model output schema.
 * The model answers in snake_case JSON; anything that does not fit is
 * handled by the fallback path.
 */

import { z } from 'zod';

export const ModelRecommendationSchema = z.object({
  place_id: z.union([z.string(), z.number()]).transform(String).optional(),
  place_name: z.string().optional(),
  rank: z.number().int().optional(),
  reason: z.string().default(''),
  match_score: z.number().nullable().optional(),
  matched_preferences: z.array(z.string()).default([]),
  considerations: z.array(z.string()).default([]),
}).refine(
  rec => Boolean(rec.place_id) || Boolean(rec.place_name),
  { message: 'place_id or place_name is required' }
);

export const ModelResponseSchema = z.object({
  recommendations: z.array(ModelRecommendationSchema),
  summary: z.string().default('추천이 완료되었습니다.'),
});

export type ModelRecommendation = z.infer<typeof ModelRecommendationSchema>;
export type ModelResponse = z.infer<typeof ModelResponseSchema>;

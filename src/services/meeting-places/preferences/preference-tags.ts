/**
 * Preference tag enumerations and their lookup tables.
 *
 * Each tag space is a closed zod enum. Display labels feed the ranking prompt;
 * search terms feed the keyword synthesizer. The Kakao index matches nouns and
 * situations ("회식", "데이트 맛집") far better than adjectives ("조용한"), so
 * search terms are not always a translation of the label.
 */

import { z } from 'zod';

export const FoodTypeSchema = z.enum([
  'korean', 'japanese', 'chinese', 'western', 'asian', 'meat',
  'seafood', 'chicken', 'pizza', 'cafe', 'bar', 'etc',
]);
export type FoodType = z.infer<typeof FoodTypeSchema>;

export const AtmosphereTypeSchema = z.enum([
  'quiet', 'lively', 'romantic', 'modern', 'traditional', 'cozy', 'spacious', 'private',
]);
export type AtmosphereType = z.infer<typeof AtmosphereTypeSchema>;

export const ConditionTypeSchema = z.enum([
  'parking', 'private_room', 'group_friendly', 'pet_friendly',
  'wheelchair', 'reservation', 'late_night',
]);
export type ConditionType = z.infer<typeof ConditionTypeSchema>;

export const MeetingPurposeSchema = z.enum(['dining', 'cafe', 'drink', 'etc']);
export type MeetingPurpose = z.infer<typeof MeetingPurposeSchema>;

export const DEFAULT_PURPOSE: MeetingPurpose = 'dining';

export type PreferenceCategory = 'foodTypes' | 'atmospheres' | 'conditions';

export const PREFERENCE_CATEGORIES: readonly PreferenceCategory[] = ['foodTypes', 'atmospheres', 'conditions'];

/** Tag type held by each category. */
export interface CategoryTags {
  foodTypes: FoodType;
  atmospheres: AtmosphereType;
  conditions: ConditionType;
}

// === Display labels (prompt) ===

export const FOOD_TYPE_LABELS = {
  korean: '한식',
  japanese: '일식',
  chinese: '중식',
  western: '양식',
  asian: '아시안',
  meat: '고기/구이',
  seafood: '해산물',
  chicken: '치킨',
  pizza: '피자',
  cafe: '카페/디저트',
  bar: '술집/바',
  etc: '기타',
} satisfies Record<FoodType, string>;

export const ATMOSPHERE_LABELS = {
  quiet: '조용한',
  lively: '활기찬/왁자지껄한',
  romantic: '로맨틱한/분위기 좋은',
  modern: '모던한/세련된',
  traditional: '전통적인',
  cozy: '아늑한',
  spacious: '넓은',
  private: '프라이빗한',
} satisfies Record<AtmosphereType, string>;

export const CONDITION_LABELS = {
  parking: '주차 가능',
  private_room: '룸/개인실',
  group_friendly: '단체 이용 가능',
  pet_friendly: '반려동물 동반 가능',
  wheelchair: '휠체어 이용 가능',
  reservation: '예약 가능',
  late_night: '심야 영업',
} satisfies Record<ConditionType, string>;

export const PURPOSE_LABELS = {
  dining: '식사 모임',
  cafe: '카페 모임',
  drink: '술자리',
  etc: '기타 모임',
} satisfies Record<MeetingPurpose, string>;

export const CATEGORY_LABELS = {
  foodTypes: '선호 음식',
  atmospheres: '선호 분위기',
  conditions: '필요 조건',
} satisfies Record<PreferenceCategory, string>;

// === Search terms (keywords) ===

export const FOOD_TYPE_SEARCH_TERMS = {
  korean: '한식',
  japanese: '일식',
  chinese: '중식',
  western: '양식',
  asian: '아시안',
  meat: '고기',
  seafood: '해산물',
  chicken: '치킨',
  pizza: '피자',
  cafe: '카페',
  bar: '술집',
  etc: '맛집',
} satisfies Record<FoodType, string>;

/** Ordered phrases per atmosphere; the first is the one searched. */
export const ATMOSPHERE_SEARCH_PHRASES = {
  quiet: ['조용한', '분위기 좋은'],
  lively: ['회식', '단체'],
  romantic: ['데이트 맛집', '분위기 좋은'],
  modern: ['분위기 좋은', '인스타'],
  traditional: ['전통', '한옥'],
  cozy: ['분위기 좋은', '아늑한'],
  spacious: ['넓은', '단체'],
  private: ['프라이빗', '룸'],
} satisfies Record<AtmosphereType, readonly string[]>;

export const CONDITION_SEARCH_TERMS = {
  parking: '주차가능',
  private_room: '룸',
  group_friendly: '단체',
  pet_friendly: '애견동반',
  wheelchair: '휠체어',
  reservation: '예약',
  late_night: '심야영업',
} satisfies Record<ConditionType, string>;

/** Generic venue nouns per purpose, most general first. */
export const PURPOSE_SEARCH_NOUNS = {
  dining: ['맛집', '식당', '레스토랑'],
  cafe: ['카페', '디저트', '브런치'],
  drink: ['술집', '바', '호프'],
  etc: ['모임장소', '맛집'],
} satisfies Record<MeetingPurpose, readonly [string, ...string[]]>;

export const VENUE_SUFFIX = '맛집';
export const GROUP_TERM = '단체';
export const GROUP_FALLBACK_NOUN = '모임장소';
export const COMPANY_DINNER_TERM = '회식';

const CATEGORY_TAG_LABELS: { [C in PreferenceCategory]: Record<CategoryTags[C], string> } = {
  foodTypes: FOOD_TYPE_LABELS,
  atmospheres: ATMOSPHERE_LABELS,
  conditions: CONDITION_LABELS,
};

export function labelFor<C extends PreferenceCategory>(category: C, tag: CategoryTags[C]): string {
  return CATEGORY_TAG_LABELS[category][tag];
}

/**
 * Keyword Synthesizer
 *
 * Builds the prioritized search strings for a meeting from its district,
 * aggregated preferences and purpose. Deterministic for a given context.
 *
 * Priority (1 = searched first):
 *   1 main          "<district> <food> 맛집"
 *   2 atmosphere    "<district> <phrase>"
 *   2 condition     "<district> <condition> <food|purpose noun>"
 *   2 group         "<district> 단체 <food|모임장소>", "<district> 회식" (8+ people)
 *   3 general       "<district> 맛집"
 *   3 food_secondary second food, same shape as main
 *   4 purpose       "<district> <purpose noun>"
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../lib/logger/structured-logger.js';
import { DEFAULT_MAX_KEYWORDS, GROUP_KEYWORD_THRESHOLD } from '../../../config/index.js';
import { getTopPreference, topTag } from '../preferences/preference-aggregator.js';
import {
  ATMOSPHERE_SEARCH_PHRASES,
  COMPANY_DINNER_TERM,
  CONDITION_SEARCH_TERMS,
  FOOD_TYPE_SEARCH_TERMS,
  GROUP_FALLBACK_NOUN,
  GROUP_TERM,
  PURPOSE_SEARCH_NOUNS,
  VENUE_SUFFIX,
  type FoodType,
} from '../preferences/preference-tags.js';
import type { KeywordCategory, MeetingContext, SearchKeyword } from '../types.js';

export type KeywordContext = Pick<
  MeetingContext,
  'purpose' | 'aggregatedPreferences' | 'expectedParticipantCount' | 'centerLocation' | 'preferredDistrict'
>;

/** Joins the non-empty parts with single spaces. */
function buildKeyword(...parts: Array<string | undefined>): string {
  return parts
    .map(part => part?.trim())
    .filter((part): part is string => !!part)
    .join(' ');
}

function foodPhrase(food: FoodType): string {
  const term = FOOD_TYPE_SEARCH_TERMS[food];
  return term === VENUE_SUFFIX ? term : `${term} ${VENUE_SUFFIX}`;
}

/** Keeps the highest-priority instance of each text, then sorts by priority. */
export function dedupeKeywords(keywords: readonly SearchKeyword[]): SearchKeyword[] {
  const byText = new Map<string, SearchKeyword>();
  for (const keyword of keywords) {
    const existing = byText.get(keyword.keyword);
    if (!existing || keyword.priority < existing.priority) {
      byText.set(keyword.keyword, keyword);
    }
  }
  return [...byText.values()].sort((a, b) => a.priority - b.priority);
}

export class KeywordSynthesizer {
  constructor(private readonly log: Logger = rootLogger) {}

  generate(context: KeywordContext, maxKeywords: number = DEFAULT_MAX_KEYWORDS): SearchKeyword[] {
    if (maxKeywords <= 0) return [];

    const district = context.centerLocation?.district ?? context.preferredDistrict;
    const prefs = context.aggregatedPreferences;
    const keywords: SearchKeyword[] = [];
    const add = (keyword: string, priority: number, category: KeywordCategory) => {
      if (keyword) keywords.push({ keyword, priority, category });
    };

    const [topFood, secondFood] = getTopPreference(prefs, 'foodTypes', 2).map(entry => entry.tag);
    const topFoodTerm = topFood ? FOOD_TYPE_SEARCH_TERMS[topFood] : undefined;
    const purposeNoun = PURPOSE_SEARCH_NOUNS[context.purpose][0];

    if (topFood) {
      add(buildKeyword(district, foodPhrase(topFood)), 1, 'main');
    }

    const atmosphere = topTag(prefs, 'atmospheres');
    if (atmosphere) {
      add(buildKeyword(district, ATMOSPHERE_SEARCH_PHRASES[atmosphere][0]), 2, 'atmosphere');
    }

    const condition = topTag(prefs, 'conditions');
    if (condition) {
      add(buildKeyword(district, CONDITION_SEARCH_TERMS[condition], topFoodTerm ?? purposeNoun), 2, 'condition');
    }

    if (context.expectedParticipantCount >= GROUP_KEYWORD_THRESHOLD) {
      add(buildKeyword(district, GROUP_TERM, topFoodTerm ?? GROUP_FALLBACK_NOUN), 2, 'group');
      add(buildKeyword(district, COMPANY_DINNER_TERM), 2, 'group');
    }

    add(buildKeyword(district, VENUE_SUFFIX), 3, 'general');

    if (secondFood && secondFood !== topFood) {
      add(buildKeyword(district, foodPhrase(secondFood)), 3, 'food_secondary');
    }

    add(buildKeyword(district, purposeNoun), 4, 'purpose');

    const result = dedupeKeywords(keywords).slice(0, maxKeywords);

    this.log.debug({
      event: 'keywords_generated',
      district: district ?? null,
      generated: keywords.length,
      kept: result.length,
      keywords: result.map(k => k.keyword),
    }, '[KeywordSynthesizer] Keywords generated');

    return result;
  }
}

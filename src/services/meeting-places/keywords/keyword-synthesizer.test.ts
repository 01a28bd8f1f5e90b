import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';
import { aggregatePreferences } from '../preferences/preference-aggregator.js';
import type { PerParticipantPreference } from '../types.js';
import { KeywordSynthesizer, dedupeKeywords, type KeywordContext } from './keyword-synthesizer.js';

const synthesizer = new KeywordSynthesizer(pino({ level: 'silent' }));

function pref(overrides: Partial<PerParticipantPreference> = {}): PerParticipantPreference {
  return { foodTypes: [], atmospheres: [], conditions: [], ...overrides };
}

function context(overrides: Partial<KeywordContext> = {}): KeywordContext {
  return {
    purpose: 'dining',
    aggregatedPreferences: aggregatePreferences([]),
    expectedParticipantCount: 4,
    ...overrides,
  };
}

const richContext = context({
  centerLocation: { latitude: 37.5, longitude: 127.03, district: '강남구' },
  aggregatedPreferences: aggregatePreferences([
    pref({ foodTypes: ['korean', 'japanese'], atmospheres: ['quiet'], conditions: ['parking'] }),
    pref({ foodTypes: ['korean', 'japanese'] }),
    pref({ foodTypes: ['korean'] }),
  ]),
});

describe('KeywordSynthesizer.generate', () => {
  it('emits each rule in priority order', () => {
    const keywords = synthesizer.generate(richContext, 10);

    assert.deepEqual(keywords, [
      { keyword: '강남구 한식 맛집', priority: 1, category: 'main' },
      { keyword: '강남구 조용한', priority: 2, category: 'atmosphere' },
      { keyword: '강남구 주차가능 한식', priority: 2, category: 'condition' },
      { keyword: '강남구 맛집', priority: 3, category: 'general' },
      { keyword: '강남구 일식 맛집', priority: 3, category: 'food_secondary' },
    ]);
  });

  it('adds group keywords for eight or more people', () => {
    const keywords = synthesizer.generate(context({
      preferredDistrict: '마포구',
      expectedParticipantCount: 10,
      aggregatedPreferences: aggregatePreferences([pref({ foodTypes: ['korean'] })]),
    }));

    assert.deepEqual(keywords, [
      { keyword: '마포구 한식 맛집', priority: 1, category: 'main' },
      { keyword: '마포구 단체 한식', priority: 2, category: 'group' },
      { keyword: '마포구 회식', priority: 2, category: 'group' },
      { keyword: '마포구 맛집', priority: 3, category: 'general' },
    ]);
  });

  it('uses the default group noun without a food preference', () => {
    const keywords = synthesizer.generate(context({ preferredDistrict: '마포구', expectedParticipantCount: 8 }));

    assert.deepEqual(keywords.map(k => k.keyword), ['마포구 단체 모임장소', '마포구 회식', '마포구 맛집']);
  });

  it('keeps the first instance of a repeated keyword', () => {
    const keywords = synthesizer.generate(context({
      preferredDistrict: '마포구',
      expectedParticipantCount: 9,
      aggregatedPreferences: aggregatePreferences([pref({ atmospheres: ['lively'] })]),
    }));

    assert.deepEqual(keywords.filter(k => k.keyword === '마포구 회식'), [
      { keyword: '마포구 회식', priority: 2, category: 'atmosphere' },
    ]);
  });

  it('omits the district when none is known', () => {
    const keywords = synthesizer.generate(context({
      purpose: 'cafe',
      aggregatedPreferences: aggregatePreferences([pref({ foodTypes: ['korean'] })]),
    }));

    assert.deepEqual(keywords.map(k => k.keyword), ['한식 맛집', '맛집', '카페']);
  });

  it('falls back to the purpose noun for conditions without a food', () => {
    const keywords = synthesizer.generate(context({
      purpose: 'drink',
      preferredDistrict: '종로구',
      aggregatedPreferences: aggregatePreferences([pref({ conditions: ['late_night'] })]),
    }));

    assert.deepEqual(keywords.map(k => k.keyword), ['종로구 심야영업 술집', '종로구 맛집', '종로구 술집']);
  });

  it('never returns more than the cap, sorted by priority', () => {
    for (const cap of [0, 1, 2, 3, 5, 8]) {
      const keywords = synthesizer.generate(richContext, cap);
      assert.ok(keywords.length <= cap);
      for (let i = 1; i < keywords.length; i++) {
        assert.ok((keywords[i - 1]?.priority ?? 0) <= (keywords[i]?.priority ?? 0));
      }
    }
    assert.deepEqual(synthesizer.generate(richContext, 2).map(k => k.keyword), ['강남구 한식 맛집', '강남구 조용한']);
  });

  it('is deterministic', () => {
    assert.deepEqual(synthesizer.generate(richContext), synthesizer.generate(richContext));
  });
});

describe('dedupeKeywords', () => {
  it('keeps the highest priority of duplicate texts', () => {
    const result = dedupeKeywords([
      { keyword: '맛집', priority: 4, category: 'purpose' },
      { keyword: '카페', priority: 2, category: 'atmosphere' },
      { keyword: '맛집', priority: 3, category: 'general' },
    ]);

    assert.deepEqual(result, [
      { keyword: '카페', priority: 2, category: 'atmosphere' },
      { keyword: '맛집', priority: 3, category: 'general' },
    ]);
  });
});

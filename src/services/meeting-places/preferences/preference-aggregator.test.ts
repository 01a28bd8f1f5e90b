/**
 * Preference Aggregator Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  aggregatePreferences,
  getTopPreference,
  rankedTags,
  topTag,
} from './preference-aggregator.js';
import type { PerParticipantPreference } from '../types.js';

function pref(partial: Partial<PerParticipantPreference>): PerParticipantPreference {
  return { foodTypes: [], atmospheres: [], conditions: [], ...partial };
}

describe('aggregatePreferences', () => {
  it('counts participants per tag', () => {
    const aggregated = aggregatePreferences([
      pref({ foodTypes: ['korean', 'meat'] }),
      pref({ foodTypes: ['korean'] }),
    ]);

    assert.deepEqual(aggregated.foodTypes, { korean: 2, meat: 1 });
    assert.equal(topTag(aggregated, 'foodTypes'), 'korean');
  });

  it('leaves categories nobody filled in empty', () => {
    const aggregated = aggregatePreferences([pref({ conditions: ['parking'] })]);

    assert.deepEqual(aggregated, {
      foodTypes: {},
      atmospheres: {},
      conditions: { parking: 1 },
    });
  });

  it('counts a repeated tag once per participant', () => {
    const aggregated = aggregatePreferences([
      pref({ atmospheres: ['quiet', 'quiet', 'cozy'] }),
      pref({ atmospheres: ['quiet'] }),
    ]);

    assert.deepEqual(aggregated.atmospheres, { quiet: 2, cozy: 1 });
  });

  it('is additive over concatenated participant lists', () => {
    const a = [
      pref({ foodTypes: ['korean', 'chinese'], conditions: ['parking'] }),
      pref({ foodTypes: ['chinese'], atmospheres: ['lively'] }),
    ];
    const b = [
      pref({ foodTypes: ['korean'], atmospheres: ['lively', 'quiet'] }),
      pref({ conditions: ['parking', 'reservation'] }),
    ];

    const whole = aggregatePreferences([...a, ...b]);
    const left = aggregatePreferences(a);
    const right = aggregatePreferences(b);

    for (const category of ['foodTypes', 'atmospheres', 'conditions'] as const) {
      const tags = new Set([...Object.keys(left[category]), ...Object.keys(right[category])]);
      for (const tag of tags) {
        const sum = (Reflect.get(left[category], tag) ?? 0) + (Reflect.get(right[category], tag) ?? 0);
        assert.equal(Reflect.get(whole[category], tag), sum, `${category}.${tag}`);
      }
      assert.equal(Object.keys(whole[category]).length, tags.size);
    }
  });

  it('returns empty maps for no participants', () => {
    assert.deepEqual(aggregatePreferences([]), { foodTypes: {}, atmospheres: {}, conditions: {} });
  });
});

describe('getTopPreference', () => {
  const aggregated = aggregatePreferences([
    pref({ foodTypes: ['japanese', 'korean'] }),
    pref({ foodTypes: ['korean', 'chinese'] }),
    pref({ foodTypes: ['chinese'] }),
  ]);

  it('orders by count and breaks ties by first-seen order', () => {
    assert.deepEqual(rankedTags(aggregated, 'foodTypes'), [
      { tag: 'korean', count: 2 },
      { tag: 'chinese', count: 2 },
      { tag: 'japanese', count: 1 },
    ]);
  });

  it('truncates to n', () => {
    assert.deepEqual(getTopPreference(aggregated, 'foodTypes', 1), [{ tag: 'korean', count: 2 }]);
    assert.deepEqual(getTopPreference(aggregated, 'foodTypes', 0), []);
  });

  it('returns empty for a category without entries', () => {
    assert.deepEqual(getTopPreference(aggregated, 'conditions', 3), []);
    assert.equal(topTag(aggregated, 'conditions'), undefined);
  });
});

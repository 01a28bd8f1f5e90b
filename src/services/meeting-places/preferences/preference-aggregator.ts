/**
 * Preference Aggregator
 *
 * Collapses participants' tag selections into per-category participant counts.
 * A tag listed twice by the same participant counts once.
 */

import type {
  AggregatedPreferences,
  PerParticipantPreference,
  TagCount,
  TagCounts,
} from '../types.js';
import type { CategoryTags, PreferenceCategory } from './preference-tags.js';

function countOncePerParticipant<T extends string>(lists: readonly (readonly T[])[]): TagCounts<T> {
  const counts: TagCounts<T> = {};
  for (const tags of lists) {
    for (const tag of new Set(tags)) {
      counts[tag] = (counts[tag] ?? 0) + 1;
    }
  }
  return counts;
}

export function aggregatePreferences(preferences: readonly PerParticipantPreference[]): AggregatedPreferences {
  return {
    foodTypes: countOncePerParticipant(preferences.map(p => p.foodTypes)),
    atmospheres: countOncePerParticipant(preferences.map(p => p.atmospheres)),
    conditions: countOncePerParticipant(preferences.map(p => p.conditions)),
  };
}

/**
 * All tags of a category, by count descending; ties keep first-seen order.
 */
export function rankedTags<C extends PreferenceCategory>(
  aggregated: AggregatedPreferences,
  category: C
): TagCount<CategoryTags[C]>[] {
  const counts: TagCounts<CategoryTags[C]> = aggregated[category];
  const entries: TagCount<CategoryTags[C]>[] = [];
  for (const key of Object.keys(counts)) {
    const tag = key as CategoryTags[C];
    const count = counts[tag];
    if (count !== undefined && count > 0) entries.push({ tag, count });
  }
  // Array.prototype.sort is stable
  return entries.sort((a, b) => b.count - a.count);
}

export function getTopPreference<C extends PreferenceCategory>(
  aggregated: AggregatedPreferences,
  category: C,
  n: number
): TagCount<CategoryTags[C]>[] {
  if (n <= 0) return [];
  return rankedTags(aggregated, category).slice(0, n);
}

/** The single most common tag of a category, if any. */
export function topTag<C extends PreferenceCategory>(
  aggregated: AggregatedPreferences,
  category: C
): CategoryTags[C] | undefined {
  return getTopPreference(aggregated, category, 1)[0]?.tag;
}

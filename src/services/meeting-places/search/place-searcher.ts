/**
 * Place Searcher
 *
 * Fans one search out per keyword, waits for all of them to settle and merges
 * the results in keyword order. A failed keyword contributes nothing.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../lib/logger/structured-logger.js';
import { DEFAULT_RESULTS_PER_KEYWORD, DEFAULT_SEARCH_RADIUS_M } from '../../../config/index.js';
import { DegradationLog, settle } from '../degradation.js';
import { isSentinel } from '../location/geo.js';
import type { PlaceSearchProvider } from '../providers.js';
import type { GeoPoint, PlaceResult, SearchKeyword } from '../types.js';

export interface SearchOptions {
  radiusMeters?: number;
  maxPerKeyword?: number;
}

/** Concatenates lists in order, keeping the first entry per place id. */
export function mergeUnique(lists: readonly (readonly PlaceResult[])[]): PlaceResult[] {
  const seen = new Set<string>();
  const merged: PlaceResult[] = [];
  for (const list of lists) {
    for (const place of list) {
      if (seen.has(place.id)) continue;
      seen.add(place.id);
      merged.push(place);
    }
  }
  return merged;
}

/** Places whose category path contains any of the terms. */
export function filterByCategory<T extends PlaceResult>(places: readonly T[], terms: readonly string[]): T[] {
  if (terms.length === 0) return [...places];
  return places.filter(place => terms.some(term => place.categoryName.includes(term)));
}

/** Nearest first; places without a distance go last in their original order. */
export function sortByDistance<T extends PlaceResult>(places: readonly T[]): T[] {
  return [...places].sort((a, b) => {
    const da = a.distanceMeters ?? Number.POSITIVE_INFINITY;
    const db = b.distanceMeters ?? Number.POSITIVE_INFINITY;
    if (da === db) return 0;
    return da < db ? -1 : 1;
  });
}

export class PlaceSearcher {
  constructor(
    private readonly provider: PlaceSearchProvider,
    private readonly log: Logger = rootLogger
  ) {}

  async search(
    keywords: readonly SearchKeyword[],
    center?: GeoPoint | null,
    options: SearchOptions = {},
    degradations: DegradationLog = new DegradationLog(this.log)
  ): Promise<PlaceResult[]> {
    const radiusMeters = options.radiusMeters ?? DEFAULT_SEARCH_RADIUS_M;
    const pageSize = options.maxPerKeyword ?? DEFAULT_RESULTS_PER_KEYWORD;
    const anchor = center && !isSentinel(center)
      ? { latitude: center.latitude, longitude: center.longitude }
      : undefined;

    const outcomes = await Promise.all(keywords.map(keyword => settle(
      () => this.provider.searchByKeyword({
        query: keyword.keyword,
        ...(anchor ? { anchor } : {}),
        radiusMeters,
        pageSize,
      }),
      'search',
      'search_failed'
    )));

    const lists = outcomes.map((outcome, index) =>
      degradations.unwrap(outcome, { keyword: keywords[index]?.keyword }) ?? []
    );
    const merged = mergeUnique(lists);

    this.log.info({
      event: 'place_search_completed',
      keywordCount: keywords.length,
      failedCount: outcomes.filter(o => !o.ok).length,
      anchored: anchor !== undefined,
      rawCount: lists.reduce((sum, list) => sum + list.length, 0),
      uniqueCount: merged.length,
    }, '[PlaceSearcher] Search completed');

    return merged;
  }
}

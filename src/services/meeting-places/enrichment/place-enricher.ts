/**
 * Place Enricher
 *
 * Best-effort review lookup for the first `maxDetailed` places. Lookups run
 * concurrently; a failed lookup leaves that place unenriched.
 */

import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../lib/logger/structured-logger.js';
import {
  DEFAULT_MAX_DETAILED,
  EXTRACTED_KEYWORDS_PER_PLACE,
  REVIEW_DOCUMENTS_PER_PLACE,
  REVIEW_SNIPPETS_PER_PLACE,
} from '../../../config/index.js';
import { DegradationLog, settle } from '../degradation.js';
import type { ReviewDocument, ReviewSource } from '../providers.js';
import type { PlaceCandidate, PlaceResult } from '../types.js';
import { cleanReviewText, extractFeatureTerms } from './review-text.js';

function unenriched(place: PlaceResult): PlaceCandidate {
  return { ...place, enriched: false, reviewSnippets: [], extractedKeywords: [] };
}

function withReviews(place: PlaceResult, documents: readonly ReviewDocument[]): PlaceCandidate {
  if (documents.length === 0) return unenriched(place);

  const texts = documents.map(doc => cleanReviewText(`${doc.title} ${doc.contents}`));
  return {
    ...place,
    enriched: true,
    reviewSnippets: documents
      .map(doc => cleanReviewText(doc.contents))
      .filter(snippet => snippet.length > 0)
      .slice(0, REVIEW_SNIPPETS_PER_PLACE),
    extractedKeywords: extractFeatureTerms(texts, EXTRACTED_KEYWORDS_PER_PLACE),
  };
}

export class PlaceEnricher {
  constructor(
    private readonly reviews: ReviewSource | null,
    private readonly log: Logger = rootLogger
  ) {}

  async enrich(
    places: readonly PlaceResult[],
    maxDetailed: number = DEFAULT_MAX_DETAILED,
    district?: string,
    degradations: DegradationLog = new DegradationLog(this.log)
  ): Promise<PlaceCandidate[]> {
    const reviews = this.reviews;
    const detailedCount = reviews ? Math.max(0, Math.min(maxDetailed, places.length)) : 0;
    const detailed = places.slice(0, detailedCount);
    const rest = places.slice(detailedCount);

    const outcomes = reviews
      ? await Promise.all(detailed.map(place => settle(
          async () => withReviews(
            place,
            await reviews.searchReviews(district ? `${district} ${place.name}` : place.name, REVIEW_DOCUMENTS_PER_PLACE)
          ),
          'enrichment',
          'enrichment_failed'
        )))
      : [];

    const enriched = detailed.map((place, index) => {
      const outcome = outcomes[index];
      const candidate = outcome ? degradations.unwrap(outcome, { placeId: place.id }) : null;
      return candidate ?? unenriched(place);
    });

    const candidates = [...enriched, ...rest.map(unenriched)];

    this.log.info({
      event: 'places_enriched',
      total: candidates.length,
      attempted: detailed.length,
      enriched: candidates.filter(c => c.enriched).length,
    }, '[PlaceEnricher] Enrichment completed');

    return candidates;
  }
}

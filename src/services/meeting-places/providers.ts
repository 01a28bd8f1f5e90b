/**
 * Contracts the pipeline needs from its external collaborators.
 * Handles are constructed by the host and injected; nothing here is global.
 */

import type { GeoPoint, PlaceResult } from './types.js';

export interface KeywordSearchRequest {
  query: string;
  /** Omitted for unanchored (keyword-only) searches. */
  anchor?: GeoPoint;
  radiusMeters: number;
  pageSize: number;
}

export interface AddressMatch extends GeoPoint {
  formattedAddress: string;
  district?: string;
}

export interface PlaceSearchProvider {
  searchByKeyword(request: KeywordSearchRequest): Promise<PlaceResult[]>;
  resolveAddress(text: string): Promise<AddressMatch[]>;
  /** District (구/군) containing the point, or null when the provider has none. */
  reverseGeocode(latitude: number, longitude: number): Promise<string | null>;
}

export interface ReviewDocument {
  title: string;
  contents: string;
  url: string;
  postedAt?: string;
}

/** Secondary lookup used to enrich candidates with review text. */
export interface ReviewSource {
  searchReviews(query: string, size: number): Promise<ReviewDocument[]>;
}

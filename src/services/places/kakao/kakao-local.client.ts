/**
 * Kakao Local / Search API Client
 *
 * Low-level client for keyword place search, address geocoding, reverse
 * geocoding and blog search, with timeout and retry logic.
 * Implements the pipeline's PlaceSearchProvider and ReviewSource contracts.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../../../lib/logger/structured-logger.js';
import { MAX_PAGE_SIZE, MAX_SEARCH_RADIUS_M } from '../../../config/index.js';
import type {
  AddressMatch,
  KeywordSearchRequest,
  PlaceSearchProvider,
  ReviewDocument,
  ReviewSource,
} from '../../meeting-places/providers.js';
import type { PlaceResult } from '../../meeting-places/types.js';
import { districtFromAddress } from '../../meeting-places/location/district.js';

const DEFAULT_BASE_URL = 'https://dapi.kakao.com';

// === Response schemas ===

const KeywordDocumentSchema = z.object({
  id: z.string(),
  place_name: z.string(),
  category_name: z.string().default(''),
  phone: z.string().optional(),
  address_name: z.string().default(''),
  road_address_name: z.string().optional(),
  x: z.coerce.number(),
  y: z.coerce.number(),
  place_url: z.string().default(''),
  distance: z.string().optional(),
});

const KeywordResponseSchema = z.object({
  documents: z.array(KeywordDocumentSchema),
});

const RegionSchema = z.object({
  region_2depth_name: z.string().optional(),
}).nullable().optional();

const AddressResponseSchema = z.object({
  documents: z.array(z.object({
    address_name: z.string(),
    x: z.coerce.number(),
    y: z.coerce.number(),
    address: RegionSchema,
    road_address: RegionSchema,
  })),
});

const RegionCodeResponseSchema = z.object({
  documents: z.array(z.object({
    region_type: z.string(),
    region_2depth_name: z.string().default(''),
  })),
});

const BlogResponseSchema = z.object({
  documents: z.array(z.object({
    title: z.string().default(''),
    contents: z.string().default(''),
    url: z.string().default(''),
    datetime: z.string().optional(),
  })),
});

/**
 * Kakao client configuration
 */
export interface KakaoLocalClientConfig {
  apiKey: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** First retry delay; doubles per attempt. */
  retryBaseDelayMs?: number;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/**
 * Kakao API error
 */
export class KakaoApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'KakaoApiError';
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class KakaoLocalClient implements PlaceSearchProvider, ReviewSource {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(config: KakaoLocalClientConfig) {
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.maxRetries = config.maxRetries ?? 1;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 500;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.log = config.logger ?? rootLogger;
  }

  async searchByKeyword(request: KeywordSearchRequest): Promise<PlaceResult[]> {
    const params = new URLSearchParams({
      query: request.query,
      size: String(clamp(Math.floor(request.pageSize), 1, MAX_PAGE_SIZE)),
    });
    if (request.anchor) {
      params.set('x', String(request.anchor.longitude));
      params.set('y', String(request.anchor.latitude));
      params.set('radius', String(clamp(Math.floor(request.radiusMeters), 0, MAX_SEARCH_RADIUS_M)));
    }

    const body = await this.get('/v2/local/search/keyword.json', params, KeywordResponseSchema);
    return body.documents.map((doc): PlaceResult => {
      const place: PlaceResult = {
        id: doc.id,
        name: doc.place_name,
        categoryName: doc.category_name,
        address: doc.address_name,
        longitude: doc.x,
        latitude: doc.y,
        url: doc.place_url,
      };
      const roadAddress = emptyToUndefined(doc.road_address_name);
      if (roadAddress) place.roadAddress = roadAddress;
      const phone = emptyToUndefined(doc.phone);
      if (phone) place.phone = phone;
      const distance = emptyToUndefined(doc.distance);
      if (distance !== undefined && Number.isFinite(Number(distance))) place.distanceMeters = Number(distance);
      return place;
    });
  }

  async resolveAddress(text: string): Promise<AddressMatch[]> {
    const params = new URLSearchParams({ query: text });
    const body = await this.get('/v2/local/search/address.json', params, AddressResponseSchema);

    return body.documents.map((doc): AddressMatch => {
      const match: AddressMatch = {
        latitude: doc.y,
        longitude: doc.x,
        formattedAddress: doc.address_name,
      };
      const district = emptyToUndefined(doc.address?.region_2depth_name)
        ?? emptyToUndefined(doc.road_address?.region_2depth_name)
        ?? districtFromAddress(doc.address_name);
      if (district) match.district = district;
      return match;
    });
  }

  async reverseGeocode(latitude: number, longitude: number): Promise<string | null> {
    const params = new URLSearchParams({ x: String(longitude), y: String(latitude) });
    const body = await this.get('/v2/local/geo/coord2regioncode.json', params, RegionCodeResponseSchema);

    const region = body.documents.find(doc => doc.region_type === 'H') ?? body.documents[0];
    return emptyToUndefined(region?.region_2depth_name) ?? null;
  }

  async searchReviews(query: string, size: number): Promise<ReviewDocument[]> {
    const params = new URLSearchParams({
      query,
      size: String(clamp(Math.floor(size), 1, 50)),
    });
    const body = await this.get('/v2/search/blog', params, BlogResponseSchema);

    return body.documents.map((doc): ReviewDocument => {
      const review: ReviewDocument = { title: doc.title, contents: doc.contents, url: doc.url };
      if (doc.datetime) review.postedAt = doc.datetime;
      return review;
    });
  }

  /**
   * GET with timeout and retry; the body is validated against `schema`.
   */
  private async get<T>(pathname: string, params: URLSearchParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        const raw = await this.request(pathname, params);
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
          throw new KakaoApiError(`Kakao API returned an unexpected body for ${pathname}`);
        }
        return parsed.data;
      } catch (err) {
        const error = err instanceof KakaoApiError
          ? err
          : new KakaoApiError(err instanceof Error ? err.message : String(err), undefined, true);

        this.log.warn({
          event: 'kakao_api_attempt_failed',
          path: pathname,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          error: error.message,
          statusCode: error.statusCode,
          isRetryable: error.isRetryable,
        }, '[KakaoLocalClient] Request attempt failed');

        if (!error.isRetryable || attempt >= this.maxRetries) {
          throw error;
        }

        const delayMs = Math.pow(2, attempt) * this.retryBaseDelayMs;
        this.log.info({
          event: 'kakao_api_retrying',
          path: pathname,
          nextAttempt: attempt + 2,
          delayMs,
        }, '[KakaoLocalClient] Retrying after delay');
        await this.sleep(delayMs);
      }
    }
  }

  private async request(pathname: string, params: URLSearchParams): Promise<unknown> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${pathname}?${params}`, {
        signal: abortController.signal,
        headers: {
          'Accept': 'application/json',
          'Authorization': `KakaoAK ${this.apiKey}`,
        },
      });

      if (!response.ok) {
        const errorBody = await response.text();
        const isRetryable = response.status >= 500 || response.status === 429;
        throw new KakaoApiError(
          `Kakao API failed: HTTP ${response.status} - ${errorBody.substring(0, 200)}`,
          response.status,
          isRetryable
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new KakaoApiError(`Kakao API returned invalid JSON for ${pathname}`, response.status);
      }
      this.log.debug({ event: 'kakao_api_success', path: pathname }, '[KakaoLocalClient] Request succeeded');
      return body;
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new KakaoApiError(`Kakao API timeout after ${this.timeoutMs}ms`, undefined, true);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

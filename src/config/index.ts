/**
 * Centralized pipeline settings.
 * Values that change between deployments live in env.ts; these are the
 * tunables and provider limits the pipeline stages share.
 */

// === Search ===

/** Default search radius around the anchor, in meters. */
export const DEFAULT_SEARCH_RADIUS_M = 5000;

/** Kakao keyword search accepts at most 20km. */
export const MAX_SEARCH_RADIUS_M = 20_000;

/** Results requested per keyword (Kakao page size is 1..15). */
export const DEFAULT_RESULTS_PER_KEYWORD = 15;
export const MAX_PAGE_SIZE = 15;

// === Keywords ===

export const DEFAULT_MAX_KEYWORDS = 5;

/** Expected head count at which group keywords are added. */
export const GROUP_KEYWORD_THRESHOLD = 8;

// === Enrichment ===

/** Only the first N search results get a review lookup. */
export const DEFAULT_MAX_DETAILED = 10;
export const REVIEW_DOCUMENTS_PER_PLACE = 5;
export const REVIEW_SNIPPETS_PER_PLACE = 3;
export const EXTRACTED_KEYWORDS_PER_PLACE = 5;

// === Recommendation ===

export const DEFAULT_TOP_N = 3;
export const PROMPT_MAX_CANDIDATES = 20;
export const PROMPT_MAX_PREFERENCES = 5;
export const PROMPT_MAX_SNIPPETS = 2;
export const PROMPT_SNIPPET_CHARS = 150;

/** Size of the deterministic fallback recommendation list. */
export const FALLBACK_RECOMMENDATION_COUNT = 3;

// === LLM Provider Settings ===

/** The maximum number of attempts for a failed LLM call. */
export const LLM_RETRY_ATTEMPTS = 3;

/** The backoff delays (in ms) between attempts. Length should match LLM_RETRY_ATTEMPTS. */
export const LLM_RETRY_BACKOFF_MS = [0, 250, 750];

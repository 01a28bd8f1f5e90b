/**
 * Review text helpers: markup cleanup and feature-term extraction.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

// Surrogates and values past U+10FFFF are not characters; those stay raw.
function fromCodePoint(entity: string, code: number): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return entity;
  if (code >= 0xd800 && code <= 0xdfff) return entity;
  return String.fromCodePoint(code);
}

function decodeEntity(entity: string, body: string): string {
  if (body.startsWith('#x') || body.startsWith('#X')) {
    return fromCodePoint(entity, Number.parseInt(body.slice(2), 16));
  }
  if (body.startsWith('#')) {
    return fromCodePoint(entity, Number.parseInt(body.slice(1), 10));
  }
  return NAMED_ENTITIES[body] ?? entity;
}

/** Strips tags, decodes entities and collapses whitespace. */
export function cleanReviewText(html: string): string {
  return html
    .replace(/<[^>]*>/g, '')
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => decodeEntity(entity, body))
    .replace(/\s+/g, ' ')
    .trim();
}

interface FeatureTerm {
  keyword: string;
  patterns: readonly string[];
}

/** Features reviewers mention that matter when choosing a meeting place. */
const FEATURE_TERMS: readonly FeatureTerm[] = [
  { keyword: '주차', patterns: ['주차'] },
  { keyword: '룸', patterns: ['룸', '개별실', '개인실'] },
  { keyword: '단체', patterns: ['단체'] },
  { keyword: '조용한', patterns: ['조용'] },
  { keyword: '데이트', patterns: ['데이트'] },
  { keyword: '회식', patterns: ['회식'] },
  { keyword: '가성비', patterns: ['가성비'] },
  { keyword: '친절', patterns: ['친절'] },
  { keyword: '웨이팅', patterns: ['웨이팅', '대기'] },
  { keyword: '예약', patterns: ['예약'] },
  { keyword: '넓은', patterns: ['넓'] },
  { keyword: '뷰', patterns: ['뷰', '전망'] },
  { keyword: '깔끔', patterns: ['깔끔', '청결'] },
  { keyword: '심야', patterns: ['늦게까지', '새벽', '심야'] },
  { keyword: '분위기', patterns: ['분위기'] },
];

function countOccurrences(text: string, pattern: string): number {
  let count = 0;
  let index = text.indexOf(pattern);
  while (index !== -1) {
    count++;
    index = text.indexOf(pattern, index + pattern.length);
  }
  return count;
}

/**
 * Feature terms found in the texts, most mentioned first (ties in table order).
 */
export function extractFeatureTerms(texts: readonly string[], limit: number): string[] {
  const corpus = texts.join('\n');
  return FEATURE_TERMS
    .map(term => ({
      keyword: term.keyword,
      count: term.patterns.reduce((sum, pattern) => sum + countOccurrences(corpus, pattern), 0),
    }))
    .filter(entry => entry.count > 0)
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limit))
    .map(entry => entry.keyword);
}

/**
 * First administrative token ending in 구 or 군, e.g. "서울 강남구 역삼동" → "강남구".
 */
export function districtFromAddress(address: string | undefined): string | undefined {
  if (!address) return undefined;
  return address
    .split(/\s+/)
    .find(part => part.length > 1 && (part.endsWith('구') || part.endsWith('군')));
}

/** Most frequent value; ties go to the first seen. */
export function mostFrequent(values: readonly string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
  'is', 'are', 'was', 'were', 'be', 'been', 'have', 'has', 'had', 'do', 'does', 'did',
  'what', 'how', 'why', 'when', 'where', 'which', 'who', 'this', 'that', 'please',
]);

/** Lower-cased words longer than two characters, minus stop words. */
export function extractKeywords(text: string): string[] {
  const words = text.toLowerCase().match(/\b\w+\b/g) ?? [];
  return words.filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

/** Capitalized words, standalone numbers and quoted phrases, deduplicated. */
export function extractEntities(text: string): string[] {
  const entities = [
    ...(text.match(/\b[A-Z][a-z]+\b/g) ?? []),
    ...(text.match(/\b\d+(?:\.\d+)?\b/g) ?? []),
    ...Array.from(text.matchAll(/"([^"]+)"/g), (match) => match[1] ?? ''),
  ];
  return Array.from(new Set(entities.filter(Boolean)));
}

/** Fraction of `expected` keywords present in `actual`; 1 when nothing is expected. */
export function keywordOverlap(expected: string, actual: string): number {
  const wanted = new Set(extractKeywords(expected));
  if (wanted.size === 0) return 1;
  const present = new Set(extractKeywords(actual));
  let hits = 0;
  for (const word of wanted) {
    if (present.has(word)) hits += 1;
  }
  return hits / wanted.size;
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

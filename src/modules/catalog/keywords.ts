// Architectural and visual terms curated into metadata style/tags
export const KEYWORD_VOCABULARY: ReadonlySet<string> = new Set([
  'indoor',
  'garden',
  'gardens',
  'greenery',
  'trees',
  'plants',
  'glass',
  'modern',
  'classic',
  'vault',
  'arched',
  'arches',
  'wood',
  'bamboo',
  'fabric',
  'curved',
  'color',
  'bright',
  'lotus',
  'heritage',
  'spacious',
  'art',
  'biophilic',
  'beautiful',
  'facade',
  'facades',
]);

/** Known vocabulary terms in the query, lower-cased, sorted and unique. */
export function extractKeywords(query: string | null | undefined): string[] {
  const tokens = (query || '').toLowerCase().match(/[a-z]+/g) ?? [];
  return [...new Set(tokens.filter((token) => KEYWORD_VOCABULARY.has(token)))].sort();
}

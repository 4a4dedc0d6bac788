/**
 * Normalisation commune au mot-clé et au texte recherché
 */
export function normalizeForMatch(value: string): string {
  return value.normalize('NFC').toLowerCase();
}

export function containsKeyword(text: string, keyword: string): boolean {
  const needle = normalizeForMatch(keyword);
  if (needle === '') return false;
  return normalizeForMatch(text).includes(needle);
}

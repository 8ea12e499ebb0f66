// Keys look like `series-language-name` with an optional trailing variant marker, e.g. `原神-中文-胡桃_ZH`.
const SEGMENT_SEPARATOR = '-';

export function hasVariantMarker(key: string, marker: string): boolean {
  return key.endsWith(marker);
}

export function canonicalIdentity(key: string, marker: string): string {
  return key.split(marker).join('');
}

export function isExcludedLanguage(key: string, markers: readonly string[]): boolean {
  const lowered = key.toLowerCase();
  return markers.some((marker) => marker && lowered.includes(marker.toLowerCase()));
}

export function extractNamePart(key: string, marker: string): string {
  const segments = key.split(SEGMENT_SEPARATOR);
  const last = segments[segments.length - 1] ?? key;
  return canonicalIdentity(last, marker);
}

/**
 * Marked keys first so the preferred-language record is stored before its
 * unmarked counterpart. Order inside each group follows the input.
 */
export function orderForMerge(keys: readonly string[], marker: string): string[] {
  const rank = (key: string) => (hasVariantMarker(key, marker) ? 0 : 1);
  return keys
    .map((key, index) => ({ key, index }))
    .sort((a, b) => rank(a.key) - rank(b.key) || a.index - b.index)
    .map(({ key }) => key);
}

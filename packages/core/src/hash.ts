/**
 * FNV-1a over UTF-16 code units, used for alphabet fingerprints.
 */

export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Eight lowercase hex digits. */
export function fingerprint(text: string): string {
  return fnv1a(text).toString(16).padStart(8, "0");
}

/**
 * packages/core/src/text/fingerprint.ts — Change-detection fingerprints.
 *
 * A ContentBuffer compares fingerprints to skip re-wrapping unchanged text.
 * The strategy is swappable so tests can use plain equality.
 */

export interface FingerprintStrategy {
  readonly name: string;
  fingerprint(text: string): string;
}

function toHex32(v: number): string {
  return (v >>> 0).toString(16).padStart(8, "0");
}

/** FNV-1a over UTF-16 code units. */
export function hashFnv1a32(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export const fnv1aFingerprint: FingerprintStrategy = Object.freeze({
  name: "fnv1a32",
  fingerprint(text: string): string {
    return `${toHex32(hashFnv1a32(text))}:${String(text.length)}`;
  },
});

/** The text is its own fingerprint. */
export const identityFingerprint: FingerprintStrategy = Object.freeze({
  name: "identity",
  fingerprint(text: string): string {
    return text;
  },
});

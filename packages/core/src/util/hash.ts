import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

/**
 * JSON with object keys sorted, so equal values always hash the same.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v instanceof Set) {
      return Array.from(v).sort();
    }
    if (v && typeof v === 'object' && !Array.isArray(v)) {
      const sorted: Record<string, unknown> = {};
      const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      for (const [k, inner] of entries) {
        sorted[k] = inner;
      }
      return sorted;
    }
    return v;
  });
}

export function hashJson(obj: unknown): string {
  return bytesToHex(sha256(utf8ToBytes(canonicalJson(obj))));
}

export function hashString(s: string): string {
  return bytesToHex(sha256(utf8ToBytes(s)));
}

export function nowMs(): number {
  return Date.now();
}

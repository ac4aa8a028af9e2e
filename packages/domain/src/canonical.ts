/**
 * Canonical serialization and content hashing.
 *
 * DETERMINISTIC: object keys are sorted at every depth, so the same content
 * always produces the same bytes and the same SHA-256, whatever the key
 * insertion order. undefined members are dropped, as JSON.stringify does.
 */

import { createHash } from 'node:crypto';
import type { ContentHash } from './types.js';

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue | undefined };

export function canonicalJson(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot canonicalize non-finite number: ${value}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (isCanonicalArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  const entries: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    if (member === undefined) continue;
    entries.push(`${JSON.stringify(key)}:${canonicalJson(member)}`);
  }
  return `{${entries.join(',')}}`;
}

function isCanonicalArray(value: CanonicalValue): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

export function sha256Hex(data: string): ContentHash {
  return createHash('sha256').update(data).digest('hex');
}

export function computeContentHash(value: CanonicalValue): ContentHash {
  return sha256Hex(canonicalJson(value));
}

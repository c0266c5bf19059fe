/**
 * Text form of a chip's FLAG block: whitespace separated `key=value` pairs.
 * Values are typed by shape.
 */

import { ChipFlagValue } from '../model/module.js';

const INTEGER = /^-?\d+$/;
const FLOAT = /^-?\d+\.\d+$/;

export function parseFlagValue(value: string): ChipFlagValue {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (INTEGER.test(value)) return parseInt(value, 10);
  if (FLOAT.test(value)) return parseFloat(value);
  return value;
}

/** Keys are kept verbatim, `__proto__` included. */
export function parseChipFlags(text: string): Record<string, ChipFlagValue> {
  const flags: Record<string, ChipFlagValue> = Object.create(null);
  for (const token of text.split(/\s+/)) {
    if (!token) continue;
    const eq = token.indexOf('=');
    // a bare key carries no value
    if (eq < 0) {
      flags[token] = '';
      continue;
    }
    flags[token.slice(0, eq)] = parseFlagValue(token.slice(eq + 1));
  }
  return flags;
}

/** One `key=value` line per flag, in insertion order. */
export function serializeChipFlags(flags: Record<string, ChipFlagValue>): string {
  return Object.entries(flags)
    .map(([key, value]) => `${key}=${String(value)}\n`)
    .join('');
}

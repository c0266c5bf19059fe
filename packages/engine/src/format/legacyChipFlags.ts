/**
 * Unpacking of the 32-bit per-chip flag words used before FLAG blocks.
 *
 * Field layouts live in `model/data/legacyChipFlags.json`, one group per
 * chip family. SMS packs its clock and chip type in a way no shift/mask pair
 * describes, so it is handled here.
 */

import layoutTable from '../model/data/legacyChipFlags.json';
import { ChipType } from '../model/chips.js';
import { ChipFlagValue } from '../model/module.js';

interface FlagField {
  key: string;
  shift: number;
  bits: number;
  bool?: boolean;
  offset?: number;
}

const layouts = new Map<string, FlagField[]>();
for (const group of layoutTable) {
  const fields: FlagField[] = group.fields.map(f => ({ ...f }));
  for (const chip of group.chips) layouts.set(chip, fields);
}

/** Bits `shift .. shift+bits-1` of an unsigned 32-bit word. */
function bitField(word: number, shift: number, bits: number): number {
  return Math.floor(word / 2 ** shift) % 2 ** bits;
}

function unpackSms(word: number): Record<string, ChipFlagValue> {
  let clockSel = word & 0xff03;
  if (clockSel > 0x100) clockSel -= 252;
  let chipType = Math.floor((word & 0xcc) / 4);
  if (chipType >= 32) chipType -= 24;
  else if (chipType >= 16) chipType -= 12;
  return { clockSel, chipType, noPhaseReset: word >>> 4 };
}

export function hasLegacyFlagLayout(chip: ChipType): boolean {
  return chip.name === 'SMS' || layouts.has(chip.name);
}

/**
 * Flag map for one chip. Chips without a known layout yield `{}`; every
 * bit pattern is accepted.
 */
export function unpackLegacyChipFlags(chip: ChipType, flagWord: number): Record<string, ChipFlagValue> {
  const word = flagWord >>> 0;
  if (chip.name === 'SMS') return unpackSms(word);

  const fields = layouts.get(chip.name);
  const out: Record<string, ChipFlagValue> = {};
  if (!fields) return out;
  for (const field of fields) {
    const raw = bitField(word, field.shift, field.bits);
    out[field.key] = field.bool ? raw !== 0 : raw + (field.offset ?? 0);
  }
  return out;
}

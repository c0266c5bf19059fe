/**
 * Sound chip table: id byte as stored in the INFO block, canonical name and
 * the fixed channel count of that chip.
 */

import chipTable from './data/chips.json';
import { UnknownEnumValueError } from '../errors.js';

export interface ChipType {
  readonly id: number;
  readonly name: string;
  readonly channels: number;
}

const byId = new Map<number, ChipType>();
const byName = new Map<string, ChipType>();

for (const entry of chipTable) {
  const chip: ChipType = Object.freeze({ id: entry.id, name: entry.name, channels: entry.channels });
  byId.set(chip.id, chip);
  byName.set(chip.name, chip);
}

export const CHIP_TYPES: readonly ChipType[] = Array.from(byId.values());

export function findChipById(id: number): ChipType | undefined {
  return byId.get(id);
}

/**
 * @throws UnknownEnumValueError for an id outside the table
 */
export function chipById(id: number, component = 'chips', offset = 0): ChipType {
  const chip = byId.get(id);
  if (!chip) throw new UnknownEnumValueError(component, offset, 'chip type', id);
  return chip;
}

export function chipByName(name: string): ChipType {
  const chip = byName.get(name);
  if (!chip) throw new UnknownEnumValueError('chips', 0, 'chip type', name);
  return chip;
}

/**
 * Loop/release markers inside macro data.
 *
 * On disk a macro is a value list plus two positions. In memory the
 * positions become `MacroMarker` items inside the list. A marker position
 * past the end lands at the end.
 */

import { MacroMarker } from '../model/enums.js';
import { MacroItem } from '../model/instrument.js';

export function insertMarker(data: MacroItem[], marker: MacroMarker, position: number): void {
  data.splice(Math.min(Math.max(position, 0), data.length), 0, marker);
}

/**
 * Markers are placed loop first, then release at its own position counted
 * on the list that already holds the loop marker.
 */
export function withMarkers(values: number[], loop: number | null, release: number | null): MacroItem[] {
  const data: MacroItem[] = [...values];
  if (loop !== null) insertMarker(data, MacroMarker.LOOP, loop);
  if (release !== null) insertMarker(data, MacroMarker.RELEASE, release);
  return data;
}

export interface SplitMacro {
  values: number[];
  loop: number | null;
  release: number | null;
}

/** Inverse of `withMarkers`: release comes out first, then loop. */
export function splitMarkers(data: readonly MacroItem[]): SplitMacro {
  const items = [...data];
  const releaseAt = items.indexOf(MacroMarker.RELEASE);
  if (releaseAt >= 0) items.splice(releaseAt, 1);
  const loopAt = items.indexOf(MacroMarker.LOOP);
  if (loopAt >= 0) items.splice(loopAt, 1);

  const values: number[] = [];
  for (const item of items) {
    if (typeof item === 'number') values.push(item);
  }
  return {
    values,
    loop: loopAt >= 0 ? loopAt : null,
    release: releaseAt >= 0 ? releaseAt : null,
  };
}

/** Apply `fn` to every value, leaving markers in place. */
export function mapValues(data: MacroItem[], fn: (value: number) => number): void {
  for (let i = 0; i < data.length; i++) {
    const item = data[i];
    if (typeof item === 'number') data[i] = fn(item);
  }
}

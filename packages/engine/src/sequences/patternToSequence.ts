/**
 * Flatten tracker rows into note-length entries: each note lasts until the
 * next one, and blank rows only extend what is already sounding.
 */

import { EffectPair, Pattern, UNSET } from '../model/pattern.js';
import { InterNote, toInterNote } from '../interchange/notes.js';

export interface SequenceEntry {
  note: InterNote;
  /** rows */
  length: number;
  /** -1 until the pattern sets a volume */
  volume: number;
  octave: number;
  /** -1 when unset */
  instrument: number;
  effects: EffectPair[];
}

function isSingleUnset(effects: readonly EffectPair[]): boolean {
  return effects.length === 1 && effects[0][0] === UNSET && effects[0][1] === UNSET;
}

export function patternToSequence(pattern: Pattern): SequenceEntry[] {
  const out: SequenceEntry[] = [];
  let lastVolume = -1;
  for (const row of pattern.rows) {
    const note = toInterNote(row.note);
    if (row.volume !== UNSET) lastVolume = row.volume;
    const previous = out[out.length - 1];
    if (note === InterNote.Blank && previous) {
      previous.length += 1;
      continue;
    }
    out.push({
      note,
      length: 1,
      volume: lastVolume,
      octave: row.octave,
      instrument: row.instrument === UNSET ? -1 : row.instrument,
      effects: isSingleUnset(row.effects) ? [] : row.effects.map((pair): EffectPair => [pair[0], pair[1]]),
    });
  }
  return out;
}

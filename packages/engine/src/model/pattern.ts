import { Note } from './enums.js';

/** "No value" marker for instrument, volume and both halves of an effect. */
export const UNSET = 0xffff;

export type EffectPair = [command: number, value: number];

export interface Row {
  note: Note;
  octave: number;
  instrument: number;
  volume: number;
  effects: EffectPair[];
}

/**
 * One pattern of one channel of one subsong. `rows.length` always equals
 * the owning subsong's pattern length after a decode.
 */
export interface Pattern {
  channel: number;
  index: number;
  subsong: number;
  name: string;
  rows: Row[];
}

export function emptyRow(effectColumns: number): Row {
  const effects: EffectPair[] = [];
  for (let i = 0; i < effectColumns; i++) effects.push([UNSET, UNSET]);
  return { note: Note.NONE, octave: 0, instrument: UNSET, volume: UNSET, effects };
}

export function isEmptyRow(row: Row): boolean {
  return row.note === Note.NONE
    && row.instrument === UNSET
    && row.volume === UNSET
    && row.effects.every(([cmd, val]) => cmd === UNSET && val === UNSET);
}

export function createPattern(channel: number, index: number, subsong = 0): Pattern {
  return { channel, index, subsong, name: '', rows: [] };
}

export function patternKey(channel: number, index: number, subsong: number): string {
  return `${subsong}:${channel}:${index}`;
}

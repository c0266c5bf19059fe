/**
 * Tracker-neutral note names, for converting patterns into other sequencers'
 * formats.
 */

import { UnknownEnumValueError } from '../errors.js';
import { Note } from '../model/enums.js';

export enum InterNote {
  Blank = 1,
  C,
  Cs,
  D,
  Ds,
  E,
  F,
  Fs,
  G,
  Gs,
  A,
  As,
  B,
  Off,
  OffRelease,
  Release,
  Echo,
}

const TO_INTER: ReadonlyMap<Note, InterNote> = new Map([
  [Note.NONE, InterNote.Blank],
  [Note.C, InterNote.C],
  [Note.C_SHARP, InterNote.Cs],
  [Note.D, InterNote.D],
  [Note.D_SHARP, InterNote.Ds],
  [Note.E, InterNote.E],
  [Note.F, InterNote.F],
  [Note.F_SHARP, InterNote.Fs],
  [Note.G, InterNote.G],
  [Note.G_SHARP, InterNote.Gs],
  [Note.A, InterNote.A],
  [Note.A_SHARP, InterNote.As],
  [Note.B, InterNote.B],
  [Note.OFF, InterNote.Off],
  [Note.OFF_RELEASE, InterNote.OffRelease],
  [Note.RELEASE, InterNote.Release],
]);

const FROM_INTER: ReadonlyMap<InterNote, Note> = new Map(Array.from(TO_INTER, ([note, inter]): [InterNote, Note] => [inter, note]));

/**
 * @throws UnknownEnumValueError for a number outside the note table
 */
export function toInterNote(note: number): InterNote {
  const inter = TO_INTER.get(note);
  if (inter === undefined) throw new UnknownEnumValueError('interchange', 0, 'note', note);
  return inter;
}

/** Notes without a tracker counterpart (`Echo`) become `Note.NONE`. */
export function fromInterNote(note: InterNote): Note {
  return FROM_INTER.get(note) ?? Note.NONE;
}

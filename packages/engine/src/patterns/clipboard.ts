/**
 * Tracker clipboard text for rows and patterns, plus a readable row dump.
 */

import { Note } from '../model/enums.js';
import { Pattern, Row, UNSET } from '../model/pattern.js';

export const CLIPBOARD_HEADER = 'org.tildearrow.furnace - Pattern Data\n0\n';

const NOTE_NAMES: Record<number, string> = {
  [Note.C]: 'C-',
  [Note.C_SHARP]: 'C#',
  [Note.D]: 'D-',
  [Note.D_SHARP]: 'D#',
  [Note.E]: 'E-',
  [Note.F]: 'F-',
  [Note.F_SHARP]: 'F#',
  [Note.G]: 'G-',
  [Note.G_SHARP]: 'G#',
  [Note.A]: 'A-',
  [Note.A_SHARP]: 'A#',
  [Note.B]: 'B-',
};

interface NoteGlyphs {
  none: string;
  off: string;
  offRelease: string;
  release: string;
}

const CLIPBOARD_GLYPHS: NoteGlyphs = { none: '...', off: 'OFF', offRelease: '===', release: 'REL' };
const DISPLAY_GLYPHS: NoteGlyphs = { none: '---', off: 'OFF', offRelease: '===', release: '///' };

function noteText(row: Row, glyphs: NoteGlyphs): string {
  switch (row.note) {
    case Note.NONE:
      return glyphs.none;
    case Note.OFF:
      return glyphs.off;
    case Note.OFF_RELEASE:
      return glyphs.offRelease;
    case Note.RELEASE:
      return glyphs.release;
    default:
      return `${NOTE_NAMES[row.note]}${row.octave}`;
  }
}

function hex(value: number, unset: string, upper: boolean): string {
  if (value === UNSET) return unset;
  const text = value.toString(16).padStart(2, '0');
  return upper ? text.toUpperCase() : text;
}

/** One row without the clipboard header, e.g. `C-401..0A05|`. */
export function rowToClipboard(row: Row): string {
  let out = noteText(row, CLIPBOARD_GLYPHS) + hex(row.instrument, '..', true) + hex(row.volume, '..', true);
  for (const [command, value] of row.effects) out += hex(command, '..', true) + hex(value, '..', true);
  return out + '|';
}

export function patternToClipboard(pattern: Pattern): string {
  return CLIPBOARD_HEADER + pattern.rows.map(rowToClipboard).join('\n');
}

/** Space separated dump for logs, e.g. `C-4 01 -- 0a05`. */
export function formatRow(row: Row): string {
  const parts = [noteText(row, DISPLAY_GLYPHS), hex(row.instrument, '--', false), hex(row.volume, '--', false)];
  for (const [command, value] of row.effects) parts.push(hex(command, '--', false) + hex(value, '--', false));
  return parts.join(' ');
}

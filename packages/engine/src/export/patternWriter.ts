/**
 * Pattern encoder: fixed `PATR` rows before v157, packed `PATN` rows after.
 */

import { BinaryWriter } from '../io/binaryWriter.js';
import { InvalidFieldValueError } from '../errors.js';
import { Note } from '../model/enums.js';
import { Subsong } from '../model/module.js';
import { emptyRow, isEmptyRow, Pattern, Row, UNSET } from '../model/pattern.js';
import { PATTERN_LEGACY_MAGIC, PATTERN_SPARSE_MAGIC, VERSION } from '../format/signatures.js';
import {
  MAX_EFFECT_COLUMNS,
  PACKED_END,
  PACKED_NOTE_OFF,
  PACKED_NOTE_OFF_RELEASE,
  PACKED_NOTE_RELEASE,
  PACKED_SKIP,
  PatternContext,
} from '../import/pattern.reader.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'pattern';
const log = createLogger(COMPONENT);

const OCTAVE_BIAS = 5;
/** Longest run one skip byte can describe; 0xff is taken by the end marker. */
const MAX_SKIP = 0x7e + 2;

interface Shape {
  rows: number;
  effectColumns: number;
}

function shapeFor(song: Subsong | undefined, pattern: Pattern, at: number): Shape {
  if (!song) {
    throw new InvalidFieldValueError(COMPONENT, at, 'subsong', pattern.subsong, 'no such subsong');
  }
  const effectColumns = song.effectColumns[pattern.channel];
  if (effectColumns === undefined) {
    throw new InvalidFieldValueError(COMPONENT, at, 'channel', pattern.channel, `subsong has ${song.effectColumns.length} channel(s)`);
  }
  if (pattern.rows.length > song.patternLength) {
    throw new InvalidFieldValueError(COMPONENT, at, 'rows', pattern.rows.length, `pattern length is ${song.patternLength}`);
  }
  return { rows: song.patternLength, effectColumns };
}

/** Rows padded to the pattern length, each with exactly `effectColumns` effects. */
function normalizedRows(pattern: Pattern, shape: Shape): Row[] {
  const rows: Row[] = [];
  for (let i = 0; i < shape.rows; i++) {
    const src = pattern.rows[i];
    const row = emptyRow(shape.effectColumns);
    if (src) {
      row.note = src.note;
      row.octave = src.octave;
      row.instrument = src.instrument;
      row.volume = src.volume;
      for (let c = 0; c < shape.effectColumns; c++) {
        const pair = src.effects[c];
        if (pair) row.effects[c] = [pair[0], pair[1]];
      }
    }
    rows.push(row);
  }
  return rows;
}

/** Packed note byte for a note and octave; inverse of `unpackNote`. */
export function packNote(note: Note, octave: number, at = 0): number {
  switch (note) {
    case Note.OFF:
      return PACKED_NOTE_OFF;
    case Note.OFF_RELEASE:
      return PACKED_NOTE_OFF_RELEASE;
    case Note.RELEASE:
      return PACKED_NOTE_RELEASE;
  }
  const raw = (octave + OCTAVE_BIAS) * 12 + (note === Note.C ? 0 : note);
  if (raw < 0 || raw >= PACKED_NOTE_OFF) {
    throw new InvalidFieldValueError(COMPONENT, at, 'octave', octave, 'outside the packed note range');
  }
  return raw;
}

// ---------- PATR ----------

function writeFixedRows(w: BinaryWriter, rows: Row[]): void {
  for (const row of rows) {
    w.writeU16(row.note);
    w.writeU16(row.note === Note.C ? row.octave - 1 : row.octave);
    w.writeU16(row.instrument);
    w.writeU16(row.volume);
    for (const [command, value] of row.effects) {
      w.writeU16(command);
      w.writeU16(value);
    }
  }
}

// ---------- PATN ----------

function presenceBits(effects: Row['effects'], from: number): number {
  let bits = 0;
  for (let c = 0; c < 4; c++) {
    const pair = effects[from + c];
    if (!pair) continue;
    if (pair[0] !== UNSET) bits |= 1 << (c * 2);
    if (pair[1] !== UNSET) bits |= 1 << (c * 2 + 1);
  }
  return bits;
}

function writePackedRow(w: BinaryWriter, row: Row): void {
  const low = presenceBits(row.effects, 0);
  const high = presenceBits(row.effects, 4);
  let head = 0;
  if (row.note !== Note.NONE) head |= 0x01;
  if (row.instrument !== UNSET) head |= 0x02;
  if (row.volume !== UNSET) head |= 0x04;
  // column 0 is always flagged in the head; the presence bytes only follow for the rest
  head |= (low & 0x03) << 3;
  if (low & ~0x03) head |= 0x20;
  if (high) head |= 0x40;
  w.writeU8(head);
  if (head & 0x20) w.writeU8(low);
  if (head & 0x40) w.writeU8(high);
  if (head & 0x01) w.writeU8(packNote(row.note, row.octave, w.position));
  if (head & 0x02) w.writeU8(row.instrument);
  if (head & 0x04) w.writeU8(row.volume);
  for (const [command, value] of row.effects) {
    if (command !== UNSET) w.writeU8(command);
    if (value !== UNSET) w.writeU8(value);
  }
}

function writeSkip(w: BinaryWriter, count: number): void {
  let left = count;
  while (left >= 2) {
    const run = Math.min(left, MAX_SKIP);
    w.writeU8(PACKED_SKIP | (run - 2));
    left -= run;
  }
  // a bare head byte is one empty row
  if (left === 1) w.writeU8(0);
}

function writePackedRows(w: BinaryWriter, rows: Row[]): void {
  let last = rows.length;
  while (last > 0 && isEmptyRow(rows[last - 1])) last--;
  let i = 0;
  while (i < last) {
    if (isEmptyRow(rows[i])) {
      let run = 0;
      while (i + run < last && isEmptyRow(rows[i + run])) run++;
      writeSkip(w, run);
      i += run;
      continue;
    }
    writePackedRow(w, rows[i]);
    i++;
  }
  // trailing empty rows are implied by the end marker
  w.writeU8(PACKED_END);
}

/** Append one pattern block in the form `ctx.version` calls for. */
export function writePattern(w: BinaryWriter, pattern: Pattern, ctx: PatternContext): void {
  const start = w.position;
  const shape = shapeFor(ctx.subsongs[pattern.subsong], pattern, start);
  if (ctx.version >= VERSION.SPARSE_PATTERNS && shape.effectColumns > MAX_EFFECT_COLUMNS) {
    throw new InvalidFieldValueError(COMPONENT, start, 'effect columns', shape.effectColumns, `packed rows hold at most ${MAX_EFFECT_COLUMNS}`);
  }
  const rows = normalizedRows(pattern, shape);
  if (ctx.version >= VERSION.SPARSE_PATTERNS) {
    w.writeBlock(PATTERN_SPARSE_MAGIC, body => {
      body.writeU8(pattern.subsong);
      body.writeU8(pattern.channel);
      body.writeU16(pattern.index);
      body.writeCString(pattern.name);
      writePackedRows(body, rows);
    });
  } else {
    w.writeBlock(PATTERN_LEGACY_MAGIC, body => {
      body.writeU16(pattern.channel);
      body.writeU16(pattern.index);
      body.writeU16(pattern.subsong);
      body.writeU16(0);
      writeFixedRows(body, rows);
      if (ctx.version >= VERSION.PATTERN_NAME) body.writeCString(pattern.name);
    });
  }
  log.debug(`pattern at 0x${start.toString(16)}: subsong ${pattern.subsong} ch ${pattern.channel} #${pattern.index}`);
}

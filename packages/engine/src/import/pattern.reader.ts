/**
 * Pattern decoding.
 *
 * Before v157 every row is a fixed record (`PATR`); from v157 rows are
 * bit-packed with run-length gaps (`PATN`). Either way the decoded pattern
 * holds exactly `patternLength` rows of its subsong.
 */

import { BinaryReader } from '../io/binaryReader.js';
import { InvalidFieldValueError } from '../errors.js';
import { decodeEnum, Note } from '../model/enums.js';
import { Subsong } from '../model/module.js';
import { EffectPair, emptyRow, Pattern, Row, UNSET } from '../model/pattern.js';
import { enterBlock } from '../format/block.js';
import { PATTERN_LEGACY_MAGIC, PATTERN_SPARSE_MAGIC, VERSION } from '../format/signatures.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'pattern';
const log = createLogger(COMPONENT);

/** Number of effect columns a packed row can describe. */
export const MAX_EFFECT_COLUMNS = 8;

export const PACKED_END = 0xff;
export const PACKED_SKIP = 0x80;

export const PACKED_NOTE_OFF = 180;
export const PACKED_NOTE_OFF_RELEASE = 181;
export const PACKED_NOTE_RELEASE = 182;

/** Octave bias of packed note numbers: raw 0 is C-(-5). */
const OCTAVE_BIAS = 5;

export interface PatternContext {
  version: number;
  subsongs: readonly Subsong[];
}

interface PatternShape {
  rows: number;
  effectColumns: number;
}

function shapeOf(ctx: PatternContext, subsong: number, channel: number, at: number): PatternShape {
  const song = ctx.subsongs[subsong];
  if (!song) {
    throw new InvalidFieldValueError(COMPONENT, at, 'subsong', subsong, `module has ${ctx.subsongs.length} subsong(s)`);
  }
  const effectColumns = song.effectColumns[channel];
  if (effectColumns === undefined) {
    throw new InvalidFieldValueError(COMPONENT, at, 'channel', channel, `module has ${song.effectColumns.length} channel(s)`);
  }
  return { rows: song.patternLength, effectColumns };
}

/** Note and octave from a packed note byte. */
export function unpackNote(raw: number, at = 0): { note: Note; octave: number } {
  switch (raw) {
    case PACKED_NOTE_OFF:
      return { note: Note.OFF, octave: 0 };
    case PACKED_NOTE_OFF_RELEASE:
      return { note: Note.OFF_RELEASE, octave: 0 };
    case PACKED_NOTE_RELEASE:
      return { note: Note.RELEASE, octave: 0 };
  }
  const semitone = raw % 12;
  const note = decodeEnum(Note, semitone === 0 ? Note.C : semitone, 'note', COMPONENT, at);
  return { note, octave: Math.floor(raw / 12) - OCTAVE_BIAS };
}

// ---------- PATR ----------

function readFixedRows(r: BinaryReader, shape: PatternShape): Row[] {
  const rows: Row[] = [];
  for (let i = 0; i < shape.rows; i++) {
    const at = r.absolutePosition;
    const note = decodeEnum(Note, r.u16(), 'note', COMPONENT, at);
    let octave = r.u16();
    // C was stored one octave low
    if (note === Note.C) octave += 1;
    const instrument = r.u16();
    const volume = r.u16();
    const effects: EffectPair[] = [];
    for (let c = 0; c < shape.effectColumns; c++) effects.push([r.u16(), r.u16()]);
    rows.push({ note, octave, instrument, volume, effects });
  }
  return rows;
}

function readFixedPattern(r: BinaryReader, ctx: PatternContext): Pattern {
  const at = r.absolutePosition;
  const body = enterBlock(r, PATTERN_LEGACY_MAGIC, COMPONENT);
  const channel = body.u16();
  const index = body.u16();
  const subsong = body.u16();
  body.u16(); // reserved
  const rows = readFixedRows(body, shapeOf(ctx, subsong, channel, at));
  const name = ctx.version >= VERSION.PATTERN_NAME ? body.cString() : '';
  return { channel, index, subsong, name, rows };
}

// ---------- PATN ----------

interface EffectPresence {
  command: boolean;
  value: boolean;
}

function readPackedRow(r: BinaryReader, head: number, effectColumns: number): Row {
  const presence: EffectPresence[] = [];
  for (let c = 0; c < MAX_EFFECT_COLUMNS; c++) presence.push({ command: false, value: false });
  presence[0] = { command: (head & 0x08) !== 0, value: (head & 0x10) !== 0 };
  if (head & 0x20) {
    const at = r.absolutePosition;
    const bits = r.u8();
    // column 0 is flagged in both bytes and they must agree
    if ((bits & 0x03) !== ((head >> 3) & 0x03)) {
      throw new InvalidFieldValueError(COMPONENT, at, 'effect presence', bits, `column 0 bits disagree with head 0x${head.toString(16)}`);
    }
    for (let c = 0; c < 4; c++) {
      presence[c] = { command: ((bits >> (c * 2)) & 1) !== 0, value: ((bits >> (c * 2 + 1)) & 1) !== 0 };
    }
  }
  if (head & 0x40) {
    const bits = r.u8();
    for (let c = 0; c < 4; c++) {
      presence[c + 4] = { command: ((bits >> (c * 2)) & 1) !== 0, value: ((bits >> (c * 2 + 1)) & 1) !== 0 };
    }
  }

  const row = emptyRow(effectColumns);
  if (head & 0x01) {
    const at = r.absolutePosition;
    const { note, octave } = unpackNote(r.u8(), at);
    row.note = note;
    row.octave = octave;
  }
  if (head & 0x02) row.instrument = r.u8();
  if (head & 0x04) row.volume = r.u8();
  presence.forEach((p, c) => {
    const command = p.command ? r.u8() : UNSET;
    const value = p.value ? r.u8() : UNSET;
    // columns the channel does not show are consumed and dropped
    if (c < effectColumns) row.effects[c] = [command, value];
  });
  return row;
}

function readPackedRows(r: BinaryReader, shape: PatternShape): Row[] {
  const rows: Row[] = [];
  while (rows.length < shape.rows) {
    const head = r.u8();
    if (head === PACKED_END) break;
    if (head & PACKED_SKIP) {
      const skip = (head & 0x7f) + 2;
      const room = shape.rows - rows.length;
      if (skip > room) {
        log.warn(`skip of ${skip} rows overshoots pattern end by ${skip - room}`);
      }
      for (let i = 0; i < Math.min(skip, room); i++) rows.push(emptyRow(shape.effectColumns));
      continue;
    }
    rows.push(readPackedRow(r, head, shape.effectColumns));
  }
  while (rows.length < shape.rows) rows.push(emptyRow(shape.effectColumns));
  return rows;
}

function readPackedPattern(r: BinaryReader, ctx: PatternContext): Pattern {
  const at = r.absolutePosition;
  const body = enterBlock(r, PATTERN_SPARSE_MAGIC, COMPONENT);
  const subsong = body.u8();
  const channel = body.u8();
  const index = body.u16();
  const name = body.cString();
  const rows = readPackedRows(body, shapeOf(ctx, subsong, channel, at));
  return { channel, index, subsong, name, rows };
}

/** One pattern block; the module version picks the row encoding. */
export function readPattern(r: BinaryReader, ctx: PatternContext): Pattern {
  const start = r.absolutePosition;
  const pattern = ctx.version >= VERSION.SPARSE_PATTERNS ? readPackedPattern(r, ctx) : readFixedPattern(r, ctx);
  log.debug(`pattern at 0x${start.toString(16)}: subsong ${pattern.subsong} ch ${pattern.channel} #${pattern.index}`);
  return pattern;
}

import { BinaryReader } from '../src/io/binaryReader';
import { BinaryWriter } from '../src/io/binaryWriter';
import { InvalidFieldValueError } from '../src/errors';
import { Note } from '../src/model/enums';
import { createSubsong, Subsong } from '../src/model/module';
import { emptyRow, Pattern, Row, UNSET } from '../src/model/pattern';
import { PatternContext, readPattern, unpackNote } from '../src/import/pattern.reader';
import { packNote, writePattern } from '../src/export/patternWriter';
import { configureLogging, resetLogging } from '../src/util/logger';

function song(patternLength: number, effectColumns: number[]): Subsong {
  const s = createSubsong(effectColumns.length);
  s.patternLength = patternLength;
  s.effectColumns = effectColumns;
  return s;
}

function row(init: Partial<Row>, effectColumns: number): Row {
  return { ...emptyRow(effectColumns), ...init };
}

function encode(pattern: Pattern, ctx: PatternContext): Uint8Array {
  const w = new BinaryWriter();
  writePattern(w, pattern, ctx);
  return w.toUint8Array();
}

function decode(bytes: Uint8Array, ctx: PatternContext): Pattern {
  return readPattern(new BinaryReader(bytes, 0, 'test'), ctx);
}

function introPattern(): Pattern {
  const rows: Row[] = [];
  for (let i = 0; i < 8; i++) rows.push(emptyRow(2));
  rows[0] = row({ note: Note.C, octave: 4, instrument: 1, volume: 0x7f, effects: [[0x0a, 0x0f], [UNSET, UNSET]] }, 2);
  rows[3] = row({ note: Note.OFF, effects: [[UNSET, UNSET], [0x04, UNSET]] }, 2);
  return { channel: 0, index: 3, subsong: 0, name: 'intro', rows };
}

const modern: PatternContext = { version: 200, subsongs: [song(8, [2, 1])] };

describe('packed notes', () => {
  test('octave bias and C', () => {
    expect(packNote(Note.C, 4)).toBe(108);
    expect(unpackNote(108)).toEqual({ note: Note.C, octave: 4 });
    expect(packNote(Note.C_SHARP, -5)).toBe(1);
    expect(unpackNote(0)).toEqual({ note: Note.C, octave: -5 });
    expect(packNote(Note.B, 9)).toBe(179);
  });

  test('off and release notes', () => {
    expect(packNote(Note.OFF, 3)).toBe(180);
    expect(packNote(Note.OFF_RELEASE, 0)).toBe(181);
    expect(packNote(Note.RELEASE, 0)).toBe(182);
    expect(unpackNote(181)).toEqual({ note: Note.OFF_RELEASE, octave: 0 });
  });

  test('notes past the packed range are rejected', () => {
    expect(() => packNote(Note.C, 10)).toThrow(InvalidFieldValueError);
    expect(() => packNote(Note.B, -6)).toThrow(InvalidFieldValueError);
  });
});

describe('PATN', () => {
  test('encodes rows, gaps and the end marker', () => {
    const bytes = encode(introPattern(), modern);
    expect(Array.from(bytes.subarray(0, 4))).toEqual([0x50, 0x41, 0x54, 0x4e]);
    expect(Array.from(bytes.subarray(8))).toEqual([
      0, 0, 3, 0,
      0x69, 0x6e, 0x74, 0x72, 0x6f, 0,
      // note, instrument, volume and column 0 both described by the head
      0x1f, 108, 1, 0x7f, 0x0a, 0x0f,
      // two empty rows
      0x80,
      // column 1 needs the presence byte
      0x21, 0x04, 180, 0x04,
      0xff,
    ]);
    expect(bytes[4]).toBe(22);
  });

  test('decodes back to the same pattern', () => {
    const pattern = introPattern();
    expect(decode(encode(pattern, modern), modern)).toEqual(pattern);
  });

  test('column 0 stays in the head when later columns are present', () => {
    const rows: Row[] = [row({ note: Note.C, octave: 4, effects: [[0x0a, 0x0f], [0x04, 0x01]] }, 2)];
    const pattern: Pattern = { channel: 0, index: 0, subsong: 0, name: '', rows };
    const bytes = encode(pattern, modern);
    expect(Array.from(bytes.subarray(8 + 5))).toEqual([0x39, 0x0f, 108, 0x0a, 0x0f, 0x04, 0x01, 0xff]);
    expect(decode(bytes, modern).rows[0]).toEqual(rows[0]);
  });

  test('column 0 bits must agree between the head and the presence byte', () => {
    const w = new BinaryWriter();
    w.writeBlock('PATN', b => {
      b.writeBytes([0, 0, 0, 0, 0]);
      // head flags column 0, the presence byte does not
      b.writeBytes([0x39, 0x0c, 108, 0x0a, 0x0f, 0x04, 0x01, 0xff]);
    });
    expect(() => decode(w.toUint8Array(), modern)).toThrow(InvalidFieldValueError);
  });

  test('a skip byte covers its count plus two rows', () => {
    const w = new BinaryWriter();
    w.writeBlock('PATN', b => {
      b.writeBytes([0, 0, 0, 0, 0]);
      b.writeU8(0x83);
      b.writeBytes([0x07, 108, 2, 0x40]);
      b.writeU8(0xff);
    });
    const p = decode(w.toUint8Array(), modern);
    expect(p.rows).toHaveLength(8);
    expect(p.rows.slice(0, 5)).toEqual([emptyRow(2), emptyRow(2), emptyRow(2), emptyRow(2), emptyRow(2)]);
    expect(p.rows[5]).toEqual(row({ note: Note.C, octave: 4, instrument: 2, volume: 0x40 }, 2));
    expect(p.rows[6]).toEqual(emptyRow(2));
  });

  test('a skip past the end is clamped with a warning', () => {
    configureLogging({ level: 'warn' });
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    warn.mockClear();
    try {
      const w = new BinaryWriter();
      w.writeBlock('PATN', b => {
        b.writeBytes([0, 0, 0, 0, 0, 0x8a, 0xff]);
      });
      const p = decode(w.toUint8Array(), modern);
      expect(p.rows).toHaveLength(8);
      expect(warn).toHaveBeenCalledWith('[pattern]', 'skip of 12 rows overshoots pattern end by 4');
    } finally {
      resetLogging();
    }
  });

  test('effect columns the channel does not show are dropped', () => {
    const w = new BinaryWriter();
    w.writeBlock('PATN', b => {
      b.writeBytes([0, 1, 0, 0, 0]);
      // column 1 command and value
      b.writeBytes([0x20, 0x0c, 0x01, 0x02]);
      b.writeU8(0xff);
    });
    const p = decode(w.toUint8Array(), modern);
    expect(p.channel).toBe(1);
    expect(p.rows[0]).toEqual(emptyRow(1));
  });

  test('long gaps split at 128 rows', () => {
    const ctx: PatternContext = { version: 200, subsongs: [song(256, [1])] };
    const rows: Row[] = [];
    for (let i = 0; i < 256; i++) rows.push(emptyRow(1));
    rows[0] = row({ note: Note.C, octave: 4 }, 1);
    rows[130] = row({ note: Note.D, octave: 2 }, 1);
    const pattern: Pattern = { channel: 0, index: 0, subsong: 0, name: '', rows };

    const bytes = encode(pattern, ctx);
    // header, empty name, first row, then 129 empty rows
    expect(Array.from(bytes.subarray(8 + 7, 8 + 9))).toEqual([0xfe, 0x00]);
    expect(decode(bytes, ctx)).toEqual(pattern);
  });

  test('more than eight effect columns cannot be packed', () => {
    const ctx: PatternContext = { version: 200, subsongs: [song(4, [9])] };
    expect(() => encode({ channel: 0, index: 0, subsong: 0, name: '', rows: [] }, ctx)).toThrow(InvalidFieldValueError);
  });
});

describe('PATR', () => {
  const legacy: PatternContext = { version: 150, subsongs: modern.subsongs };

  test('C is stored one octave low', () => {
    const bytes = encode(introPattern(), legacy);
    expect(String.fromCharCode(...bytes.subarray(0, 4))).toBe('PATR');
    // row 0: note 12 then octave
    expect([bytes[16], bytes[18]]).toEqual([12, 3]);
  });

  test('decodes back to the same pattern', () => {
    const pattern = introPattern();
    expect(decode(encode(pattern, legacy), legacy)).toEqual(pattern);
  });

  test('names only exist from version 51', () => {
    const old: PatternContext = { version: 50, subsongs: modern.subsongs };
    const back = decode(encode(introPattern(), old), old);
    expect(back.name).toBe('');
    expect(back.rows[0].octave).toBe(4);
  });
});

describe('pattern shape', () => {
  test('short patterns are padded to the pattern length', () => {
    const pattern: Pattern = { channel: 1, index: 0, subsong: 0, name: '', rows: [row({ note: Note.E, octave: 1 }, 1)] };
    const back = decode(encode(pattern, modern), modern);
    expect(back.rows).toHaveLength(8);
    expect(back.rows[0]).toEqual(row({ note: Note.E, octave: 1 }, 1));
  });

  test('rows beyond the pattern length are rejected', () => {
    const rows: Row[] = [];
    for (let i = 0; i < 9; i++) rows.push(emptyRow(1));
    expect(() => encode({ channel: 1, index: 0, subsong: 0, name: '', rows }, modern)).toThrow(InvalidFieldValueError);
  });

  test('unknown channels are rejected on both sides', () => {
    expect(() => encode({ channel: 5, index: 0, subsong: 0, name: '', rows: [] }, modern)).toThrow(InvalidFieldValueError);
    const w = new BinaryWriter();
    w.writeBlock('PATN', b => b.writeBytes([0, 5, 0, 0, 0, 0xff]));
    expect(() => decode(w.toUint8Array(), modern)).toThrow(InvalidFieldValueError);
  });
});

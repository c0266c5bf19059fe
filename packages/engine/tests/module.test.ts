import { deflateSync } from 'zlib';
import { BinaryWriter } from '../src/io/binaryWriter';
import { BadMagicError, InvalidFieldValueError } from '../src/errors';
import { chipByName, ChipType } from '../src/model/chips';
import { createModule, getNumChannels } from '../src/model/module';
import { seedCompatFlags, writeCompatPhase } from '../src/format/compatFlagTable';
import { decodeModule, isModule, speedPatternFromSpeeds } from '../src/import/module.reader';
import { getModuleSummary } from '../src/import/summary';
import { encodeModule } from '../src/export/moduleWriter';
import { unpackLegacyChipFlags } from '../src/format/legacyChipFlags';
import layoutTable from '../src/model/data/legacyChipFlags.json';
import { configureLogging, resetLogging } from '../src/util/logger';
import { buildSpeakerModule } from './helpers/module';

/**
 * A release-100 module holding one chip with a packed flag word, speeds 3
 * and 4 and no tables.
 */
function legacyV100(chip: ChipType, flagWord: number): Uint8Array {
  const version = 100;
  const compat = seedCompatFlags(version);
  const n = chip.channels;
  const w = new BinaryWriter();
  w.writeAscii('-Furnace module-');
  w.writeU16(version);
  w.writeU16(0);
  w.writeU32(32);
  w.fill(8);
  w.writeBlock('INFO', b => {
    b.writeBytes([0, 3, 4, 1]);
    b.writeF32(60);
    b.writeU16(32);
    b.writeU16(1);
    b.writeBytes([4, 16]);
    b.writeU16(0);
    b.writeU16(0);
    b.writeU16(0);
    b.writeU32(0);

    b.writeU8(chip.id);
    b.fill(31);
    b.writeI8(64);
    b.fill(31);
    b.fill(32);
    b.writeU32(flagWord);
    b.fill(31 * 4);

    b.writeCString('Old');
    b.writeCString('someone');
    b.writeF32(440);
    writeCompatPhase(b, compat, 1, version);

    // orders, effect columns, shown, collapsed, names, abbreviations
    b.fill(n);
    b.fill(n, 1);
    b.fill(n, 1);
    b.fill(n);
    b.fill(n);
    b.fill(n);
    b.writeCString('');

    b.writeF32(1.5);
    writeCompatPhase(b, compat, 2, version);
    b.writeU16(150);
    b.writeU16(150);

    b.writeCString('');
    b.writeCString('');
    b.writeU8(0);
    b.fill(3);
  });
  return w.toUint8Array();
}

function genesisV100(): Uint8Array {
  return legacyV100(chipByName('GENESIS'), 0x80000003);
}

/** A current-format module written field by field: one PC speaker, no tables. */
function minimalV200(): Uint8Array {
  const version = 200;
  const compat = seedCompatFlags(version);
  const w = new BinaryWriter();
  w.writeAscii('-Furnace module-');
  w.writeU16(version);
  w.writeU16(0);
  w.writeU32(32);
  w.fill(8);
  w.writeBlock('INFO', b => {
    b.writeBytes([0, 6, 6, 1]);
    b.writeF32(60);
    b.writeU16(64);
    b.writeU16(1);
    b.writeBytes([4, 16]);
    b.writeU16(0);
    b.writeU16(0);
    b.writeU16(0);
    b.writeU32(0);

    b.writeU8(chipByName('PC_SPEAKER').id);
    b.fill(31);
    b.writeI8(64);
    b.fill(31);
    b.fill(32);
    // no FLAG block pointers
    b.fill(32 * 4);

    b.writeCString('Minimal');
    b.writeCString('');
    b.writeF32(440);
    writeCompatPhase(b, compat, 1, version);

    b.writeBytes([0, 1, 1, 0, 0, 0]);
    b.writeCString('');

    b.writeF32(2);
    writeCompatPhase(b, compat, 2, version);
    b.writeU16(150);
    b.writeU16(150);

    b.writeCString('');
    b.writeCString('');
    b.writeU8(0);
    b.fill(3);

    for (let i = 0; i < 6; i++) b.writeCString('');

    b.writeF32(1);
    b.writeF32(0);
    b.writeF32(0);
    b.writeU32(0);

    b.writeBool(compat.autoPatchbay);
    writeCompatPhase(b, compat, 3, version);

    b.writeU8(1);
    b.writeU8(6);
    b.fill(15);
    b.writeU8(0);
  });
  return w.toUint8Array();
}

describe('module round trip', () => {
  test('decode(encode(m)) reproduces the module', () => {
    const m = buildSpeakerModule();
    expect(decodeModule(encodeModule(m))).toEqual(m);
  });

  test('re-encoding a decoded module is byte identical', () => {
    const bytes = encodeModule(buildSpeakerModule());
    expect(encodeModule(decodeModule(bytes))).toEqual(bytes);
  });

  test('header layout', () => {
    const bytes = encodeModule(buildSpeakerModule());
    expect(String.fromCharCode(...bytes.subarray(0, 16))).toBe('-Furnace module-');
    expect([bytes[16], bytes[17]]).toEqual([200, 0]);
    expect([bytes[20], bytes[21], bytes[22], bytes[23]]).toEqual([32, 0, 0, 0]);
    expect(String.fromCharCode(...bytes.subarray(32, 36))).toBe('INFO');
  });

  test('chips without flags get no FLAG block', () => {
    const m = createModule({ version: 200, chips: [chipByName('PC_SPEAKER')] });
    const text = Buffer.from(encodeModule(m)).toString('latin1');
    expect(text.includes('FLAG')).toBe(false);
    expect(decodeModule(encodeModule(m)).chips.list[0].flags).toEqual({});
  });

  test('encoding needs the featural instrument format', () => {
    expect(() => encodeModule(buildSpeakerModule(), { version: 126 })).toThrow(InvalidFieldValueError);
  });

  test('orders of unequal length are rejected', () => {
    const m = createModule({ version: 200, chips: [chipByName('GB')] });
    m.subsongs[0].order[2] = [0, 1];
    expect(() => encodeModule(m)).toThrow(InvalidFieldValueError);
  });
});

describe('containers', () => {
  test('zlib-wrapped modules are inflated', () => {
    const m = buildSpeakerModule();
    const packed = deflateSync(encodeModule(m));
    expect(isModule(packed)).toBe(true);
    expect(decodeModule(packed)).toEqual(m);
  });

  test('compressed input is refused when decompression is off', () => {
    const packed = deflateSync(encodeModule(buildSpeakerModule()));
    expect(() => decodeModule(packed, { decompress: false })).toThrow(BadMagicError);
  });

  test('data that is neither a module nor zlib', () => {
    const junk = Buffer.from('this is not a module at all');
    expect(isModule(junk)).toBe(false);
    expect(() => decodeModule(junk)).toThrow(BadMagicError);
  });

  test('newer versions decode with a warning', () => {
    configureLogging({ level: 'warn' });
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      const bytes = encodeModule(buildSpeakerModule(), { version: 201 });
      warn.mockClear();
      expect(decodeModule(bytes).meta.version).toBe(201);
      expect(warn).toHaveBeenCalledWith('[module]', 'module version 201 is newer than 200; decoding with the newest known layout');
    } finally {
      resetLogging();
    }
  });
});

describe('older revisions', () => {
  test('release 100 INFO with packed chip flags', () => {
    const m = decodeModule(genesisV100());
    expect(m.meta.version).toBe(100);
    expect(m.meta.name).toBe('Old');
    expect(m.meta.author).toBe('someone');
    expect(m.chips.masterVolume).toBe(1.5);
    expect(m.chips.list).toHaveLength(1);
    expect(m.chips.list[0].type.name).toBe('GENESIS');
    expect(m.chips.list[0].flags).toEqual({ clockSel: 3, ladderEffect: true });
    expect(m.chips.list[0].volume).toBe(1);
    expect(m.compatFlags).toEqual(seedCompatFlags(100));

    const song = m.subsongs[0];
    expect(song.timing.speed).toEqual([3, 4]);
    expect(song.speedPattern).toEqual([3, 4]);
    expect(song.patternLength).toBe(32);
    expect(song.order).toHaveLength(10);
    expect(song.effectColumns).toEqual([1, 1, 1, 1, 1, 1, 1, 1, 1, 1]);
    expect(m.patterns).toEqual([]);
  });

  test('equal speeds give a one-entry speed pattern', () => {
    expect(speedPatternFromSpeeds([6, 6])).toEqual([6]);
    expect(speedPatternFromSpeeds([3, 4])).toEqual([3, 4]);
  });

  test('release 100 modules re-encode at a current version', () => {
    const m = decodeModule(genesisV100());
    const back = decodeModule(encodeModule(m, { version: 200 }));
    expect(back.meta.version).toBe(200);
    expect(back.chips.list[0].flags).toEqual({ clockSel: 3, ladderEffect: true });
    expect(back.subsongs[0].speedPattern).toEqual([3, 4]);
  });
});

describe('format versions', () => {
  test('the same content written at two versions decodes alike', () => {
    const m = buildSpeakerModule();
    m.meta.tuning = 432;
    const older = decodeModule(encodeModule(m, { version: 127 }));
    const newer = decodeModule(encodeModule(m, { version: 200 }));
    for (const decoded of [older, newer]) {
      expect([decoded.meta.name, decoded.meta.author, decoded.meta.tuning]).toEqual(['Test Song', 'tester', 432]);
    }
    expect(older.subsongs[0].patternLength).toBe(newer.subsongs[0].patternLength);
    expect(older.subsongs[0].timing).toEqual(newer.subsongs[0].timing);
  });

  test('default compat flags survive a change of version', () => {
    const m = buildSpeakerModule();
    // no flag threshold falls between these two
    const a = decodeModule(encodeModule(m, { version: 192 }));
    const b = decodeModule(encodeModule(m, { version: 199 }));
    expect(a.compatFlags).toEqual(b.compatFlags);
    expect(b.compatFlags).toEqual(seedCompatFlags(199));
  });

  test('a hand-written minimal module', () => {
    const m = decodeModule(minimalV200());
    expect(m.meta.version).toBe(200);
    expect(m.meta.name).toBe('Minimal');
    expect(getNumChannels(m)).toBe(1);
    expect(m.chips.list[0].flags).toEqual({});
    expect([m.instruments, m.wavetables, m.samples, m.patterns]).toEqual([[], [], [], []]);
    expect(m.compatFlags).toEqual(seedCompatFlags(200));
    expect(m.subsongs).toHaveLength(1);
    expect(m.subsongs[0].speedPattern).toEqual([6]);
  });
});

describe('chip flags across the FLAG block change', () => {
  const chipNames = [...layoutTable.flatMap(group => group.chips), 'SMS'];

  test.each([0x80000003, 0x0000c5a6])('packed word %i agrees with its FLAG text for every chip', word => {
    for (const name of chipNames) {
      const chip = chipByName(name);
      const packed = decodeModule(legacyV100(chip, word)).chips.list[0].flags;
      expect(packed).toEqual(unpackLegacyChipFlags(chip, word));

      const m = createModule({ version: 200, chips: [chip] });
      m.chips.list[0].flags = { ...packed };
      const text = decodeModule(encodeModule(m)).chips.list[0].flags;

      const shared = Object.keys(packed).filter(key => key in text);
      expect({ chip: name, shared: shared.length > 0 }).toEqual({ chip: name, shared: true });
      for (const key of shared) {
        expect({ chip: name, key, value: text[key] }).toEqual({ chip: name, key, value: packed[key] });
      }
    }
  });
});

describe('getModuleSummary', () => {
  test('lists chips, subsongs and table sizes', () => {
    expect(getModuleSummary(buildSpeakerModule())).toBe(
      [
        'Name: Test Song',
        'Author: tester',
        'Format version: 200',
        'Chips (1):',
        '  PC_SPEAKER: 1 channels',
        'Channels: 1',
        'Subsongs (2):',
        '  0: speed 6/6, timebase 1, 60 Hz, pattern length 16, 2 orders',
        '  1 "B-side": speed 6/6, timebase 1, 60 Hz, pattern length 8, 1 orders',
        'Instruments: 1',
        'Wavetables: 1',
        'Samples: 1',
        'Patterns: 3',
      ].join('\n'),
    );
  });

  test('untitled modules', () => {
    const summary = getModuleSummary(createModule({ version: 200, chips: [chipByName('PC_SPEAKER')] }));
    expect(summary.split('\n').slice(0, 2)).toEqual(['Name: (untitled)', 'Author: (unknown)']);
  });
});

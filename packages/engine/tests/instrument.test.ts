import { BinaryWriter } from '../src/io/binaryWriter';
import { InvalidFieldValueError, UnknownEnumValueError, BadMagicError } from '../src/errors';
import { InstrumentType, MacroCode, MacroMarker, MacroSize, SNESSusMode } from '../src/model/enums';
import {
  createFeature,
  createInstrument,
  createMacro,
  findFeature,
  getInstrumentName,
  Instrument,
} from '../src/model/instrument';
import { macroWordSize } from '../src/format/features';
import { withMarkers } from '../src/format/macroData';
import { encodeInstrument, featuralVersion } from '../src/export/instrumentWriter';
import { writeWavetable } from '../src/export/wavetableWriter';
import {
  decodeInstrument,
  decodeLegacyInstrumentFile,
  sniffInstrumentFile,
} from '../src/import/instrument.reader';
import { FIXED_ARP_BIT, LEGACY_STEPS, stepApplies } from '../src/import/legacyInstrument.reader';
import { writeLegacyInstrumentV11, LegacyFixture } from './helpers/legacyInstrument';

const L = MacroMarker.LOOP;

function sampleInstrument(): Instrument {
  const ins = createInstrument(InstrumentType.FM_4OP);
  const fm = createFeature('FM');
  fm.alg = 4;
  fm.fb = 6;
  fm.ops = 4;
  fm.operators[0].tl = 30;
  fm.operators[3].mult = 7;
  fm.operators[2].enable = false;

  const vol = createMacro(MacroCode.VOL);
  vol.data = withMarkers([15, 12, 8], 1, 3);
  const arp = createMacro(MacroCode.ARP);
  arp.data = [-12, 0, 12];
  arp.speed = 2;
  arp.open = true;

  const sl = createFeature('SL');
  sl.entries.push({ index: 2, pointer: 0x1234 });

  ins.features.push(
    { code: 'NA', name: 'Bass' },
    fm,
    { code: 'MA', macros: [vol, arp] },
    createFeature('SN'),
    sl,
  );
  return ins;
}

function legacyEmbed(fx: LegacyFixture): Uint8Array {
  const w = new BinaryWriter();
  writeLegacyInstrumentV11(w, fx);
  return w.toUint8Array();
}

describe('featural instruments', () => {
  test('INS2 block decodes back to the same instrument', () => {
    const ins = sampleInstrument();
    const bytes = encodeInstrument(ins);
    expect(String.fromCharCode(...bytes.subarray(0, 4))).toBe('INS2');
    expect(decodeInstrument(bytes, 'featural-embed')).toEqual(ins);
  });

  test('FINS file decodes back to the same instrument', () => {
    const ins = sampleInstrument();
    const bytes = encodeInstrument(ins, { container: 'file' });
    expect(sniffInstrumentFile(bytes)).toBe('featural-file');
    expect(decodeInstrument(bytes, 'featural-file')).toEqual(ins);
  });

  test('instruments are never written older than the featural format', () => {
    const ins = createInstrument(InstrumentType.GB, 'legacy', 100);
    expect(featuralVersion(ins)).toBe(127);
    const back = decodeInstrument(encodeInstrument(ins), 'featural-embed');
    expect(back.meta).toEqual({ version: 127, type: InstrumentType.GB, format: 'featural' });
  });

  test('SNES sustain byte only exists from version 131', () => {
    const sn = createFeature('SN');
    sn.sus = SNESSusMode.SUS_WITH_DEC;
    sn.d2 = 9;

    const old = createInstrument(InstrumentType.SNES, 'featural', 130);
    old.features.push(sn);
    const oldBytes = encodeInstrument(old, { container: 'file' });
    // FINS, version, type, 'SN' + u16 length, four body bytes, 'EN'
    expect(oldBytes.byteLength).toBe(4 + 2 + 2 + 4 + 4 + 2);
    const oldBack = findFeature(decodeInstrument(oldBytes, 'featural-file'), 'SN');
    expect(oldBack?.sus).toBe(SNESSusMode.SUS_WITH_DEC);
    expect(oldBack?.d2).toBe(0);

    const current = createInstrument(InstrumentType.SNES, 'featural', 131);
    current.features.push(sn);
    const currentBack = findFeature(decodeInstrument(encodeInstrument(current), 'featural-embed'), 'SN');
    expect(currentBack?.d2).toBe(9);
  });

  test('C64 cutoff keeps all eleven bits', () => {
    const ins = createInstrument(InstrumentType.C64);
    const c64 = createFeature('64');
    c64.cut = 0x7ff;
    c64.res = 15;
    ins.features.push(c64);
    const bytes = encodeInstrument(ins, { container: 'file' });
    // FINS, version, type, '64' + u16 length, then the cutoff/resonance word last
    expect([bytes[18], bytes[19]]).toEqual([0xff, 0xf7]);
    expect(findFeature(decodeInstrument(bytes, 'featural-file'), '64')).toEqual(c64);
  });

  test('macro word size is the narrowest that fits', () => {
    expect(macroWordSize([])).toBe(MacroSize.UINT8);
    expect(macroWordSize([0, 255])).toBe(MacroSize.UINT8);
    expect(macroWordSize([-1, 127])).toBe(MacroSize.INT8);
    expect(macroWordSize([-129, 3])).toBe(MacroSize.INT16);
    expect(macroWordSize([40000])).toBe(MacroSize.INT32);
  });

  test('macros longer than 255 steps are rejected', () => {
    const ins = createInstrument();
    const vol = createMacro(MacroCode.VOL);
    vol.data = new Array<number>(256).fill(1);
    ins.features.push({ code: 'MA', macros: [vol] });
    expect(() => encodeInstrument(ins)).toThrow(InvalidFieldValueError);
  });

  test('more than four stored FM operators is an error', () => {
    const w = new BinaryWriter();
    w.writeBlock('INS2', b => {
      b.writeU16(143);
      b.writeU16(InstrumentType.FM_4OP);
      b.writeAscii('FM');
      b.writeU16(4);
      b.writeBytes([0x05, 0, 0, 0]);
      b.writeAscii('EN');
    });
    expect(() => decodeInstrument(w.toUint8Array(), 'featural-embed')).toThrow(InvalidFieldValueError);
  });

  test('unknown feature codes are rejected', () => {
    const w = new BinaryWriter();
    w.writeAscii('FINS');
    w.writeU16(143);
    w.writeU16(0);
    w.writeAscii('ZZ');
    w.writeU16(0);
    expect(() => decodeInstrument(w.toUint8Array(), 'featural-file')).toThrow(UnknownEnumValueError);
  });
});

describe('legacy instruments', () => {
  test('standard macros, arpeggio offset and type relabel', () => {
    const ins = decodeInstrument(
      legacyEmbed({ name: 'Lead', vol: [15, 10, 5], volLoop: 1, arp: [12, 24], duty: [1, 2], oldVolHeight: 31 }),
      'legacy-embed',
    );
    expect(ins.meta).toEqual({ version: 11, type: InstrumentType.PCE, format: 'legacy' });
    expect(ins.features.map(f => f.code)).toEqual(['NA', 'FM', 'GB', '64', 'SM', 'MA']);
    expect(getInstrumentName(ins)).toBe('Lead');

    const macros = findFeature(ins, 'MA')?.macros ?? [];
    expect(macros.map(m => m.kind)).toEqual([MacroCode.VOL, MacroCode.ARP, MacroCode.DUTY, MacroCode.WAVE]);
    expect(macros[0].data).toEqual([15, L, 10, 5]);
    expect(macros[1].data).toEqual([0, 12]);
    // duty macros of PC Engine instruments before 63 are dropped
    expect(macros[2].data).toEqual([]);
  });

  test('header fields land in their features', () => {
    const ins = decodeInstrument(legacyEmbed({ name: 'x' }), 'legacy-embed');
    expect(ins.meta.type).toBe(InstrumentType.STANDARD);
    const fm = findFeature(ins, 'FM');
    expect([fm?.alg, fm?.fb, fm?.ops]).toEqual([3, 5, 4]);
    // enable and kvs are only stored from 114 and 115
    expect(fm?.operators[0].enable).toBe(true);
    expect(fm?.operators[0].kvs).toBe(2);
    const gb = findFeature(ins, 'GB');
    expect([gb?.envVol, gb?.envDir, gb?.envLen]).toEqual([9, 1, 3]);
    const sm = findFeature(ins, 'SM');
    expect(sm?.initSample).toBe(7);
    expect(sm?.useWave).toBe(false);
    expect(sm?.waveLen).toBe(31);
  });

  test('fixed arpeggio mode becomes a bit on each value', () => {
    const ins = decodeInstrument(legacyEmbed({ name: 'fx', arp: [3, 5], arpMode: 1 }), 'legacy-embed');
    const arp = findFeature(ins, 'MA')?.macros.find(m => m.kind === MacroCode.ARP);
    expect(arp?.data).toEqual([3 | FIXED_ARP_BIT, 5 | FIXED_ARP_BIT]);
  });

  test('an old duty height of 31 marks an SSG instrument', () => {
    const ins = decodeInstrument(legacyEmbed({ name: 'ssg', oldVolHeight: 15, oldDutyHeight: 31 }), 'legacy-embed');
    expect(ins.meta.type).toBe(InstrumentType.SSG);
  });

  test('relative C64 duty macros move down an octave', () => {
    const dutyOf = (c64DutyIsAbs: boolean) => {
      const ins = decodeInstrument(legacyEmbed({ name: 'sid', type: InstrumentType.C64, duty: [20, 30], c64DutyIsAbs }), 'legacy-embed');
      return findFeature(ins, 'MA')?.macros.find(m => m.kind === MacroCode.DUTY)?.data;
    };
    expect(dutyOf(false)).toEqual([8, 18]);
    expect(dutyOf(true)).toEqual([20, 30]);
  });

  test('legacy instruments re-encode as featural', () => {
    const ins = decodeInstrument(legacyEmbed({ name: 'Lead', vol: [15, 10, 5], volLoop: 1 }), 'legacy-embed');
    const back = decodeInstrument(encodeInstrument(ins), 'featural-embed');
    expect(back.meta).toEqual({ version: 127, type: InstrumentType.STANDARD, format: 'featural' });
    expect(back.features).toEqual(ins.features);
  });

  test('step gates', () => {
    const byName = (name: string) => LEGACY_STEPS.find(s => s.name === name);
    const arpOffset = byName('arpeggio offset');
    const fmMacros = byName('fm macros');
    expect(arpOffset && stepApplies(arpOffset, 30)).toBe(true);
    expect(arpOffset && stepApplies(arpOffset, 31)).toBe(false);
    expect(fmMacros && stepApplies(fmMacros, 28)).toBe(false);
    expect(fmMacros && stepApplies(fmMacros, 29)).toBe(true);
  });

  test('instrument file with a bundled wavetable', () => {
    const w = new BinaryWriter();
    w.writeAscii('-Furnace instr.-');
    w.writeU16(11);
    w.writeU16(0);
    const insPtr = w.position;
    w.writeU32(0);
    w.writeU16(1);
    w.writeU16(0);
    w.writeU32(0);
    const wavePtr = w.position;
    w.writeU32(0);

    w.patchU32(insPtr, w.position);
    writeLegacyInstrumentV11(w, { name: 'Bundle' });
    w.patchU32(wavePtr, w.position);
    writeWavetable(w, { meta: { name: 'tri', width: 4, height: 16 }, data: [0, 5, 10, 15] });

    const bytes = w.toUint8Array();
    expect(sniffInstrumentFile(bytes)).toBe('legacy-file');
    const file = decodeLegacyInstrumentFile(bytes);
    expect(file.version).toBe(11);
    expect(getInstrumentName(file.instrument)).toBe('Bundle');
    expect(file.wavetables).toEqual([{ meta: { name: 'tri', width: 4, height: 16 }, data: [0, 5, 10, 15] }]);
    expect(file.samples).toEqual([]);
    expect(getInstrumentName(decodeInstrument(bytes, 'legacy-file'))).toBe('Bundle');
  });

  test('zero wavetable and sample pointers are empty slots', () => {
    const w = new BinaryWriter();
    w.writeAscii('-Furnace instr.-');
    w.writeU16(11);
    w.writeU16(0);
    const insPtr = w.position;
    w.writeU32(0);
    w.writeU16(1);
    w.writeU16(1);
    w.writeU32(0);
    w.writeU32(0);
    w.writeU32(0);

    w.patchU32(insPtr, w.position);
    writeLegacyInstrumentV11(w, { name: 'Alone' });

    const file = decodeLegacyInstrumentFile(w.toUint8Array());
    expect(getInstrumentName(file.instrument)).toBe('Alone');
    expect(file.wavetables).toEqual([]);
    expect(file.samples).toEqual([]);
  });

  test('files without a known signature are refused', () => {
    expect(() => sniffInstrumentFile(Buffer.from('garbage file....'))).toThrow(BadMagicError);
  });
});

/**
 * Featural instrument blocks.
 *
 * One read/write pair per feature code. Readers get a reader bounded to the
 * block's declared length; writers emit only the body (the caller adds the
 * code and length). The mapped table type makes a missing code a compile
 * error.
 */

import { BinaryReader } from '../io/binaryReader.js';
import { BinaryWriter } from '../io/binaryWriter.js';
import { InvalidFieldValueError } from '../errors.js';
import {
  decodeEnum,
  ESFilterMode,
  GainMode,
  GBHwCommand,
  MACRO_SIZE_LAYOUT,
  MacroCode,
  MacroSize,
  MacroType,
  OpMacroCode,
  SNESSusMode,
  WaveFX,
} from '../model/enums.js';
import {
  createFeature,
  Feature,
  FeatureCode,
  FeatureOf,
  FMOperator,
  NOTE_MAP_SIZE,
  PointerListFeature,
  SingleMacro,
} from '../model/instrument.js';
import { splitMarkers, withMarkers } from './macroData.js';

const COMPONENT = 'instrument';

export interface FeatureContext {
  /** instrument version; gates fields added after the featural format appeared */
  version: number;
}

export interface FeatureCodec<C extends FeatureCode> {
  read(r: BinaryReader, code: C, ctx: FeatureContext): FeatureOf<C>;
  write(w: BinaryWriter, feature: FeatureOf<C>, ctx: FeatureContext): void;
}

type FeatureCodecTable = { [C in FeatureCode]: FeatureCodec<C> };

/** SNES `d2`/sustain byte appears from this version. */
export const SNES_D2_VERSION = 131;

const MACRO_HEADER_SIZE = 8;
const MACRO_END = 0xff;
const NO_POSITION = 0xff;

const bit = (value: number, n: number): boolean => ((value >> n) & 1) !== 0;
const flag = (on: boolean, n: number): number => (on ? 1 << n : 0);

// ---------- Macros ----------

function readMacroValue(r: BinaryReader, size: MacroSize): number {
  const layout = MACRO_SIZE_LAYOUT[size];
  switch (layout.bytes) {
    case 1:
      return layout.signed ? r.i8() : r.u8();
    case 2:
      return r.i16();
    case 4:
      return r.i32();
  }
}

/** Narrowest word size holding every value. */
export function macroWordSize(values: readonly number[]): MacroSize {
  if (values.every(v => v >= 0 && v <= 0xff)) return MacroSize.UINT8;
  if (values.every(v => v >= -0x80 && v <= 0x7f)) return MacroSize.INT8;
  if (values.every(v => v >= -0x8000 && v <= 0x7fff)) return MacroSize.INT16;
  return MacroSize.INT32;
}

function writeMacroValue(w: BinaryWriter, size: MacroSize, value: number): void {
  switch (size) {
    case MacroSize.UINT8:
      w.writeU8(value);
      break;
    case MacroSize.INT8:
      w.writeI8(value);
      break;
    case MacroSize.INT16:
      w.writeI16(value);
      break;
    case MacroSize.INT32:
      w.writeI32(value);
      break;
  }
}

function readMacros<K extends MacroCode | OpMacroCode>(
  r: BinaryReader,
  decodeKind: (raw: number, offset: number) => K,
): SingleMacro<K>[] {
  r.u16(); // header length, always 8
  const macros: SingleMacro<K>[] = [];
  for (;;) {
    const at = r.absolutePosition;
    const raw = r.u8();
    if (raw === MACRO_END) break;
    const kind = decodeKind(raw, at);
    const length = r.u8();
    const loop = r.u8();
    const release = r.u8();
    const mode = r.u8();
    const flags = r.u8();
    const wordSize = decodeEnum(MacroSize, (flags >> 6) & 3, 'macro word size', COMPONENT, r.absolutePosition - 1);
    const type = decodeEnum(MacroType, (flags >> 1) & 3, 'macro type', COMPONENT, r.absolutePosition - 1);
    const delay = r.u8();
    const speed = r.u8();
    const values: number[] = [];
    for (let i = 0; i < length; i++) values.push(readMacroValue(r, wordSize));
    macros.push({
      kind,
      mode,
      type,
      delay,
      speed,
      open: bit(flags, 0),
      data: withMarkers(values, loop === NO_POSITION ? null : loop, release === NO_POSITION ? null : release),
    });
  }
  return macros;
}

function writeMacros(w: BinaryWriter, macros: readonly SingleMacro[]): void {
  w.writeU16(MACRO_HEADER_SIZE);
  for (const macro of macros) {
    const { values, loop, release } = splitMarkers(macro.data);
    if (values.length > 0xff) {
      throw new InvalidFieldValueError(COMPONENT, w.position, 'macro length', values.length, 'at most 255 steps');
    }
    const size = macroWordSize(values);
    w.writeU8(macro.kind);
    w.writeU8(values.length);
    w.writeU8(loop ?? NO_POSITION);
    w.writeU8(release ?? NO_POSITION);
    w.writeU8(macro.mode);
    w.writeU8((size << 6) | ((macro.type & 3) << 1) | (macro.open ? 1 : 0));
    w.writeU8(macro.delay);
    w.writeU8(macro.speed);
    for (const v of values) writeMacroValue(w, size, v);
  }
  w.writeU8(MACRO_END);
}

const macroCode = (raw: number, offset: number): MacroCode => decodeEnum(MacroCode, raw, 'macro code', COMPONENT, offset);
const opMacroCode = (raw: number, offset: number): OpMacroCode => decodeEnum(OpMacroCode, raw, 'operator macro code', COMPONENT, offset);

const readOperatorMacros = (r: BinaryReader): SingleMacro<OpMacroCode>[] => readMacros(r, opMacroCode);

// ---------- FM ----------

function readOperator(r: BinaryReader, op: FMOperator): void {
  let b = r.u8();
  op.ksr = bit(b, 7);
  op.dt = (b >> 4) & 7;
  op.mult = b & 15;
  b = r.u8();
  op.sus = bit(b, 7);
  op.tl = b & 127;
  b = r.u8();
  op.rs = (b >> 6) & 3;
  op.vib = bit(b, 5);
  op.ar = b & 31;
  b = r.u8();
  op.am = bit(b, 7);
  op.ksl = (b >> 5) & 3;
  op.dr = b & 31;
  b = r.u8();
  op.egt = bit(b, 7);
  op.kvs = (b >> 5) & 3;
  op.d2r = b & 31;
  b = r.u8();
  op.sl = (b >> 4) & 15;
  op.rr = b & 15;
  b = r.u8();
  op.dvb = (b >> 4) & 15;
  op.ssgEnv = b & 15;
  b = r.u8();
  op.dam = (b >> 5) & 7;
  op.dt2 = (b >> 3) & 3;
  op.ws = b & 7;
}

function writeOperator(w: BinaryWriter, op: FMOperator): void {
  w.writeU8(flag(op.ksr, 7) | ((op.dt & 7) << 4) | (op.mult & 15));
  w.writeU8(flag(op.sus, 7) | (op.tl & 127));
  w.writeU8(((op.rs & 3) << 6) | flag(op.vib, 5) | (op.ar & 31));
  w.writeU8(flag(op.am, 7) | ((op.ksl & 3) << 5) | (op.dr & 31));
  w.writeU8(flag(op.egt, 7) | ((op.kvs & 3) << 5) | (op.d2r & 31));
  w.writeU8(((op.sl & 15) << 4) | (op.rr & 15));
  w.writeU8(((op.dvb & 15) << 4) | (op.ssgEnv & 15));
  w.writeU8(((op.dam & 7) << 5) | ((op.dt2 & 3) << 3) | (op.ws & 7));
}

// ---------- Pointer lists ----------

function readPointerList<C extends 'SL' | 'WL'>(r: BinaryReader, code: C): PointerListFeature<C> {
  const count = r.u8();
  const indices: number[] = [];
  for (let i = 0; i < count; i++) indices.push(r.u8());
  // all indices come first, then the pointers in the same order
  const entries = indices.map(index => ({ index, pointer: 0 }));
  for (const entry of entries) entry.pointer = r.u32();
  return { code, entries };
}

function writePointerList(w: BinaryWriter, f: PointerListFeature): void {
  w.writeU8(f.entries.length);
  for (const e of f.entries) w.writeU8(e.index);
  for (const e of f.entries) w.writeU32(e.pointer);
}

// ---------- SNES ----------

/** Gain modes below 4 all mean direct gain. */
export function gainModeFromBits(bits: number, offset: number): GainMode {
  const mode = bits & 7;
  return mode < 4 ? GainMode.DIRECT : decodeEnum(GainMode, mode, 'gain mode', COMPONENT, offset);
}

// ---------- Table ----------

export const FEATURE_CODECS: FeatureCodecTable = {
  NA: {
    read: r => ({ code: 'NA', name: r.cString() }),
    write: (w, f) => w.writeCString(f.name),
  },

  FM: {
    read: r => {
      const fm = createFeature('FM');
      let b = r.u8();
      const stored = b & 15;
      fm.operators.forEach((op, i) => {
        op.enable = bit(b, 4 + i);
      });
      b = r.u8();
      fm.alg = (b >> 4) & 7;
      fm.fb = b & 7;
      b = r.u8();
      fm.fms2 = (b >> 5) & 7;
      fm.ams = (b >> 3) & 3;
      fm.fms = b & 7;
      b = r.u8();
      fm.ams2 = (b >> 6) & 3;
      fm.ops = bit(b, 5) ? 4 : 2;
      fm.opllPreset = b & 31;
      if (stored > fm.operators.length) {
        throw new InvalidFieldValueError(COMPONENT, r.absolutePosition - 4, 'FM operator count', stored, 'at most 4 operators');
      }
      for (let i = 0; i < stored; i++) readOperator(r, fm.operators[i]);
      return fm;
    },
    write: (w, f) => {
      const stored = Math.min(f.ops, f.operators.length);
      let enables = 0;
      f.operators.forEach((op, i) => {
        enables |= flag(op.enable, 4 + i);
      });
      w.writeU8(enables | stored);
      w.writeU8(((f.alg & 7) << 4) | (f.fb & 7));
      w.writeU8(((f.fms2 & 7) << 5) | ((f.ams & 3) << 3) | (f.fms & 7));
      w.writeU8(((f.ams2 & 3) << 6) | flag(f.ops === 4, 5) | (f.opllPreset & 31));
      for (let i = 0; i < stored; i++) writeOperator(w, f.operators[i]);
    },
  },

  MA: {
    read: r => ({ code: 'MA', macros: readMacros(r, macroCode) }),
    write: (w, f) => writeMacros(w, f.macros),
  },
  O1: { read: r => ({ code: 'O1', macros: readOperatorMacros(r) }), write: (w, f) => writeMacros(w, f.macros) },
  O2: { read: r => ({ code: 'O2', macros: readOperatorMacros(r) }), write: (w, f) => writeMacros(w, f.macros) },
  O3: { read: r => ({ code: 'O3', macros: readOperatorMacros(r) }), write: (w, f) => writeMacros(w, f.macros) },
  O4: { read: r => ({ code: 'O4', macros: readOperatorMacros(r) }), write: (w, f) => writeMacros(w, f.macros) },

  '64': {
    read: r => {
      const c = createFeature('64');
      let b = r.u8();
      c.dutyIsAbs = bit(b, 7);
      c.initFilter = bit(b, 6);
      c.volIsCutoff = bit(b, 5);
      c.toFilter = bit(b, 4);
      c.noiseOn = bit(b, 3);
      c.pulseOn = bit(b, 2);
      c.sawOn = bit(b, 1);
      c.triOn = bit(b, 0);
      b = r.u8();
      c.oscSync = bit(b, 7);
      c.ringMod = bit(b, 6);
      c.noTest = bit(b, 5);
      c.filterIsAbs = bit(b, 4);
      c.ch3Off = bit(b, 3);
      c.bp = bit(b, 2);
      c.hp = bit(b, 1);
      c.lp = bit(b, 0);
      b = r.u8();
      c.envelope.a = (b >> 4) & 15;
      c.envelope.d = b & 15;
      b = r.u8();
      c.envelope.s = (b >> 4) & 15;
      c.envelope.r = b & 15;
      c.duty = r.u16();
      const cutRes = r.u16();
      c.cut = cutRes & 0x7ff;
      c.res = (cutRes >> 12) & 15;
      return c;
    },
    write: (w, c) => {
      w.writeU8(
        flag(c.dutyIsAbs, 7) | flag(c.initFilter, 6) | flag(c.volIsCutoff, 5) | flag(c.toFilter, 4)
          | flag(c.noiseOn, 3) | flag(c.pulseOn, 2) | flag(c.sawOn, 1) | flag(c.triOn, 0),
      );
      w.writeU8(
        flag(c.oscSync, 7) | flag(c.ringMod, 6) | flag(c.noTest, 5) | flag(c.filterIsAbs, 4)
          | flag(c.ch3Off, 3) | flag(c.bp, 2) | flag(c.hp, 1) | flag(c.lp, 0),
      );
      w.writeU8(((c.envelope.a & 15) << 4) | (c.envelope.d & 15));
      w.writeU8(((c.envelope.s & 15) << 4) | (c.envelope.r & 15));
      w.writeU16(c.duty);
      w.writeU16((c.cut & 0x7ff) | ((c.res & 15) << 12));
    },
  },

  GB: {
    read: r => {
      const gb = createFeature('GB');
      let b = r.u8();
      gb.envVol = b & 15;
      gb.envDir = (b >> 4) & 1;
      gb.envLen = (b >> 5) & 7;
      gb.soundLen = r.u8();
      b = r.u8();
      gb.softEnv = bit(b, 0);
      gb.alwaysInit = bit(b, 1);
      const count = r.u8();
      for (let i = 0; i < count; i++) {
        const at = r.absolutePosition;
        const command = decodeEnum(GBHwCommand, r.u8(), 'GB hardware command', COMPONENT, at);
        gb.hwSeq.push({ command, data: [r.u8(), r.u8()] });
      }
      return gb;
    },
    write: (w, gb) => {
      w.writeU8((gb.envVol & 15) | ((gb.envDir & 1) << 4) | ((gb.envLen & 7) << 5));
      w.writeU8(gb.soundLen);
      w.writeU8(flag(gb.softEnv, 0) | flag(gb.alwaysInit, 1));
      w.writeU8(gb.hwSeq.length);
      for (const entry of gb.hwSeq) {
        w.writeU8(entry.command);
        w.writeU8(entry.data[0]);
        w.writeU8(entry.data[1]);
      }
    },
  },

  SM: {
    read: r => {
      const sm = createFeature('SM');
      sm.initSample = r.u16();
      const b = r.u8();
      sm.useWave = bit(b, 2);
      sm.useSample = bit(b, 1);
      sm.useNoteMap = bit(b, 0);
      sm.waveLen = r.u8();
      if (sm.useNoteMap) {
        for (const entry of sm.sampleMap) {
          entry.freq = r.u16();
          entry.sampleIndex = r.u16();
        }
      }
      return sm;
    },
    write: (w, sm) => {
      w.writeU16(sm.initSample);
      w.writeU8(flag(sm.useWave, 2) | flag(sm.useSample, 1) | flag(sm.useNoteMap, 0));
      w.writeU8(sm.waveLen);
      if (sm.useNoteMap) {
        for (let i = 0; i < NOTE_MAP_SIZE; i++) {
          const entry = sm.sampleMap[i] ?? { freq: 0, sampleIndex: 0 };
          w.writeU16(entry.freq);
          w.writeU16(entry.sampleIndex);
        }
      }
    },
  },

  LD: {
    read: r => ({
      code: 'LD',
      fixedDrums: bit(r.u8(), 0),
      kickFreq: r.u16(),
      snareHatFreq: r.u16(),
      tomTopFreq: r.u16(),
    }),
    write: (w, f) => {
      w.writeU8(flag(f.fixedDrums, 0));
      w.writeU16(f.kickFreq);
      w.writeU16(f.snareHatFreq);
      w.writeU16(f.tomTopFreq);
    },
  },

  SN: {
    read: (r, _code, ctx) => {
      const sn = createFeature('SN');
      let b = r.u8();
      sn.envelope.d = (b >> 4) & 15;
      sn.envelope.a = b & 15;
      b = r.u8();
      sn.envelope.s = (b >> 4) & 15;
      sn.envelope.r = b & 15;
      const at = r.absolutePosition;
      b = r.u8();
      sn.useEnv = bit(b, 4);
      sn.sus = bit(b, 3) ? SNESSusMode.SUS_WITH_DEC : SNESSusMode.DIRECT;
      sn.gainMode = gainModeFromBits(b, at);
      sn.gain = r.u8();
      if (ctx.version >= SNES_D2_VERSION) {
        const d2s = r.u8();
        sn.sus = decodeEnum(SNESSusMode, (d2s >> 5) & 3, 'SNES sustain mode', COMPONENT, r.absolutePosition - 1);
        sn.d2 = d2s & 31;
      }
      return sn;
    },
    write: (w, sn, ctx) => {
      w.writeU8(((sn.envelope.d & 15) << 4) | (sn.envelope.a & 15));
      w.writeU8(((sn.envelope.s & 15) << 4) | (sn.envelope.r & 15));
      w.writeU8(flag(sn.useEnv, 4) | flag(sn.sus !== SNESSusMode.DIRECT, 3) | (sn.gainMode & 7));
      w.writeU8(sn.gain);
      if (ctx.version >= SNES_D2_VERSION) {
        w.writeU8(((sn.sus & 3) << 5) | (sn.d2 & 31));
      }
    },
  },

  N1: {
    read: r => ({ code: 'N1', wave: r.i32(), wavePos: r.u8(), waveLen: r.u8(), waveMode: r.u8() }),
    write: (w, f) => {
      w.writeI32(f.wave);
      w.writeU8(f.wavePos);
      w.writeU8(f.waveLen);
      w.writeU8(f.waveMode);
    },
  },

  FD: {
    read: r => {
      const fd = createFeature('FD');
      fd.modSpeed = r.i32();
      fd.modDepth = r.i32();
      fd.initTableWithFirstWave = r.bool();
      fd.modTable = Array.from(r.bytes(32));
      return fd;
    },
    write: (w, fd) => {
      w.writeI32(fd.modSpeed);
      w.writeI32(fd.modDepth);
      w.writeBool(fd.initTableWithFirstWave);
      for (let i = 0; i < 32; i++) w.writeU8(fd.modTable[i] ?? 0);
    },
  },

  WS: {
    read: r => {
      const waveIndices: [number, number] = [r.i32(), r.i32()];
      const rateDivider = r.u8();
      const at = r.absolutePosition;
      return {
        code: 'WS',
        waveIndices,
        rateDivider,
        effect: decodeEnum(WaveFX, r.u8(), 'wave synth effect', COMPONENT, at),
        enabled: bit(r.u8(), 0),
        globalEffect: bit(r.u8(), 0),
        speed: r.u8(),
        params: [r.u8(), r.u8(), r.u8(), r.u8()],
      };
    },
    write: (w, f) => {
      w.writeI32(f.waveIndices[0]);
      w.writeI32(f.waveIndices[1]);
      w.writeU8(f.rateDivider);
      w.writeU8(f.effect);
      w.writeBool(f.enabled);
      w.writeBool(f.globalEffect);
      w.writeU8(f.speed);
      for (const p of f.params) w.writeU8(p);
    },
  },

  SL: { read: (r, code) => readPointerList(r, code), write: writePointerList },
  WL: { read: (r, code) => readPointerList(r, code), write: writePointerList },

  MP: {
    read: r => ({
      code: 'MP',
      ar: r.u8(),
      d1r: r.u8(),
      dl: r.u8(),
      d2r: r.u8(),
      rr: r.u8(),
      rc: r.u8(),
      lfo: r.u8(),
      vib: r.u8(),
      am: r.u8(),
    }),
    write: (w, f) => {
      for (const v of [f.ar, f.d1r, f.dl, f.d2r, f.rr, f.rc, f.lfo, f.vib, f.am]) w.writeU8(v);
    },
  },

  SU: {
    read: r => ({ code: 'SU', switchRoles: r.bool() }),
    write: (w, f) => w.writeBool(f.switchRoles),
  },

  ES: {
    read: r => {
      const at = r.absolutePosition;
      return {
        code: 'ES',
        filterMode: decodeEnum(ESFilterMode, r.u8(), 'ES5506 filter mode', COMPONENT, at),
        k1: r.u16(),
        k2: r.u16(),
        envCount: r.u16(),
        leftVolumeRamp: r.u8(),
        rightVolumeRamp: r.u8(),
        k1Ramp: r.u8(),
        k2Ramp: r.u8(),
        k1Slow: r.u8(),
        k2Slow: r.u8(),
      };
    },
    write: (w, f) => {
      w.writeU8(f.filterMode);
      w.writeU16(f.k1);
      w.writeU16(f.k2);
      w.writeU16(f.envCount);
      for (const v of [f.leftVolumeRamp, f.rightVolumeRamp, f.k1Ramp, f.k2Ramp, f.k1Slow, f.k2Slow]) w.writeU8(v);
    },
  },

  X1: {
    read: r => ({ code: 'X1', bankSlot: r.i32() }),
    write: (w, f) => w.writeI32(f.bankSlot),
  },

  NE: {
    read: r => {
      const ne = createFeature('NE');
      ne.useMap = bit(r.u8(), 0);
      if (ne.useMap) {
        for (const entry of ne.sampleMap) {
          entry.pitch = r.u8();
          entry.delta = r.u8();
        }
      }
      return ne;
    },
    write: (w, ne) => {
      w.writeU8(flag(ne.useMap, 0));
      if (ne.useMap) {
        for (let i = 0; i < NOTE_MAP_SIZE; i++) {
          const entry = ne.sampleMap[i] ?? { pitch: 0, delta: 0 };
          w.writeU8(entry.pitch);
          w.writeU8(entry.delta);
        }
      }
    },
  },

  PN: {
    read: r => ({ code: 'PN', octave: r.u8() }),
    write: (w, f) => w.writeU8(f.octave),
  },

  S2: {
    read: r => {
      const b = r.u8();
      return { code: 'S2', volume: b & 15, waveMix: (b >> 4) & 3, noiseMode: (b >> 6) & 3 };
    },
    write: (w, f) => w.writeU8((f.volume & 15) | ((f.waveMix & 3) << 4) | ((f.noiseMode & 3) << 6)),
  },
};

export function readFeature<C extends FeatureCode>(r: BinaryReader, code: C, ctx: FeatureContext): FeatureOf<C> {
  const codec: FeatureCodec<C> = FEATURE_CODECS[code];
  return codec.read(r, code, ctx);
}

function writeFeatureBody<C extends FeatureCode>(w: BinaryWriter, code: C, feature: FeatureOf<C>, ctx: FeatureContext): void {
  const codec: FeatureCodec<C> = FEATURE_CODECS[code];
  codec.write(w, feature, ctx);
}

/** Code, u16 length, body. */
export function writeFeature(w: BinaryWriter, feature: Feature, ctx: FeatureContext): void {
  const body = new BinaryWriter();
  writeFeatureBody(body, feature.code, feature, ctx);
  const bytes = body.toUint8Array();
  if (bytes.byteLength > 0xffff) {
    throw new InvalidFieldValueError(COMPONENT, w.position, `${feature.code} block length`, bytes.byteLength, 'feature blocks hold at most 65535 bytes');
  }
  w.writeAscii(feature.code);
  w.writeU16(bytes.byteLength);
  w.writeBytes(bytes);
}

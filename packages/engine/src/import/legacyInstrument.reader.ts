/**
 * Legacy (`INST`) instrument decoding.
 *
 * The legacy block is one long record that grew a field or two with almost
 * every release. It is decoded by an ordered list of steps; each step reads
 * the fields one release added (or applies one historical correction) on a
 * shared state, and is skipped when the instrument predates it. The result
 * has the same feature shape as a featural instrument.
 */

import { BinaryReader } from '../io/binaryReader.js';
import {
  decodeEnum,
  ESFilterMode,
  GBHwCommand,
  InstrumentType,
  MacroCode,
  MacroMarker,
  OpMacroCode,
  SNESSusMode,
  WaveFX,
} from '../model/enums.js';
import {
  C64Feature,
  createFeature,
  createMacro,
  ES5506Feature,
  FDSFeature,
  Feature,
  FMFeature,
  GBFeature,
  Instrument,
  MacroFeature,
  MacroItem,
  MultiPCMFeature,
  N163Feature,
  NameFeature,
  OperatorMacroFeature,
  OPERATOR_MACRO_CODES,
  OPLDrumsFeature,
  SampleFeature,
  SingleMacro,
  SNESFeature,
  SoundUnitFeature,
  WaveSynthFeature,
} from '../model/instrument.js';
import { gainModeFromBits } from '../format/features.js';
import { insertMarker, mapValues } from '../format/macroData.js';
import { enterBlock } from '../format/block.js';
import { INSTRUMENT_LEGACY_MAGIC } from '../format/signatures.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'instrument';
const log = createLogger(COMPONENT);

/** Legacy loop/release position meaning "none". */
export const NO_MARKER = 0xffffffff;

/** Arpeggio values carrying this bit are fixed notes rather than offsets. */
export const FIXED_ARP_BIT = 0x40000000;

const STANDARD_CODES = [MacroCode.VOL, MacroCode.ARP, MacroCode.DUTY, MacroCode.WAVE] as const;
const EXTENDED_CODES = [MacroCode.PITCH, MacroCode.EX1, MacroCode.EX2, MacroCode.EX3] as const;
const FM_CODES = [MacroCode.ALG, MacroCode.FB, MacroCode.FMS, MacroCode.AMS] as const;
const LATE_CODES = [
  MacroCode.PAN_L,
  MacroCode.PAN_R,
  MacroCode.PHASE_RESET,
  MacroCode.EX4,
  MacroCode.EX5,
  MacroCode.EX6,
  MacroCode.EX7,
  MacroCode.EX8,
] as const;

const OP_CODES = [
  OpMacroCode.AM,
  OpMacroCode.AR,
  OpMacroCode.DR,
  OpMacroCode.MULT,
  OpMacroCode.RR,
  OpMacroCode.SL,
  OpMacroCode.TL,
  OpMacroCode.DT2,
  OpMacroCode.RS,
  OpMacroCode.DT,
  OpMacroCode.D2R,
  OpMacroCode.SSG_EG,
] as const;
const OP_EXTENDED_CODES = [
  OpMacroCode.DAM,
  OpMacroCode.DVB,
  OpMacroCode.EGT,
  OpMacroCode.KSL,
  OpMacroCode.SUS,
  OpMacroCode.VIB,
  OpMacroCode.WS,
  OpMacroCode.KSR,
] as const;

/** Order of the per-macro mode bytes; arpeggio has none. */
const MODE_ORDER: readonly MacroCode[] = [
  MacroCode.VOL,
  MacroCode.DUTY,
  MacroCode.WAVE,
  ...EXTENDED_CODES,
  ...FM_CODES,
  ...LATE_CODES,
];

/** Order of the speed and delay bytes. */
const TIMING_ORDER: readonly MacroCode[] = [...STANDARD_CODES, ...EXTENDED_CODES, ...FM_CODES, ...LATE_CODES];

/** Blocks that only exist from some release on, in the order they end up in the feature list. */
interface OptionalFeatures {
  LD?: OPLDrumsFeature;
  N1?: N163Feature;
  FD?: FDSFeature;
  WS?: WaveSynthFeature;
  MP?: MultiPCMFeature;
  SU?: SoundUnitFeature;
  ES?: ES5506Feature;
  SN?: SNESFeature;
}

const OPTIONAL_ORDER: readonly (keyof OptionalFeatures)[] = ['LD', 'N1', 'FD', 'WS', 'MP', 'SU', 'ES', 'SN'];

export interface LegacyState {
  r: BinaryReader;
  version: number;
  type: InstrumentType;
  name: NameFeature;
  fm: FMFeature;
  gb: GBFeature;
  c64: C64Feature;
  sample: SampleFeature;
  macros: MacroFeature;
  operators: OperatorMacroFeature[];
  optional: OptionalFeatures;
  arpMode: number;
  arpLength: number;
  arpLoop: number;
  oldVolHeight: number;
  oldDutyHeight: number;
}

export interface LegacyStep {
  name: string;
  /** first version carrying the step's fields */
  since?: number;
  /** the step applies to versions below this one */
  before?: number;
  run(state: LegacyState): void;
}

// ---------- Helpers ----------

function readU32s(r: BinaryReader, count: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(r.u32());
  return out;
}

function readValues(r: BinaryReader, count: number, read: (r: BinaryReader) => number): MacroItem[] {
  const out: MacroItem[] = [];
  for (let i = 0; i < count; i++) out.push(read(r));
  return out;
}

const i32 = (r: BinaryReader): number => r.i32();
const u8 = (r: BinaryReader): number => r.u8();

function placeMarker(data: MacroItem[], marker: MacroMarker, position: number): void {
  if (position !== NO_MARKER) insertMarker(data, marker, position);
}

/** Standard macro for `code`, created and appended on first use. */
export function standardMacro(state: LegacyState, code: MacroCode): SingleMacro<MacroCode> {
  let macro = state.macros.macros.find(m => m.kind === code);
  if (!macro) {
    macro = createMacro(code);
    state.macros.macros.push(macro);
  }
  return macro;
}

function opMacro(op: OperatorMacroFeature, code: OpMacroCode): SingleMacro<OpMacroCode> {
  let macro = op.macros.find(m => m.kind === code);
  if (!macro) {
    macro = createMacro(code);
    op.macros.push(macro);
  }
  return macro;
}

/**
 * Lengths, loops, releases, open flags, then the values of each macro: the
 * grouping every set added from v61 on uses.
 */
function readMacroSet(r: BinaryReader, macros: SingleMacro[], read: (r: BinaryReader) => number): void {
  const lengths = readU32s(r, macros.length);
  const loops = readU32s(r, macros.length);
  const releases = readU32s(r, macros.length);
  for (const m of macros) m.open = r.bool();
  macros.forEach((m, i) => {
    m.data = readValues(r, lengths[i], read);
    placeMarker(m.data, MacroMarker.LOOP, loops[i]);
    placeMarker(m.data, MacroMarker.RELEASE, releases[i]);
  });
}

// ---------- Steps ----------

function readFM(s: LegacyState): void {
  const { r, fm } = s;
  fm.alg = r.u8();
  fm.fb = r.u8();
  fm.fms = r.u8();
  fm.ams = r.u8();
  fm.ops = r.u8();
  fm.opllPreset = r.u8();
  r.u16(); // reserved
  for (const op of fm.operators) {
    op.am = r.bool();
    op.ar = r.u8();
    op.dr = r.u8();
    op.mult = r.u8();
    op.rr = r.u8();
    op.sl = r.u8();
    op.tl = r.u8();
    op.dt2 = r.u8();
    op.rs = r.u8();
    op.dt = r.u8();
    op.d2r = r.u8();
    op.ssgEnv = r.u8();
    op.dam = r.u8();
    op.dvb = r.u8();
    op.egt = r.bool();
    op.ksl = r.u8();
    op.sus = r.bool();
    op.vib = r.bool();
    op.ws = r.u8();
    op.ksr = r.bool();
    const enable = r.bool();
    if (s.version >= 114) op.enable = enable;
    const kvs = r.u8();
    if (s.version >= 115) op.kvs = kvs;
    r.skip(10);
  }
}

function readGB(s: LegacyState): void {
  const { r, gb } = s;
  gb.envVol = r.u8();
  gb.envDir = r.u8();
  gb.envLen = r.u8();
  gb.soundLen = r.u8();
}

function readC64(s: LegacyState): void {
  const { r, c64 } = s;
  c64.triOn = r.bool();
  c64.sawOn = r.bool();
  c64.pulseOn = r.bool();
  c64.noiseOn = r.bool();
  c64.envelope = { a: r.u8(), d: r.u8(), s: r.u8(), r: r.u8() };
  c64.duty = r.u16();
  c64.ringMod = r.bool();
  c64.oscSync = r.bool();
  c64.toFilter = r.bool();
  c64.initFilter = r.bool();
  c64.volIsCutoff = r.bool();
  c64.res = r.u8();
  c64.lp = r.bool();
  c64.bp = r.bool();
  c64.hp = r.bool();
  c64.ch3Off = r.bool();
  c64.cut = r.u16();
  c64.dutyIsAbs = r.bool();
  c64.filterIsAbs = r.bool();
}

function readAmiga(s: LegacyState): void {
  const { r, sample } = s;
  sample.initSample = r.u16();
  const wave = r.bool();
  const waveLen = r.u8();
  if (s.version >= 82) {
    sample.useWave = wave;
    sample.waveLen = waveLen;
  }
  r.skip(12);
}

function readStandardMacros(s: LegacyState): void {
  const { r } = s;
  const codes: MacroCode[] = s.version >= 17 ? [...STANDARD_CODES, ...EXTENDED_CODES] : [...STANDARD_CODES];
  const lengths = readU32s(r, codes.length);
  const loops = readU32s(r, codes.length);
  s.arpMode = r.u8();
  s.oldVolHeight = r.u8();
  s.oldDutyHeight = r.u8();
  r.u8(); // reserved
  codes.forEach((code, i) => {
    const macro = standardMacro(s, code);
    macro.data = readValues(r, lengths[i], i32);
    placeMarker(macro.data, MacroMarker.LOOP, loops[i]);
  });
  s.arpLength = lengths[1];
  s.arpLoop = loops[1];
}

function shiftArpeggio(s: LegacyState): void {
  if (s.arpMode !== 0) return;
  mapValues(standardMacro(s, MacroCode.ARP).data, v => v - 12);
}

function shiftC64Macros(s: LegacyState): void {
  if (s.type !== InstrumentType.C64) return;
  if (s.c64.volIsCutoff && !s.c64.filterIsAbs) {
    mapValues(standardMacro(s, MacroCode.VOL).data, v => v - 18);
  }
  if (!s.c64.dutyIsAbs) {
    mapValues(standardMacro(s, MacroCode.DUTY).data, v => v - 12);
  }
}

/**
 * Before v112 "fixed" arpeggios were a macro mode; they became a bit on
 * each value, and the end of the sequence gained an explicit terminator.
 */
function convertFixedArpeggio(s: LegacyState): void {
  if (s.arpMode === 0) return;
  const data = standardMacro(s, MacroCode.ARP).data;
  mapValues(data, v => v ^ FIXED_ARP_BIT);
  if (data.length === 0) {
    data.push(0);
  } else if (s.arpLoop !== NO_MARKER) {
    if (s.arpLoop === s.arpLength + 1) {
      data[data.length - 1] = 0;
      data.push(MacroMarker.LOOP);
    } else if (s.arpLoop === s.arpLength) {
      data.push(0);
    }
  }
}

function relabelStandardType(s: LegacyState): void {
  if (s.type !== InstrumentType.STANDARD) return;
  if (s.oldVolHeight === 31) s.type = InstrumentType.PCE;
  else if (s.oldDutyHeight === 31) s.type = InstrumentType.SSG;
}

function readFMMacros(s: LegacyState): void {
  const { r } = s;
  const lengths = readU32s(r, FM_CODES.length);
  const loops = readU32s(r, FM_CODES.length);
  for (const code of [...STANDARD_CODES, ...EXTENDED_CODES, ...FM_CODES]) {
    standardMacro(s, code).open = r.bool();
  }
  FM_CODES.forEach((code, i) => {
    const macro = standardMacro(s, code);
    macro.data = readValues(r, lengths[i], i32);
    placeMarker(macro.data, MacroMarker.LOOP, loops[i]);
  });
}

function readOperatorMacros(s: LegacyState): void {
  const { r } = s;
  s.operators = OPERATOR_MACRO_CODES.map(code => createFeature(code));
  const headers = s.operators.map(op => {
    const lengths = readU32s(r, OP_CODES.length);
    const loops = readU32s(r, OP_CODES.length);
    OP_CODES.forEach(code => {
      opMacro(op, code).open = r.bool();
    });
    return { lengths, loops };
  });
  s.operators.forEach((op, n) => {
    OP_CODES.forEach((code, i) => {
      const macro = opMacro(op, code);
      macro.data = readValues(r, headers[n].lengths[i], i32);
      placeMarker(macro.data, MacroMarker.LOOP, headers[n].loops[i]);
    });
  });
}

function readReleases(s: LegacyState): void {
  const { r } = s;
  for (const code of [...STANDARD_CODES, ...EXTENDED_CODES, ...FM_CODES]) {
    placeMarker(standardMacro(s, code).data, MacroMarker.RELEASE, r.u32());
  }
  for (const op of s.operators) {
    for (const code of OP_CODES) placeMarker(opMacro(op, code).data, MacroMarker.RELEASE, r.u32());
  }
}

function readExtendedOperatorMacros(s: LegacyState): void {
  for (const op of s.operators) {
    readMacroSet(s.r, OP_EXTENDED_CODES.map(code => opMacro(op, code)), u8);
  }
}

function readOPLDrums(s: LegacyState): void {
  const { r } = s;
  const ld = createFeature('LD');
  ld.fixedDrums = r.bool();
  r.u8(); // reserved
  ld.kickFreq = r.u16();
  ld.snareHatFreq = r.u16();
  ld.tomTopFreq = r.u16();
  s.optional.LD = ld;
}

function clearObsoleteMacros(s: LegacyState): void {
  if (s.version < 63 && s.type === InstrumentType.PCE) standardMacro(s, MacroCode.DUTY).data = [];
  if (s.version < 70 && s.type === InstrumentType.FM_OPLL) standardMacro(s, MacroCode.WAVE).data = [];
}

function readNoteMap(s: LegacyState): void {
  const { r, sample } = s;
  sample.useNoteMap = r.bool();
  if (!sample.useNoteMap) return;
  for (const entry of sample.sampleMap) entry.freq = r.u32();
  for (const entry of sample.sampleMap) entry.sampleIndex = r.u16();
}

function readN163(s: LegacyState): void {
  const { r } = s;
  s.optional.N1 = { code: 'N1', wave: r.i32(), wavePos: r.u8(), waveLen: r.u8(), waveMode: r.u8() };
  r.u8(); // reserved
}

function readLateMacros(s: LegacyState): void {
  readMacroSet(s.r, LATE_CODES.map(code => standardMacro(s, code)), i32);
}

function readFDS(s: LegacyState): void {
  const { r } = s;
  const fd = createFeature('FD');
  fd.modSpeed = r.i32();
  fd.modDepth = r.i32();
  fd.initTableWithFirstWave = r.bool();
  r.skip(3);
  fd.modTable = Array.from(r.bytes(32));
  s.optional.FD = fd;
}

function readOPZ(s: LegacyState): void {
  s.fm.fms2 = s.r.u8();
  s.fm.ams2 = s.r.u8();
}

function readWaveSynth(s: LegacyState): void {
  const { r } = s;
  const waveIndices: [number, number] = [r.i32(), r.i32()];
  const rateDivider = r.u8();
  const at = r.absolutePosition;
  const effect = decodeEnum(WaveFX, r.u8(), 'wave synth effect', COMPONENT, at);
  s.optional.WS = {
    code: 'WS',
    waveIndices,
    rateDivider,
    effect,
    enabled: r.bool(),
    globalEffect: r.bool(),
    speed: r.u8(),
    params: [r.u8(), r.u8(), r.u8(), r.u8()],
  };
}

function readMacroModes(s: LegacyState): void {
  for (const code of MODE_ORDER) standardMacro(s, code).mode = s.r.u8();
}

function readC64NoTest(s: LegacyState): void {
  s.c64.noTest = s.r.bool();
}

function readMultiPCM(s: LegacyState): void {
  const { r } = s;
  s.optional.MP = {
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
  };
  r.skip(23);
}

function readSoundUnit(s: LegacyState): void {
  s.sample.useSample = s.r.bool();
  s.optional.SU = { code: 'SU', switchRoles: s.r.bool() };
}

function readGBHardwareSequence(s: LegacyState): void {
  const { r, gb } = s;
  const count = r.u8();
  gb.hwSeq = [];
  for (let i = 0; i < count; i++) {
    const at = r.absolutePosition;
    const command = decodeEnum(GBHwCommand, r.u8(), 'GB hardware command', COMPONENT, at);
    gb.hwSeq.push({ command, data: [r.u8(), r.u8()] });
  }
}

function readGBFlags(s: LegacyState): void {
  s.gb.softEnv = s.r.bool();
  s.gb.alwaysInit = s.r.bool();
}

function readES5506(s: LegacyState): void {
  const { r } = s;
  const at = r.absolutePosition;
  s.optional.ES = {
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
}

function readSNES(s: LegacyState): void {
  const { r } = s;
  const sn = createFeature('SN');
  sn.useEnv = r.bool();
  if (s.version >= 118) {
    sn.gainMode = gainModeFromBits(r.u8(), r.absolutePosition - 1);
    sn.gain = r.u8();
  } else {
    r.skip(2);
  }
  sn.envelope.a = r.u8();
  sn.envelope.d = r.u8();
  const sus = r.u8();
  sn.envelope.s = sus & 7;
  sn.sus = (sus >> 3) & 1 ? SNESSusMode.SUS_WITH_DEC : SNESSusMode.DIRECT;
  sn.envelope.r = r.u8();
  s.optional.SN = sn;
}

function readMacroTiming(s: LegacyState): void {
  const { r } = s;
  for (const code of TIMING_ORDER) standardMacro(s, code).speed = r.u8();
  for (const code of TIMING_ORDER) standardMacro(s, code).delay = r.u8();
  const opOrder = [...OP_CODES, ...OP_EXTENDED_CODES];
  for (const op of s.operators) {
    for (const code of opOrder) opMacro(op, code).speed = r.u8();
    for (const code of opOrder) opMacro(op, code).delay = r.u8();
  }
}

export const LEGACY_STEPS: readonly LegacyStep[] = [
  { name: 'fm', run: readFM },
  { name: 'gb', run: readGB },
  { name: 'c64', run: readC64 },
  { name: 'amiga', run: readAmiga },
  { name: 'standard macros', run: readStandardMacros },
  { name: 'arpeggio offset', before: 31, run: shiftArpeggio },
  { name: 'c64 macro offsets', before: 87, run: shiftC64Macros },
  { name: 'fixed arpeggio', before: 112, run: convertFixedArpeggio },
  { name: 'standard type', before: 17, run: relabelStandardType },
  { name: 'fm macros', since: 29, run: readFMMacros },
  { name: 'operator macros', since: 29, run: readOperatorMacros },
  { name: 'release points', since: 44, run: readReleases },
  { name: 'extended operator macros', since: 61, run: readExtendedOperatorMacros },
  { name: 'opl drums', since: 63, run: readOPLDrums },
  { name: 'obsolete macros', run: clearObsoleteMacros },
  { name: 'note map', since: 67, run: readNoteMap },
  { name: 'n163', since: 73, run: readN163 },
  { name: 'late macros', since: 76, run: readLateMacros },
  { name: 'fds', since: 76, run: readFDS },
  { name: 'opz', since: 77, run: readOPZ },
  { name: 'wave synth', since: 79, run: readWaveSynth },
  { name: 'macro modes', since: 84, run: readMacroModes },
  { name: 'c64 no test', since: 89, run: readC64NoTest },
  { name: 'multipcm', since: 93, run: readMultiPCM },
  { name: 'sound unit', since: 104, run: readSoundUnit },
  { name: 'gb hardware sequence', since: 105, run: readGBHardwareSequence },
  { name: 'gb flags', since: 106, run: readGBFlags },
  { name: 'es5506', since: 107, run: readES5506 },
  { name: 'snes', since: 109, run: readSNES },
  { name: 'macro timing', since: 111, run: readMacroTiming },
];

export function stepApplies(step: LegacyStep, version: number): boolean {
  return (step.since === undefined || version >= step.since) && (step.before === undefined || version < step.before);
}

export function createLegacyState(r: BinaryReader, version: number, type: InstrumentType, name: string): LegacyState {
  return {
    r,
    version,
    type,
    name: { code: 'NA', name },
    fm: createFeature('FM'),
    gb: createFeature('GB'),
    c64: createFeature('64'),
    sample: createFeature('SM'),
    macros: createFeature('MA'),
    operators: [],
    optional: {},
    arpMode: 0,
    arpLength: 0,
    arpLoop: NO_MARKER,
    oldVolHeight: 0,
    oldDutyHeight: 0,
  };
}

export function runLegacySteps(state: LegacyState, steps: readonly LegacyStep[] = LEGACY_STEPS): void {
  for (const step of steps) {
    if (!stepApplies(step, state.version)) continue;
    step.run(state);
  }
}

export function assembleLegacyFeatures(s: LegacyState): Feature[] {
  const features: Feature[] = [s.name, s.fm, s.gb, s.c64, s.sample, s.macros];
  for (const code of OPTIONAL_ORDER) {
    const feature = s.optional[code];
    if (feature) features.push(feature);
  }
  features.push(...s.operators);
  return features;
}

/** One `INST` block; its own size field bounds it. */
export function readLegacyInstrument(r: BinaryReader): Instrument {
  const start = r.absolutePosition;
  const body = enterBlock(r, INSTRUMENT_LEGACY_MAGIC, COMPONENT);
  const version = body.u16();
  const typeAt = body.absolutePosition;
  const type = decodeEnum(InstrumentType, body.u8(), 'instrument type', COMPONENT, typeAt);
  body.u8(); // reserved
  const state = createLegacyState(body, version, type, body.cString());
  runLegacySteps(state);
  log.debug(`INST at 0x${start.toString(16)}: v${version} "${state.name.name}"`);
  return { meta: { version, type: state.type, format: 'legacy' }, features: assembleLegacyFeatures(state) };
}

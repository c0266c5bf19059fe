/**
 * Instrument model.
 *
 * An instrument is metadata plus an ordered list of features. Every feature
 * is tagged by the two-character code it carries on disk, which makes
 * `Feature` a closed union: a switch over `feature.code` is exhaustive.
 * Both on-disk generations decode into this same shape.
 */

import {
  ESFilterMode,
  GainMode,
  GBHwCommand,
  InstrumentType,
  MacroCode,
  MacroMarker,
  MacroType,
  OpMacroCode,
  SNESSusMode,
  WaveFX,
} from './enums.js';

/** A macro step: either a value or a loop/release position marker. */
export type MacroItem = number | MacroMarker;

export interface SingleMacro<K extends MacroCode | OpMacroCode = MacroCode | OpMacroCode> {
  kind: K;
  mode: number;
  type: MacroType;
  delay: number;
  speed: number;
  open: boolean;
  data: MacroItem[];
}

export interface GenericADSR {
  a: number;
  d: number;
  s: number;
  r: number;
}

export interface NameFeature {
  code: 'NA';
  name: string;
}

export interface FMOperator {
  am: boolean;
  ar: number;
  dr: number;
  mult: number;
  rr: number;
  sl: number;
  tl: number;
  dt2: number;
  rs: number;
  dt: number;
  d2r: number;
  ssgEnv: number;
  dam: number;
  dvb: number;
  egt: boolean;
  ksl: number;
  sus: boolean;
  vib: boolean;
  ws: number;
  ksr: boolean;
  enable: boolean;
  kvs: number;
}

export interface FMFeature {
  code: 'FM';
  alg: number;
  fb: number;
  fms: number;
  ams: number;
  fms2: number;
  ams2: number;
  /** 2 or 4 */
  ops: number;
  opllPreset: number;
  /** always four entries; only the first `ops` are stored in featural blocks */
  operators: FMOperator[];
}

export interface MacroFeature {
  code: 'MA';
  macros: SingleMacro<MacroCode>[];
}

export type OperatorMacroFeatureCode = 'O1' | 'O2' | 'O3' | 'O4';

export const OPERATOR_MACRO_CODES: readonly OperatorMacroFeatureCode[] = ['O1', 'O2', 'O3', 'O4'];

export interface OperatorMacroFeature<C extends OperatorMacroFeatureCode = OperatorMacroFeatureCode> {
  code: C;
  macros: SingleMacro<OpMacroCode>[];
}

export interface C64Feature {
  code: '64';
  triOn: boolean;
  sawOn: boolean;
  pulseOn: boolean;
  noiseOn: boolean;
  envelope: GenericADSR;
  duty: number;
  ringMod: boolean;
  oscSync: boolean;
  toFilter: boolean;
  volIsCutoff: boolean;
  initFilter: boolean;
  dutyIsAbs: boolean;
  filterIsAbs: boolean;
  noTest: boolean;
  res: number;
  cut: number;
  hp: boolean;
  lp: boolean;
  bp: boolean;
  ch3Off: boolean;
}

export interface GBHwSeqEntry {
  command: GBHwCommand;
  data: [number, number];
}

export interface GBFeature {
  code: 'GB';
  envVol: number;
  envDir: number;
  envLen: number;
  soundLen: number;
  softEnv: boolean;
  alwaysInit: boolean;
  hwSeq: GBHwSeqEntry[];
}

export interface SampleMapEntry {
  freq: number;
  sampleIndex: number;
}

/** Sample playback settings and note map ("Amiga" in the tracker). */
export interface SampleFeature {
  code: 'SM';
  initSample: number;
  useNoteMap: boolean;
  useSample: boolean;
  useWave: boolean;
  waveLen: number;
  /** one entry per note, 120 in total */
  sampleMap: SampleMapEntry[];
}

export interface OPLDrumsFeature {
  code: 'LD';
  fixedDrums: boolean;
  kickFreq: number;
  snareHatFreq: number;
  tomTopFreq: number;
}

export interface SNESFeature {
  code: 'SN';
  useEnv: boolean;
  sus: SNESSusMode;
  gainMode: GainMode;
  gain: number;
  d2: number;
  envelope: GenericADSR;
}

export interface N163Feature {
  code: 'N1';
  wave: number;
  wavePos: number;
  waveLen: number;
  waveMode: number;
}

export interface FDSFeature {
  code: 'FD';
  modSpeed: number;
  modDepth: number;
  initTableWithFirstWave: boolean;
  /** 32 entries */
  modTable: number[];
}

export interface WaveSynthFeature {
  code: 'WS';
  waveIndices: [number, number];
  rateDivider: number;
  effect: WaveFX;
  enabled: boolean;
  globalEffect: boolean;
  speed: number;
  params: [number, number, number, number];
}

export interface PointerEntry {
  index: number;
  pointer: number;
}

/**
 * Sample (`SL`) or wavetable (`WL`) references. Indices and pointers are kept
 * raw; resolving them is up to the consumer.
 */
export interface PointerListFeature<C extends 'SL' | 'WL' = 'SL' | 'WL'> {
  code: C;
  entries: PointerEntry[];
}

export interface MultiPCMFeature {
  code: 'MP';
  ar: number;
  d1r: number;
  dl: number;
  d2r: number;
  rr: number;
  rc: number;
  lfo: number;
  vib: number;
  am: number;
}

export interface SoundUnitFeature {
  code: 'SU';
  switchRoles: boolean;
}

export interface ES5506Feature {
  code: 'ES';
  filterMode: ESFilterMode;
  k1: number;
  k2: number;
  envCount: number;
  leftVolumeRamp: number;
  rightVolumeRamp: number;
  k1Ramp: number;
  k2Ramp: number;
  k1Slow: number;
  k2Slow: number;
}

export interface X1010Feature {
  code: 'X1';
  bankSlot: number;
}

export interface DPCMMapEntry {
  pitch: number;
  delta: number;
}

export interface DPCMMapFeature {
  code: 'NE';
  useMap: boolean;
  /** 120 entries */
  sampleMap: DPCMMapEntry[];
}

export interface PowerNoiseFeature {
  code: 'PN';
  octave: number;
}

export interface SID2Feature {
  code: 'S2';
  volume: number;
  waveMix: number;
  noiseMode: number;
}

export type Feature =
  | NameFeature
  | FMFeature
  | MacroFeature
  | OperatorMacroFeature<'O1'>
  | OperatorMacroFeature<'O2'>
  | OperatorMacroFeature<'O3'>
  | OperatorMacroFeature<'O4'>
  | C64Feature
  | GBFeature
  | SampleFeature
  | OPLDrumsFeature
  | SNESFeature
  | N163Feature
  | FDSFeature
  | WaveSynthFeature
  | PointerListFeature<'SL'>
  | PointerListFeature<'WL'>
  | MultiPCMFeature
  | SoundUnitFeature
  | ES5506Feature
  | X1010Feature
  | DPCMMapFeature
  | PowerNoiseFeature
  | SID2Feature;

export type FeatureCode = Feature['code'];

export type FeatureOf<C extends FeatureCode> = Extract<Feature, { code: C }>;

export type InstrumentFormat = 'legacy' | 'featural';

export interface InstrumentMeta {
  /** tracker version the instrument was saved with */
  version: number;
  type: InstrumentType;
  format: InstrumentFormat;
}

export interface Instrument {
  meta: InstrumentMeta;
  features: Feature[];
}

// ---------- Defaults ----------

export const NOTE_MAP_SIZE = 120;

export function createMacro<K extends MacroCode | OpMacroCode>(kind: K): SingleMacro<K> {
  return { kind, mode: 0, type: MacroType.SEQUENCE, delay: 0, speed: 1, open: false, data: [] };
}

export function createFMOperator(init: Partial<FMOperator> = {}): FMOperator {
  return {
    am: false,
    ar: 0,
    dr: 0,
    mult: 0,
    rr: 0,
    sl: 0,
    tl: 0,
    dt2: 0,
    rs: 0,
    dt: 0,
    d2r: 0,
    ssgEnv: 0,
    dam: 0,
    dvb: 0,
    egt: false,
    ksl: 0,
    sus: false,
    vib: false,
    ws: 0,
    ksr: false,
    enable: true,
    kvs: 2,
    ...init,
  };
}

const fmOperatorDefaults = (): FMOperator[] => [
  createFMOperator({ tl: 42, ar: 31, dr: 8, sl: 15, rr: 3, mult: 5, dt: 5 }),
  createFMOperator({ tl: 48, ar: 31, dr: 4, sl: 11, rr: 1, mult: 1, dt: 5 }),
  createFMOperator({ tl: 18, ar: 31, dr: 10, sl: 15, rr: 4, mult: 1, dt: 0 }),
  createFMOperator({ tl: 2, ar: 31, dr: 9, sl: 15, rr: 9, mult: 1, dt: 0 }),
];

function filled<T>(count: number, make: () => T): T[] {
  const out: T[] = [];
  for (let i = 0; i < count; i++) out.push(make());
  return out;
}

type FeatureFactories = { [C in FeatureCode]: () => FeatureOf<C> };

const FEATURE_FACTORIES: FeatureFactories = {
  NA: () => ({ code: 'NA', name: '' }),
  FM: () => ({ code: 'FM', alg: 0, fb: 4, fms: 0, ams: 0, fms2: 0, ams2: 0, ops: 2, opllPreset: 0, operators: fmOperatorDefaults() }),
  MA: () => ({ code: 'MA', macros: [] }),
  O1: () => ({ code: 'O1', macros: [] }),
  O2: () => ({ code: 'O2', macros: [] }),
  O3: () => ({ code: 'O3', macros: [] }),
  O4: () => ({ code: 'O4', macros: [] }),
  '64': () => ({
    code: '64',
    triOn: false,
    sawOn: true,
    pulseOn: false,
    noiseOn: false,
    envelope: { a: 0, d: 8, s: 0, r: 0 },
    duty: 2048,
    ringMod: false,
    oscSync: false,
    toFilter: false,
    volIsCutoff: false,
    initFilter: false,
    dutyIsAbs: false,
    filterIsAbs: false,
    noTest: false,
    res: 0,
    cut: 0,
    hp: false,
    lp: false,
    bp: false,
    ch3Off: false,
  }),
  GB: () => ({ code: 'GB', envVol: 15, envDir: 0, envLen: 2, soundLen: 0, softEnv: false, alwaysInit: false, hwSeq: [] }),
  SM: () => ({
    code: 'SM',
    initSample: 0,
    useNoteMap: false,
    useSample: false,
    useWave: false,
    waveLen: 31,
    sampleMap: filled(NOTE_MAP_SIZE, () => ({ freq: 0, sampleIndex: 0 })),
  }),
  LD: () => ({ code: 'LD', fixedDrums: false, kickFreq: 1312, snareHatFreq: 1360, tomTopFreq: 448 }),
  SN: () => ({
    code: 'SN',
    useEnv: true,
    sus: SNESSusMode.DIRECT,
    gainMode: GainMode.DIRECT,
    gain: 127,
    d2: 0,
    envelope: { a: 15, d: 7, s: 7, r: 0 },
  }),
  N1: () => ({ code: 'N1', wave: -1, wavePos: 0, waveLen: 32, waveMode: 3 }),
  FD: () => ({ code: 'FD', modSpeed: 0, modDepth: 0, initTableWithFirstWave: false, modTable: filled(32, () => 0) }),
  WS: () => ({
    code: 'WS',
    waveIndices: [0, 0],
    rateDivider: 1,
    effect: WaveFX.NONE,
    enabled: false,
    globalEffect: false,
    speed: 0,
    params: [0, 0, 0, 0],
  }),
  SL: () => ({ code: 'SL', entries: [] }),
  WL: () => ({ code: 'WL', entries: [] }),
  MP: () => ({ code: 'MP', ar: 15, d1r: 15, dl: 0, d2r: 0, rr: 15, rc: 15, lfo: 0, vib: 0, am: 0 }),
  SU: () => ({ code: 'SU', switchRoles: false }),
  ES: () => ({
    code: 'ES',
    filterMode: ESFilterMode.LPK2_LPK1,
    k1: 0xffff,
    k2: 0xffff,
    envCount: 0,
    leftVolumeRamp: 0,
    rightVolumeRamp: 0,
    k1Ramp: 0,
    k2Ramp: 0,
    k1Slow: 0,
    k2Slow: 0,
  }),
  X1: () => ({ code: 'X1', bankSlot: 0 }),
  NE: () => ({ code: 'NE', useMap: false, sampleMap: filled(NOTE_MAP_SIZE, () => ({ pitch: 0, delta: 0 })) }),
  PN: () => ({ code: 'PN', octave: 0 }),
  S2: () => ({ code: 'S2', volume: 0, waveMix: 0, noiseMode: 0 }),
};

export const FEATURE_CODES: readonly FeatureCode[] = [
  'NA', 'FM', 'MA', 'O1', 'O2', 'O3', 'O4', '64', 'GB', 'SM', 'LD', 'SN',
  'N1', 'FD', 'WS', 'SL', 'WL', 'MP', 'SU', 'ES', 'X1', 'NE', 'PN', 'S2',
];

export function isFeatureCode(code: string): code is FeatureCode {
  return FEATURE_CODES.some(c => c === code);
}

/** A feature record holding the tracker's defaults for `code`. */
export function createFeature<C extends FeatureCode>(code: C): FeatureOf<C> {
  return FEATURE_FACTORIES[code]();
}

export function createInstrument(type = InstrumentType.FM_4OP, format: InstrumentFormat = 'featural', version = 143): Instrument {
  return { meta: { version, type, format }, features: [] };
}

// ---------- Queries ----------

export function findFeature<C extends FeatureCode>(instrument: Instrument, code: C): FeatureOf<C> | undefined {
  return instrument.features.find((f): f is FeatureOf<C> => f.code === code);
}

/** Display name carried by the `NA` feature, or '' without one. */
export function getInstrumentName(instrument: Instrument): string {
  return findFeature(instrument, 'NA')?.name ?? '';
}

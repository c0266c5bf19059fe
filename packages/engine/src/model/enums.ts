/**
 * Closed code tables used by the codecs.
 *
 * Values are the on-disk numbers; a value outside a table is rejected with
 * `UnknownEnumValueError` by `decodeEnum`.
 */

import { UnknownEnumValueError } from '../errors.js';

export enum Note {
  NONE = 0,
  C_SHARP = 1,
  D = 2,
  D_SHARP = 3,
  E = 4,
  F = 5,
  F_SHARP = 6,
  G = 7,
  G_SHARP = 8,
  A = 9,
  A_SHARP = 10,
  B = 11,
  C = 12,
  OFF = 100,
  OFF_RELEASE = 101,
  RELEASE = 102,
}

export enum MacroCode {
  VOL = 0,
  ARP = 1,
  DUTY = 2,
  WAVE = 3,
  PITCH = 4,
  EX1 = 5,
  EX2 = 6,
  EX3 = 7,
  ALG = 8,
  FB = 9,
  FMS = 10,
  AMS = 11,
  PAN_L = 12,
  PAN_R = 13,
  PHASE_RESET = 14,
  EX4 = 15,
  EX5 = 16,
  EX6 = 17,
  EX7 = 18,
  EX8 = 19,
  STOP = 255,
}

export enum OpMacroCode {
  AM = 0,
  AR = 1,
  DR = 2,
  MULT = 3,
  RR = 4,
  SL = 5,
  TL = 6,
  DT2 = 7,
  RS = 8,
  DT = 9,
  D2R = 10,
  SSG_EG = 11,
  DAM = 12,
  DVB = 13,
  EGT = 14,
  KSL = 15,
  SUS = 16,
  VIB = 17,
  WS = 18,
  KSR = 19,
}

export enum MacroType {
  SEQUENCE = 0,
  ADSR = 1,
  LFO = 2,
}

/** Word size of macro values inside a featural macro block. */
export enum MacroSize {
  UINT8 = 0,
  INT8 = 1,
  INT16 = 2,
  INT32 = 3,
}

export const MACRO_SIZE_LAYOUT: Record<MacroSize, { bytes: 1 | 2 | 4; signed: boolean }> = {
  [MacroSize.UINT8]: { bytes: 1, signed: false },
  [MacroSize.INT8]: { bytes: 1, signed: true },
  [MacroSize.INT16]: { bytes: 2, signed: true },
  [MacroSize.INT32]: { bytes: 4, signed: true },
};

/** Positions inside macro data; never values. */
export enum MacroMarker {
  LOOP = 'Loop',
  RELEASE = 'Release',
}

export enum GBHwCommand {
  ENVELOPE = 0,
  SWEEP = 1,
  WAIT = 2,
  WAIT_REL = 3,
  LOOP = 4,
  LOOP_REL = 5,
}

export enum SampleType {
  ZX_DRUM = 0,
  NES_DPCM = 1,
  QSOUND_ADPCM = 4,
  ADPCM_A = 5,
  ADPCM_B = 6,
  X68K_ADPCM = 7,
  PCM_8 = 8,
  SNES_BRR = 9,
  VOX = 10,
  PCM_16 = 16,
}

export enum InstrumentType {
  STANDARD = 0,
  FM_4OP = 1,
  GB = 2,
  C64 = 3,
  AMIGA = 4,
  PCE = 5,
  SSG = 6,
  AY8930 = 7,
  TIA = 8,
  SAA1099 = 9,
  VIC = 10,
  PET = 11,
  VRC6 = 12,
  FM_OPLL = 13,
  FM_OPL = 14,
  FDS = 15,
  VB = 16,
  N163 = 17,
  KONAMI_SCC = 18,
  FM_OPZ = 19,
  POKEY = 20,
  PC_BEEPER = 21,
  WONDERSWAN = 22,
  LYNX = 23,
  VERA = 24,
  X1010 = 25,
  VRC6_SAW = 26,
  ES5506 = 27,
  MULTIPCM = 28,
  SNES = 29,
  TSU = 30,
  NAMCO_WSG = 31,
  OPL_DRUMS = 32,
  FM_OPM = 33,
  NES = 34,
  MSM6258 = 35,
  MSM6295 = 36,
  ADPCM_A = 37,
  ADPCM_B = 38,
  SEGAPCM = 39,
  QSOUND = 40,
  YMZ280B = 41,
  RF5C68 = 42,
  MSM5232 = 43,
  T6W28 = 44,
  K007232 = 45,
  GA20 = 46,
  POKEMON_MINI = 47,
  SM8521 = 48,
  PV1000 = 49,
}

export enum WaveFX {
  NONE = 0,
  INVERT = 1,
  ADD = 2,
  SUBTRACT = 3,
  AVERAGE = 4,
  PHASE = 5,
  CHORUS = 6,
  NONE_DUAL = 128,
  WIPE = 129,
  FADE = 130,
  PING_PONG = 131,
  OVERLAY = 132,
  NEGATIVE_OVERLAY = 133,
  SLIDE = 134,
  MIX = 135,
  PHASE_MOD = 136,
}

export enum ESFilterMode {
  HPK2_HPK2 = 0,
  HPK2_LPK1 = 1,
  LPK2_LPK2 = 2,
  LPK2_LPK1 = 3,
}

export enum GainMode {
  DIRECT = 0,
  DEC_LINEAR = 4,
  DEC_LOG = 5,
  INC_LINEAR = 6,
  INC_INVLOG = 7,
}

export enum SNESSusMode {
  DIRECT = 0,
  SUS_WITH_DEC = 1,
  SUS_WITH_EXP = 2,
  SUS_WITH_REL = 3,
}

export enum LinearPitch {
  NON_LINEAR = 0,
  ONLY_PITCH_CHANGE = 1,
  FULL_LINEAR = 2,
}

export enum LoopModality {
  HARD_RESET_CHANNELS = 0,
  SOFT_RESET_CHANNELS = 1,
  DO_NOTHING = 2,
}

export enum DelayBehavior {
  STRICT = 0,
  BROKEN = 1,
  LAX = 2,
}

export enum JumpTreatment {
  ALL_JUMPS = 0,
  FIRST_JUMP_ONLY = 1,
  ROW_JUMP_PRIORITY = 2,
}

/** Patchbay destination port sets. */
export enum InputPortSet {
  SYSTEM = 0,
  NULL = 0xfff,
}

/** Patchbay source port sets: chips 1 to 32 by index, plus the special sources. */
export enum OutputPortSet {
  CHIP_1 = 0,
  CHIP_2 = 1,
  CHIP_3 = 2,
  CHIP_4 = 3,
  CHIP_5 = 4,
  CHIP_6 = 5,
  CHIP_7 = 6,
  CHIP_8 = 7,
  CHIP_9 = 8,
  CHIP_10 = 9,
  CHIP_11 = 10,
  CHIP_12 = 11,
  CHIP_13 = 12,
  CHIP_14 = 13,
  CHIP_15 = 14,
  CHIP_16 = 15,
  CHIP_17 = 16,
  CHIP_18 = 17,
  CHIP_19 = 18,
  CHIP_20 = 19,
  CHIP_21 = 20,
  CHIP_22 = 21,
  CHIP_23 = 22,
  CHIP_24 = 23,
  CHIP_25 = 24,
  CHIP_26 = 25,
  CHIP_27 = 26,
  CHIP_28 = 27,
  CHIP_29 = 28,
  CHIP_30 = 29,
  CHIP_31 = 30,
  CHIP_32 = 31,
  PREVIEW = 0xffd,
  METRONOME = 0xffe,
  NULL = 0xfff,
}

export function isEnumMember<T extends number>(table: Record<string, T | string>, value: number): value is T {
  return Object.values(table).some(v => v === value);
}

/**
 * Validate a raw number against a code table.
 *
 * @throws UnknownEnumValueError when `value` is not a member of `table`
 */
export function decodeEnum<T extends number>(
  table: Record<string, T | string>,
  value: number,
  domain: string,
  component: string,
  offset: number,
): T {
  if (isEnumMember(table, value)) return value;
  throw new UnknownEnumValueError(component, offset, domain, value);
}

/** Member name for display, e.g. `Note.C_SHARP` -> "C_SHARP". */
export function enumName(table: Record<string, number | string>, value: number): string {
  const name = table[value];
  return typeof name === 'string' ? name : String(value);
}

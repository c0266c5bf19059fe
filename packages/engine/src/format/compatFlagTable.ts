/**
 * Compatibility flag table.
 *
 * Each flag has
 * - a default (value for files newer than every threshold),
 * - an optional legacy seed: files older than `before` get `value`,
 * - the version from which it is stored on disk and the INFO phase it lives in.
 *
 * Seeding happens once from the version alone; each phase then reads the
 * flags present at that version in table order and skips the rest of the
 * phase's fixed byte budget.
 */

import { BinaryReader } from '../io/binaryReader.js';
import { BinaryWriter } from '../io/binaryWriter.js';
import { CompatFlagName, CompatFlags } from '../model/compatFlags.js';
import { decodeEnum, DelayBehavior, JumpTreatment, LinearPitch, LoopModality } from '../model/enums.js';

export type CompatPhase = 1 | 2 | 3;

export interface CompatFlagSpec<T> {
  defaultValue: T;
  legacy?: { before: number; value: T };
  /** phase holding the flag; `null` for flags stored elsewhere or nowhere */
  phase: CompatPhase | null;
  /** first version storing the flag on disk */
  since: number;
  read(r: BinaryReader): T;
  write(w: BinaryWriter, value: T): void;
}

/** Bytes reserved for each phase, used or not. */
export const PHASE_BUDGET: Record<CompatPhase, number> = { 1: 20, 2: 28, 3: 8 };

const NEVER = Number.POSITIVE_INFINITY;

function bool(phase: CompatPhase | null, since: number, defaultValue: boolean, legacy?: { before: number; value: boolean }): CompatFlagSpec<boolean> {
  return {
    defaultValue,
    legacy,
    phase,
    since,
    read: r => r.u8() !== 0,
    write: (w, v) => w.writeBool(v),
  };
}

function byte(phase: CompatPhase, since: number, defaultValue: number): CompatFlagSpec<number> {
  return {
    defaultValue,
    phase,
    since,
    read: r => r.u8(),
    write: (w, v) => w.writeU8(v),
  };
}

function choice<T extends number>(
  table: Record<string, T | string>,
  domain: string,
  phase: CompatPhase,
  since: number,
  defaultValue: T,
  legacy?: { before: number; value: T },
): CompatFlagSpec<T> {
  return {
    defaultValue,
    legacy,
    phase,
    since,
    read: r => decodeEnum(table, r.u8(), domain, 'compat', r.absolutePosition - 1),
    write: (w, v) => w.writeU8(v),
  };
}

type CompatFlagTable = { [K in CompatFlagName]: CompatFlagSpec<CompatFlags[K]> };

/** Key order inside each phase is the on-disk order. */
export const COMPAT_FLAG_TABLE: CompatFlagTable = {
  limitSlides: bool(1, 37, false, { before: 37, value: true }),
  linearPitch: choice(LinearPitch, 'linear pitch', 1, 37, LinearPitch.FULL_LINEAR, { before: 37, value: LinearPitch.ONLY_PITCH_CHANGE }),
  loopModality: choice(LoopModality, 'loop modality', 1, 37, LoopModality.DO_NOTHING, { before: 37, value: LoopModality.HARD_RESET_CHANNELS }),
  properNoiseLayout: bool(1, 43, true, { before: 43, value: false }),
  waveDutyIsVolume: bool(1, 43, false, { before: 43, value: false }),
  resetMacroOnPorta: bool(1, 45, false, { before: 45, value: true }),
  legacyVolumeSlides: bool(1, 45, false, { before: 45, value: true }),
  compatibleArpeggio: bool(1, 45, false, { before: 45, value: true }),
  noteOffResetsSlides: bool(1, 45, true, { before: 45, value: true }),
  targetResetsSlides: bool(1, 45, true, { before: 45, value: true }),
  arpeggioInhibitsPortamento: bool(1, 47, false, { before: 46, value: true }),
  wackAlgorithmMacro: bool(1, 47, false, { before: 46, value: true }),
  brokenShortcutSlides: bool(1, 49, false, { before: 49, value: true }),
  ignoreDuplicateSlides: bool(1, 50, false, { before: 50, value: false }),
  stopPortamentoOnNoteOff: bool(1, 62, false, { before: 62, value: true }),
  continuousVibrato: bool(1, 62, false),
  brokenDacMode: bool(1, 64, false, { before: 64, value: false }),
  oneTickCut: bool(1, 65, false, { before: 65, value: false }),
  instrumentChangeAllowedInPorta: bool(1, 66, true, { before: 66, value: false }),
  resetNoteBaseOnArpeggioStop: bool(1, 69, true, { before: 69, value: false }),

  brokenSpeedSelection: bool(2, 70, false),
  noSlidesOnFirstTick: bool(2, 71, false, { before: 71, value: false }),
  nextRowResetArpPos: bool(2, 71, false, { before: 71, value: false }),
  ignoreJumpAtEnd: bool(2, 71, false, { before: 71, value: true }),
  buggyPortamentoAfterSlide: bool(2, 72, false, { before: 72, value: true }),
  gbInsAffectsEnv: bool(2, 72, true, { before: 72, value: false }),
  sharedExtchState: bool(2, 78, true, { before: 78, value: false }),
  ignoreOutsideDacModeChange: bool(2, 83, false, { before: 83, value: true }),
  e1e2TakesPriority: bool(2, 83, false, { before: 83, value: false }),
  newSegaPcm: bool(2, 84, true, { before: 84, value: false }),
  weirdFnumPitchSlides: bool(2, 85, false, { before: 85, value: true }),
  snDutyResetsPhase: bool(2, 86, false, { before: 86, value: true }),
  linearPitchMacro: bool(2, 90, true, { before: 90, value: false }),
  pitchSlideSpeedInLinear: byte(2, 94, 4),
  oldOctaveBoundary: bool(2, 97, false, { before: 97, value: true }),
  disableOpn2DacVolumeControl: bool(2, 98, false, { before: 97, value: true }),
  newVolumeScaling: bool(2, 99, true, { before: 99, value: false }),
  volumeMacroLingers: bool(2, 99, true, { before: 99, value: false }),
  brokenOutVol: bool(2, 99, false, { before: 99, value: true }),
  e1e2StopOnSameNote: bool(2, 100, false, { before: 100, value: false }),
  brokenPortaAfterArp: bool(2, 101, false, { before: 101, value: true }),
  snNoLowPeriods: bool(2, 108, false, { before: 108, value: true }),
  cutDelayEffectPolicy: choice(DelayBehavior, 'delay behavior', 2, 110, DelayBehavior.LAX, { before: 110, value: DelayBehavior.BROKEN }),
  jumpTreatment: choice(JumpTreatment, 'jump treatment', 2, 113, JumpTreatment.ALL_JUMPS, { before: 113, value: JumpTreatment.FIRST_JUMP_ONLY }),
  autoSysName: bool(2, 115, true, { before: 115, value: true }),
  disableSampleMacro: bool(2, 117, false, { before: 117, value: true }),
  brokenOutVol2: bool(2, 121, false, { before: 121, value: false }),
  oldArpStrategy: bool(2, 130, false, { before: 130, value: true }),

  autoPatchbay: bool(null, 136, true),

  brokenPortaDuringLegato: bool(3, 138, false, { before: 138, value: true }),
  brokenFmOff: bool(3, 155, false, { before: 155, value: true }),
  preNoteNoEffect: bool(3, 168, false, { before: 168, value: true }),
  oldDpcm: bool(3, 183, false, { before: 183, value: true }),
  resetArpPhaseOnNewNote: bool(3, 184, true, { before: 184, value: false }),
  ceilVolumeScaling: bool(3, 188, true, { before: 188, value: false }),
  oldAlwaysSetVolume: bool(3, 191, false, { before: 191, value: true }),

  oldSampleOffset: bool(null, NEVER, false, { before: 200, value: true }),
};

function flagNames(): CompatFlagName[] {
  const names: CompatFlagName[] = [];
  for (const key of Object.keys(COMPAT_FLAG_TABLE)) {
    if (isCompatFlagName(key)) names.push(key);
  }
  return names;
}

export function isCompatFlagName(key: string): key is CompatFlagName {
  return Object.prototype.hasOwnProperty.call(COMPAT_FLAG_TABLE, key);
}

export const COMPAT_FLAG_NAMES: readonly CompatFlagName[] = flagNames();

/** Flags of one phase in on-disk order. */
export function phaseFlags(phase: CompatPhase): CompatFlagName[] {
  return COMPAT_FLAG_NAMES.filter(name => COMPAT_FLAG_TABLE[name].phase === phase);
}

/** Flags of `phase` stored on disk by a file of `version`. */
export function phaseFlagsAt(phase: CompatPhase, version: number): CompatFlagName[] {
  return phaseFlags(phase).filter(name => COMPAT_FLAG_TABLE[name].since <= version);
}

function seedOne<K extends CompatFlagName>(flags: Partial<CompatFlags>, name: K, version: number): void {
  const spec: CompatFlagSpec<CompatFlags[K]> = COMPAT_FLAG_TABLE[name];
  flags[name] = spec.legacy && version < spec.legacy.before ? spec.legacy.value : spec.defaultValue;
}

function isComplete(flags: Partial<CompatFlags>): flags is CompatFlags {
  return COMPAT_FLAG_NAMES.every(name => flags[name] !== undefined);
}

/**
 * Flags a file of `version` implies before any byte of it is read.
 */
export function seedCompatFlags(version: number): CompatFlags {
  const flags: Partial<CompatFlags> = {};
  for (const name of COMPAT_FLAG_NAMES) seedOne(flags, name, version);
  if (!isComplete(flags)) {
    throw new Error('compat flag table is missing entries');
  }
  return flags;
}

export function readCompatFlag<K extends CompatFlagName>(flags: CompatFlags, name: K, r: BinaryReader): void {
  const spec: CompatFlagSpec<CompatFlags[K]> = COMPAT_FLAG_TABLE[name];
  flags[name] = spec.read(r);
}

export function writeCompatFlag<K extends CompatFlagName>(flags: CompatFlags, name: K, w: BinaryWriter): void {
  const spec: CompatFlagSpec<CompatFlags[K]> = COMPAT_FLAG_TABLE[name];
  spec.write(w, flags[name]);
}

/**
 * Read one phase and skip its reserved tail.
 * @returns the number of reserved bytes skipped
 */
export function readCompatPhase(r: BinaryReader, flags: CompatFlags, phase: CompatPhase, version: number): number {
  const present = phaseFlagsAt(phase, version);
  for (const name of present) readCompatFlag(flags, name, r);
  const reserved = PHASE_BUDGET[phase] - present.length;
  r.skip(reserved);
  return reserved;
}

export function writeCompatPhase(w: BinaryWriter, flags: CompatFlags, phase: CompatPhase, version: number): void {
  const present = phaseFlagsAt(phase, version);
  for (const name of present) writeCompatFlag(flags, name, w);
  w.fill(PHASE_BUDGET[phase] - present.length);
}

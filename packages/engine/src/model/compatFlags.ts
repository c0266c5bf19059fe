import { DelayBehavior, JumpTreatment, LinearPitch, LoopModality } from './enums.js';

/**
 * Playback compatibility settings of a module.
 *
 * The value of each flag depends on the file version: old files get the
 * behaviour the tracker had when they were saved, newer ones store the flag
 * explicitly. See `format/compatFlagTable.ts` for thresholds.
 */
export interface CompatFlags {
  // phase 1
  limitSlides: boolean;
  linearPitch: LinearPitch;
  loopModality: LoopModality;
  properNoiseLayout: boolean;
  waveDutyIsVolume: boolean;
  resetMacroOnPorta: boolean;
  legacyVolumeSlides: boolean;
  compatibleArpeggio: boolean;
  noteOffResetsSlides: boolean;
  targetResetsSlides: boolean;
  arpeggioInhibitsPortamento: boolean;
  wackAlgorithmMacro: boolean;
  brokenShortcutSlides: boolean;
  ignoreDuplicateSlides: boolean;
  stopPortamentoOnNoteOff: boolean;
  continuousVibrato: boolean;
  brokenDacMode: boolean;
  oneTickCut: boolean;
  instrumentChangeAllowedInPorta: boolean;
  resetNoteBaseOnArpeggioStop: boolean;

  // phase 2
  brokenSpeedSelection: boolean;
  noSlidesOnFirstTick: boolean;
  nextRowResetArpPos: boolean;
  ignoreJumpAtEnd: boolean;
  buggyPortamentoAfterSlide: boolean;
  gbInsAffectsEnv: boolean;
  sharedExtchState: boolean;
  ignoreOutsideDacModeChange: boolean;
  e1e2TakesPriority: boolean;
  newSegaPcm: boolean;
  weirdFnumPitchSlides: boolean;
  snDutyResetsPhase: boolean;
  linearPitchMacro: boolean;
  pitchSlideSpeedInLinear: number;
  oldOctaveBoundary: boolean;
  disableOpn2DacVolumeControl: boolean;
  newVolumeScaling: boolean;
  volumeMacroLingers: boolean;
  brokenOutVol: boolean;
  e1e2StopOnSameNote: boolean;
  brokenPortaAfterArp: boolean;
  snNoLowPeriods: boolean;
  cutDelayEffectPolicy: DelayBehavior;
  jumpTreatment: JumpTreatment;
  autoSysName: boolean;
  disableSampleMacro: boolean;
  brokenOutVol2: boolean;
  oldArpStrategy: boolean;

  // stored outside the phases
  autoPatchbay: boolean;

  // phase 3
  brokenPortaDuringLegato: boolean;
  brokenFmOff: boolean;
  preNoteNoEffect: boolean;
  oldDpcm: boolean;
  resetArpPhaseOnNewNote: boolean;
  ceilVolumeScaling: boolean;
  oldAlwaysSetVolume: boolean;

  /** Implied by the version only; never stored. */
  oldSampleOffset: boolean;
}

export type CompatFlagName = keyof CompatFlags;

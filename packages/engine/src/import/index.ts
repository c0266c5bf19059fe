/**
 * Import module exports
 */

export { decodeModule, isModule, speedPatternFromSpeeds, SPEED_PATTERN_SLOTS, type DecodeModuleOptions } from './module.reader.js';
export { decompressModule, hasModuleMagic } from './container.js';
export {
  decodeInstrument,
  decodeLegacyInstrumentFile,
  readFeaturalInstrument,
  sniffInstrumentFile,
  type InstrumentImportKind,
  type LegacyInstrumentFile,
} from './instrument.reader.js';
export {
  readLegacyInstrument,
  LEGACY_STEPS,
  runLegacySteps,
  stepApplies,
  type LegacyState,
  type LegacyStep,
} from './legacyInstrument.reader.js';
export { readPattern, unpackNote, type PatternContext } from './pattern.reader.js';
export { decodeWavetable, decodeWavetableFile, readWavetable, type WavetableFile } from './wavetable.reader.js';
export { decodeSample, readSample } from './sample.reader.js';
export { readModuleFile, readInstrumentFile, readWavetableFile } from './files.js';
export { getModuleSummary } from './summary.js';

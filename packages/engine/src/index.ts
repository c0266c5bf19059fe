/**
 * Bidirectional codec for Furnace tracker modules, instruments,
 * wavetables and samples.
 */

export * from './errors.js';
export { BinaryReader } from './io/binaryReader.js';
export { BinaryWriter } from './io/binaryWriter.js';

export * from './model/enums.js';
export * from './model/chips.js';
export * from './model/compatFlags.js';
export * from './model/instrument.js';
export * from './model/module.js';
export * from './model/pattern.js';
export * from './model/sample.js';
export * from './model/wavetable.js';

export {
  COMPAT_FLAG_NAMES,
  COMPAT_FLAG_TABLE,
  PHASE_BUDGET,
  phaseFlags,
  phaseFlagsAt,
  readCompatPhase,
  seedCompatFlags,
  writeCompatPhase,
  type CompatPhase,
} from './format/compatFlagTable.js';
export { parseChipFlags, parseFlagValue, serializeChipFlags } from './format/chipFlagText.js';
export { hasLegacyFlagLayout, unpackLegacyChipFlags } from './format/legacyChipFlags.js';
export { insertMarker, splitMarkers, withMarkers } from './format/macroData.js';
export { FEATURE_CODECS, macroWordSize, readFeature, writeFeature, type FeatureContext } from './format/features.js';
export * from './format/signatures.js';

export * from './import/index.js';
export * from './export/index.js';

export { CLIPBOARD_HEADER, formatRow, patternToClipboard, rowToClipboard } from './patterns/clipboard.js';
export { InterNote, fromInterNote, toInterNote } from './interchange/notes.js';
export { patternToSequence, type SequenceEntry } from './sequences/patternToSequence.js';

export * from './util/index.js';

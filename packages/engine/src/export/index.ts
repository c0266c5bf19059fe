export { encodeModule, type EncodeModuleOptions } from './moduleWriter.js';
export {
  encodeInstrument,
  featuralVersion,
  writeInstrument,
  type EncodeInstrumentOptions,
  type InstrumentContainer,
} from './instrumentWriter.js';
export { encodeWavetable, encodeWavetableFile, writeWavetable } from './wavetableWriter.js';
export { encodeSample, writeSample } from './sampleWriter.js';
export { packNote, writePattern } from './patternWriter.js';
export { writeModuleFile, type WriteModuleOptions } from './files.js';
export { exportJSON, toJSON, JSON_EXPORT_FORMAT } from './jsonExport.js';

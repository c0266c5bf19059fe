/** Container and block signatures, plus the version gates shared by several codecs. */

export const MODULE_MAGIC = '-Furnace module-';
export const INSTRUMENT_FILE_MAGIC = '-Furnace instr.-';
export const INSTRUMENT_FEATURAL_FILE_MAGIC = 'FINS';
export const WAVETABLE_FILE_MAGIC = '-Furnace waveta-';

export const INFO_MAGIC = 'INFO';
export const SONG_MAGIC = 'SONG';
export const FLAG_MAGIC = 'FLAG';
export const INSTRUMENT_LEGACY_MAGIC = 'INST';
export const INSTRUMENT_FEATURAL_MAGIC = 'INS2';
export const WAVETABLE_MAGIC = 'WAVE';
export const SAMPLE_MAGIC = 'SMP2';
export const PATTERN_LEGACY_MAGIC = 'PATR';
export const PATTERN_SPARSE_MAGIC = 'PATN';

/** Header size of a module container: magic, version, reserved, INFO pointer, reserved. */
export const MODULE_HEADER_SIZE = 32;

export const MAX_CHIPS = 32;

/** Newest format revision whose layout this codec knows. */
export const LATEST_VERSION = 200;

export const VERSION = {
  /** INFO carries a length; before this the block runs to the end of the stream */
  INFO_LENGTH: 100,
  /** per-chip FLAG blocks replace the packed legacy flag words */
  CHIP_FLAG_BLOCKS: 119,
  /** featural instruments (INS2) */
  FEATURAL_INSTRUMENTS: 127,
  /** sparse PATN patterns */
  SPARSE_PATTERNS: 157,
  PATTERN_NAME: 51,
  MASTER_VOLUME: 59,
  COMPAT_PHASE_2: 70,
  SUBSONGS: 95,
  VIRTUAL_TEMPO: 96,
  EXTRA_META: 103,
  MIXER_PATCHBAY: 135,
  AUTO_PATCHBAY: 136,
  COMPAT_PHASE_3: 138,
  SPEED_PATTERN: 139,
} as const;

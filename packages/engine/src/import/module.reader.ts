/**
 * Module decoding.
 *
 * Reads the container header, seeds the compat flags from the version, then
 * walks INFO, the per-chip FLAG blocks, the instrument/wavetable/sample
 * tables, the extra subsongs and finally the patterns (which need every
 * subsong's pattern length and effect-column counts).
 */

import { BinaryReader } from '../io/binaryReader.js';
import { BadMagicError, InvalidFieldValueError } from '../errors.js';
import { chipById } from '../model/chips.js';
import { decodeEnum, InputPortSet, OutputPortSet } from '../model/enums.js';
import {
  ChannelDisplayInfo,
  ChipInfo,
  createChip,
  createModuleMeta,
  createTimingInfo,
  FurnaceModule,
  getNumChannels,
  PatchBayConnection,
  Subsong,
} from '../model/module.js';
import { seedCompatFlags, readCompatPhase } from '../format/compatFlagTable.js';
import { parseChipFlags } from '../format/chipFlagText.js';
import { unpackLegacyChipFlags } from '../format/legacyChipFlags.js';
import { enterBlock } from '../format/block.js';
import {
  FLAG_MAGIC,
  INFO_MAGIC,
  LATEST_VERSION,
  MAX_CHIPS,
  MODULE_MAGIC,
  SONG_MAGIC,
  VERSION,
} from '../format/signatures.js';
import { decompressModule, hasModuleMagic } from './container.js';
import { readFeaturalInstrument } from './instrument.reader.js';
import { readLegacyInstrument } from './legacyInstrument.reader.js';
import { readWavetable } from './wavetable.reader.js';
import { readSample } from './sample.reader.js';
import { readPattern } from './pattern.reader.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'module';
const log = createLogger(COMPONENT);

/** Entries in a speed pattern or groove; shorter lists are padded on disk. */
export const SPEED_PATTERN_SLOTS = 16;

export interface DecodeModuleOptions {
  /** inflate zlib-wrapped input (default true) */
  decompress?: boolean;
}

interface TablePointers {
  instruments: number[];
  wavetables: number[];
  samples: number[];
  patterns: number[];
  subsongs: number[];
  chipFlags: number[];
}

function readU32s(r: BinaryReader, count: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(r.u32());
  return out;
}

function readU8s(r: BinaryReader, count: number): number[] {
  return Array.from(r.bytes(count));
}

/** Speed pattern or groove: length byte, entries, zero padding up to 16. */
function readSpeedList(r: BinaryReader, what: string, padded: boolean): number[] {
  const at = r.absolutePosition;
  const length = r.u8();
  if (length > SPEED_PATTERN_SLOTS) {
    throw new InvalidFieldValueError(COMPONENT, at, `${what} length`, length, `at most ${SPEED_PATTERN_SLOTS} entries`);
  }
  const values = readU8s(r, length);
  if (padded) r.skip(SPEED_PATTERN_SLOTS - length);
  return values;
}

/** Files before speed patterns alternate between the two speeds. */
export function speedPatternFromSpeeds(speed: [number, number]): number[] {
  return speed[0] === speed[1] ? [speed[0]] : [speed[0], speed[1]];
}

/** Orders, effect columns and channel display arrays; INFO and SONG share the layout. */
function readChannelTables(r: BinaryReader, song: Subsong, numChannels: number, orderLength: number): void {
  song.order = [];
  for (let ch = 0; ch < numChannels; ch++) song.order.push(readU8s(r, orderLength));
  song.effectColumns = readU8s(r, numChannels);
  const display: ChannelDisplayInfo[] = [];
  for (let ch = 0; ch < numChannels; ch++) display.push({ name: '', abbreviation: '', collapsed: false, shown: r.bool() });
  for (const d of display) d.collapsed = r.bool();
  for (const d of display) d.name = r.cString();
  for (const d of display) d.abbreviation = r.cString();
  song.channelDisplay = display;
}

function emptySubsong(): Subsong {
  return {
    name: '',
    comment: '',
    speedPattern: [],
    grooves: [],
    timing: createTimingInfo(),
    patternLength: 64,
    order: [],
    effectColumns: [],
    channelDisplay: [],
  };
}

function readPatchbay(r: BinaryReader): PatchBayConnection[] {
  const count = r.u32();
  const connections: PatchBayConnection[] = [];
  for (let i = 0; i < count; i++) {
    const at = r.absolutePosition;
    const dest = r.u16();
    const source = r.u16();
    connections.push({
      dest: { set: decodeEnum(InputPortSet, dest >> 4, 'input port set', COMPONENT, at), port: dest & 15 },
      source: { set: decodeEnum(OutputPortSet, source >> 4, 'output port set', COMPONENT, at + 2), port: source & 15 },
    });
  }
  return connections;
}

function readInfo(r: BinaryReader, module: FurnaceModule): TablePointers {
  const { version } = module.meta;
  let body: BinaryReader;
  if (version < VERSION.INFO_LENGTH) {
    r.expectMagic(INFO_MAGIC, COMPONENT);
    r.skip(4);
    body = r.subReader(r.remaining, COMPONENT);
  } else {
    body = enterBlock(r, INFO_MAGIC, COMPONENT);
  }

  const song = module.subsongs[0];
  song.timing.timebase = body.u8() + 1;
  song.timing.speed = [body.u8(), body.u8()];
  song.timing.arpSpeed = body.u8();
  song.timing.clockSpeed = body.f32();
  song.patternLength = body.u16();
  const orderLength = body.u16();
  song.timing.highlight = [body.u8(), body.u8()];

  const instrumentCount = body.u16();
  const wavetableCount = body.u16();
  const sampleCount = body.u16();
  const patternCount = body.u32();

  const chipsAt = body.absolutePosition;
  const chipIds = readU8s(body, MAX_CHIPS);
  const chips: ChipInfo[] = [];
  for (const [i, id] of chipIds.entries()) {
    if (id === 0) break;
    chips.push(createChip(chipById(id, COMPONENT, chipsAt + i)));
  }
  module.chips.list = chips;

  for (let i = 0; i < MAX_CHIPS; i++) {
    const volume = body.i8() / 64;
    if (i < chips.length) chips[i].volume = volume;
  }
  for (let i = 0; i < MAX_CHIPS; i++) {
    const panning = body.i8() / 128;
    if (i < chips.length) chips[i].panning = panning;
  }

  let chipFlags: number[] = [];
  if (version >= VERSION.CHIP_FLAG_BLOCKS) {
    chipFlags = readU32s(body, MAX_CHIPS);
  } else {
    const words = readU32s(body, MAX_CHIPS);
    chips.forEach((chip, i) => {
      chip.flags = unpackLegacyChipFlags(chip.type, words[i]);
    });
  }

  module.meta.name = body.cString();
  module.meta.author = body.cString();
  module.meta.tuning = body.f32();

  readCompatPhase(body, module.compatFlags, 1, version);

  const pointers: TablePointers = {
    instruments: readU32s(body, instrumentCount),
    wavetables: readU32s(body, wavetableCount),
    samples: readU32s(body, sampleCount),
    patterns: readU32s(body, patternCount),
    subsongs: [],
    chipFlags,
  };

  readChannelTables(body, song, getNumChannels(module), orderLength);
  module.meta.comment = body.cString();

  if (version >= VERSION.MASTER_VOLUME) module.chips.masterVolume = body.f32();

  if (version >= VERSION.COMPAT_PHASE_2) {
    readCompatPhase(body, module.compatFlags, 2, version);
    if (version >= VERSION.VIRTUAL_TEMPO) {
      song.timing.virtualTempo = [body.u16(), body.u16()];
    } else {
      body.skip(4);
    }
  }

  if (version >= VERSION.SUBSONGS) {
    song.name = body.cString();
    song.comment = body.cString();
    const extra = body.u8();
    body.skip(3);
    pointers.subsongs = readU32s(body, extra);
  }

  if (version >= VERSION.EXTRA_META) {
    module.meta.sysName = body.cString();
    module.meta.album = body.cString();
    module.meta.nameJp = body.cString();
    module.meta.authorJp = body.cString();
    module.meta.sysNameJp = body.cString();
    module.meta.albumJp = body.cString();
  }

  if (version >= VERSION.MIXER_PATCHBAY) {
    for (const chip of chips) {
      chip.volume = body.f32();
      chip.panning = body.f32();
      chip.surround = body.f32();
    }
    module.patchbay = readPatchbay(body);
  }

  if (version >= VERSION.AUTO_PATCHBAY) module.compatFlags.autoPatchbay = body.bool();

  if (version >= VERSION.COMPAT_PHASE_3) readCompatPhase(body, module.compatFlags, 3, version);

  if (version >= VERSION.SPEED_PATTERN) {
    song.speedPattern = readSpeedList(body, 'speed pattern', true);
    const grooveCount = body.u8();
    song.grooves = [];
    for (let i = 0; i < grooveCount; i++) song.grooves.push(readSpeedList(body, 'groove', true));
  } else {
    song.speedPattern = speedPatternFromSpeeds(song.timing.speed);
  }

  log.debug(`INFO: ${chips.length} chip(s), ${instrumentCount} ins, ${wavetableCount} waves, ${sampleCount} samples, ${patternCount} patterns`);
  return pointers;
}

function readChipFlagBlocks(r: BinaryReader, module: FurnaceModule, pointers: number[]): void {
  module.chips.list.forEach((chip, i) => {
    const at = pointers[i];
    if (!at) return;
    const body = enterBlock(r.fork(at), FLAG_MAGIC, 'flags');
    chip.flags = parseChipFlags(body.cString());
  });
}

function readSubsong(r: BinaryReader, module: FurnaceModule): Subsong {
  const body = enterBlock(r, SONG_MAGIC, COMPONENT);
  const song = emptySubsong();
  song.timing.timebase = body.u8() + 1;
  song.timing.speed = [body.u8(), body.u8()];
  song.timing.arpSpeed = body.u8();
  song.timing.clockSpeed = body.f32();
  song.patternLength = body.u16();
  const orderLength = body.u16();
  song.timing.highlight = [body.u8(), body.u8()];
  song.timing.virtualTempo = [body.u16(), body.u16()];
  song.name = body.cString();
  song.comment = body.cString();
  readChannelTables(body, song, getNumChannels(module), orderLength);
  song.speedPattern = module.meta.version >= VERSION.SPEED_PATTERN
    ? readSpeedList(body, 'speed pattern', false)
    : speedPatternFromSpeeds(song.timing.speed);
  return song;
}

/** Follow a pointer table until its first zero entry. */
function livePointers(pointers: number[]): number[] {
  const end = pointers.indexOf(0);
  return end < 0 ? pointers : pointers.slice(0, end);
}

function emptyModule(version: number): FurnaceModule {
  return {
    meta: createModuleMeta(version),
    chips: { list: [], masterVolume: 2 },
    compatFlags: seedCompatFlags(version),
    subsongs: [emptySubsong()],
    patchbay: [],
    instruments: [],
    wavetables: [],
    samples: [],
    patterns: [],
  };
}

/**
 * Decode a module container. Compressed input is inflated first unless
 * `decompress` is false.
 */
export function decodeModule(bytes: Uint8Array, options: DecodeModuleOptions = {}): FurnaceModule {
  const data = !hasModuleMagic(bytes) && options.decompress !== false ? decompressModule(bytes) : bytes;
  const r = new BinaryReader(data, 0, COMPONENT);
  r.expectMagic(MODULE_MAGIC);
  const version = r.u16();
  r.u16(); // reserved
  const infoAt = r.u32();
  r.skip(8);

  if (version > LATEST_VERSION) {
    log.warn(`module version ${version} is newer than ${LATEST_VERSION}; decoding with the newest known layout`);
  }

  const module = emptyModule(version);
  const pointers = readInfo(r.fork(infoAt), module);

  if (version >= VERSION.CHIP_FLAG_BLOCKS) readChipFlagBlocks(r, module, pointers.chipFlags);

  const featural = version >= VERSION.FEATURAL_INSTRUMENTS;
  module.instruments = livePointers(pointers.instruments).map(at =>
    featural ? readFeaturalInstrument(r.fork(at, 'instrument')) : readLegacyInstrument(r.fork(at, 'instrument')),
  );
  module.wavetables = livePointers(pointers.wavetables).map(at => readWavetable(r.fork(at, 'wavetable')));
  module.samples = livePointers(pointers.samples).map(at => readSample(r.fork(at, 'sample')));

  if (version >= VERSION.SUBSONGS) {
    for (const at of livePointers(pointers.subsongs)) module.subsongs.push(readSubsong(r.fork(at), module));
  }

  const ctx = { version, subsongs: module.subsongs };
  module.patterns = livePointers(pointers.patterns).map(at => readPattern(r.fork(at, 'pattern'), ctx));

  log.info(`decoded module v${version} "${module.meta.name}"`);
  return module;
}

/** True when `bytes` is a module container, plain or compressed. */
export function isModule(bytes: Uint8Array): boolean {
  if (hasModuleMagic(bytes)) return true;
  try {
    return hasModuleMagic(decompressModule(bytes));
  } catch (err) {
    if (err instanceof BadMagicError) return false;
    throw err;
  }
}

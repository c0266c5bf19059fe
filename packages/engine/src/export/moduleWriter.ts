/**
 * Module encoder.
 *
 * Writes the header and INFO with zeroed pointer slots, then appends each
 * referenced block and backpatches its slot with the block's offset. The
 * target version gates the same fields the decoder gates, so
 * `encode(decode(encode(m)))` reproduces `encode(m)` byte for byte.
 */

import { BinaryWriter } from '../io/binaryWriter.js';
import { InvalidFieldValueError } from '../errors.js';
import { FurnaceModule, getNumChannels, Subsong } from '../model/module.js';
import { writeCompatPhase } from '../format/compatFlagTable.js';
import { serializeChipFlags } from '../format/chipFlagText.js';
import {
  FLAG_MAGIC,
  INFO_MAGIC,
  LATEST_VERSION,
  MAX_CHIPS,
  MODULE_HEADER_SIZE,
  MODULE_MAGIC,
  SONG_MAGIC,
  VERSION,
} from '../format/signatures.js';
import { SPEED_PATTERN_SLOTS } from '../import/module.reader.js';
import { writeInstrument } from './instrumentWriter.js';
import { writeWavetable } from './wavetableWriter.js';
import { writeSample } from './sampleWriter.js';
import { writePattern } from './patternWriter.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'module';
const log = createLogger(COMPONENT);

export interface EncodeModuleOptions {
  /** target format version (default: the module's own version) */
  version?: number;
}

interface PointerSlots {
  chipFlags: number[];
  instruments: number[];
  wavetables: number[];
  samples: number[];
  patterns: number[];
  subsongs: number[];
}

/** Write `count` zeroed u32 slots and return their offsets. */
function reserve(w: BinaryWriter, count: number): number[] {
  const slots: number[] = [];
  for (let i = 0; i < count; i++) {
    slots.push(w.position);
    w.writeU32(0);
  }
  return slots;
}

function clampI8(value: number): number {
  return Math.max(-128, Math.min(127, Math.round(value)));
}

function orderLength(song: Subsong, at: number): number {
  const length = song.order[0]?.length ?? 0;
  for (const [ch, column] of song.order.entries()) {
    if (column.length !== length) {
      throw new InvalidFieldValueError(COMPONENT, at, `order length of channel ${ch}`, column.length, `channel 0 has ${length} rows`);
    }
  }
  return length;
}

function writeSpeedList(w: BinaryWriter, values: readonly number[], what: string, padded: boolean): void {
  if (values.length > SPEED_PATTERN_SLOTS) {
    throw new InvalidFieldValueError(COMPONENT, w.position, `${what} length`, values.length, `at most ${SPEED_PATTERN_SLOTS} entries`);
  }
  w.writeU8(values.length);
  w.writeBytes(values);
  if (padded) w.fill(SPEED_PATTERN_SLOTS - values.length);
}

function writeTimingHead(w: BinaryWriter, song: Subsong): number {
  const { timing } = song;
  w.writeU8(timing.timebase - 1);
  w.writeU8(timing.speed[0]);
  w.writeU8(timing.speed[1]);
  w.writeU8(timing.arpSpeed);
  w.writeF32(timing.clockSpeed);
  w.writeU16(song.patternLength);
  const length = orderLength(song, w.position);
  w.writeU16(length);
  w.writeU8(timing.highlight[0]);
  w.writeU8(timing.highlight[1]);
  return length;
}

function writeChannelTables(w: BinaryWriter, song: Subsong, numChannels: number, length: number): void {
  for (let ch = 0; ch < numChannels; ch++) {
    const column = song.order[ch] ?? [];
    for (let i = 0; i < length; i++) w.writeU8(column[i] ?? 0);
  }
  for (let ch = 0; ch < numChannels; ch++) w.writeU8(song.effectColumns[ch] ?? 1);
  const display = Array.from({ length: numChannels }, (_, ch) => song.channelDisplay[ch]);
  for (const d of display) w.writeBool(d?.shown ?? true);
  for (const d of display) w.writeBool(d?.collapsed ?? false);
  for (const d of display) w.writeCString(d?.name ?? '');
  for (const d of display) w.writeCString(d?.abbreviation ?? '');
}

function writeInfo(w: BinaryWriter, module: FurnaceModule, version: number): PointerSlots {
  const song = module.subsongs[0];
  const chips = module.chips.list;
  const numChannels = getNumChannels(module);
  if (chips.length > MAX_CHIPS) {
    throw new InvalidFieldValueError(COMPONENT, w.position, 'chip count', chips.length, `at most ${MAX_CHIPS}`);
  }
  return w.writeBlock(INFO_MAGIC, body => {
    const length = writeTimingHead(body, song);

    body.writeU16(module.instruments.length);
    body.writeU16(module.wavetables.length);
    body.writeU16(module.samples.length);
    body.writeU32(module.patterns.length);

    for (let i = 0; i < MAX_CHIPS; i++) body.writeU8(chips[i]?.type.id ?? 0);
    for (let i = 0; i < MAX_CHIPS; i++) body.writeI8(clampI8((chips[i]?.volume ?? 1) * 64));
    for (let i = 0; i < MAX_CHIPS; i++) body.writeI8(clampI8((chips[i]?.panning ?? 0) * 128));
    const chipFlags = reserve(body, MAX_CHIPS);

    body.writeCString(module.meta.name);
    body.writeCString(module.meta.author);
    body.writeF32(module.meta.tuning);

    writeCompatPhase(body, module.compatFlags, 1, version);

    const instruments = reserve(body, module.instruments.length);
    const wavetables = reserve(body, module.wavetables.length);
    const samples = reserve(body, module.samples.length);
    const patterns = reserve(body, module.patterns.length);

    writeChannelTables(body, song, numChannels, length);
    body.writeCString(module.meta.comment);

    if (version >= VERSION.MASTER_VOLUME) body.writeF32(module.chips.masterVolume);

    if (version >= VERSION.COMPAT_PHASE_2) {
      writeCompatPhase(body, module.compatFlags, 2, version);
      if (version >= VERSION.VIRTUAL_TEMPO) {
        body.writeU16(song.timing.virtualTempo[0]);
        body.writeU16(song.timing.virtualTempo[1]);
      } else {
        body.fill(4);
      }
    }

    let subsongs: number[] = [];
    if (version >= VERSION.SUBSONGS) {
      body.writeCString(song.name);
      body.writeCString(song.comment);
      const extra = module.subsongs.length - 1;
      if (extra > 0xff) {
        throw new InvalidFieldValueError(COMPONENT, body.position, 'subsong count', module.subsongs.length, 'at most 256 subsongs');
      }
      body.writeU8(extra);
      body.fill(3);
      subsongs = reserve(body, extra);
    }

    if (version >= VERSION.EXTRA_META) {
      const { meta } = module;
      for (const s of [meta.sysName, meta.album, meta.nameJp, meta.authorJp, meta.sysNameJp, meta.albumJp]) {
        body.writeCString(s);
      }
    }

    if (version >= VERSION.MIXER_PATCHBAY) {
      for (const chip of chips) {
        body.writeF32(chip.volume);
        body.writeF32(chip.panning);
        body.writeF32(chip.surround);
      }
      body.writeU32(module.patchbay.length);
      for (const { dest, source } of module.patchbay) {
        body.writeU16((dest.set << 4) | (dest.port & 15));
        body.writeU16((source.set << 4) | (source.port & 15));
      }
    }

    if (version >= VERSION.AUTO_PATCHBAY) body.writeBool(module.compatFlags.autoPatchbay);

    if (version >= VERSION.COMPAT_PHASE_3) writeCompatPhase(body, module.compatFlags, 3, version);

    if (version >= VERSION.SPEED_PATTERN) {
      writeSpeedList(body, song.speedPattern, 'speed pattern', true);
      body.writeU8(song.grooves.length);
      for (const groove of song.grooves) writeSpeedList(body, groove, 'groove', true);
    }

    return { chipFlags, instruments, wavetables, samples, patterns, subsongs };
  });
}

function writeSubsong(w: BinaryWriter, song: Subsong, numChannels: number, version: number): void {
  w.writeBlock(SONG_MAGIC, body => {
    const length = writeTimingHead(body, song);
    body.writeU16(song.timing.virtualTempo[0]);
    body.writeU16(song.timing.virtualTempo[1]);
    body.writeCString(song.name);
    body.writeCString(song.comment);
    writeChannelTables(body, song, numChannels, length);
    if (version >= VERSION.SPEED_PATTERN) writeSpeedList(body, song.speedPattern, 'speed pattern', true);
  });
}

/** Append each item's block, pointing its slot at it. */
function writeTable<T>(w: BinaryWriter, slots: number[], items: readonly T[], write: (item: T) => void): void {
  items.forEach((item, i) => {
    w.patchU32(slots[i], w.position);
    write(item);
  });
}

export function encodeModule(module: FurnaceModule, options: EncodeModuleOptions = {}): Uint8Array {
  const version = options.version ?? module.meta.version;
  if (version < VERSION.FEATURAL_INSTRUMENTS) {
    throw new InvalidFieldValueError(COMPONENT, 0, 'target version', version, `encoding needs version ${VERSION.FEATURAL_INSTRUMENTS} or newer`);
  }
  if (version > LATEST_VERSION) {
    log.warn(`target version ${version} is newer than ${LATEST_VERSION}; writing the newest known layout`);
  }

  const w = new BinaryWriter();
  w.writeAscii(MODULE_MAGIC);
  w.writeU16(version);
  w.writeU16(0);
  w.writeU32(MODULE_HEADER_SIZE);
  w.fill(8);

  const slots = writeInfo(w, module, version);
  const numChannels = getNumChannels(module);

  module.chips.list.forEach((chip, i) => {
    const text = serializeChipFlags(chip.flags);
    if (!text) return;
    w.patchU32(slots.chipFlags[i], w.position);
    w.writeBlock(FLAG_MAGIC, body => body.writeCString(text));
  });

  writeTable(w, slots.instruments, module.instruments, ins => writeInstrument(w, ins));
  writeTable(w, slots.wavetables, module.wavetables, wave => writeWavetable(w, wave));
  writeTable(w, slots.samples, module.samples, sample => writeSample(w, sample));
  writeTable(w, slots.subsongs, module.subsongs.slice(1), song => writeSubsong(w, song, numChannels, version));

  const ctx = { version, subsongs: module.subsongs };
  writeTable(w, slots.patterns, module.patterns, pattern => writePattern(w, pattern, ctx));

  log.info(`encoded module v${version}: ${w.position} bytes`);
  return w.toUint8Array();
}

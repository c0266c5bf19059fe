/**
 * Module entity model.
 *
 * Plain data records; every decode builds a fresh graph and the codecs
 * never share instances between modules.
 */

import { ChipType, chipByName } from './chips.js';
import { CompatFlags } from './compatFlags.js';
import { seedCompatFlags } from '../format/compatFlagTable.js';
import { LATEST_VERSION } from '../format/signatures.js';
import { InputPortSet, OutputPortSet } from './enums.js';
import { Instrument } from './instrument.js';
import { Pattern } from './pattern.js';
import { Sample } from './sample.js';
import { Wavetable } from './wavetable.js';

export type ChipFlagValue = boolean | number | string;

export interface ChipInfo {
  type: ChipType;
  flags: Record<string, ChipFlagValue>;
  volume: number;
  panning: number;
  /** front/rear balance */
  surround: number;
}

export interface ChipList {
  list: ChipInfo[];
  masterVolume: number;
}

export interface ModuleMeta {
  name: string;
  nameJp: string;
  author: string;
  authorJp: string;
  album: string;
  albumJp: string;
  sysName: string;
  sysNameJp: string;
  comment: string;
  version: number;
  tuning: number;
}

export interface TimingInfo {
  arpSpeed: number;
  clockSpeed: number;
  highlight: [number, number];
  speed: [number, number];
  timebase: number;
  virtualTempo: [number, number];
}

export interface ChannelDisplayInfo {
  name: string;
  abbreviation: string;
  collapsed: boolean;
  shown: boolean;
}

export interface Subsong {
  name: string;
  comment: string;
  /** up to 16 tick speeds */
  speedPattern: number[];
  grooves: number[][];
  timing: TimingInfo;
  patternLength: number;
  /** channel index -> pattern index per order row */
  order: number[][];
  effectColumns: number[];
  channelDisplay: ChannelDisplayInfo[];
}

export interface PatchBayConnection {
  source: { set: OutputPortSet; port: number };
  dest: { set: InputPortSet; port: number };
}

export interface FurnaceModule {
  meta: ModuleMeta;
  chips: ChipList;
  compatFlags: CompatFlags;
  /** subsong 0 always exists */
  subsongs: Subsong[];
  patchbay: PatchBayConnection[];
  instruments: Instrument[];
  wavetables: Wavetable[];
  samples: Sample[];
  patterns: Pattern[];
}

export function createModuleMeta(version = 0): ModuleMeta {
  return {
    name: '',
    nameJp: '',
    author: '',
    authorJp: '',
    album: '',
    albumJp: '',
    sysName: 'Sega Genesis/Mega Drive',
    sysNameJp: '',
    comment: '',
    version,
    tuning: 440,
  };
}

export function createTimingInfo(): TimingInfo {
  return {
    arpSpeed: 1,
    clockSpeed: 60,
    highlight: [4, 16],
    speed: [6, 6],
    timebase: 1,
    virtualTempo: [150, 150],
  };
}

export function createChannelDisplay(): ChannelDisplayInfo {
  return { name: '', abbreviation: '', collapsed: false, shown: true };
}

/**
 * Subsong with one order row and one effect column per channel.
 */
export function createSubsong(numChannels: number): Subsong {
  const order: number[][] = [];
  const effectColumns: number[] = [];
  const channelDisplay: ChannelDisplayInfo[] = [];
  for (let ch = 0; ch < numChannels; ch++) {
    order.push([0]);
    effectColumns.push(1);
    channelDisplay.push(createChannelDisplay());
  }
  return {
    name: '',
    comment: '',
    speedPattern: [6],
    grooves: [],
    timing: createTimingInfo(),
    patternLength: 64,
    order,
    effectColumns,
    channelDisplay,
  };
}

export function createChip(type: ChipType): ChipInfo {
  return { type, flags: {}, volume: 1, panning: 0, surround: 0 };
}

/**
 * An empty module. Without `chips` it carries the tracker's default
 * Genesis setup.
 */
export function createModule(opts: { version?: number; chips?: ChipType[] } = {}): FurnaceModule {
  const version = opts.version ?? LATEST_VERSION;
  const chipTypes = opts.chips ?? [chipByName('GENESIS')];
  const chips = chipTypes.map(createChip);
  const numChannels = chipTypes.reduce((sum, c) => sum + c.channels, 0);
  return {
    meta: createModuleMeta(version),
    chips: { list: chips, masterVolume: 2 },
    compatFlags: seedCompatFlags(version),
    subsongs: [createSubsong(numChannels)],
    patchbay: [],
    instruments: [],
    wavetables: [],
    samples: [],
    patterns: [],
  };
}

/** Sum of the channel counts of all configured chips. */
export function getNumChannels(module: Pick<FurnaceModule, 'chips'>): number {
  return module.chips.list.reduce((sum, chip) => sum + chip.type.channels, 0);
}

export function getPattern(module: FurnaceModule, channel: number, index: number, subsong = 0): Pattern | undefined {
  return module.patterns.find(p => p.channel === channel && p.index === index && p.subsong === subsong);
}

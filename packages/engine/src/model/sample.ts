import { SampleType } from './enums.js';

export const SAMPLE_PRESENCE_BYTES = 16;

export interface SampleMeta {
  name: string;
  /** declared length in samples; the payload carries `length` bytes */
  length: number;
  compatRate: number;
  c4Rate: number;
  /** bit depth / encoding, see `SampleType`; kept raw */
  depth: number;
  loopDirection: number;
  flags: number;
  flags2: number;
  /** -1 when the sample does not loop */
  loopStart: number;
  loopEnd: number;
  presence: number[];
}

export interface Sample {
  meta: SampleMeta;
  data: Uint8Array;
}

export function createSample(data: Uint8Array = new Uint8Array(0), name = ''): Sample {
  return {
    meta: {
      name,
      length: data.byteLength,
      compatRate: 32000,
      c4Rate: 32000,
      depth: SampleType.PCM_8,
      loopDirection: 0,
      flags: 0,
      flags2: 0,
      loopStart: -1,
      loopEnd: -1,
      presence: new Array<number>(SAMPLE_PRESENCE_BYTES).fill(0),
    },
    data,
  };
}

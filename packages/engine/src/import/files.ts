/**
 * Path-based convenience wrappers around the byte decoders.
 */
import { readFileSync } from 'fs';
import { Instrument } from '../model/instrument.js';
import { FurnaceModule } from '../model/module.js';
import { decodeModule, DecodeModuleOptions } from './module.reader.js';
import { decodeInstrument, sniffInstrumentFile } from './instrument.reader.js';
import { decodeWavetableFile, WavetableFile } from './wavetable.reader.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('files');

function readBytes(path: string): Uint8Array {
  const buf = readFileSync(path);
  log.debug(`read ${buf.byteLength} bytes from ${path}`);
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

export function readModuleFile(path: string, options: DecodeModuleOptions = {}): FurnaceModule {
  return decodeModule(readBytes(path), options);
}

/** Either standalone instrument container; the signature decides which. */
export function readInstrumentFile(path: string): Instrument {
  const bytes = readBytes(path);
  return decodeInstrument(bytes, sniffInstrumentFile(bytes));
}

export function readWavetableFile(path: string): WavetableFile {
  return decodeWavetableFile(readBytes(path));
}

import { writeFileSync } from 'fs';
import { deflateSync } from 'zlib';
import { FurnaceModule } from '../model/module.js';
import { encodeModule, EncodeModuleOptions } from './moduleWriter.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('files');

export interface WriteModuleOptions extends EncodeModuleOptions {
  /** zlib-wrap the container, as the tracker does when saving */
  compress?: boolean;
}

export function writeModuleFile(path: string, module: FurnaceModule, options: WriteModuleOptions = {}): void {
  const raw = encodeModule(module, options);
  const out = options.compress ? deflateSync(raw) : raw;
  writeFileSync(path, out);
  log.debug(`wrote ${out.byteLength} bytes to ${path}${options.compress ? ' (compressed)' : ''}`);
}

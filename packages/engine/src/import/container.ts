import { inflateSync } from 'zlib';
import { BadMagicError } from '../errors.js';
import { MODULE_MAGIC } from '../format/signatures.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('container');

export function hasModuleMagic(bytes: Uint8Array): boolean {
  if (bytes.byteLength < MODULE_MAGIC.length) return false;
  for (let i = 0; i < MODULE_MAGIC.length; i++) {
    if (bytes[i] !== MODULE_MAGIC.charCodeAt(i)) return false;
  }
  return true;
}

function leadingAscii(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < Math.min(bytes.byteLength, MODULE_MAGIC.length); i++) out += String.fromCharCode(bytes[i]);
  return out;
}

/**
 * Inflate a zlib-wrapped module. Data that is not zlib raises
 * `BadMagicError`, since it is neither a plain nor a compressed module.
 */
export function decompressModule(bytes: Uint8Array): Uint8Array {
  let inflated: Buffer;
  try {
    inflated = inflateSync(bytes);
  } catch (err) {
    throw new BadMagicError('container', 0, MODULE_MAGIC, leadingAscii(bytes), { cause: err });
  }
  log.debug(`inflated ${bytes.byteLength} -> ${inflated.byteLength} bytes`);
  return new Uint8Array(inflated.buffer, inflated.byteOffset, inflated.byteLength);
}

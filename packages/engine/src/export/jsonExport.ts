/*
 * JSON export of a decoded module or instrument.
 * Byte payloads (sample data) are rendered as plain number arrays.
 */
import { writeFileSync, statSync } from 'fs';
import { FurnaceModule } from '../model/module.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('export');

export const JSON_EXPORT_FORMAT = 1;

function byteArrays(_key: string, value: unknown): unknown {
  return value instanceof Uint8Array ? Array.from(value) : value;
}

/** Pretty-printed JSON for any decoded value. */
export function toJSON(value: unknown): string {
  return JSON.stringify(value, byteArrays, 2);
}

/**
 * Write `module` to `outPath` wrapped with export metadata. A missing
 * `.json` extension is appended.
 * @returns the path actually written
 */
export function exportJSON(module: FurnaceModule, outPath: string): string {
  const path = outPath.toLowerCase().endsWith('.json') ? outPath : `${outPath}.json`;
  const outObj = {
    exportedAt: new Date().toISOString(),
    format: JSON_EXPORT_FORMAT,
    module,
  };
  log.info(`exporting JSON to ${path}`);
  log.debug(
    `${module.chips.list.length} chip(s), ${module.subsongs.length} subsong(s), ${module.patterns.length} patterns, ${module.instruments.length} instruments`,
  );
  writeFileSync(path, toJSON(outObj), 'utf8');
  log.info(`export complete: ${statSync(path).size.toLocaleString()} bytes written`);
  return path;
}

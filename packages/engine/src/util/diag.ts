import { FurnaceFormatError, hexOffset } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface DiagMeta {
  file?: string;
  offset?: number;
}

export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta?: DiagMeta): string {
  const parts: string[] = [`[${level}]`, `[${component || 'unknown'}]`, message];
  const fields: string[] = [];
  if (meta) {
    if (meta.file) fields.push(`file=${meta.file}`);
    if (typeof meta.offset === 'number') fields.push(`offset=${hexOffset(meta.offset)}`);
  }
  if (fields.length) parts.push(fields.join(', '));
  return parts.join(' ');
}

/**
 * Render any thrown value as a single diagnostic line. Format errors keep
 * their component and offset; everything else is reported under `fallback`.
 */
export function describeError(err: unknown, fallback: string, file?: string): string {
  if (err instanceof FurnaceFormatError) {
    return formatDiagnostic('ERROR', err.component, `${err.name}: ${err.message}`, { file, offset: err.offset });
  }
  const message = err instanceof Error ? err.message : String(err);
  return formatDiagnostic('ERROR', fallback, message, { file });
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}

export function error(component: string, message: string, meta?: DiagMeta): void {
  log.error(formatDiagnostic('ERROR', component, message, meta));
}

export default { formatDiagnostic, describeError, warn, error };

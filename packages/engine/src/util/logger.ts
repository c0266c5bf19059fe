/**
 * Engine logger
 *
 * Centralized, namespaced logging for the codec and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (module, instrument, pattern, sample, ...)
 * - Optional ISO timestamps
 * - Configuration from environment variables
 * - Safe production defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@furcodec/engine';
 *
 * const log = createLogger('module');
 *
 * log.debug('INFO block at', 0x20);
 * log.warn('version newer than known layout');
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
const DEFAULT_CONFIG: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: false,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return levelOrder.some(l => l === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({ level: 'debug', modules: ['module', 'pattern'] });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('info')) {
    console.info('[furcodec] Logging configured:', config);
  }
}

/**
 * Load logging configuration from environment variables.
 * Looks for FURCODEC_LOGLEVEL and FURCODEC_LOG_MODULES (comma separated).
 */
export function loadLoggingFromEnv(env: Record<string, string | undefined> = process.env): void {
  const rawLevel = env.FURCODEC_LOGLEVEL?.trim().toLowerCase();
  const level = rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined;
  const modulesStr = env.FURCODEC_LOG_MODULES;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (level || modules) {
    configureLogging({
      level: level ?? config.level,
      modules,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

/** Restore the defaults; mostly useful between tests. */
export function resetLogging(): void {
  config = { ...DEFAULT_CONFIG };
  moduleSet.clear();
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

function output(level: Exclude<LogLevel, 'none'>, module: string, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module}]`;
  switch (level) {
    case 'error':
      console.error(prefix, ...args);
      break;
    case 'warn':
      console.warn(prefix, ...args);
      break;
    case 'info':
      console.info(prefix, ...args);
      break;
    case 'debug':
      console.log(prefix, ...args);
      break;
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'module', 'instrument', 'cli')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) output('error', module, args);
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) output('warn', module, args);
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) output('info', module, args);
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) output('debug', module, args);
    },
  };
}

export default createLogger;

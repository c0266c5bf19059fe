import { Command } from 'commander';
import { readFileSync, writeFileSync } from 'fs';
import {
  BadMagicError,
  configureLogging,
  createLogger,
  decompressModule,
  describeError,
  enumName,
  exportJSON,
  getInstrumentName,
  getModuleSummary,
  getPattern,
  hasModuleMagic,
  Instrument,
  InstrumentType,
  loadLoggingFromEnv,
  MODULE_MAGIC,
  patternToClipboard,
  readInstrumentFile,
  readModuleFile,
  toJSON,
} from '@furcodec/engine';

const log = createLogger('cli');

interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
}

/** Features of an instrument, one line each, for `instrument`. */
export function describeInstrument(instrument: Instrument): string {
  const lines = [
    `Name: ${getInstrumentName(instrument) || '(unnamed)'}`,
    `Type: ${enumName(InstrumentType, instrument.meta.type)}`,
    `Format: ${instrument.meta.format} (version ${instrument.meta.version})`,
    `Features (${instrument.features.length}): ${instrument.features.map(f => f.code).join(' ')}`,
  ];
  return lines.join('\n');
}

function parseIndex(value: string, what: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${what} must be a non-negative integer, got '${value}'`);
  return n;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('furcodec')
    .description('Inspect, dump and convert Furnace tracker modules and instruments')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)');

  program.hook('preAction', () => {
    loadLoggingFromEnv();
    const globalOpts = program.opts<GlobalOptions>();
    if (globalOpts.debug) configureLogging({ level: 'debug' });
    else if (globalOpts.verbose) configureLogging({ level: 'info' });
  });

  /** Run a command body, reporting failures the same way for every command. */
  function run(label: string, file: string, body: () => void): void {
    try {
      body();
    } catch (err) {
      console.error(describeError(err, label, file));
      if (program.opts<GlobalOptions>().debug && err instanceof Error && err.stack) {
        console.error(err.stack);
      }
      process.exitCode = 2;
    }
  }

  program
    .command('inspect')
    .description('Print a summary of a module')
    .argument('<file>', 'Path to the .fur file')
    .action((file: string) => {
      run('inspect', file, () => {
        console.log(getModuleSummary(readModuleFile(file)));
      });
    });

  program
    .command('json')
    .description('Dump a decoded module as JSON')
    .argument('<file>', 'Path to the .fur file')
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .action((file: string, options: { output?: string }) => {
      run('json', file, () => {
        const module = readModuleFile(file);
        if (options.output) {
          const written = exportJSON(module, options.output);
          console.log(`Wrote ${written}`);
        } else {
          console.log(toJSON(module));
        }
      });
    });

  program
    .command('decompress')
    .description('Inflate a zlib-compressed module')
    .argument('<in>', 'Compressed .fur file')
    .argument('<out>', 'Destination path')
    .action((input: string, output: string) => {
      run('decompress', input, () => {
        const buf = readFileSync(input);
        const bytes = new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
        if (hasModuleMagic(bytes)) {
          log.info(`${input} is not compressed; copying as is`);
          writeFileSync(output, bytes);
          return;
        }
        const inflated = decompressModule(bytes);
        if (!hasModuleMagic(inflated)) {
          throw new BadMagicError('container', 0, MODULE_MAGIC, Buffer.from(inflated.subarray(0, MODULE_MAGIC.length)).toString('latin1'));
        }
        writeFileSync(output, inflated);
        console.log(`Wrote ${output} (${inflated.byteLength} bytes)`);
      });
    });

  program
    .command('pattern')
    .description('Print one pattern as tracker clipboard text')
    .argument('<file>', 'Path to the .fur file')
    .argument('<channel>', 'Channel number')
    .argument('<index>', 'Pattern index')
    .option('-s, --subsong <n>', 'Subsong number', '0')
    .action((file: string, channel: string, index: string, options: { subsong: string }) => {
      run('pattern', file, () => {
        const ch = parseIndex(channel, 'channel');
        const idx = parseIndex(index, 'index');
        const subsong = parseIndex(options.subsong, 'subsong');
        const pattern = getPattern(readModuleFile(file), ch, idx, subsong);
        if (!pattern) throw new Error(`no pattern ${idx} on channel ${ch} of subsong ${subsong}`);
        console.log(patternToClipboard(pattern));
      });
    });

  program
    .command('instrument')
    .description('Summarise an instrument file (.fui)')
    .argument('<file>', 'Path to the instrument file')
    .action((file: string) => {
      run('instrument', file, () => {
        console.log(describeInstrument(readInstrumentFile(file)));
      });
    });

  return program;
}

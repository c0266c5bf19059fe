import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { deflateSync } from 'zlib';
import {
  createInstrument,
  encodeInstrument,
  encodeModule,
  getModuleSummary,
  InstrumentType,
  patternToClipboard,
  resetLogging,
} from '@furcodec/engine';
import { buildProgram, describeInstrument } from '../src/program';
import { buildSpeakerModule } from '../../engine/tests/helpers/module';

function run(...args: string[]): void {
  buildProgram().exitOverride().parse(args, { from: 'user' });
}

describe('furcodec CLI', () => {
  let dir: string;
  let out: jest.SpyInstance;
  let err: jest.SpyInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'furcodec-cli-'));
    out = jest.spyOn(console, 'log').mockImplementation(() => {});
    err = jest.spyOn(console, 'error').mockImplementation(() => {});
    out.mockClear();
    err.mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
    resetLogging();
  });

  function writeSong(compress = false): string {
    const path = join(dir, 'song.fur');
    const bytes = encodeModule(buildSpeakerModule());
    writeFileSync(path, compress ? deflateSync(bytes) : bytes);
    return path;
  }

  test('inspect prints the module summary', () => {
    run('inspect', writeSong(true));
    expect(out).toHaveBeenCalledWith(getModuleSummary(buildSpeakerModule()));
    expect(process.exitCode).toBeUndefined();
  });

  test('json writes to stdout', () => {
    run('json', writeSong());
    expect(out).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(out.mock.calls[0][0]));
    expect(printed).toMatchObject({ meta: { name: 'Test Song', author: 'tester' } });
  });

  test('json -o writes a file', () => {
    const target = join(dir, 'dump');
    run('json', writeSong(), '-o', target);
    expect(out).toHaveBeenCalledWith(`Wrote ${target}.json`);
    const written: unknown = JSON.parse(readFileSync(`${target}.json`, 'utf8'));
    expect(written).toMatchObject({ format: 1, module: { meta: { name: 'Test Song' } } });
  });

  test('decompress inflates a compressed module', () => {
    const plain = encodeModule(buildSpeakerModule());
    const target = join(dir, 'plain.fur');
    run('decompress', writeSong(true), target);
    expect(Array.from(readFileSync(target))).toEqual(Array.from(plain));
    expect(out).toHaveBeenCalledWith(`Wrote ${target} (${plain.byteLength} bytes)`);
  });

  test('decompress copies a module that is already plain', () => {
    const target = join(dir, 'copy.fur');
    const source = writeSong();
    run('decompress', source, target);
    expect(Array.from(readFileSync(target))).toEqual(Array.from(readFileSync(source)));
  });

  test('pattern prints clipboard text', () => {
    run('pattern', writeSong(), '0', '1');
    const expected = buildSpeakerModule().patterns[1];
    expect(out).toHaveBeenCalledWith(patternToClipboard(expected));
  });

  test('pattern reports a missing pattern', () => {
    const path = writeSong();
    run('pattern', path, '0', '9');
    expect(err).toHaveBeenCalledWith(`[ERROR] [pattern] no pattern 9 on channel 0 of subsong 0 file=${path}`);
    expect(process.exitCode).toBe(2);
  });

  test('pattern rejects a non-numeric channel', () => {
    const path = writeSong();
    run('pattern', path, 'x', '0');
    expect(err).toHaveBeenCalledWith(`[ERROR] [pattern] channel must be a non-negative integer, got 'x' file=${path}`);
  });

  test('instrument describes a featural instrument file', () => {
    const ins = createInstrument(InstrumentType.GB);
    ins.features.push({ code: 'NA', name: 'lead' });
    const path = join(dir, 'lead.fui');
    writeFileSync(path, encodeInstrument(ins, { container: 'file' }));
    run('instrument', path);
    expect(out).toHaveBeenCalledWith('Name: lead\nType: GB\nFormat: featural (version 143)\nFeatures (1): NA');
  });

  test('describeInstrument names unnamed instruments', () => {
    expect(describeInstrument(createInstrument(InstrumentType.FM_4OP))).toBe(
      'Name: (unnamed)\nType: FM_4OP\nFormat: featural (version 143)\nFeatures (0): ',
    );
  });

  test('unreadable input is reported with its component', () => {
    const path = join(dir, 'junk.fur');
    writeFileSync(path, 'this is not a module at all');
    run('inspect', path);
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0][0])).toMatch(/^\[ERROR\] \[container\] BadMagicError: /);
    expect(process.exitCode).toBe(2);
  });
});

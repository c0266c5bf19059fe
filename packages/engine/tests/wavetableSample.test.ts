import { InvalidFieldValueError } from '../src/errors';
import { createWavetable } from '../src/model/wavetable';
import { createSample } from '../src/model/sample';
import { decodeWavetable, decodeWavetableFile } from '../src/import/wavetable.reader';
import { encodeWavetable, encodeWavetableFile } from '../src/export/wavetableWriter';
import { decodeSample } from '../src/import/sample.reader';
import { encodeSample } from '../src/export/sampleWriter';

describe('wavetables', () => {
  test('height is stored minus one', () => {
    const wave = createWavetable(2, 32, '');
    wave.data = [1, 2];
    const bytes = encodeWavetable(wave);
    // magic, length, empty name, width, reserved, then height
    expect(bytes[17]).toBe(31);
    expect(decodeWavetable(bytes).meta.height).toBe(32);
  });

  test('width follows the data', () => {
    const wave = createWavetable(5, 16, 'short');
    wave.data = [3, 1];
    expect(decodeWavetable(encodeWavetable(wave)).meta).toEqual({ name: 'short', width: 2, height: 16 });
  });

  test('a height below one is rejected', () => {
    expect(() => encodeWavetable(createWavetable(4, 0))).toThrow(InvalidFieldValueError);
  });

  test('standalone wavetable file', () => {
    const wave = createWavetable(4, 8, 'saw');
    wave.data = [0, 2, 4, 6];
    const bytes = encodeWavetableFile(wave, 143);
    expect(String.fromCharCode(...bytes.subarray(0, 16))).toBe('-Furnace waveta-');
    expect(decodeWavetableFile(bytes)).toEqual({ version: 143, wavetable: wave });
  });
});

describe('samples', () => {
  test('SMP2 block round trip', () => {
    const sample = createSample(Uint8Array.from([0, 64, 128, 255, 17]), 'kick');
    sample.meta.loopStart = 1;
    sample.meta.loopEnd = 4;
    sample.meta.flags = 1;
    sample.meta.presence[0] = 0xff;
    const back = decodeSample(encodeSample(sample));
    expect(back.meta).toEqual(sample.meta);
    expect(Array.from(back.data)).toEqual([0, 64, 128, 255, 17]);
  });

  test('declared length must match the payload', () => {
    const sample = createSample(Uint8Array.from([1, 2, 3]));
    sample.meta.length = 4;
    expect(() => encodeSample(sample)).toThrow(InvalidFieldValueError);
  });
});

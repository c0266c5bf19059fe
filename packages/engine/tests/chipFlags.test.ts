import { chipById, chipByName } from '../src/model/chips';
import { hasLegacyFlagLayout, unpackLegacyChipFlags } from '../src/format/legacyChipFlags';
import { parseChipFlags, parseFlagValue, serializeChipFlags } from '../src/format/chipFlagText';
import { UnknownEnumValueError } from '../src/errors';

describe('legacy chip flag words', () => {
  test('Genesis clock and ladder effect', () => {
    expect(unpackLegacyChipFlags(chipByName('GENESIS'), 0x80000003)).toEqual({ clockSel: 3, ladderEffect: true });
  });

  test('AY-3-8910 packs several fields', () => {
    // clock 2, chip type 1, stereo, stereo separation 0x40
    const word = 2 | (1 << 4) | (1 << 6) | (0x40 << 8);
    expect(unpackLegacyChipFlags(chipByName('AY38910'), word)).toEqual({
      clockSel: 2,
      chipType: 1,
      stereo: true,
      halfClock: false,
      stereoSep: 0x40,
    });
  });

  test('SMS uses its own packing', () => {
    expect(unpackLegacyChipFlags(chipByName('SMS'), 0x0103)).toEqual({ clockSel: 7, chipType: 0, noPhaseReset: 16 });
  });

  test('chips without a layout yield no flags', () => {
    const pet = chipByName('PET');
    expect(hasLegacyFlagLayout(pet)).toBe(false);
    expect(unpackLegacyChipFlags(pet, 0xffffffff)).toEqual({});
  });
});

describe('FLAG block text', () => {
  test('values are typed by shape', () => {
    expect(parseFlagValue('true')).toBe(true);
    expect(parseFlagValue('false')).toBe(false);
    expect(parseFlagValue('-12')).toBe(-12);
    expect(parseFlagValue('1.5')).toBe(1.5);
    expect(parseFlagValue('1.5x')).toBe('1.5x');
  });

  test('parse and serialize', () => {
    const flags = parseChipFlags('clockSel=3\nstereo=true\nname=abc\n');
    expect(flags).toEqual({ clockSel: 3, stereo: true, name: 'abc' });
    expect(serializeChipFlags(flags)).toBe('clockSel=3\nstereo=true\nname=abc\n');
  });

  test('keys named like object internals are kept', () => {
    const flags = parseChipFlags('__proto__=7\nclockSel=1\n');
    expect(Object.keys(flags)).toEqual(['__proto__', 'clockSel']);
    expect(flags['__proto__']).toBe(7);
    expect(serializeChipFlags(flags)).toBe('__proto__=7\nclockSel=1\n');
  });

  test('a bare key maps to an empty string', () => {
    expect(parseChipFlags('flag\n')).toEqual({ flag: '' });
  });
});

describe('chip table', () => {
  test('ids map to chips with channel counts', () => {
    expect(chipById(2)).toEqual({ id: 2, name: 'GENESIS', channels: 10 });
  });

  test('unknown ids are rejected', () => {
    expect(() => chipById(0x10, 'module', 0x40)).toThrow(UnknownEnumValueError);
  });
});

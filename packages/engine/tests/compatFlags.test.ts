import { BinaryReader } from '../src/io/binaryReader';
import { BinaryWriter } from '../src/io/binaryWriter';
import {
  COMPAT_FLAG_NAMES,
  PHASE_BUDGET,
  phaseFlags,
  phaseFlagsAt,
  readCompatPhase,
  seedCompatFlags,
  writeCompatPhase,
} from '../src/format/compatFlagTable';
import { DelayBehavior, LinearPitch, LoopModality } from '../src/model/enums';
import { UnknownEnumValueError } from '../src/errors';

describe('compat flag seeding', () => {
  test('very old files get the legacy behaviour', () => {
    const flags = seedCompatFlags(20);
    expect(flags.limitSlides).toBe(true);
    expect(flags.linearPitch).toBe(LinearPitch.ONLY_PITCH_CHANGE);
    expect(flags.loopModality).toBe(LoopModality.HARD_RESET_CHANNELS);
    expect(flags.properNoiseLayout).toBe(false);
    expect(flags.cutDelayEffectPolicy).toBe(DelayBehavior.BROKEN);
    expect(flags.oldSampleOffset).toBe(true);
  });

  test('the newest files get the defaults', () => {
    const flags = seedCompatFlags(200);
    expect(flags.limitSlides).toBe(false);
    expect(flags.linearPitch).toBe(LinearPitch.FULL_LINEAR);
    expect(flags.pitchSlideSpeedInLinear).toBe(4);
    expect(flags.autoPatchbay).toBe(true);
    expect(flags.oldSampleOffset).toBe(false);
  });

  test('the threshold is exclusive', () => {
    expect(seedCompatFlags(44).resetMacroOnPorta).toBe(true);
    expect(seedCompatFlags(45).resetMacroOnPorta).toBe(false);
  });

  test('every flag is seeded', () => {
    const flags = seedCompatFlags(100);
    for (const name of COMPAT_FLAG_NAMES) expect(flags[name]).not.toBeUndefined();
  });
});

describe('compat flag phases', () => {
  test('each phase fits its byte budget', () => {
    expect(phaseFlags(1)).toHaveLength(20);
    expect(phaseFlags(2)).toHaveLength(28);
    expect(phaseFlags(3).length).toBeLessThanOrEqual(PHASE_BUDGET[3]);
  });

  test('a phase stores only the flags known at the file version', () => {
    expect(phaseFlagsAt(2, 70)).toEqual(['brokenSpeedSelection']);
    expect(phaseFlagsAt(3, 154)).toEqual(['brokenPortaDuringLegato']);
  });

  test('reading a phase consumes the whole budget', () => {
    const bytes = new Uint8Array(PHASE_BUDGET[2] + 1);
    bytes[0] = 1; // brokenSpeedSelection
    bytes[PHASE_BUDGET[2]] = 0xaa;
    const r = new BinaryReader(bytes);
    const flags = seedCompatFlags(70);
    const skipped = readCompatPhase(r, flags, 2, 70);
    expect(skipped).toBe(27);
    expect(flags.brokenSpeedSelection).toBe(true);
    expect(r.u8()).toBe(0xaa);
  });

  test('flags outside the stored set keep their seeded value', () => {
    const flags = seedCompatFlags(70);
    readCompatPhase(new BinaryReader(new Uint8Array(PHASE_BUDGET[2])), flags, 2, 70);
    // stored from v71, so still the legacy seed
    expect(flags.ignoreJumpAtEnd).toBe(true);
  });

  test('write mirrors read', () => {
    const flags = seedCompatFlags(200);
    flags.oneTickCut = true;
    flags.linearPitch = LinearPitch.NON_LINEAR;
    flags.pitchSlideSpeedInLinear = 9;
    flags.oldAlwaysSetVolume = true;
    const w = new BinaryWriter();
    writeCompatPhase(w, flags, 1, 200);
    writeCompatPhase(w, flags, 2, 200);
    writeCompatPhase(w, flags, 3, 200);
    expect(w.position).toBe(20 + 28 + 8);

    const back = seedCompatFlags(200);
    const r = new BinaryReader(w.toUint8Array());
    readCompatPhase(r, back, 1, 200);
    readCompatPhase(r, back, 2, 200);
    readCompatPhase(r, back, 3, 200);
    expect(back).toEqual(flags);
  });

  test('an out-of-range choice value is rejected', () => {
    const bytes = new Uint8Array(PHASE_BUDGET[1]);
    bytes[1] = 7; // linearPitch
    expect(() => readCompatPhase(new BinaryReader(bytes), seedCompatFlags(200), 1, 200)).toThrow(UnknownEnumValueError);
  });
});

import { UnknownEnumValueError } from '../src/errors';
import { Note } from '../src/model/enums';
import { fromInterNote, InterNote, toInterNote } from '../src/interchange/notes';

describe('interchange notes', () => {
  test('numbering starts at Blank', () => {
    expect(InterNote.Blank).toBe(1);
    expect(InterNote.C).toBe(2);
    expect(InterNote.Echo).toBe(17);
  });

  test('tracker notes map both ways', () => {
    expect(toInterNote(Note.NONE)).toBe(InterNote.Blank);
    expect(toInterNote(Note.C)).toBe(InterNote.C);
    expect(toInterNote(Note.A_SHARP)).toBe(InterNote.As);
    expect(toInterNote(Note.OFF_RELEASE)).toBe(InterNote.OffRelease);
    expect(fromInterNote(InterNote.Fs)).toBe(Note.F_SHARP);
    expect(fromInterNote(InterNote.Release)).toBe(Note.RELEASE);
  });

  test('echo has no tracker note', () => {
    expect(fromInterNote(InterNote.Echo)).toBe(Note.NONE);
  });

  test('numbers outside the note table are rejected', () => {
    expect(() => toInterNote(50)).toThrow(UnknownEnumValueError);
  });
});

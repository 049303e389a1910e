import { FormatError } from './errors.js';

/** Pitched note letters. */
export type NoteLetter = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G';

/** Letter used for rests. */
export const REST_LETTER = 'R';

/** Letter slot of a note: a pitch letter or the rest marker. */
export type NoteName = NoteLetter | typeof REST_LETTER;

/** Accidental tokens: natural, sharp, flat, double-sharp, double-flat. */
export type Accidental = '' | '#' | 'b' | 'x' | 'bb';

/** Clef active on the note's staff, e.g. `{ sign: 'G', line: 2 }`. */
export interface Clef {
  readonly sign: string;
  readonly line: number;
}

/** Immutable pitch-or-rest value without timing information. */
export interface Note {
  readonly clef: Clef;
  readonly name: NoteName;
  readonly accidental: Accidental;
  /** Absent for rests. */
  readonly octave?: number;
  readonly articulations: readonly string[];
}

/** Fields accepted by `createNote`. */
export interface PitchedNoteInput {
  clef: Clef;
  name: NoteLetter;
  accidental?: Accidental;
  octave: number;
  articulations?: readonly string[];
}

export const NOTE_LETTERS: readonly NoteLetter[] = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];

/** Accidentals in greedy match order (longest first). */
export const ACCIDENTALS: readonly Exclude<Accidental, ''>[] = ['bb', 'x', '#', 'b'];

const ACCIDENTAL_SEMITONES: Record<Accidental, number> = {
  '': 0,
  '#': 1,
  b: -1,
  x: 2,
  bb: -2
};

const LETTER_SEMITONES: Record<NoteLetter, number> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11
};

// Characters the textual encoding uses as delimiters.
const RESERVED_CHARACTERS = /[(),|>&+\s]/;

export function isNoteLetter(value: string): value is NoteLetter {
  return NOTE_LETTERS.some((letter) => letter === value);
}

export function isAccidental(value: string): value is Accidental {
  return value === '' || ACCIDENTALS.some((accidental) => accidental === value);
}

/** Build a validated, frozen pitched note. */
export function createNote(input: PitchedNoteInput): Note {
  if (!isNoteLetter(input.name)) {
    throw new FormatError('Invalid note letter', String(input.name));
  }

  const accidental = input.accidental ?? '';
  if (!isAccidental(accidental)) {
    throw new FormatError('Invalid accidental', String(accidental));
  }

  if (!Number.isSafeInteger(input.octave)) {
    throw new FormatError('Octave must be an integer', String(input.octave));
  }

  const note: Note = {
    clef: validateClef(input.clef),
    name: input.name,
    accidental,
    octave: input.octave,
    articulations: validateArticulations(input.articulations ?? [])
  };
  return Object.freeze(note);
}

/** Build a validated, frozen rest. */
export function createRest(clef: Clef, articulations: readonly string[] = []): Note {
  const rest: Note = {
    clef: validateClef(clef),
    name: REST_LETTER,
    accidental: '',
    articulations: validateArticulations(articulations)
  };
  return Object.freeze(rest);
}

export function isRest(note: Note): boolean {
  return note.name === REST_LETTER;
}

/** Structural equality over every field. */
export function notesEqual(left: Note, right: Note): boolean {
  return (
    left.clef.sign === right.clef.sign &&
    left.clef.line === right.clef.line &&
    left.name === right.name &&
    left.accidental === right.accidental &&
    left.octave === right.octave &&
    left.articulations.length === right.articulations.length &&
    left.articulations.every((token, index) => token === right.articulations[index])
  );
}

/** MIDI note number (C4 = 60), or `undefined` for rests. */
export function noteToMidiNumber(note: Note): number | undefined {
  if (note.name === REST_LETTER || note.octave === undefined) {
    return undefined;
  }

  return (note.octave + 1) * 12 + LETTER_SEMITONES[note.name] + ACCIDENTAL_SEMITONES[note.accidental];
}

/** Map a MusicXML `<alter>` value onto an accidental token. */
export function accidentalFromAlter(alter: number | undefined): Accidental | undefined {
  switch (alter ?? 0) {
    case 0:
      return '';
    case 1:
      return '#';
    case 2:
      return 'x';
    case -1:
      return 'b';
    case -2:
      return 'bb';
    default:
      return undefined;
  }
}

function validateClef(clef: Clef): Clef {
  if (clef.sign.length === 0 || RESERVED_CHARACTERS.test(clef.sign)) {
    throw new FormatError('Invalid clef sign', clef.sign);
  }
  if (!Number.isSafeInteger(clef.line)) {
    throw new FormatError('Clef line must be an integer', String(clef.line));
  }

  const validated: Clef = { sign: clef.sign, line: clef.line };
  return Object.freeze(validated);
}

function validateArticulations(articulations: readonly string[]): readonly string[] {
  for (const token of articulations) {
    if (token.length === 0 || RESERVED_CHARACTERS.test(token)) {
      throw new FormatError('Invalid articulation token', token);
    }
  }

  return Object.freeze([...articulations]);
}

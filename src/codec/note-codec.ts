import { FormatError } from '../core/errors.js';
import {
  ACCIDENTALS,
  REST_LETTER,
  createNote,
  createRest,
  isNoteLetter,
  type Accidental,
  type Clef,
  type Note
} from '../core/note.js';

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Encode a note as `(<sign>,<line>)<Letter><Accidental><Octave>|<art1>,<art2>,...`.
 * Rests leave accidental and octave empty.
 */
export function encodeNote(note: Note): string {
  const octave = note.octave === undefined ? '' : String(note.octave);
  return `(${note.clef.sign},${note.clef.line})${note.name}${note.accidental}${octave}|${note.articulations.join(',')}`;
}

/** Inverse of `encodeNote`. Throws `FormatError` on malformed input. */
export function decodeNote(text: string): Note {
  if (text.length === 0) {
    throw new FormatError('Empty note string');
  }

  const clefEnd = text.indexOf(')');
  if (!text.startsWith('(') || clefEnd === -1) {
    throw new FormatError('Note string is missing its clef prefix', text);
  }

  const clef = decodeClef(text.slice(1, clefEnd), text);
  const remainder = text.slice(clefEnd + 1);

  const articulationStart = remainder.indexOf('|');
  if (articulationStart === -1) {
    throw new FormatError('Note string is missing the articulation separator', text);
  }

  const pitchPart = remainder.slice(0, articulationStart);
  const articulationPart = remainder.slice(articulationStart + 1);
  const articulations = articulationPart.split(',').filter((token) => token.length > 0);

  const letter = pitchPart.charAt(0);
  if (letter.length === 0) {
    throw new FormatError('Note string is missing its letter', text);
  }

  if (letter === REST_LETTER) {
    if (pitchPart.length > 1) {
      throw new FormatError('Rest cannot carry accidental or octave', text);
    }
    return createRest(clef, articulations);
  }

  if (!isNoteLetter(letter)) {
    throw new FormatError('Invalid note letter', text);
  }

  const { accidental, rest: octaveText } = splitAccidental(pitchPart.slice(1));
  if (!INTEGER_PATTERN.test(octaveText)) {
    throw new FormatError('Invalid octave', text);
  }

  return createNote({
    clef,
    name: letter,
    accidental,
    octave: Number.parseInt(octaveText, 10),
    articulations
  });
}

/** Greedy longest-prefix accidental match (`bb` before `b`). */
function splitAccidental(text: string): { accidental: Accidental; rest: string } {
  for (const accidental of ACCIDENTALS) {
    if (text.startsWith(accidental)) {
      return { accidental, rest: text.slice(accidental.length) };
    }
  }

  return { accidental: '', rest: text };
}

function decodeClef(content: string, source: string): Clef {
  const parts = content.split(',');
  const [sign, line] = parts;
  if (parts.length !== 2 || sign === undefined || line === undefined || !INTEGER_PATTERN.test(line)) {
    throw new FormatError('Invalid clef', source);
  }

  return { sign, line: Number.parseInt(line, 10) };
}

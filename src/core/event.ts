import { FormatError } from './errors.js';
import { notesEqual, type Note } from './note.js';

/** Rhythmic value as a reduced fraction of a whole note. */
export interface RhythmicType {
  readonly numerator: number;
  readonly denominator: number;
}

/**
 * A single note, rest, or chord with its shared rhythm.
 * `duration` is the source tick count when the score provides one.
 */
export interface Event {
  readonly notes: readonly Note[];
  readonly type: RhythmicType;
  readonly duration?: number;
}

/** One event per selected voice at one time index. */
export type EventGroup = readonly Event[];

/** MusicXML `<type>` names mapped to whole-note fractions. */
export const NOTE_TYPE_FRACTIONS: Readonly<Record<string, RhythmicType>> = {
  breve: { numerator: 2, denominator: 1 },
  whole: { numerator: 1, denominator: 1 },
  half: { numerator: 1, denominator: 2 },
  quarter: { numerator: 1, denominator: 4 },
  eighth: { numerator: 1, denominator: 8 },
  '16th': { numerator: 1, denominator: 16 },
  '32nd': { numerator: 1, denominator: 32 },
  '64th': { numerator: 1, denominator: 64 }
};

const SHORTEST_DENOMINATOR = 64;

/** Reduce and validate a rhythmic type against the supported breve..64th range. */
export function rhythmicType(numerator: number, denominator: number): RhythmicType {
  const integral = Number.isSafeInteger(numerator) && Number.isSafeInteger(denominator);
  if (!integral || numerator <= 0 || denominator <= 0) {
    throw new FormatError('Rhythmic type must be a positive fraction', `${numerator}/${denominator}`);
  }

  const divisor = greatestCommonDivisor(numerator, denominator);
  const reduced: RhythmicType = { numerator: numerator / divisor, denominator: denominator / divisor };
  if (!isSupportedType(reduced)) {
    throw new FormatError('Unsupported rhythmic type', `${numerator}/${denominator}`);
  }

  return Object.freeze(reduced);
}

/** Rhythmic value as a plain number of whole notes. */
export function rhythmicTypeValue(type: RhythmicType): number {
  return type.numerator / type.denominator;
}

/** Build a frozen event. Fails on an empty note list or an invalid rhythm. */
export function createEvent(notes: readonly Note[], type: RhythmicType, duration?: number): Event {
  if (notes.length === 0) {
    throw new FormatError('Event requires at least one note or rest');
  }

  if (duration !== undefined && (!Number.isSafeInteger(duration) || duration < 0)) {
    throw new FormatError('Event duration must be a non-negative integer', String(duration));
  }

  const event: Event = {
    notes: Object.freeze([...notes]),
    type: rhythmicType(type.numerator, type.denominator),
    duration
  };
  return Object.freeze(event);
}

export function isChord(event: Event): boolean {
  return event.notes.length > 1;
}

/** Structural equality over notes, type, and duration. */
export function eventsEqual(left: Event, right: Event): boolean {
  return (
    left.type.numerator === right.type.numerator &&
    left.type.denominator === right.type.denominator &&
    left.duration === right.duration &&
    left.notes.length === right.notes.length &&
    left.notes.every((note, index) => {
      const other = right.notes[index];
      return other !== undefined && notesEqual(note, other);
    })
  );
}

export function groupsEqual(left: EventGroup, right: EventGroup): boolean {
  return (
    left.length === right.length &&
    left.every((event, index) => {
      const other = right[index];
      return other !== undefined && eventsEqual(event, other);
    })
  );
}

function isSupportedType(type: RhythmicType): boolean {
  if (type.denominator === 1) {
    return type.numerator === 1 || type.numerator === 2;
  }

  return (
    type.numerator === 1 &&
    type.denominator <= SHORTEST_DENOMINATOR &&
    (type.denominator & (type.denominator - 1)) === 0
  );
}

function greatestCommonDivisor(left: number, right: number): number {
  let a = left;
  let b = right;
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

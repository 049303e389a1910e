import { FormatError } from '../core/errors.js';
import { createEvent, rhythmicType, type Event } from '../core/event.js';
import { decodeNote, encodeNote } from './note-codec.js';

/** Separator between the chord notes of one event. */
export const NOTE_SEPARATOR = '>';
/** Separator between the note list and the timing segment. */
export const TIMING_SEPARATOR = '>>';

const DURATION_PATTERN = /^\d+$/;
const FRACTION_PATTERN = /^(\d+)\/(\d+)$/;
const NO_DURATION = 'None';

/** Encode an event as `<note1>><note2>...>><num>/<den>|<duration or None>`. */
export function encodeEvent(event: Event): string {
  const notes = event.notes.map(encodeNote).join(NOTE_SEPARATOR);
  const duration = event.duration === undefined ? NO_DURATION : String(event.duration);
  return `${notes}${TIMING_SEPARATOR}${event.type.numerator}/${event.type.denominator}|${duration}`;
}

/** Inverse of `encodeEvent`. Throws `FormatError` on malformed input. */
export function decodeEvent(text: string): Event {
  // Note text never contains '>', so the last '>>' is always the timing separator.
  const separatorIndex = text.lastIndexOf(TIMING_SEPARATOR);
  if (separatorIndex === -1) {
    throw new FormatError("Event string is missing the '>>' separator", text);
  }

  const noteTexts = text.slice(0, separatorIndex).split(NOTE_SEPARATOR);
  if (noteTexts.some((segment) => segment.length === 0)) {
    throw new FormatError('Event string contains an empty note segment', text);
  }

  const timing = text.slice(separatorIndex + TIMING_SEPARATOR.length);
  const durationStart = timing.indexOf('|');
  if (durationStart === -1) {
    throw new FormatError("Event timing is missing the '|' separator", text);
  }

  const fraction = FRACTION_PATTERN.exec(timing.slice(0, durationStart));
  if (!fraction) {
    throw new FormatError('Invalid rhythmic type', text);
  }

  const durationText = timing.slice(durationStart + 1);
  let duration: number | undefined;
  if (durationText !== NO_DURATION) {
    if (!DURATION_PATTERN.test(durationText)) {
      throw new FormatError('Invalid event duration', text);
    }
    duration = Number.parseInt(durationText, 10);
  }

  const type = rhythmicType(Number(fraction[1]), Number(fraction[2]));
  return createEvent(noteTexts.map(decodeNote), type, duration);
}

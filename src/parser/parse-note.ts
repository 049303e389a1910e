import { FormatError } from '../core/errors.js';
import { createEvent, NOTE_TYPE_FRACTIONS, rhythmicType, type Event, type RhythmicType } from '../core/event.js';
import { accidentalFromAlter, createNote, createRest, isNoteLetter, type Note } from '../core/note.js';
import { DEFAULT_RESOLUTION } from '../core/score.js';
import { clefForStaff, type PartAttributes } from './parse-attributes.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { childrenOf, firstChild, parseOptionalFloat, parseOptionalInt, textOf } from './xml-utils.js';

/**
 * Outcome of reading one `<note>`. Chord members (`<chord/>`) come back as a
 * bare note so the caller can merge them into the previous event of the voice.
 * A skipped chord base leaves its members without an event to join.
 */
export type NoteParseResult =
  | { kind: 'event'; voice: string; event: Event }
  | { kind: 'chord'; voice: string; note: Note }
  | { kind: 'skipped'; voice: string; chord: boolean };

// Breve down to 64th, as whole-note values, longest first.
const TYPES_BY_LENGTH: readonly RhythmicType[] = Object.values(NOTE_TYPE_FRACTIONS).sort(
  (left, right) => right.numerator / right.denominator - left.numerator / left.denominator
);

export function parseNote(node: XmlNode, attributes: PartAttributes, ctx: ParseContext): NoteParseResult {
  const staff = textOf(firstChild(node, 'staff')) ?? '1';
  const voice = ctx.voiceKey === 'staff' ? staff : textOf(firstChild(node, 'voice')) ?? '1';
  const isGrace = firstChild(node, 'grace') !== undefined;
  const isChordMember = firstChild(node, 'chord') !== undefined;

  const duration = isGrace ? undefined : readDuration(node, ctx);
  const note = readPitchOrRest(node, attributes, staff, ctx);
  if (!note) {
    return { kind: 'skipped', voice, chord: isChordMember };
  }

  if (isChordMember) {
    return { kind: 'chord', voice, note };
  }

  const type = readType(node, duration, attributes, ctx);
  if (!type) {
    return { kind: 'skipped', voice, chord: false };
  }

  return { kind: 'event', voice, event: createEvent([note], type, duration) };
}

/** Append a chord member to `base`, keeping its rhythm. */
export function mergeChordNote(base: Event, note: Note): Event {
  return createEvent([...base.notes, note], base.type, base.duration);
}

function readPitchOrRest(node: XmlNode, attributes: PartAttributes, staff: string, ctx: ParseContext): Note | undefined {
  const clef = clefForStaff(attributes, staff, node, ctx);
  if (firstChild(node, 'rest')) {
    return createRest(clef);
  }

  const pitch = firstChild(node, 'pitch');
  if (!pitch) {
    addDiagnostic(ctx, 'NOTE_WITHOUT_PITCH', 'warning', '<note> has neither <pitch> nor <rest>; skipping it.', node);
    return undefined;
  }

  const step = textOf(firstChild(pitch, 'step'));
  const octave = parseOptionalInt(textOf(firstChild(pitch, 'octave')));
  if (!step || !isNoteLetter(step) || octave === undefined) {
    addDiagnostic(ctx, 'INVALID_PITCH', 'warning', `<pitch> step '${step ?? ''}' or octave is invalid; skipping it.`, pitch);
    return undefined;
  }

  const alterNode = firstChild(pitch, 'alter');
  const accidental = accidentalFromAlter(alterNode ? parseOptionalFloat(textOf(alterNode)) : undefined);
  if (accidental === undefined) {
    addDiagnostic(
      ctx,
      'UNSUPPORTED_ALTER',
      'warning',
      `<alter>${textOf(alterNode) ?? ''}</alter> has no accidental token; skipping the note.`,
      alterNode
    );
    return undefined;
  }

  try {
    return createNote({ clef, name: step, accidental, octave, articulations: readArticulations(node) });
  } catch (error) {
    if (!(error instanceof FormatError)) {
      throw error;
    }
    addDiagnostic(ctx, 'INVALID_NOTE', 'warning', error.message, node);
    return undefined;
  }
}

/** Element names under every `<notations><articulations>`, in document order. */
function readArticulations(node: XmlNode): string[] {
  return childrenOf(node, 'notations').flatMap((notations) =>
    childrenOf(notations, 'articulations').flatMap((group) => group.children.map((child) => child.name))
  );
}

function readDuration(node: XmlNode, ctx: ParseContext): number | undefined {
  const durationNode = firstChild(node, 'duration');
  if (!durationNode) {
    addDiagnostic(ctx, 'MISSING_DURATION', 'warning', '<note> has no <duration>.', node);
    return undefined;
  }

  const duration = parseOptionalInt(textOf(durationNode));
  if (duration === undefined || duration < 0) {
    addDiagnostic(ctx, 'INVALID_DURATION', 'warning', '<duration> must be a non-negative integer.', durationNode);
    return undefined;
  }
  return duration;
}

function readType(
  node: XmlNode,
  duration: number | undefined,
  attributes: PartAttributes,
  ctx: ParseContext
): RhythmicType | undefined {
  const typeName = textOf(firstChild(node, 'type'));
  if (typeName !== undefined && Object.hasOwn(NOTE_TYPE_FRACTIONS, typeName)) {
    const type = NOTE_TYPE_FRACTIONS[typeName];
    if (type) {
      return type;
    }
  }
  if (typeName !== undefined) {
    addDiagnostic(ctx, 'UNSUPPORTED_NOTE_TYPE', 'warning', `<type>${typeName}</type> is outside breve..64th.`, node);
  }

  if (duration === undefined || duration === 0) {
    addDiagnostic(ctx, 'MISSING_NOTE_TYPE', 'warning', 'Note has no usable <type> or <duration>; skipping it.', node);
    return undefined;
  }

  const divisions = attributes.divisions ?? DEFAULT_RESOLUTION;
  const derived = typeFromDuration(duration, divisions);
  addDiagnostic(
    ctx,
    'NOTE_TYPE_DERIVED',
    'info',
    `Derived type ${derived.numerator}/${derived.denominator} from duration ${duration} at ${divisions} division(s).`,
    firstChild(node, 'duration') ?? node
  );
  return derived;
}

/**
 * Longest supported type that fits in `duration`, so dotted values round down
 * to their undotted base. Clamped to the breve..64th range.
 */
export function typeFromDuration(duration: number, divisions: number): RhythmicType {
  const wholeNotes = duration / (4 * divisions);
  const fitting = TYPES_BY_LENGTH.find((type) => type.numerator / type.denominator <= wholeNotes);
  const chosen = fitting ?? TYPES_BY_LENGTH[TYPES_BY_LENGTH.length - 1];
  return chosen ?? rhythmicType(1, 64);
}

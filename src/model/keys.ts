import { decodeEvent, encodeEvent } from '../codec/event-codec.js';
import { ConfigError } from '../core/errors.js';
import type { Event, EventGroup } from '../core/event.js';

/** Joins the per-voice events of one time step in persisted labels. */
export const VOICE_SEPARATOR = '&';
/** Joins the time steps of a state window in persisted labels. */
export const WINDOW_SEPARATOR = '+';

/** Event text encoder; table builds pass a memoized one. */
export type EventEncoder = (event: Event) => string;

/** Order labels by UTF-16 code units so column order never depends on locale. */
export function compareLabels(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * One synchronized multi-voice time step.
 * `id` is the in-memory identity (a JSON array of event encodings, so no
 * delimiter can collide); `label` is the `&`-joined persisted form.
 */
export class StepKey {
  readonly events: EventGroup;
  readonly encodings: readonly string[];
  readonly id: string;
  readonly label: string;

  private constructor(events: EventGroup, encodings: readonly string[]) {
    this.events = Object.freeze([...events]);
    this.encodings = Object.freeze([...encodings]);
    this.id = JSON.stringify(this.encodings);
    this.label = this.encodings.join(VOICE_SEPARATOR);
  }

  static of(events: EventGroup, encode: EventEncoder = encodeEvent): StepKey {
    if (events.length === 0) {
      throw new ConfigError('A time step needs at least one voice event.');
    }
    return new StepKey(events, events.map(encode));
  }

  /** Decode an `&`-joined label. Throws `FormatError` on malformed events. */
  static parse(label: string): StepKey {
    const events = label.split(VOICE_SEPARATOR).map(decodeEvent);
    // Re-encode so equal events always share one id, however the label spelled them.
    return new StepKey(events, events.map(encodeEvent));
  }

  get voiceCount(): number {
    return this.events.length;
  }

  equals(other: StepKey): boolean {
    return this.id === other.id;
  }
}

/** An n-gram context: `order` consecutive time steps, oldest first. */
export class StateKey {
  readonly steps: readonly StepKey[];
  readonly id: string;
  readonly label: string;

  private constructor(steps: readonly StepKey[]) {
    this.steps = Object.freeze([...steps]);
    this.id = JSON.stringify(this.steps.map((step) => step.encodings));
    this.label = this.steps.map((step) => step.label).join(WINDOW_SEPARATOR);
  }

  static of(steps: readonly StepKey[]): StateKey {
    const first = steps[0];
    if (!first) {
      throw new ConfigError('A state needs at least one time step.');
    }
    if (steps.some((step) => step.voiceCount !== first.voiceCount)) {
      throw new ConfigError('All time steps of a state must have the same number of voices.');
    }
    return new StateKey(steps);
  }

  /** Decode a `+`-joined label. Throws `FormatError` on malformed events. */
  static parse(label: string): StateKey {
    return StateKey.of(label.split(WINDOW_SEPARATOR).map((segment) => StepKey.parse(segment)));
  }

  get order(): number {
    return this.steps.length;
  }

  get voiceCount(): number {
    return this.latest.voiceCount;
  }

  /** Most recent time step of the window. */
  get latest(): StepKey {
    const step = this.steps[this.steps.length - 1];
    if (!step) {
      throw new ConfigError('State has no time steps.');
    }
    return step;
  }

  /** Slide the window: drop the oldest step and append `next`. */
  advance(next: StepKey): StateKey {
    return StateKey.of([...this.steps.slice(1), next]);
  }

  equals(other: StateKey): boolean {
    return this.id === other.id;
  }
}

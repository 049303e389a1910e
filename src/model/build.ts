import { createMemoizedEventEncoder } from '../codec/memo.js';
import { ConfigError } from '../core/errors.js';
import type { Event } from '../core/event.js';
import { StateKey, StepKey } from './keys.js';
import { normalizeRows, type TransitionTable } from './transition-table.js';

/**
 * How windows behave at the end of the corpus.
 * `wrap` indexes modulo the aligned length so the last `order` steps still
 * open states; `truncate` only builds windows that fit inside the corpus.
 */
export type WindowBoundary = 'wrap' | 'truncate';

export interface BuildOptions {
  order: number;
  boundary?: WindowBoundary;
}

/** Shortest voice length, i.e. the synchronized time axis of the corpus. */
export function minVoiceLength(voices: readonly (readonly Event[])[]): number {
  if (voices.length === 0) {
    return 0;
  }
  return Math.min(...voices.map((voice) => voice.length));
}

/**
 * Build the n-gram transition table over aligned voices.
 *
 * For every time index `i` the state is the window of steps
 * `(i + j) mod L` for `j < order` and the successor is step `(i + order) mod L`,
 * where `L` is the shortest voice length. Events past `L` are ignored.
 */
export function buildTransitionTable(voices: readonly (readonly Event[])[], options: BuildOptions): TransitionTable {
  const { order } = options;
  const boundary = options.boundary ?? 'wrap';

  if (voices.length === 0) {
    throw new ConfigError('At least one voice must be selected to build a transition table.');
  }
  if (!Number.isInteger(order) || order < 1) {
    throw new ConfigError(`Order must be a positive integer, got ${order}.`);
  }

  const length = minVoiceLength(voices);
  if (order >= length) {
    throw new ConfigError(`Order (${order}) must be less than the minimum voice length (${length}).`);
  }

  const encode = createMemoizedEventEncoder();
  const steps: StepKey[] = [];
  for (let time = 0; time < length; time += 1) {
    steps.push(StepKey.of(voices.map((voice) => eventAt(voice, time)), encode));
  }

  const states = new Map<string, StateKey>();
  const successors = new Map<string, StepKey>();
  const counts = new Map<string, Map<string, number>>();

  const windowCount = boundary === 'wrap' ? length : length - order;
  for (let index = 0; index < windowCount; index += 1) {
    const window: StepKey[] = [];
    for (let offset = 0; offset < order; offset += 1) {
      window.push(stepAt(steps, (index + offset) % length));
    }

    const state = StateKey.of(window);
    const successor = stepAt(steps, (index + order) % length);
    states.set(state.id, state);
    successors.set(successor.id, successor);

    const row = counts.get(state.id) ?? new Map<string, number>();
    row.set(successor.id, (row.get(successor.id) ?? 0) + 1);
    counts.set(state.id, row);
  }

  return normalizeRows({
    states: [...states.values()],
    successors: [...successors.values()],
    counts
  });
}

function eventAt(voice: readonly Event[], time: number): Event {
  const event = voice[time];
  if (!event) {
    throw new ConfigError(`Voice has no event at time index ${time}.`);
  }
  return event;
}

function stepAt(steps: readonly StepKey[], index: number): StepKey {
  const step = steps[index];
  if (!step) {
    throw new ConfigError(`No time step at index ${index}.`);
  }
  return step;
}

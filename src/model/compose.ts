import type { Diagnostic } from '../core/diagnostics.js';
import { ConfigError } from '../core/errors.js';
import type { EventGroup } from '../core/event.js';
import type { StateKey } from './keys.js';
import type { RandomSource } from './random.js';
import type { Transition, TransitionTable } from './transition-table.js';

export interface ComposeOptions {
  random?: RandomSource;
}

/** Generated composition (`steps + 1` groups) plus sampling diagnostics. */
export interface ComposeResult {
  groups: EventGroup[];
  diagnostics: Diagnostic[];
}

/**
 * Sample a new multi-voice sequence from `table`.
 *
 * A random row seeds the walk and its latest step is the first output. Each
 * of the `steps` draws then appends one successor and slides the window.
 * States without positive successors repeat the previous output.
 */
export function composeSequence(table: TransitionTable, steps: number, options: ComposeOptions = {}): ComposeResult {
  if (!Number.isInteger(steps) || steps < 0) {
    throw new ConfigError(`Number of steps must be a non-negative integer, got ${steps}.`);
  }

  const random = options.random ?? Math.random;
  const diagnostics: Diagnostic[] = [];
  const reportedDeadEnds = new Set<string>();

  let state = pickInitialState(table, random());
  let previous = state.latest.events;
  const groups: EventGroup[] = [previous];

  for (let step = 0; step < steps; step += 1) {
    const transitions = table.transitionsFrom(state) ?? [];
    if (transitions.length === 0) {
      if (!reportedDeadEnds.has(state.id)) {
        reportedDeadEnds.add(state.id);
        diagnostics.push({
          code: 'SAMPLING_DEAD_END',
          severity: 'info',
          message: `State '${state.label}' has no outgoing transitions; repeating the previous output from step ${step + 1}.`
        });
      }
      groups.push(previous);
      continue;
    }

    const chosen = drawTransition(transitions, random());
    previous = chosen.successor.events;
    groups.push(previous);
    state = state.advance(chosen.successor);
  }

  return { groups, diagnostics };
}

/** Uniform pick among the table rows for a draw `u` in [0, 1). */
export function pickInitialState(table: TransitionTable, u: number): StateKey {
  const index = Math.min(table.states.length - 1, Math.floor(u * table.states.length));
  const state = table.states[index];
  if (!state) {
    throw new ConfigError('Cannot compose from an empty transition table.');
  }
  return state;
}

/**
 * Roulette-wheel selection: the first transition whose running probability sum
 * is strictly greater than `u`. Rounding can leave the total just below `u`,
 * in which case the last transition is taken.
 */
export function drawTransition(transitions: readonly Transition[], u: number): Transition {
  let cumulative = 0;
  for (const transition of transitions) {
    cumulative += transition.probability;
    if (u < cumulative) {
      return transition;
    }
  }

  const last = transitions[transitions.length - 1];
  if (!last) {
    throw new ConfigError('Cannot draw from an empty successor list.');
  }
  return last;
}

import { ConfigError } from '../core/errors.js';
import { compareLabels, type StateKey, type StepKey } from './keys.js';

/** Successor entry of one table row. */
export interface Transition {
  successor: StepKey;
  probability: number;
}

/** Raw observation counts keyed by state id, then successor id. */
export interface TransitionCounts {
  states: readonly StateKey[];
  successors: readonly StepKey[];
  counts: ReadonlyMap<string, ReadonlyMap<string, number>>;
}

/**
 * Read-only row-stochastic table: rows are observed states, columns observed
 * successor steps. Rows and columns are ordered by persisted label.
 */
export class TransitionTable {
  readonly order: number;
  readonly voiceCount: number;
  readonly states: readonly StateKey[];
  readonly successors: readonly StepKey[];
  private readonly rows: Map<string, Transition[]>;
  // state id -> successor id -> positive probability
  private readonly cells: Map<string, Map<string, number>>;

  constructor(
    states: readonly StateKey[],
    successors: readonly StepKey[],
    probabilities: ReadonlyMap<string, ReadonlyMap<string, number>>
  ) {
    const first = states[0];
    if (!first || successors.length === 0) {
      throw new ConfigError('A transition table needs at least one state and one successor.');
    }

    this.order = first.order;
    this.voiceCount = first.voiceCount;
    if (states.some((state) => state.order !== this.order || state.voiceCount !== this.voiceCount)) {
      throw new ConfigError('All states of a transition table must share one order and voice count.');
    }
    if (successors.some((successor) => successor.voiceCount !== this.voiceCount)) {
      throw new ConfigError(`Every successor must have ${this.voiceCount} voice(s).`);
    }

    this.states = Object.freeze([...states].sort((left, right) => compareLabels(left.label, right.label)));
    this.successors = Object.freeze([...successors].sort((left, right) => compareLabels(left.label, right.label)));

    this.rows = new Map();
    this.cells = new Map();
    for (const state of this.states) {
      const input = probabilities.get(state.id);
      const row: Transition[] = [];
      const lookup = new Map<string, number>();
      for (const successor of this.successors) {
        const probability = input?.get(successor.id) ?? 0;
        if (probability > 0) {
          row.push({ successor, probability });
          lookup.set(successor.id, probability);
        }
      }
      this.rows.set(state.id, row);
      this.cells.set(state.id, lookup);
    }
  }

  hasState(state: StateKey): boolean {
    return this.rows.has(state.id);
  }

  /** Positive-probability successors in column order; `undefined` for unknown states. */
  transitionsFrom(state: StateKey): readonly Transition[] | undefined {
    return this.rows.get(state.id);
  }

  probability(state: StateKey, successor: StepKey): number {
    return this.cells.get(state.id)?.get(successor.id) ?? 0;
  }

  rowSum(state: StateKey): number {
    return (this.rows.get(state.id) ?? []).reduce((sum, entry) => sum + entry.probability, 0);
  }
}

/**
 * Normalize counts into probabilities. A row whose counts sum to zero is
 * treated as recurrent: every column gets the same weight before dividing.
 */
export function normalizeRows(input: TransitionCounts): TransitionTable {
  const probabilities = new Map<string, Map<string, number>>();

  for (const state of input.states) {
    const counts = input.counts.get(state.id);
    const weights = new Map<string, number>();
    for (const successor of input.successors) {
      weights.set(successor.id, counts?.get(successor.id) ?? 0);
    }

    let total = sumValues(weights);
    if (total === 0) {
      for (const successor of input.successors) {
        weights.set(successor.id, 1);
      }
      total = input.successors.length;
    }

    const row = new Map<string, number>();
    for (const [successorId, weight] of weights) {
      row.set(successorId, weight / total);
    }
    probabilities.set(state.id, row);
  }

  return new TransitionTable(input.states, input.successors, probabilities);
}

function sumValues(values: ReadonlyMap<string, number>): number {
  let total = 0;
  for (const value of values.values()) {
    total += value;
  }
  return total;
}

import { describe, expect, it } from 'vitest';

import { ConfigError } from '../../src/core/errors.js';
import type { EventGroup } from '../../src/core/event.js';
import { buildTransitionTable } from '../../src/model/build.js';
import { composeSequence, drawTransition, pickInitialState } from '../../src/model/compose.js';
import { StepKey } from '../../src/model/keys.js';
import { createSeededRandom } from '../../src/model/random.js';
import { noteEvent } from '../helpers/events.js';

const C4 = noteEvent('C', 4);
const D4 = noteEvent('D', 4);
const E4 = noteEvent('E', 4);

const names = (groups: readonly EventGroup[]): string[] =>
  groups.map((group) => group.map((event) => event.notes.map((note) => note.name).join('')).join('&'));

describe('composeSequence', () => {
  it('emits the seed step followed by one group per draw', () => {
    const table = buildTransitionTable([[C4, D4, E4]], { order: 1 });
    const result = composeSequence(table, 4, { random: () => 0 });

    expect(result.groups).toHaveLength(5);
    expect(names(result.groups)).toEqual(['C', 'D', 'E', 'C', 'D']);
    expect(result.diagnostics).toEqual([]);
  });

  it('returns only the seed step for zero steps', () => {
    const table = buildTransitionTable([[C4, D4, E4]], { order: 1 });

    expect(composeSequence(table, 0, { random: () => 0.5 }).groups).toHaveLength(1);
  });

  it('repeats the previous output from a state without successors', () => {
    const table = buildTransitionTable([[C4, D4, E4]], { order: 1, boundary: 'truncate' });
    const result = composeSequence(table, 4, { random: () => 0 });

    expect(names(result.groups)).toEqual(['C', 'D', 'E', 'E', 'E']);
    expect(result.diagnostics).toEqual([
      {
        code: 'SAMPLING_DEAD_END',
        severity: 'info',
        message:
          "State '(G,2)E4|>>1/4|None' has no outgoing transitions; repeating the previous output from step 3."
      }
    ]);
  });

  it('keeps every voice in each generated group', () => {
    const table = buildTransitionTable(
      [
        [C4, D4, E4, C4],
        [E4, E4, D4, C4]
      ],
      { order: 2 }
    );
    const result = composeSequence(table, 10, { random: createSeededRandom(7) });

    expect(result.groups).toHaveLength(11);
    expect(result.groups.every((group) => group.length === 2)).toBe(true);
  });

  it('is reproducible for a fixed seed', () => {
    const voice = [C4, D4, C4, E4, D4, C4, E4, E4];
    const table = buildTransitionTable([voice], { order: 1 });

    const first = composeSequence(table, 20, { random: createSeededRandom(1234) });
    const second = composeSequence(table, 20, { random: createSeededRandom(1234) });

    expect(names(first.groups)).toEqual(names(second.groups));
  });

  it('rejects negative or fractional step counts', () => {
    const table = buildTransitionTable([[C4, D4]], { order: 1 });

    expect(() => composeSequence(table, -1)).toThrow(ConfigError);
    expect(() => composeSequence(table, 2.5)).toThrow(ConfigError);
  });
});

describe('drawTransition', () => {
  const transitions = [
    { successor: StepKey.of([C4]), probability: 0.5 },
    { successor: StepKey.of([D4]), probability: 0.5 }
  ];

  it('takes the first entry whose running sum exceeds the draw', () => {
    expect(drawTransition(transitions, 0).successor.equals(StepKey.of([C4]))).toBe(true);
    expect(drawTransition(transitions, 0.49).successor.equals(StepKey.of([C4]))).toBe(true);
  });

  it('compares strictly, so a draw equal to a boundary moves on', () => {
    expect(drawTransition(transitions, 0.5).successor.equals(StepKey.of([D4]))).toBe(true);
  });

  it('falls back to the last entry when rounding leaves the sum short', () => {
    const short = [
      { successor: StepKey.of([C4]), probability: 0.3 },
      { successor: StepKey.of([D4]), probability: 0.6 }
    ];

    expect(drawTransition(short, 0.95).successor.equals(StepKey.of([D4]))).toBe(true);
  });

  it('fails on an empty list', () => {
    expect(() => drawTransition([], 0.1)).toThrow(ConfigError);
  });
});

describe('pickInitialState', () => {
  it('maps the draw uniformly onto the label-ordered rows', () => {
    const table = buildTransitionTable([[C4, D4, E4]], { order: 1 });

    expect(pickInitialState(table, 0).label).toBe('(G,2)C4|>>1/4|None');
    expect(pickInitialState(table, 0.34).label).toBe('(G,2)D4|>>1/4|None');
    expect(pickInitialState(table, 0.999).label).toBe('(G,2)E4|>>1/4|None');
    expect(pickInitialState(table, 1).label).toBe('(G,2)E4|>>1/4|None');
  });
});

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import midiPackage from '@tonejs/midi';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { main } from '../../src/cli/compose.js';
import { ConfigError, MissingVoiceError } from '../../src/core/errors.js';
import type { EventGroup } from '../../src/core/event.js';
import { StepKey } from '../../src/model/keys.js';
import { serializeTransitionTable } from '../../src/model/table-csv.js';
import { runRecipeFile } from '../../src/pipeline/run-recipe.js';

const { Midi } = midiPackage;

const STUDY = fileURLToPath(new URL('../fixtures/scores/two-hand-study.musicxml', import.meta.url));

function recipe(lines: Record<string, string>): string {
  const defaults: Record<string, string> = {
    scores: `[${JSON.stringify(STUDY)}]`,
    voices: '[1, 2]',
    order: '2',
    steps: '12',
    seed: '7',
    instruments: '[piano, bass]',
    output: 'out/study.mid'
  };
  return Object.entries({ ...defaults, ...lines })
    .map(([key, value]) => `${key}: ${value}`)
    .join('\n');
}

const labels = (groups: readonly EventGroup[]): string[] => groups.map((group) => StepKey.of(group).label);

describe('recipe pipeline', () => {
  let workDir = '';

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'score-markov-pipeline-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  async function writeRecipe(name: string, lines: Record<string, string> = {}): Promise<string> {
    const recipePath = path.join(workDir, name);
    await writeFile(recipePath, recipe(lines), 'utf8');
    return recipePath;
  }

  it('builds a table from the score, composes and writes a MIDI file', async () => {
    const result = await runRecipeFile(await writeRecipe('study.yaml', { table: '{ save: tables/study.csv }' }));

    expect(result.diagnostics).toEqual([]);
    expect(result.table.order).toBe(2);
    expect(result.table.voiceCount).toBe(2);
    expect(result.table.states).toHaveLength(8);
    expect(result.composition).toHaveLength(13);
    expect(result.resolution).toBe(1);
    expect(result.tempo).toBe(100);
    expect(result.outputPath).toBe(path.join(workDir, 'out', 'study.mid'));

    const midi = new Midi(await readFile(result.outputPath));
    expect(midi.tracks.map((track) => track.instrument.number)).toEqual([0, 32]);
    expect(midi.tracks[1]?.notes).toHaveLength(13);
    expect(midi.tracks[1]?.notes.at(-1)?.ticks).toBe(12 * 480);

    const saved = await readFile(path.join(workDir, 'tables', 'study.csv'), 'utf8');
    expect(saved).toBe(serializeTransitionTable(result.table));
  });

  it('composes the same music from a saved table with the same seed', async () => {
    const built = await runRecipeFile(await writeRecipe('build.yaml', { table: '{ save: study.csv }' }));
    const loaded = await runRecipeFile(
      await writeRecipe('load.yaml', { table: '{ load: study.csv }', output: 'out/again.mid' })
    );

    expect(labels(loaded.composition)).toEqual(labels(built.composition));
  });

  it('takes every state from a loaded table without aggregating the selected voices', async () => {
    const built = await runRecipeFile(await writeRecipe('build.yaml', { table: '{ save: study.csv }' }));
    const loaded = await runRecipeFile(
      await writeRecipe('load.yaml', {
        voices: '[1, 9]',
        order: '3',
        table: '{ load: study.csv }',
        output: 'out/again.mid'
      })
    );

    expect(labels(loaded.composition)).toEqual(labels(built.composition));
    expect(loaded.table.order).toBe(2);
    expect(loaded.resolution).toBe(1);
    expect(loaded.tempo).toBe(100);
    expect(loaded.diagnostics).toEqual([
      {
        code: 'TABLE_ORDER_MISMATCH',
        severity: 'warning',
        message: `Table ${path.join(workDir, 'study.csv')} has order 2; the recipe order 3 is ignored.`
      }
    ]);
  });

  it('lets the caller supply the random source', async () => {
    const recipePath = await writeRecipe('fixed.yaml', { steps: '3' });
    const first = await runRecipeFile(recipePath, { random: () => 0 });
    const second = await runRecipeFile(recipePath, { random: () => 0 });

    expect(labels(first.composition)).toEqual(labels(second.composition));
    expect(first.composition[0]).toEqual(first.table.states[0]?.latest.events);
  });

  it('overrides the score tempo from the recipe', async () => {
    const result = await runRecipeFile(await writeRecipe('tempo.yaml', { tempo: '72' }));

    expect(result.tempo).toBe(72);
  });

  it('rejects a loaded table with a different voice count', async () => {
    await runRecipeFile(await writeRecipe('build.yaml', { table: '{ save: study.csv }' }));
    const mismatch = await writeRecipe('one-voice.yaml', {
      voices: '[1]',
      instruments: 'piano',
      table: '{ load: study.csv }'
    });

    await expect(runRecipeFile(mismatch)).rejects.toThrow(ConfigError);
    await expect(runRecipeFile(mismatch)).rejects.toThrow(
      `Table ${path.join(workDir, 'study.csv')} has 2 voice(s) but the recipe selects 1.`
    );
  });

  it('fails when a selected voice exists in no score', async () => {
    const recipePath = await writeRecipe('missing.yaml', { voices: '[1, 7]' });

    await expect(runRecipeFile(recipePath)).rejects.toThrow(MissingVoiceError);
  });
});

describe('command-line runner', () => {
  let workDir = '';
  let out: string[] = [];
  let err: string[] = [];
  const io = {
    out: (line: string): void => {
      out.push(line);
    },
    err: (line: string): void => {
      err.push(line);
    }
  };

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'score-markov-cli-'));
    out = [];
    err = [];
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('prints usage without exactly one argument', async () => {
    expect(await main([], io)).toBe(2);
    expect(await main(['a.yaml', 'b.yaml'], io)).toBe(2);
    expect(await main(['--help'], io)).toBe(0);
    expect(err).toEqual([
      'Usage: score-markov <recipe.yaml>',
      'Usage: score-markov <recipe.yaml>',
      'Usage: score-markov <recipe.yaml>'
    ]);
  });

  it('reports the written file on success', async () => {
    const recipePath = path.join(workDir, 'study.yaml');
    await writeFile(recipePath, recipe({}), 'utf8');

    expect(await main([recipePath], io)).toBe(0);
    expect(out).toEqual([
      `Wrote 13 step(s) to ${path.join(workDir, 'out', 'study.mid')} (8 state(s), order 2, 100 BPM).`
    ]);
    expect(err).toEqual([]);
  });

  it('prints parser diagnostics when a score cannot be ingested', async () => {
    const brokenPath = path.join(workDir, 'broken.musicxml');
    const recipePath = path.join(workDir, 'broken.yaml');
    await writeFile(brokenPath, '<score-partwise><part-list></score-partwise>', 'utf8');
    await writeFile(recipePath, recipe({ scores: '[broken.musicxml]' }), 'utf8');

    expect(await main([recipePath], io)).toBe(1);
    expect(err[0]?.startsWith('[error] XML_NOT_WELL_FORMED: ')).toBe(true);
    expect(err.at(-1)?.startsWith(`IngestionError: Could not ingest ${brokenPath}: XML_NOT_WELL_FORMED: `)).toBe(true);
  });

  it('reports recipe errors by name', async () => {
    const recipePath = path.join(workDir, 'invalid.yaml');
    await writeFile(recipePath, 'scores: [a.musicxml]\noutput: out.mid\n', 'utf8');

    expect(await main([recipePath], io)).toBe(1);
    expect(err).toEqual([`RecipeError: Recipe error in ${recipePath}: 'voices' must list at least one voice`]);
  });
});

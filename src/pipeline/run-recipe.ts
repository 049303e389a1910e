import { loadRecipe, type Recipe } from '../config/recipe.js';
import type { Diagnostic } from '../core/diagnostics.js';
import { ConfigError, IngestionError } from '../core/errors.js';
import type { EventGroup } from '../core/event.js';
import { DEFAULT_RESOLUTION, DEFAULT_TEMPO, type IngestedScore } from '../core/score.js';
import { writeCompositionMidi } from '../midi/emit.js';
import { aggregateVoices, alignVoices } from '../model/aggregate.js';
import { buildTransitionTable } from '../model/build.js';
import { composeSequence } from '../model/compose.js';
import { createSeededRandom, type RandomSource } from '../model/random.js';
import { loadTransitionTable, saveTransitionTable } from '../model/table-csv.js';
import type { TransitionTable } from '../model/transition-table.js';
import { parseScoreFile } from '../public/api.js';

export interface RunRecipeOptions {
  /** Overrides the recipe seed. */
  random?: RandomSource;
}

export interface RecipeRunResult {
  table: TransitionTable;
  composition: EventGroup[];
  resolution: number;
  tempo: number;
  outputPath: string;
  diagnostics: Diagnostic[];
}

/**
 * Ingest → aggregate → build (or load) → compose → write MIDI.
 * Scores that fail to parse stop the run with `IngestionError`. A loaded
 * table skips aggregation, so `voices` only has to match its voice count.
 */
export async function runRecipe(recipe: Recipe, options: RunRecipeOptions = {}): Promise<RecipeRunResult> {
  const diagnostics: Diagnostic[] = [];

  const scores: IngestedScore[] = [];
  for (const scorePath of recipe.scores) {
    const parsed = await parseScoreFile(scorePath, { mode: recipe.parseMode, voiceKey: recipe.voiceKey });
    diagnostics.push(...parsed.diagnostics);
    if (!parsed.score) {
      throw new IngestionError(scorePath, parsed.diagnostics);
    }
    scores.push(parsed.score);
  }

  let table: TransitionTable;
  let resolution: number;
  let scoreTempo: number;
  if (recipe.table.load) {
    // A loaded table replaces the corpus; scores only supply resolution and tempo.
    table = await loadTransitionTable(recipe.table.load);
    if (table.voiceCount !== recipe.voices.length) {
      throw new ConfigError(
        `Table ${recipe.table.load} has ${table.voiceCount} voice(s) but the recipe selects ${recipe.voices.length}.`
      );
    }
    if (table.order !== recipe.order) {
      diagnostics.push({
        code: 'TABLE_ORDER_MISMATCH',
        severity: 'warning',
        message: `Table ${recipe.table.load} has order ${table.order}; the recipe order ${recipe.order} is ignored.`
      });
    }
    const first = scores[0];
    resolution = first?.resolution ?? DEFAULT_RESOLUTION;
    scoreTempo = first?.tempo ?? DEFAULT_TEMPO;
  } else {
    const corpus = aggregateVoices(scores, { voices: recipe.voices, instrument: recipe.instrument });
    diagnostics.push(...corpus.diagnostics);
    table = buildTransitionTable(alignVoices(corpus), { order: recipe.order, boundary: recipe.boundary });
    resolution = corpus.resolution;
    scoreTempo = corpus.tempo;
  }

  if (recipe.table.save) {
    await saveTransitionTable(table, recipe.table.save);
  }

  const random = options.random ?? (recipe.seed === undefined ? undefined : createSeededRandom(recipe.seed));
  const composed = composeSequence(table, recipe.steps, { random });
  diagnostics.push(...composed.diagnostics);

  const tempo = recipe.tempo ?? scoreTempo;
  await writeCompositionMidi(recipe.output, composed.groups, {
    resolution,
    tempo,
    instruments: recipe.instruments,
    velocity: recipe.velocity
  });

  return {
    table,
    composition: composed.groups,
    resolution,
    tempo,
    outputPath: recipe.output,
    diagnostics
  };
}

export async function runRecipeFile(filePath: string, options: RunRecipeOptions = {}): Promise<RecipeRunResult> {
  return runRecipe(await loadRecipe(filePath), options);
}

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml, YAMLParseError } from 'yaml';

import { RecipeError } from '../core/errors.js';
import type { VoiceKey } from '../core/score.js';
import type { WindowBoundary } from '../model/build.js';
import type { ParserMode } from '../parser/parse-context.js';

/** Validated recipe. Every path is resolved against the recipe's directory. */
export interface Recipe {
  filePath: string;
  scores: string[];
  voices: string[];
  instrument?: string;
  order: number;
  boundary: WindowBoundary;
  steps: number;
  seed?: number;
  tempo?: number;
  velocity: number;
  instruments?: string | string[];
  parseMode: ParserMode;
  voiceKey: VoiceKey;
  table: {
    load?: string;
    save?: string;
  };
  output: string;
}

const DEFAULT_ORDER = 1;
const DEFAULT_STEPS = 50;
const DEFAULT_VELOCITY = 127;

/** Read and validate a YAML recipe file. */
export async function loadRecipe(filePath: string): Promise<Recipe> {
  const text = await readFile(filePath, 'utf8');
  return parseRecipe(text, filePath);
}

/** Validate recipe YAML. `filePath` anchors relative paths and error messages. */
export function parseRecipe(text: string, filePath: string): Recipe {
  let input: unknown;
  try {
    input = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new RecipeError(filePath, `invalid YAML (${error.message})`);
    }
    throw error;
  }

  if (!isRecord(input)) {
    throw new RecipeError(filePath, 'recipe must be a YAML mapping');
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const resolve = (target: string): string => path.resolve(baseDir, target);

  const scores = readStringList(filePath, input, 'scores');
  if (!scores || scores.length === 0) {
    throw new RecipeError(filePath, "'scores' must list at least one score file");
  }
  const voices = readStringList(filePath, input, 'voices');
  if (!voices || voices.length === 0) {
    throw new RecipeError(filePath, "'voices' must list at least one voice");
  }

  const order = readInteger(filePath, input, 'order', 1) ?? DEFAULT_ORDER;
  const steps = readInteger(filePath, input, 'steps', 0) ?? DEFAULT_STEPS;
  const velocity = readInteger(filePath, input, 'velocity', 0) ?? DEFAULT_VELOCITY;
  if (velocity > 127) {
    throw new RecipeError(filePath, "'velocity' must be at most 127");
  }

  const tempo = readNumber(filePath, input, 'tempo');
  if (tempo !== undefined && tempo <= 0) {
    throw new RecipeError(filePath, "'tempo' must be positive");
  }

  const table = readTable(filePath, input.table);
  const recipe: Recipe = {
    filePath,
    scores: scores.map(resolve),
    voices,
    order,
    boundary: readChoice(filePath, input, 'boundary', ['wrap', 'truncate']) ?? 'wrap',
    steps,
    velocity,
    parseMode: readChoice(filePath, input, 'parse_mode', ['strict', 'lenient']) ?? 'lenient',
    voiceKey: readChoice(filePath, input, 'voice_key', ['staff', 'voice']) ?? 'staff',
    table: {
      load: table.load === undefined ? undefined : resolve(table.load),
      save: table.save === undefined ? undefined : resolve(table.save)
    },
    output: resolve(readRequiredString(filePath, input, 'output'))
  };

  const instrument = readOptionalString(filePath, input, 'instrument');
  if (instrument !== undefined) {
    recipe.instrument = instrument;
  }
  const seed = readInteger(filePath, input, 'seed', 0);
  if (seed !== undefined) {
    recipe.seed = seed;
  }
  if (tempo !== undefined) {
    recipe.tempo = tempo;
  }

  const instruments = input.instruments;
  if (typeof instruments === 'string') {
    recipe.instruments = instruments;
  } else if (instruments !== undefined && instruments !== null) {
    const list = readStringList(filePath, input, 'instruments');
    if (list) {
      recipe.instruments = list;
    }
  }

  return recipe;
}

function readTable(filePath: string, value: unknown): { load?: string; save?: string } {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new RecipeError(filePath, "'table' must be a mapping with optional 'load' and 'save'");
  }
  return {
    load: readOptionalString(filePath, value, 'load', 'table.load'),
    save: readOptionalString(filePath, value, 'save', 'table.save')
  };
}

function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new RecipeError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

function readOptionalString(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  label: string = key
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new RecipeError(filePath, `'${label}' must be a non-empty string`);
  }
  return value;
}

/** A list of strings; numbers are accepted and turned into their decimal form (`1` → `'1'`). */
function readStringList(filePath: string, obj: Record<string, unknown>, key: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new RecipeError(filePath, `'${key}' must be a list`);
  }

  return value.map((item: unknown) => {
    if (typeof item === 'string' && item.trim() !== '') {
      return item;
    }
    if (typeof item === 'number' && Number.isFinite(item)) {
      return String(item);
    }
    throw new RecipeError(filePath, `'${key}' entries must be strings or numbers`);
  });
}

function readNumber(filePath: string, obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RecipeError(filePath, `'${key}' must be a finite number`);
  }
  return value;
}

function readInteger(filePath: string, obj: Record<string, unknown>, key: string, minimum: number): number | undefined {
  const value = readNumber(filePath, obj, key);
  if (value !== undefined && (!Number.isInteger(value) || value < minimum)) {
    throw new RecipeError(filePath, `'${key}' must be an integer >= ${minimum}`);
  }
  return value;
}

function readChoice<T extends string>(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  choices: readonly T[]
): T | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new RecipeError(filePath, `'${key}' must be one of ${choices.map((choice) => `'${choice}'`).join(', ')}`);
  }
  return match;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

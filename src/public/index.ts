export * from './api.js';

export * from '../core/diagnostics.js';
export * from '../core/errors.js';
export * from '../core/event.js';
export * from '../core/note.js';
export * from '../core/score.js';

export { decodeNote, encodeNote } from '../codec/note-codec.js';
export { decodeEvent, encodeEvent, NOTE_SEPARATOR, TIMING_SEPARATOR } from '../codec/event-codec.js';
export { createMemoizedEventEncoder, memoizeByIdentity } from '../codec/memo.js';

export * from '../model/keys.js';
export * from '../model/transition-table.js';
export * from '../model/build.js';
export * from '../model/aggregate.js';
export * from '../model/compose.js';
export * from '../model/random.js';
export * from '../model/table-csv.js';

export { compositionToMidi, writeCompositionMidi, type MidiRenderOptions } from '../midi/emit.js';
export { resolveInstrument, type InstrumentSound } from '../midi/gm-programs.js';

export { loadRecipe, parseRecipe, type Recipe } from '../config/recipe.js';
export { runRecipe, runRecipeFile, type RecipeRunResult, type RunRecipeOptions } from '../pipeline/run-recipe.js';

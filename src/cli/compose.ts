#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { formatDiagnostic } from '../core/diagnostics.js';
import { IngestionError } from '../core/errors.js';
import { runRecipeFile } from '../pipeline/run-recipe.js';

const USAGE = 'Usage: score-markov <recipe.yaml>';

/** Output sinks, swapped out in tests. */
export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

/** Run one recipe and return the process exit code. */
export async function main(args: readonly string[], io: CliIo = consoleIo): Promise<number> {
  const [recipePath, ...rest] = args;
  if (!recipePath || rest.length > 0 || recipePath === '--help' || recipePath === '-h') {
    io.err(USAGE);
    return recipePath === '--help' || recipePath === '-h' ? 0 : 2;
  }

  try {
    const result = await runRecipeFile(recipePath);
    for (const diagnostic of result.diagnostics) {
      io.err(formatDiagnostic(diagnostic));
    }
    io.out(
      `Wrote ${result.composition.length} step(s) to ${result.outputPath} ` +
        `(${result.table.states.length} state(s), order ${result.table.order}, ${result.tempo} BPM).`
    );
    return 0;
  } catch (error) {
    if (error instanceof IngestionError) {
      for (const diagnostic of error.diagnostics) {
        io.err(formatDiagnostic(diagnostic));
      }
    }
    io.err(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && existsSync(script) && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}

import type { Diagnostic } from './diagnostics.js';

/** Malformed note, event, or table text. The offending input is kept for reporting. */
export class FormatError extends Error {
  readonly input?: string;

  constructor(message: string, input?: string) {
    super(input === undefined ? message : `${message}: '${input}'`);
    this.name = 'FormatError';
    this.input = input;
  }
}

/** Invalid caller configuration (order, voice set, instrument counts, ...). */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A requested voice is not present in any supplied score. */
export class MissingVoiceError extends Error {
  readonly voice: string;

  constructor(voice: string, scoreCount: number) {
    super(`Voice '${voice}' not found in any of the ${scoreCount} supplied score(s).`);
    this.name = 'MissingVoiceError';
    this.voice = voice;
  }
}

/** Malformed or invalid YAML recipe. */
export class RecipeError extends ConfigError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Recipe error in ${filePath}: ${message}`);
    this.name = 'RecipeError';
    this.filePath = filePath;
  }
}

/** A score could not be ingested; the parser diagnostics explain why. */
export class IngestionError extends Error {
  readonly filePath: string;
  readonly diagnostics: readonly Diagnostic[];

  constructor(filePath: string, diagnostics: readonly Diagnostic[]) {
    const first = diagnostics.find((diagnostic) => diagnostic.severity === 'error');
    super(`Could not ingest ${filePath}${first ? `: ${first.code}: ${first.message}` : ''}`);
    this.name = 'IngestionError';
    this.filePath = filePath;
    this.diagnostics = diagnostics;
  }
}

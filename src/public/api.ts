import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { Diagnostic } from '../core/diagnostics.js';
import type { IngestedScore, VoiceKey } from '../core/score.js';
import { extractMusicXmlFromMxl } from '../parser/mxl.js';
import { parseMusicXmlScore, parseMusicXmlScoreWith } from '../parser/parse.js';
import { createParseContext, mergeDiagnostics } from '../parser/parse-context.js';

/** Options shared by every score entry point. */
export interface ParseOptions {
  sourceName?: string;
  mode?: 'strict' | 'lenient';
  voiceKey?: VoiceKey;
}

/** Diagnostics-first parse envelope. */
export interface ParseResult {
  score?: IngestedScore;
  diagnostics: Diagnostic[];
}

/** Text or bytes; `auto` detects a ZIP (`.mxl`) payload by its signature. */
export interface ParseAsyncInput {
  data: string | Uint8Array;
  format?: 'auto' | 'xml' | 'mxl';
}

/** Parse MusicXML text into per-instrument event streams. */
export function parseScore(xmlText: string, options: ParseOptions = {}): ParseResult {
  return parseMusicXmlScore(xmlText, options);
}

/** Parse MusicXML text or bytes, including compressed `.mxl` archives. */
export async function parseScoreAsync(input: ParseAsyncInput, options: ParseOptions = {}): Promise<ParseResult> {
  const format = input.format ?? 'auto';
  if (format === 'mxl' || (format === 'auto' && looksLikeZip(input.data))) {
    return parseMxl(input.data, options);
  }

  const xmlText = typeof input.data === 'string' ? input.data : new TextDecoder().decode(input.data);
  return parseScore(xmlText, options);
}

/** Read a `.musicxml`, `.xml` or `.mxl` file. The file name becomes the default source name. */
export async function parseScoreFile(filePath: string, options: ParseOptions = {}): Promise<ParseResult> {
  const data = new Uint8Array(await readFile(filePath));
  const format = path.extname(filePath).toLowerCase() === '.mxl' ? 'mxl' : 'auto';
  return parseScoreAsync({ data, format }, { ...options, sourceName: options.sourceName ?? path.basename(filePath) });
}

function parseMxl(data: string | Uint8Array, options: ParseOptions): ParseResult {
  const ctx = createParseContext(options.mode ?? 'lenient', options.voiceKey ?? 'staff', options.sourceName);
  if (typeof data === 'string') {
    mergeDiagnostics(ctx, [
      { code: 'MXL_INVALID_ARCHIVE', severity: 'error', message: 'MXL input must be binary ZIP data, not text.' }
    ]);
    return { diagnostics: ctx.diagnostics };
  }

  const extraction = extractMusicXmlFromMxl(data);
  mergeDiagnostics(ctx, extraction.diagnostics);
  if (extraction.xmlText === undefined || ctx.failed) {
    return { diagnostics: ctx.diagnostics };
  }
  return parseMusicXmlScoreWith(extraction.xmlText, ctx);
}

function looksLikeZip(data: string | Uint8Array): boolean {
  return typeof data !== 'string' && data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b;
}

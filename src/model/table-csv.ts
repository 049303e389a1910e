import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { FormatError } from '../core/errors.js';
import { StateKey, StepKey } from './keys.js';
import { TransitionTable } from './transition-table.js';

/** Accepted distance from 1 for persisted (already normalized) rows. */
const PERSISTED_ROW_TOLERANCE = 1e-6;

/**
 * Serialize a table as CSV: a header row with an empty corner cell followed by
 * the successor labels, then one row per state label. Probabilities use the
 * shortest decimal that round-trips, so reading restores them exactly.
 */
export function serializeTransitionTable(table: TransitionTable): string {
  const lines: string[] = [['', ...table.successors.map((successor) => successor.label)].map(quoteField).join(',')];

  for (const state of table.states) {
    const cells = table.successors.map((successor) => String(table.probability(state, successor)));
    lines.push([quoteField(state.label), ...cells].join(','));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Parse CSV produced by `serializeTransitionTable` (or any writer using the
 * same row/column layout). Throws `FormatError` on malformed labels, shapes,
 * or probabilities. All-zero rows receive the uniform recurrent fallback.
 */
export function parseTransitionTable(text: string): TransitionTable {
  const records = parseCsv(text);
  const header = records[0];
  if (!header || header.length < 2) {
    throw new FormatError('Transition table CSV needs a header with at least one successor column');
  }

  const successors = header.slice(1).map((label) => StepKey.parse(label));
  assertUniqueKeys(successors, 'successor');

  const states: StateKey[] = [];
  const probabilities = new Map<string, Map<string, number>>();

  for (let index = 1; index < records.length; index += 1) {
    const record = records[index];
    if (!record) {
      continue;
    }
    const [label, ...cells] = record;
    if (label === undefined || cells.length !== successors.length) {
      throw new FormatError(`Row ${index + 1} has ${cells.length} cell(s); expected ${successors.length}`);
    }

    const state = StateKey.parse(label);
    const row = new Map<string, number>();
    let total = 0;
    cells.forEach((cell, column) => {
      const successor = successors[column];
      const probability = Number(cell);
      if (!successor || cell.trim().length === 0 || !Number.isFinite(probability) || probability < 0) {
        throw new FormatError(`Invalid probability in row ${index + 1}`, cell);
      }
      row.set(successor.id, probability);
      total += probability;
    });

    if (total === 0) {
      // Recurrent fallback, as applied when building.
      for (const successor of successors) {
        row.set(successor.id, 1 / successors.length);
      }
    } else if (Math.abs(total - 1) > PERSISTED_ROW_TOLERANCE) {
      throw new FormatError(`Row ${index + 1} sums to ${total}, expected 1`, label);
    }

    states.push(state);
    probabilities.set(state.id, row);
  }

  if (states.length === 0) {
    throw new FormatError('Transition table CSV contains no state rows');
  }
  assertUniqueKeys(states, 'state');

  // Stored rows are used verbatim; dividing by their sum again would perturb the last bits.
  return new TransitionTable(states, successors, probabilities);
}

/** Write the CSV form of `table` to `filePath`, creating parent directories. */
export async function saveTransitionTable(table: TransitionTable, filePath: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeTransitionTable(table), 'utf8');
}

/** Read and parse a persisted transition table. */
export async function loadTransitionTable(filePath: string): Promise<TransitionTable> {
  const text = await readFile(filePath, 'utf8');
  return parseTransitionTable(text);
}

function assertUniqueKeys(keys: readonly { id: string; label: string }[], kind: string): void {
  const seen = new Set<string>();
  for (const key of keys) {
    if (seen.has(key.id)) {
      throw new FormatError(`Duplicate ${kind} label`, key.label);
    }
    seen.add(key.id);
  }
}

/** Quote a field when it holds a delimiter, quote, or line break. */
function quoteField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/** Minimal RFC 4180 reader: quoted fields, doubled quotes, LF or CRLF rows. */
function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let index = 0;

  while (index < text.length) {
    const char = text.charAt(index);

    if (quoted) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
      if (char === '\r' && text[index + 1] === '\n') {
        index += 1;
      }
    } else {
      field += char;
    }
    index += 1;
  }

  if (quoted) {
    throw new FormatError('Unterminated quoted field in transition table CSV');
  }
  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter((entry) => !(entry.length === 1 && entry[0] === ''));
}

import { readFileSync } from 'node:fs';

/** General MIDI sound selected by an instrument tag. */
export interface InstrumentSound {
  /** Program number 0..127; 0 for percussion, which plays on the drum channel instead. */
  program: number;
  percussion: boolean;
}

interface GeneralMidiTable {
  programs: string[];
  aliases: Record<string, number>;
  percussion: string[];
}

const TABLE_URL = new URL('../../data/gm-programs.json', import.meta.url);

let lookup: Map<string, InstrumentSound> | undefined;

/**
 * Resolve an instrument tag such as `Violin`, `acoustic-grand-piano` or
 * `drums`. Case, spaces and punctuation are ignored.
 */
export function resolveInstrument(tag: string): InstrumentSound | undefined {
  lookup ??= buildLookup(loadTable());
  return lookup.get(normalizeTag(tag));
}

export function normalizeTag(tag: string): string {
  return tag.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function buildLookup(table: GeneralMidiTable): Map<string, InstrumentSound> {
  const sounds = new Map<string, InstrumentSound>();
  table.programs.forEach((name, program) => {
    sounds.set(normalizeTag(name), { program, percussion: false });
  });
  for (const [alias, program] of Object.entries(table.aliases)) {
    sounds.set(normalizeTag(alias), { program, percussion: false });
  }
  for (const name of table.percussion) {
    sounds.set(normalizeTag(name), { program: 0, percussion: true });
  }
  return sounds;
}

function loadTable(): GeneralMidiTable {
  const parsed: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error('gm-programs.json must contain an object.');
  }

  const { programs, aliases, percussion } = parsed;
  if (!isStringArray(programs) || programs.length !== 128) {
    throw new Error('gm-programs.json "programs" must list 128 names.');
  }
  if (!isStringArray(percussion)) {
    throw new Error('gm-programs.json "percussion" must be a list of names.');
  }
  if (!isRecord(aliases)) {
    throw new Error('gm-programs.json "aliases" must be an object.');
  }

  const programAliases: Record<string, number> = {};
  for (const [alias, program] of Object.entries(aliases)) {
    if (typeof program !== 'number' || !Number.isInteger(program) || program < 0 || program > 127) {
      throw new Error(`gm-programs.json alias "${alias}" must map to a program number 0..127.`);
    }
    programAliases[alias] = program;
  }

  return { programs, aliases: programAliases, percussion };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

import type { Diagnostic } from '../core/diagnostics.js';
import type { Event } from '../core/event.js';
import {
  DEFAULT_RESOLUTION,
  DEFAULT_TEMPO,
  type IngestedScore,
  type InstrumentStreams,
  type VoiceKey
} from '../core/score.js';
import { applyAttributes, createPartAttributes } from './parse-attributes.js';
import { addDiagnostic, createParseContext, type ParseContext, type ParserMode } from './parse-context.js';
import { mergeChordNote, parseNote } from './parse-note.js';
import { parsePartNames } from './parse-part-list.js';
import { normalizeTimewiseToPartwise } from './parse-timewise.js';
import { parseXmlToAst, XmlParseError, type XmlNode } from './xml-ast.js';
import { attribute, childrenOf, firstChild, parseOptionalFloat, parseOptionalInt, textOf } from './xml-utils.js';

export interface ParserOptions {
  sourceName?: string;
  mode?: ParserMode;
  /** Group notes by `<staff>` (default) or by `<voice>`. */
  voiceKey?: VoiceKey;
}

/** Diagnostics-first envelope: `score` is absent when parsing failed (or any error in strict mode). */
export interface ParserResult {
  score?: IngestedScore;
  diagnostics: Diagnostic[];
}

/**
 * Read MusicXML text (`score-partwise` or `score-timewise`) into per-part,
 * per-voice event streams plus the tick resolution and tempo of the score.
 */
export function parseMusicXmlScore(xmlText: string, options: ParserOptions = {}): ParserResult {
  const ctx = createParseContext(options.mode ?? 'lenient', options.voiceKey ?? 'staff', options.sourceName);
  return finish(ctx, readScore(xmlText, ctx));
}

/** Same as `parseMusicXmlScore`, continuing diagnostics already collected for this source. */
export function parseMusicXmlScoreWith(xmlText: string, ctx: ParseContext): ParserResult {
  return finish(ctx, readScore(xmlText, ctx));
}

function finish(ctx: ParseContext, score: IngestedScore | undefined): ParserResult {
  if (!score || (ctx.mode === 'strict' && ctx.failed)) {
    return { diagnostics: ctx.diagnostics };
  }
  return { score, diagnostics: ctx.diagnostics };
}

function readScore(xmlText: string, ctx: ParseContext): IngestedScore | undefined {
  const root = readRoot(xmlText, ctx);
  if (!root) {
    return undefined;
  }

  const partNames = parsePartNames(firstChild(root, 'part-list'), ctx);
  const partNodes = childrenOf(root, 'part');
  if (partNodes.length === 0) {
    addDiagnostic(ctx, 'MISSING_PARTS', 'error', 'Score contains no <part> elements.', root);
    return undefined;
  }

  const resolution = readResolution(root, ctx);
  const instruments = partNodes.map((partNode, index) => readPart(partNode, index, partNames, resolution, ctx));

  return {
    sourceName: ctx.sourceName,
    resolution,
    tempo: readTempo(root, ctx),
    instruments
  };
}

function readRoot(xmlText: string, ctx: ParseContext): XmlNode | undefined {
  let root: XmlNode;
  try {
    root = parseXmlToAst(xmlText, ctx.sourceName);
  } catch (error) {
    if (!(error instanceof XmlParseError)) {
      throw error;
    }
    addDiagnostic(ctx, 'XML_NOT_WELL_FORMED', 'error', error.message, undefined, error.source);
    return undefined;
  }

  if (root.name === 'score-timewise') {
    root = normalizeTimewiseToPartwise(root, ctx);
  }
  if (root.name !== 'score-partwise') {
    addDiagnostic(
      ctx,
      'UNSUPPORTED_ROOT',
      'error',
      `Unsupported root element '${root.name}'; expected score-partwise or score-timewise.`,
      root
    );
    return undefined;
  }
  return root;
}

/** Walk one part's measures in order, tracking attributes and merging chords. */
function readPart(
  partNode: XmlNode,
  index: number,
  partNames: ReadonlyMap<string, string>,
  resolution: number,
  ctx: ParseContext
): InstrumentStreams {
  const id = attribute(partNode, 'id') ?? `P${index + 1}`;
  if (!attribute(partNode, 'id')) {
    addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', `<part> has no id attribute; using '${id}'.`, partNode);
  } else if (partNames.size > 0 && !partNames.has(id)) {
    addDiagnostic(ctx, 'PART_NOT_IN_PART_LIST', 'warning', `Part '${id}' is not declared in <part-list>.`, partNode);
  }

  const attributes = createPartAttributes();
  // Voices whose most recent base note was skipped; their chord members go with it.
  const orphanedVoices = new Set<string>();
  const voices = new Map<string, Event[]>();
  const streamFor = (voice: string): Event[] => {
    const existing = voices.get(voice);
    if (existing) {
      return existing;
    }
    const created: Event[] = [];
    voices.set(voice, created);
    return created;
  };

  for (const measure of childrenOf(partNode, 'measure')) {
    for (const child of measure.children) {
      if (child.name === 'attributes') {
        applyAttributes(child, attributes, ctx);
        if (firstChild(child, 'divisions') && attributes.divisions !== undefined && attributes.divisions !== resolution) {
          addDiagnostic(
            ctx,
            'DIVISIONS_MISMATCH',
            'warning',
            `Part '${id}' uses ${attributes.divisions} division(s) but the score resolution is ${resolution}; durations are kept as written.`,
            child
          );
        }
        if (ctx.voiceKey === 'staff') {
          for (let staff = 1; staff <= attributes.staves; staff += 1) {
            streamFor(String(staff));
          }
        }
        continue;
      }
      if (child.name !== 'note') {
        continue;
      }

      const result = parseNote(child, attributes, ctx);
      if (result.kind === 'skipped') {
        if (!result.chord) {
          orphanedVoices.add(result.voice);
        }
        continue;
      }
      if (result.kind === 'chord' && orphanedVoices.has(result.voice)) {
        addDiagnostic(
          ctx,
          'CHORD_BASE_SKIPPED',
          'warning',
          `<chord/> note belongs to a skipped note in voice '${result.voice}'; skipping it.`,
          child
        );
        continue;
      }

      const stream = streamFor(result.voice);
      if (result.kind === 'event') {
        orphanedVoices.delete(result.voice);
        stream.push(result.event);
        continue;
      }

      const base = stream.at(-1);
      if (!base) {
        addDiagnostic(
          ctx,
          'CHORD_WITHOUT_BASE_NOTE',
          'warning',
          `<chord/> note has no preceding note in voice '${result.voice}'; skipping it.`,
          child
        );
        continue;
      }
      stream[stream.length - 1] = mergeChordNote(base, result.note);
    }
  }

  return { id, name: partNames.get(id) ?? id, voices };
}

/** First `<divisions>` in document order. */
function readResolution(root: XmlNode, ctx: ParseContext): number {
  const node = findFirst(root, (candidate) => candidate.name === 'divisions');
  const divisions = parseOptionalInt(textOf(node));
  if (divisions !== undefined && divisions > 0) {
    return divisions;
  }

  addDiagnostic(
    ctx,
    'MISSING_DIVISIONS',
    'info',
    `No usable <divisions>; assuming ${DEFAULT_RESOLUTION} tick(s) per quarter.`,
    node ?? root
  );
  return DEFAULT_RESOLUTION;
}

/** First `<sound tempo>` in document order. */
function readTempo(root: XmlNode, ctx: ParseContext): number {
  const sound = findFirst(root, (candidate) => candidate.name === 'sound' && attribute(candidate, 'tempo') !== undefined);
  if (!sound) {
    return DEFAULT_TEMPO;
  }

  const tempo = parseOptionalFloat(attribute(sound, 'tempo'));
  if (tempo === undefined || tempo <= 0) {
    addDiagnostic(ctx, 'INVALID_TEMPO', 'warning', `<sound tempo> must be positive; using ${DEFAULT_TEMPO} BPM.`, sound);
    return DEFAULT_TEMPO;
  }
  return tempo;
}

function findFirst(node: XmlNode, predicate: (candidate: XmlNode) => boolean): XmlNode | undefined {
  if (predicate(node)) {
    return node;
  }
  for (const child of node.children) {
    const found = findFirst(child, predicate);
    if (found) {
      return found;
    }
  }
  return undefined;
}

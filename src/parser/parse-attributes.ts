import type { Clef } from '../core/note.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childrenOf, firstChild, parseOptionalInt, textOf } from './xml-utils.js';

/** Clef assumed for a staff before any `<clef>` reaches it. */
export const DEFAULT_CLEF: Clef = Object.freeze({ sign: 'G', line: 2 });

// Reference line implied by a sign when `<line>` is omitted.
const IMPLIED_CLEF_LINES: Readonly<Record<string, number>> = {
  G: 2,
  F: 4,
  C: 3,
  TAB: 5,
  percussion: 3,
  none: 3
};

/** Attribute state carried across the measures of one part. */
export interface PartAttributes {
  divisions?: number;
  staves: number;
  /** Active clef per staff number. */
  clefs: Map<string, Clef>;
}

export function createPartAttributes(): PartAttributes {
  return { staves: 1, clefs: new Map() };
}

/** Apply one `<attributes>` element to the running part state. */
export function applyAttributes(node: XmlNode, state: PartAttributes, ctx: ParseContext): void {
  const divisionsNode = firstChild(node, 'divisions');
  if (divisionsNode) {
    const divisions = parseOptionalInt(textOf(divisionsNode));
    if (divisions === undefined || divisions <= 0) {
      addDiagnostic(ctx, 'INVALID_DIVISIONS', 'warning', '<divisions> must be a positive integer.', divisionsNode);
    } else {
      state.divisions = divisions;
    }
  }

  const stavesNode = firstChild(node, 'staves');
  if (stavesNode) {
    const staves = parseOptionalInt(textOf(stavesNode));
    if (staves === undefined || staves <= 0) {
      addDiagnostic(ctx, 'INVALID_STAVES', 'warning', '<staves> must be a positive integer.', stavesNode);
    } else {
      state.staves = staves;
    }
  }

  for (const clefNode of childrenOf(node, 'clef')) {
    const staff = attribute(clefNode, 'number') ?? '1';
    const clef = parseClef(clefNode, ctx);
    if (clef) {
      state.clefs.set(staff, clef);
    }
  }
}

/** Clef for `staff`, defaulting to treble once per staff with an info diagnostic. */
export function clefForStaff(state: PartAttributes, staff: string, note: XmlNode, ctx: ParseContext): Clef {
  const clef = state.clefs.get(staff);
  if (clef) {
    return clef;
  }

  addDiagnostic(ctx, 'CLEF_DEFAULTED', 'info', `Staff ${staff} has no clef before its first note; assuming G2.`, note);
  state.clefs.set(staff, DEFAULT_CLEF);
  return DEFAULT_CLEF;
}

function parseClef(node: XmlNode, ctx: ParseContext): Clef | undefined {
  const sign = textOf(firstChild(node, 'sign'));
  if (!sign || /[(),|>&+\s]/.test(sign)) {
    addDiagnostic(ctx, 'INVALID_CLEF', 'warning', `<clef> has an unusable sign '${sign ?? ''}'.`, node);
    return undefined;
  }

  const lineNode = firstChild(node, 'line');
  const line = lineNode ? parseOptionalInt(textOf(lineNode)) : impliedLine(sign);
  if (line === undefined) {
    addDiagnostic(ctx, 'INVALID_CLEF', 'warning', `<clef> line for sign '${sign}' is not an integer.`, node);
    return undefined;
  }

  const clef: Clef = { sign, line };
  return Object.freeze(clef);
}

function impliedLine(sign: string): number | undefined {
  return Object.hasOwn(IMPLIED_CLEF_LINES, sign) ? IMPLIED_CLEF_LINES[sign] : undefined;
}

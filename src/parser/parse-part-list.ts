import { addDiagnostic, type ParseContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childrenOf, firstChild, textOf } from './xml-utils.js';

/** Map `<score-part id>` to its `<part-name>`; parts without a name map to their id. */
export function parsePartNames(partList: XmlNode | undefined, ctx: ParseContext): Map<string, string> {
  const names = new Map<string, string>();
  if (!partList) {
    addDiagnostic(ctx, 'MISSING_PART_LIST', 'warning', 'Score has no <part-list>; part ids are used as names.');
    return names;
  }

  for (const scorePart of childrenOf(partList, 'score-part')) {
    const id = attribute(scorePart, 'id');
    if (!id) {
      addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', '<score-part> is missing its id attribute.', scorePart);
      continue;
    }
    if (names.has(id)) {
      addDiagnostic(ctx, 'DUPLICATE_PART_ID', 'warning', `Part id '${id}' is declared more than once.`, scorePart);
      continue;
    }
    names.set(id, textOf(firstChild(scorePart, 'part-name')) ?? id);
  }

  return names;
}

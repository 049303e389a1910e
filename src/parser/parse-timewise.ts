import { addDiagnostic, type ParseContext } from './parse-context.js';
import type { XmlNode } from './xml-ast.js';
import { attribute, childrenOf, firstChild } from './xml-utils.js';

/**
 * Rewrite a `score-timewise` tree (measures containing parts) into the
 * `score-partwise` shape (parts containing measures). A part absent from a
 * measure gets an empty measure so measure counts stay aligned.
 */
export function normalizeTimewiseToPartwise(root: XmlNode, ctx: ParseContext): XmlNode {
  const partList = firstChild(root, 'part-list');
  const measures = childrenOf(root, 'measure');
  const partIds = orderedPartIds(partList, measures, ctx);

  const parts = partIds.map((partId, partIndex): XmlNode => {
    const path = `/score-partwise[1]/part[${partIndex + 1}]`;
    const partMeasures = measures.map((measure, measureIndex): XmlNode => {
      const slice = childrenOf(measure, 'part').find((node) => attribute(node, 'id') === partId);
      return {
        name: 'measure',
        attributes: { ...measure.attributes },
        children: slice?.children ?? [],
        text: '',
        location: slice?.location ?? measure.location,
        path: `${path}/measure[${measureIndex + 1}]`
      };
    });

    return {
      name: 'part',
      attributes: { id: partId },
      children: partMeasures,
      text: '',
      location: partMeasures[0]?.location ?? root.location,
      path
    };
  });

  addDiagnostic(
    ctx,
    'SCORE_TIMEWISE_NORMALIZED',
    'info',
    `Converted score-timewise to score-partwise (${partIds.length} part(s), ${measures.length} measure(s)).`,
    root
  );

  return {
    ...root,
    name: 'score-partwise',
    text: '',
    path: '/score-partwise[1]',
    children: partList ? [partList, ...parts] : parts
  };
}

/** Part ids from `<part-list>` first, then any extra ids met inside measures. */
function orderedPartIds(partList: XmlNode | undefined, measures: XmlNode[], ctx: ParseContext): string[] {
  const ids = new Set<string>();
  const candidates = [
    ...childrenOf(partList, 'score-part'),
    ...measures.flatMap((measure) => childrenOf(measure, 'part'))
  ];

  // <score-part> without an id is reported by the part-list pass.
  for (const node of candidates) {
    const id = attribute(node, 'id');
    if (id) {
      ids.add(id);
    } else if (node.name === 'part') {
      addDiagnostic(ctx, 'MISSING_PART_ID', 'warning', '<measure><part> is missing its id attribute.', node);
    }
  }
  return [...ids];
}

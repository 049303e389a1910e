import { SaxesParser, type SaxesTag } from 'saxes';

/** 1-based line and column of an element's opening tag. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Read-only element tree node. Text is the concatenation of direct text and CDATA. */
export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text: string;
  location: XmlLocation;
  /** Indexed element path such as `/score-partwise[1]/part[2]/measure[5]`. */
  path: string;
}

/** XML well-formedness failure with the position where the parser stopped. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;

  constructor(message: string, source?: XmlLocation) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

interface PendingNode extends XmlNode {
  children: PendingNode[];
  siblingCounts: Map<string, number>;
}

/**
 * Parse XML text into an element tree. Namespace prefixes are dropped from
 * element and attribute names, so `xlink:href` is read as `href`.
 */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  const parser = new SaxesParser({ xmlns: true, position: true, fileName: sourceName });
  const open: PendingNode[] = [];
  const tagStarts: XmlLocation[] = [];
  let root: PendingNode | undefined;
  let failure: XmlParseError | undefined;

  const here = (): XmlLocation => ({ line: parser.line, column: parser.column + 1 });
  const appendText = (text: string): void => {
    const current = open.at(-1);
    if (current) {
      current.text += text;
    }
  };

  parser.on('error', (error) => {
    failure ??= new XmlParseError(error.message, here());
  });
  parser.on('opentagstart', () => {
    tagStarts.push(here());
  });
  parser.on('opentag', (tag) => {
    const parent = open.at(-1);
    const name = localName('local' in tag ? tag.local : undefined, tag.name);
    const node: PendingNode = {
      name,
      attributes: readAttributes(tag),
      children: [],
      text: '',
      location: tagStarts.pop() ?? here(),
      path: childPath(parent, name),
      siblingCounts: new Map()
    };

    if (parent) {
      parent.children.push(node);
    } else {
      root ??= node;
    }
    open.push(node);
  });
  parser.on('text', appendText);
  parser.on('cdata', appendText);
  parser.on('closetag', () => {
    open.pop();
  });

  parser.write(xmlText).close();

  if (failure) {
    throw failure;
  }
  if (!root) {
    throw new XmlParseError('Document has no root element');
  }
  return seal(root);
}

function localName(local: string | undefined, qualified: string): string {
  if (local) {
    return local;
  }
  const colon = qualified.indexOf(':');
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

function readAttributes(tag: SaxesTag): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const [key, entry] of Object.entries(tag.attributes)) {
    if (typeof entry === 'string') {
      attributes[localName(undefined, key)] = entry;
    } else {
      attributes[localName('local' in entry ? entry.local : undefined, entry.name)] = entry.value;
    }
  }
  return attributes;
}

function childPath(parent: PendingNode | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }
  const index = (parent.siblingCounts.get(name) ?? 0) + 1;
  parent.siblingCounts.set(name, index);
  return `${parent.path}/${name}[${index}]`;
}

function seal(node: PendingNode): XmlNode {
  return {
    name: node.name,
    attributes: node.attributes,
    children: node.children.map(seal),
    text: node.text,
    location: node.location,
    path: node.path
  };
}

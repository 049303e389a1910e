import type { XmlNode } from './xml-ast.js';

export function firstChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return node?.children.find((child) => child.name === name);
}

export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  return node ? node.children.filter((child) => child.name === name) : [];
}

/** Follow a `/`-separated chain of first children, e.g. `pitch/step`. */
export function descend(node: XmlNode | undefined, path: string): XmlNode | undefined {
  return path.split('/').reduce<XmlNode | undefined>((current, name) => firstChild(current, name), node);
}

/** Trimmed text content; `undefined` when the node is missing or blank. */
export function textOf(node: XmlNode | undefined): string | undefined {
  const text = node?.text.trim();
  return text ? text : undefined;
}

export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** Strict base-10 integer: `undefined` unless the whole string is an integer. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

export function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

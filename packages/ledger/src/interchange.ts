/**
 * Element tree for the hierarchical interchange (OFX) form of the ledger.
 * A node carries either a text value or child elements, never both.
 */
export interface InterchangeNode {
  tag: string;
  value?: string;
  children?: InterchangeNode[];
}

export function element(tag: string, value: string): InterchangeNode {
  return { tag, value };
}

export function aggregate(tag: string, children: InterchangeNode[]): InterchangeNode {
  return { tag, children };
}

/** First direct child with the given tag. */
export function childOf(node: InterchangeNode, tag: string): InterchangeNode | undefined {
  return node.children?.find((child) => child.tag === tag);
}

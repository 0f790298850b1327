/**
 * Interchange (OFX 2.0 XML) document renderer.
 *
 * All statements given go into one document, one STMTTRNRS each.
 */

import { aggregate, type InterchangeNode, type Statement } from '@ledgerjob/ledger';

export const OFX_PREAMBLE = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<?OFX OFXHEADER="200" SECURITY="NONE" OLDFILEUID="NONE" NEWFILEUID="NONE" VERSION="200"?>',
].join('\n');

/**
 * Escape special characters for OFX (XML-like)
 */
export function escapeOfx(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Render a node tree, one tag per line. Leaf elements keep value and closing tag
 * on the opening tag's line.
 */
export function renderNode(node: InterchangeNode): string {
  if (node.children === undefined) {
    return `<${node.tag}>${escapeOfx(node.value ?? '')}</${node.tag}>`;
  }
  const inner = node.children.map((child) => renderNode(child));
  return [`<${node.tag}>`, ...inner, `</${node.tag}>`].join('\n');
}

export function buildOfxTree(statements: readonly Statement[]): InterchangeNode {
  return aggregate('OFX', [
    aggregate(
      'BANKMSGSRSV1',
      statements.map((statement) => statement.toInterchangeRecord())
    ),
  ]);
}

export function renderOfxDocument(statements: readonly Statement[]): string {
  return `${OFX_PREAMBLE}\n${renderNode(buildOfxTree(statements))}\n`;
}

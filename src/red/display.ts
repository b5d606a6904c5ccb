// Debug rendering of cursors: `KIND@start..end` for nodes, the same plus the
// quoted text for tokens. Recursive output has one line per element.

import type { Resolver } from '../interning/interner.js';
import { formatKind } from '../syntax/kind.js';
import type { SyntaxElement } from './element.js';
import type { SyntaxNode } from './syntax_node.js';

const INDENT = '  ';

export function debugLine<D, R extends Resolver | undefined>(
  element: SyntaxElement<D, R>,
  resolver: Resolver | undefined
): string {
  const head = `${formatKind(element.kind(), element.tree.syntax)}@${element.textRange().toString()}`;
  const token = element.asToken();
  if (token === undefined || resolver === undefined) return head;
  return `${head} ${JSON.stringify(token.resolveText(resolver))}`;
}

export function debugTree<D, R extends Resolver | undefined>(
  node: SyntaxNode<D, R>,
  resolver: Resolver | undefined
): string {
  let out = '';
  let depth = 0;
  for (const event of node.preorderWithTokens()) {
    if (event.type === 'enter') {
      out += `${INDENT.repeat(depth)}${debugLine(event.item, resolver)}\n`;
      depth++;
    } else {
      depth--;
    }
  }
  return out;
}

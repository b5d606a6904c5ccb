import type { Resolver } from '../interning/interner.js';
import type { SyntaxNode } from './syntax_node.js';
import type { SyntaxToken } from './syntax_token.js';

/** A node or token cursor. Narrow with `asNode()` / `asToken()` or `instanceof`. */
export type SyntaxElement<D = unknown, R extends Resolver | undefined = undefined> =
  | SyntaxNode<D, R>
  | SyntaxToken<D, R>;

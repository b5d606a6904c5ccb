import type { GreenNode, GreenToken } from '../green/element.js';
import type { NodeCache } from '../green/node_cache.js';
import type { Interner, Resolver, TokenKey } from '../interning/interner.js';
import type { RawSyntaxKind } from '../syntax/kind.js';
import { TextRange } from '../text/text_range.js';
import type { PositionKey } from './data_table.js';
import { debugLine } from './display.js';
import type { SyntaxElement } from './element.js';
import { comparePaths } from './position.js';
import { Sequence } from './sequence.js';
import { rebuildAncestors } from './rebuild.js';
import type { SyntaxNode } from './syntax_node.js';
import { Direction } from './traversal.js';
import type { TreeContext } from './tree.js';

/**
 * Cursor over a green token. Tokens always have a parent node and carry no
 * attached data.
 */
export class SyntaxToken<D = unknown, R extends Resolver | undefined = undefined> {
  private path: readonly number[] | undefined;

  constructor(
    private readonly greenToken: GreenToken,
    private readonly parentNode: SyntaxNode<D, R>,
    private readonly indexInParent: number,
    private readonly offset: number,
    readonly tree: TreeContext<D, R>
  ) {}

  green(): GreenToken {
    return this.greenToken;
  }

  kind(): RawSyntaxKind {
    return this.greenToken.kind;
  }

  textKey(): TokenKey {
    return this.greenToken.textKey;
  }

  textRange(): TextRange {
    return TextRange.at(this.offset, this.greenToken.textLength);
  }

  index(): number {
    return this.indexInParent;
  }

  parent(): SyntaxNode<D, R> {
    return this.parentNode;
  }

  /** The parent node, then its ancestors up to the root. */
  ancestors(): Sequence<SyntaxNode<D, R>> {
    return this.parentNode.ancestors();
  }

  asNode(): SyntaxNode<D, R> | undefined {
    return undefined;
  }

  asToken(): SyntaxToken<D, R> | undefined {
    return this;
  }

  positionPath(): readonly number[] {
    if (this.path === undefined) {
      this.path = [...this.parentNode.positionPath(), this.indexInParent];
    }
    return this.path;
  }

  positionKey(): PositionKey {
    return this.positionPath().join('.');
  }

  equals(other: SyntaxElement<D, R>): boolean {
    if (other === this) return true;
    return (
      other instanceof SyntaxToken &&
      other.tree === this.tree &&
      other.greenToken === this.greenToken &&
      other.offset === this.offset &&
      comparePaths(other.positionPath(), this.positionPath()) === 0
    );
  }

  compare(other: SyntaxElement<D, R>): number {
    return comparePaths(this.positionPath(), other.positionPath());
  }

  nextSiblingOrToken(): SyntaxElement<D, R> | undefined {
    return this.parentNode.childAt(this.indexInParent + 1);
  }

  prevSiblingOrToken(): SyntaxElement<D, R> | undefined {
    if (this.indexInParent === 0) return undefined;
    return this.parentNode.childAt(this.indexInParent - 1);
  }

  /** This token followed by its sibling elements in `direction`. */
  siblingsWithTokens(direction: Direction): Sequence<SyntaxElement<D, R>> {
    const start: SyntaxElement<D, R> = this;
    return new Sequence(function* () {
      for (let element: SyntaxElement<D, R> | undefined = start; element !== undefined; ) {
        yield element;
        element = direction === Direction.Next ? element.nextSiblingOrToken() : element.prevSiblingOrToken();
      }
    });
  }

  /** The next token in document order, skipping nodes without tokens. */
  nextToken(): SyntaxToken<D, R> | undefined {
    let current: SyntaxElement<D, R> = this;
    for (;;) {
      let sibling: SyntaxElement<D, R> | undefined = current.nextSiblingOrToken();
      while (sibling === undefined) {
        const parent: SyntaxNode<D, R> | undefined = current.parent();
        if (parent === undefined) return undefined;
        current = parent;
        sibling = current.nextSiblingOrToken();
      }
      if (sibling instanceof SyntaxToken) return sibling;
      const first: SyntaxToken<D, R> | undefined = sibling.firstToken();
      if (first !== undefined) return first;
      current = sibling;
    }
  }

  /** The previous token in document order, skipping nodes without tokens. */
  prevToken(): SyntaxToken<D, R> | undefined {
    let current: SyntaxElement<D, R> = this;
    for (;;) {
      let sibling: SyntaxElement<D, R> | undefined = current.prevSiblingOrToken();
      while (sibling === undefined) {
        const parent: SyntaxNode<D, R> | undefined = current.parent();
        if (parent === undefined) return undefined;
        current = parent;
        sibling = current.prevSiblingOrToken();
      }
      if (sibling instanceof SyntaxToken) return sibling;
      const last: SyntaxToken<D, R> | undefined = sibling.lastToken();
      if (last !== undefined) return last;
      current = sibling;
    }
  }

  resolveText(resolver: Resolver): string {
    return this.greenToken.text(resolver);
  }

  text<Q extends Resolver>(this: SyntaxToken<D, Q>): string {
    return this.resolveText(this.tree.resolver);
  }

  resolver<Q extends Resolver>(this: SyntaxToken<D, Q>): Q {
    return this.tree.resolver;
  }

  /** A new green root with this token replaced by `replacement`. */
  replaceWith(replacement: GreenToken, cache?: NodeCache<Interner>): GreenNode {
    return rebuildAncestors(this.parentNode, this.indexInParent, replacement, cache);
  }

  debug(resolver: Resolver | undefined): string {
    return debugLine(this, resolver);
  }

  toDebugString(): string {
    return this.debug(this.tree.resolver);
  }

  toString(): string {
    const resolver = this.tree.resolver;
    return resolver !== undefined ? this.resolveText(resolver) : debugLine(this, undefined);
  }
}

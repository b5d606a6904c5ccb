/**
 * @module syntax-node
 *
 * 红树节点游标。
 *
 * 游标包装一个绿节点，并记录父游标、在父节点中的下标以及绝对偏移量。
 * 游标按需创建、用后即弃；相同位置的两个游标通过 `equals` 比较相等，
 * 并共享同一个数据表条目。
 *
 * `R` 是根节点持有的 Resolver 类型：只有 `R` 为 Resolver 时才能调用
 * `text()` / `resolver()`，否则需要显式传入 Resolver。
 */

import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import { GreenNode } from '../green/element.js';
import type { NodeCache } from '../green/node_cache.js';
import type { Interner, Resolver } from '../interning/interner.js';
import type { RawSyntaxKind } from '../syntax/kind.js';
import { TextRange } from '../text/text_range.js';
import type { DataHandle, PositionKey, TrySetResult } from './data_table.js';
import { debugLine, debugTree } from './display.js';
import type { SyntaxElement } from './element.js';
import { comparePaths } from './position.js';
import { rebuildAncestors } from './rebuild.js';
import { Sequence } from './sequence.js';
import { SyntaxText } from './syntax_text.js';
import { SyntaxToken } from './syntax_token.js';
import { Direction, enter, leave, type TokenAtOffset, type WalkEvent } from './traversal.js';
import { TreeContext, type RootOptions } from './tree.js';

const NO_TOKEN = { type: 'none' } as const;

export class SyntaxNode<D = unknown, R extends Resolver | undefined = undefined> {
  private path: readonly number[] | undefined;

  /**
   * Cursors are created by `newRoot` / `newRootWithResolver` and by
   * navigating from an existing cursor.
   */
  constructor(
    private readonly greenNode: GreenNode,
    private readonly parentNode: SyntaxNode<D, R> | undefined,
    private readonly indexInParent: number,
    private readonly offset: number,
    readonly tree: TreeContext<D, R>
  ) {}

  /** A root whose text queries take an explicit resolver. */
  static newRoot<D = unknown>(green: GreenNode, options: RootOptions = {}): SyntaxNode<D, undefined> {
    return new SyntaxNode<D, undefined>(
      green,
      undefined,
      0,
      0,
      new TreeContext<D, undefined>(green, undefined, options.syntax)
    );
  }

  /** A root that owns `resolver`, enabling `text()` on every cursor of the tree. */
  static newRootWithResolver<D = unknown, R extends Resolver = Resolver>(
    green: GreenNode,
    resolver: R,
    options: RootOptions = {}
  ): SyntaxNode<D, R> {
    return new SyntaxNode<D, R>(green, undefined, 0, 0, new TreeContext<D, R>(green, resolver, options.syntax));
  }

  // ---------------------------------------------------------------------------
  // Core queries
  // ---------------------------------------------------------------------------

  green(): GreenNode {
    return this.greenNode;
  }

  kind(): RawSyntaxKind {
    return this.greenNode.kind;
  }

  textRange(): TextRange {
    return TextRange.at(this.offset, this.greenNode.textLength);
  }

  /** Index of this node among its parent's children (tokens included). */
  index(): number {
    return this.indexInParent;
  }

  parent(): SyntaxNode<D, R> | undefined {
    return this.parentNode;
  }

  isRoot(): boolean {
    return this.parentNode === undefined;
  }

  root(): SyntaxNode<D, R> {
    let node: SyntaxNode<D, R> = this;
    while (node.parentNode !== undefined) node = node.parentNode;
    return node;
  }

  /** This node, then its parent, up to the root. */
  ancestors(): Sequence<SyntaxNode<D, R>> {
    const start: SyntaxNode<D, R> = this;
    return new Sequence(function* () {
      for (let node: SyntaxNode<D, R> | undefined = start; node !== undefined; node = node.parent()) {
        yield node;
      }
    });
  }

  asNode(): SyntaxNode<D, R> | undefined {
    return this;
  }

  asToken(): SyntaxToken<D, R> | undefined {
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Position identity
  // ---------------------------------------------------------------------------

  /** Child indices from the root down to this node. */
  positionPath(): readonly number[] {
    if (this.path === undefined) {
      this.path = this.parentNode ? [...this.parentNode.positionPath(), this.indexInParent] : [];
    }
    return this.path;
  }

  /**
   * Stable identity of this position within its tree. Equal for every
   * cursor denoting the same place, however it was obtained.
   */
  positionKey(): PositionKey {
    return this.positionPath().join('.');
  }

  equals(other: SyntaxElement<D, R>): boolean {
    if (other === this) return true;
    return (
      other instanceof SyntaxNode &&
      other.tree === this.tree &&
      other.greenNode === this.greenNode &&
      other.offset === this.offset &&
      comparePaths(other.positionPath(), this.positionPath()) === 0
    );
  }

  /** Document (preorder) order; ancestors sort before their descendants. */
  compare(other: SyntaxElement<D, R>): number {
    return comparePaths(this.positionPath(), other.positionPath());
  }

  // ---------------------------------------------------------------------------
  // Children
  // ---------------------------------------------------------------------------

  /** The child element at `index`, with its absolute offset. */
  childAt(index: number): SyntaxElement<D, R> | undefined {
    const child = this.greenNode.child(index);
    if (child === undefined) return undefined;
    const offset = this.offset + this.greenNode.childOffset(index);
    return child instanceof GreenNode
      ? new SyntaxNode<D, R>(child, this, index, offset, this.tree)
      : new SyntaxToken<D, R>(child, this, index, offset, this.tree);
  }

  childrenWithTokens(): Sequence<SyntaxElement<D, R>> {
    const node: SyntaxNode<D, R> = this;
    return new Sequence(function* () {
      const count = node.greenNode.childCount;
      for (let i = 0; i < count; i++) {
        const child = node.childAt(i);
        if (child !== undefined) yield child;
      }
    });
  }

  children(): Sequence<SyntaxNode<D, R>> {
    const node: SyntaxNode<D, R> = this;
    return new Sequence(function* () {
      const count = node.greenNode.childCount;
      for (let i = 0; i < count; i++) {
        const child = node.nodeChildAt(i);
        if (child !== undefined) yield child;
      }
    });
  }

  firstChildOrToken(): SyntaxElement<D, R> | undefined {
    return this.childAt(0);
  }

  lastChildOrToken(): SyntaxElement<D, R> | undefined {
    return this.childAt(this.greenNode.childCount - 1);
  }

  firstChild(): SyntaxNode<D, R> | undefined {
    return this.nodeChildFrom(0, 1);
  }

  lastChild(): SyntaxNode<D, R> | undefined {
    return this.nodeChildFrom(this.greenNode.childCount - 1, -1);
  }

  // ---------------------------------------------------------------------------
  // Siblings
  // ---------------------------------------------------------------------------

  nextSiblingOrToken(): SyntaxElement<D, R> | undefined {
    return this.parentNode?.childAt(this.indexInParent + 1);
  }

  prevSiblingOrToken(): SyntaxElement<D, R> | undefined {
    if (this.indexInParent === 0) return undefined;
    return this.parentNode?.childAt(this.indexInParent - 1);
  }

  nextSibling(): SyntaxNode<D, R> | undefined {
    return this.parentNode?.nodeChildFrom(this.indexInParent + 1, 1);
  }

  prevSibling(): SyntaxNode<D, R> | undefined {
    return this.parentNode?.nodeChildFrom(this.indexInParent - 1, -1);
  }

  /** This node followed by its sibling nodes in `direction`. */
  siblings(direction: Direction): Sequence<SyntaxNode<D, R>> {
    const start: SyntaxNode<D, R> = this;
    return new Sequence(function* () {
      for (let node: SyntaxNode<D, R> | undefined = start; node !== undefined; ) {
        yield node;
        node = direction === Direction.Next ? node.nextSibling() : node.prevSibling();
      }
    });
  }

  /** This node followed by its sibling elements in `direction`. */
  siblingsWithTokens(direction: Direction): Sequence<SyntaxElement<D, R>> {
    const start: SyntaxElement<D, R> = this;
    return new Sequence(function* () {
      for (let element: SyntaxElement<D, R> | undefined = start; element !== undefined; ) {
        yield element;
        element = direction === Direction.Next ? element.nextSiblingOrToken() : element.prevSiblingOrToken();
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Descendants
  // ---------------------------------------------------------------------------

  preorder(): Sequence<WalkEvent<SyntaxNode<D, R>>> {
    const start: SyntaxNode<D, R> = this;
    return new Sequence(function* () {
      let event: WalkEvent<SyntaxNode<D, R>> | undefined = enter(start);
      while (event !== undefined) {
        yield event;
        const item: SyntaxNode<D, R> = event.item;
        if (event.type === 'enter') {
          const first: SyntaxNode<D, R> | undefined = item.firstChild();
          event = first ? enter(first) : leave(item);
        } else if (item === start) {
          event = undefined;
        } else {
          const sibling: SyntaxNode<D, R> | undefined = item.nextSibling();
          const parent: SyntaxNode<D, R> | undefined = item.parent();
          event = sibling ? enter(sibling) : parent ? leave(parent) : undefined;
        }
      }
    });
  }

  preorderWithTokens(): Sequence<WalkEvent<SyntaxElement<D, R>>> {
    const start: SyntaxElement<D, R> = this;
    return new Sequence(function* () {
      let event: WalkEvent<SyntaxElement<D, R>> | undefined = enter(start);
      while (event !== undefined) {
        yield event;
        const item: SyntaxElement<D, R> = event.item;
        if (event.type === 'enter') {
          const first: SyntaxElement<D, R> | undefined =
            item instanceof SyntaxNode ? item.firstChildOrToken() : undefined;
          event = first ? enter(first) : leave(item);
        } else if (item === start) {
          event = undefined;
        } else {
          const sibling: SyntaxElement<D, R> | undefined = item.nextSiblingOrToken();
          const parent: SyntaxNode<D, R> | undefined = item.parent();
          event = sibling ? enter(sibling) : parent ? leave(parent) : undefined;
        }
      }
    });
  }

  /** This node and every node below it, in preorder. */
  descendants(): Sequence<SyntaxNode<D, R>> {
    return this.preorder()
      .filter(event => event.type === 'enter')
      .map(event => event.item);
  }

  /** This node and every element below it, in preorder. */
  descendantsWithTokens(): Sequence<SyntaxElement<D, R>> {
    return this.preorderWithTokens()
      .filter(event => event.type === 'enter')
      .map(event => event.item);
  }

  firstToken(): SyntaxToken<D, R> | undefined {
    for (const child of this.childrenWithTokens()) {
      const token: SyntaxToken<D, R> | undefined = child instanceof SyntaxToken ? child : child.firstToken();
      if (token !== undefined) return token;
    }
    return undefined;
  }

  lastToken(): SyntaxToken<D, R> | undefined {
    for (let i = this.greenNode.childCount - 1; i >= 0; i--) {
      const child = this.childAt(i);
      const token: SyntaxToken<D, R> | undefined = child instanceof SyntaxNode ? child.lastToken() : child;
      if (token !== undefined) return token;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Offset queries
  // ---------------------------------------------------------------------------

  /**
   * The token(s) at absolute `offset`. On the boundary between two tokens
   * both are returned; empty tokens are never returned.
   */
  tokenAtOffset(offset: number): TokenAtOffset<SyntaxToken<D, R>> {
    const range = this.textRange();
    if (!range.containsInclusive(offset)) {
      throw new CstError(ErrorCode.OFFSET_OUT_OF_RANGE, { offset, range: range.toString() });
    }
    if (range.isEmpty()) return NO_TOKEN;

    const touching: SyntaxElement<D, R>[] = [];
    for (const child of this.childrenWithTokens()) {
      const childRange = child.textRange();
      if (childRange.start > offset) break;
      if (!childRange.isEmpty() && childRange.containsInclusive(offset)) touching.push(child);
    }

    const [left, right] = touching;
    if (left === undefined) return NO_TOKEN;
    const leftAt = tokenAt(left, offset);
    if (right === undefined) return leftAt;
    const rightAt = tokenAt(right, offset);
    if (leftAt.type === 'single' && rightAt.type === 'single') {
      return { type: 'between', left: leftAt.token, right: rightAt.token };
    }
    return leftAt;
  }

  /** The first direct child whose range contains `range`. */
  childOrTokenAtRange(range: TextRange): SyntaxElement<D, R> | undefined {
    return this.childrenWithTokens().find(child => child.textRange().containsRange(range));
  }

  /** The deepest element whose range contains `range`. */
  coveringElement(range: TextRange): SyntaxElement<D, R> {
    const own = this.textRange();
    if (!own.containsRange(range)) {
      throw new CstError(ErrorCode.RANGE_OUT_OF_BOUNDS, { range: range.toString(), bounds: own.toString() });
    }
    let element: SyntaxElement<D, R> = this;
    while (element instanceof SyntaxNode) {
      const child = element.childOrTokenAtRange(range);
      if (child === undefined) break;
      element = child;
    }
    return element;
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  /** Concatenated text of every token below this node. */
  resolveText(resolver: Resolver): string {
    return this.greenNode.resolveText(resolver);
  }

  text<Q extends Resolver>(this: SyntaxNode<D, Q>): string {
    return this.resolveText(this.tree.resolver);
  }

  resolver<Q extends Resolver>(this: SyntaxNode<D, Q>): Q {
    return this.tree.resolver;
  }

  /** A lazy view of this node's text; nothing is concatenated up front. */
  syntaxText(resolver: Resolver): SyntaxText<D, R> {
    return new SyntaxText(this, resolver, this.textRange());
  }

  // ---------------------------------------------------------------------------
  // Attached data
  // ---------------------------------------------------------------------------

  /** Attach `value` unless this position already carries data. */
  trySetData(value: D): TrySetResult<D> {
    return this.tree.data.trySet(this.positionKey(), value);
  }

  setData(value: D): DataHandle<D> {
    return this.tree.data.set(this.positionKey(), value);
  }

  getData(): DataHandle<D> | undefined {
    return this.tree.data.get(this.positionKey());
  }

  clearData(): boolean {
    return this.tree.data.clear(this.positionKey());
  }

  // ---------------------------------------------------------------------------
  // Derived trees
  // ---------------------------------------------------------------------------

  /**
   * A new green root equal to this tree with this node replaced by
   * `replacement`. Subtrees off the path to the root are shared; with a
   * `cache` the rebuilt ancestors are canonicalized through it.
   */
  replaceWith(replacement: GreenNode, cache?: NodeCache<Interner>): GreenNode {
    return rebuildAncestors(this.parentNode, this.indexInParent, replacement, cache);
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  /** Debug rendering using an explicit resolver for token texts. */
  debug(resolver: Resolver | undefined, recursive = false): string {
    return recursive ? debugTree(this, resolver) : debugLine(this, resolver);
  }

  /** Debug rendering using the owned resolver, if any. */
  toDebugString(recursive = false): string {
    return this.debug(this.tree.resolver, recursive);
  }

  /** The text when the tree owns a resolver, the debug line otherwise. */
  toString(): string {
    const resolver = this.tree.resolver;
    return resolver !== undefined ? this.resolveText(resolver) : debugLine(this, undefined);
  }

  private nodeChildAt(index: number): SyntaxNode<D, R> | undefined {
    const child = this.greenNode.child(index);
    if (!(child instanceof GreenNode)) return undefined;
    return new SyntaxNode<D, R>(child, this, index, this.offset + this.greenNode.childOffset(index), this.tree);
  }

  private nodeChildFrom(start: number, step: 1 | -1): SyntaxNode<D, R> | undefined {
    for (let i = start; i >= 0 && i < this.greenNode.childCount; i += step) {
      const child = this.nodeChildAt(i);
      if (child !== undefined) return child;
    }
    return undefined;
  }
}

function tokenAt<D, R extends Resolver | undefined>(
  element: SyntaxElement<D, R>,
  offset: number
): TokenAtOffset<SyntaxToken<D, R>> {
  return element instanceof SyntaxToken ? { type: 'single', token: element } : element.tokenAtOffset(offset);
}

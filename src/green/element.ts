import type { Resolver, TokenKey } from '../interning/interner.js';
import type { RawSyntaxKind } from '../syntax/kind.js';
import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';

// Process-wide identity counter; the node cache signs children by id.
let nextGreenId = 0;

/**
 * Immutable leaf. Knows its kind, its interned text key and its UTF-8 byte
 * length, but not its position.
 */
export class GreenToken {
  readonly id: number;

  constructor(
    readonly kind: RawSyntaxKind,
    readonly textKey: TokenKey,
    readonly textLength: number
  ) {
    this.id = nextGreenId++;
    Object.freeze(this);
  }

  text(resolver: Resolver): string {
    return resolver.resolve(this.textKey);
  }

  structurallyEquals(other: GreenElement): boolean {
    return (
      other === this ||
      (other instanceof GreenToken && other.kind === this.kind && other.textKey === this.textKey)
    );
  }
}

/**
 * Immutable interior node. Children keep construction order; the node may
 * be shared by any number of parents and trees.
 */
export class GreenNode {
  readonly id: number;
  readonly children: readonly GreenElement[];
  readonly textLength: number;
  private readonly offsets: readonly number[];

  constructor(readonly kind: RawSyntaxKind, children: readonly GreenElement[]) {
    this.id = nextGreenId++;
    const offsets: number[] = [];
    let length = 0;
    for (const child of children) {
      offsets.push(length);
      length += child.textLength;
    }
    this.children = Object.freeze([...children]);
    this.offsets = Object.freeze(offsets);
    this.textLength = length;
    Object.freeze(this);
  }

  get childCount(): number {
    return this.children.length;
  }

  child(index: number): GreenElement | undefined {
    return this.children[index];
  }

  /** Offset of child `index` relative to the start of this node. */
  childOffset(index: number): number {
    const offset = this.offsets[index];
    if (offset === undefined) {
      throw new CstError(ErrorCode.CHILD_INDEX_OUT_OF_RANGE, { index, count: this.children.length });
    }
    return offset;
  }

  structurallyEquals(other: GreenElement): boolean {
    if (other === this) return true;
    if (!(other instanceof GreenNode)) return false;
    if (other.kind !== this.kind || other.textLength !== this.textLength) return false;
    if (other.children.length !== this.children.length) return false;
    return this.children.every((child, i) => {
      const theirs = other.children[i];
      return theirs !== undefined && child.structurallyEquals(theirs);
    });
  }

  resolveText(resolver: Resolver): string {
    const parts: string[] = [];
    forEachGreenToken(this, token => {
      parts.push(token.text(resolver));
    });
    return parts.join('');
  }

  /**
   * A new node of the same kind with children `[start, start + deleteCount)`
   * replaced by `insert`. The receiver is left untouched.
   */
  spliceChildren(start: number, deleteCount: number, insert: readonly GreenElement[]): GreenNode {
    const children = [...this.children];
    children.splice(start, deleteCount, ...insert);
    return new GreenNode(this.kind, children);
  }

  replaceChild(index: number, replacement: GreenElement): GreenNode {
    if (index < 0 || index >= this.children.length) {
      throw new CstError(ErrorCode.CHILD_INDEX_OUT_OF_RANGE, { index, count: this.children.length });
    }
    return this.spliceChildren(index, 1, [replacement]);
  }
}

export type GreenElement = GreenNode | GreenToken;

export function isGreenNode(element: GreenElement): element is GreenNode {
  return element instanceof GreenNode;
}

export function isGreenToken(element: GreenElement): element is GreenToken {
  return element instanceof GreenToken;
}

/** Visit every token below `node` in document order. */
export function forEachGreenToken(node: GreenNode, visit: (token: GreenToken) => void): void {
  const stack: GreenElement[] = [node];
  while (stack.length > 0) {
    const element = stack.pop();
    if (element === undefined) break;
    if (element instanceof GreenToken) {
      visit(element);
      continue;
    }
    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

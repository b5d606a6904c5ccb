import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { Resolver } from '../interning/interner.js';
import type { TextRange } from '../text/text_range.js';
import { charAtUtf8, sliceUtf8, utf8Length } from '../utils/utf8.js';
import { Sequence } from './sequence.js';
import type { SyntaxNode } from './syntax_node.js';

/**
 * Text of a node (or of a sub-range of it), read lazily from the tokens.
 * Offsets taken and returned by the methods are relative to the start of
 * this text, in UTF-8 bytes.
 */
export class SyntaxText<D, R extends Resolver | undefined> {
  constructor(
    private readonly node: SyntaxNode<D, R>,
    private readonly resolver: Resolver,
    private readonly range: TextRange
  ) {}

  get length(): number {
    return this.range.length;
  }

  isEmpty(): boolean {
    return this.range.isEmpty();
  }

  /** Absolute range of this text in the source. */
  textRange(): TextRange {
    return this.range;
  }

  /** The token texts (clipped to this range) in document order. */
  chunks(): Sequence<string> {
    const { node, resolver, range } = this;
    return new Sequence(function* () {
      for (const element of node.descendantsWithTokens()) {
        const token = element.asToken();
        if (token === undefined) continue;
        const tokenRange = token.textRange();
        const common = range.intersect(tokenRange);
        if (common === undefined || common.isEmpty()) continue;
        const text = token.resolveText(resolver);
        yield common.equals(tokenRange)
          ? text
          : sliceUtf8(text, common.start - tokenRange.start, common.end - tokenRange.start);
      }
    });
  }

  toString(): string {
    return this.chunks().toArray().join('');
  }

  equals(other: string | SyntaxText<D, R>): boolean {
    return this.toString() === other.toString();
  }

  charAt(offset: number): string | undefined {
    if (offset < 0 || offset >= this.length) return undefined;
    let start = 0;
    for (const chunk of this.chunks()) {
      const length = utf8Length(chunk);
      if (offset < start + length) return charAtUtf8(chunk, offset - start);
      start += length;
    }
    return undefined;
  }

  /** A sub-view; `range` is relative to this text. */
  slice(range: TextRange): SyntaxText<D, R> {
    if (range.end > this.length) {
      throw new CstError(ErrorCode.RANGE_OUT_OF_BOUNDS, {
        range: range.toString(),
        bounds: `0..${this.length}`,
      });
    }
    return new SyntaxText(this.node, this.resolver, range.shift(this.range.start));
  }

  containsChar(ch: string): boolean {
    return this.chunks().some(chunk => chunk.includes(ch));
  }

  /** Byte offset of the first occurrence of `ch`. */
  findChar(ch: string): number | undefined {
    let start = 0;
    for (const chunk of this.chunks()) {
      const index = chunk.indexOf(ch);
      if (index >= 0) return start + utf8Length(chunk.slice(0, index));
      start += utf8Length(chunk);
    }
    return undefined;
  }
}

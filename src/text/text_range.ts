import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';

/** A UTF-8 byte offset or length. */
export type TextSize = number;

function isTextSize(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Half-open byte interval `[start, end)` into the source text.
 */
export class TextRange {
  private constructor(readonly start: TextSize, readonly end: TextSize) {
    Object.freeze(this);
  }

  static new(start: TextSize, end: TextSize): TextRange {
    if (!isTextSize(start) || !isTextSize(end) || start > end) {
      throw new CstError(ErrorCode.INVALID_RANGE, { start, end });
    }
    return new TextRange(start, end);
  }

  static at(offset: TextSize, length: TextSize): TextRange {
    return TextRange.new(offset, offset + length);
  }

  static empty(offset: TextSize): TextRange {
    return TextRange.new(offset, offset);
  }

  static upTo(end: TextSize): TextRange {
    return TextRange.new(0, end);
  }

  get length(): TextSize {
    return this.end - this.start;
  }

  isEmpty(): boolean {
    return this.start === this.end;
  }

  contains(offset: TextSize): boolean {
    return this.start <= offset && offset < this.end;
  }

  containsInclusive(offset: TextSize): boolean {
    return this.start <= offset && offset <= this.end;
  }

  containsRange(other: TextRange): boolean {
    return this.start <= other.start && other.end <= this.end;
  }

  /** The common part of both ranges; empty ranges count when they touch. */
  intersect(other: TextRange): TextRange | undefined {
    const start = Math.max(this.start, other.start);
    const end = Math.min(this.end, other.end);
    return start <= end ? new TextRange(start, end) : undefined;
  }

  cover(other: TextRange): TextRange {
    return new TextRange(Math.min(this.start, other.start), Math.max(this.end, other.end));
  }

  coverOffset(offset: TextSize): TextRange {
    return this.cover(TextRange.empty(offset));
  }

  shift(delta: number): TextRange {
    return TextRange.new(this.start + delta, this.end + delta);
  }

  equals(other: TextRange): boolean {
    return this.start === other.start && this.end === other.end;
  }

  compare(other: TextRange): number {
    return this.start - other.start || this.end - other.end;
  }

  toString(): string {
    return `${this.start}..${this.end}`;
  }
}

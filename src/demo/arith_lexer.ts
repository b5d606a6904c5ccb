/**
 * @module arith-lexer
 *
 * 算术表达式词法分析器。
 *
 * 每个输入字符都落在某个 token 中（包括空白与注释），
 * 因此 token 文本拼接后与源文本完全一致。无法识别的字符
 * 产生 ErrorToken，不会抛出异常。
 */

import { ArithKind } from './arith_kinds.js';

export interface ArithToken {
  readonly kind: ArithKind;
  readonly text: string;
}

const PUNCTUATION: Readonly<Record<string, ArithKind>> = {
  '+': ArithKind.Plus,
  '-': ArithKind.Minus,
  '*': ArithKind.Star,
  '/': ArithKind.Slash,
  '(': ArithKind.LParen,
  ')': ArithKind.RParen,
};

// Sticky patterns, tried in order at the current position.
const PATTERNS: ReadonlyArray<readonly [ArithKind, RegExp]> = [
  [ArithKind.Whitespace, /\s+/y],
  [ArithKind.Comment, /#[^\n]*/y],
  [ArithKind.Number, /[0-9]+/y],
  [ArithKind.Ident, /[A-Za-z_][A-Za-z0-9_]*/y],
];

export function lexArith(source: string): ArithToken[] {
  const tokens: ArithToken[] = [];
  let pos = 0;
  outer: while (pos < source.length) {
    for (const [kind, pattern] of PATTERNS) {
      pattern.lastIndex = pos;
      const match = pattern.exec(source);
      const text = match?.[0];
      if (text !== undefined) {
        tokens.push({ kind, text });
        pos = pattern.lastIndex;
        continue outer;
      }
    }
    const ch = String.fromCodePoint(source.codePointAt(pos) ?? 0);
    tokens.push({ kind: PUNCTUATION[ch] ?? ArithKind.ErrorToken, text: ch });
    pos += ch.length;
  }
  return tokens;
}

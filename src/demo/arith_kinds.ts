import { syntaxFromEnum } from '../syntax/kind.js';

/** Kinds of the arithmetic demo grammar. Tokens first, then nodes. */
export enum ArithKind {
  Whitespace,
  Comment,
  Number,
  Ident,
  Plus,
  Minus,
  Star,
  Slash,
  LParen,
  RParen,
  ErrorToken,

  Root,
  BinaryExpr,
  UnaryExpr,
  ParenExpr,
  Literal,
  Name,
  Error,
}

export const arithSyntax = syntaxFromEnum(ArithKind, {
  Plus: '+',
  Minus: '-',
  Star: '*',
  Slash: '/',
  LParen: '(',
  RParen: ')',
});

export function isTrivia(kind: ArithKind): boolean {
  return kind === ArithKind.Whitespace || kind === ArithKind.Comment;
}

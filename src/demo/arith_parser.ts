/**
 * @module arith-parser
 *
 * 算术表达式语法分析器（优先级爬升）。
 *
 * 示例生产者：演示如何驱动 GreenNodeBuilder。
 * - 二元表达式通过 checkpoint + startNodeAt 实现左结合
 * - 运算符和括号使用 staticToken
 * - 遇到意外 token 时包装为 Error 节点并继续，错误以值的形式返回
 */

import { GreenNodeBuilder } from '../green/builder.js';
import type { GreenNode } from '../green/element.js';
import { NodeCache, type NodeCacheStats } from '../green/node_cache.js';
import type { Interner, TokenInterner } from '../interning/interner.js';
import { SyntaxNode } from '../red/syntax_node.js';
import { createLogger } from '../utils/logger.js';
import { utf8Length } from '../utils/utf8.js';
import { ArithKind, arithSyntax, isTrivia } from './arith_kinds.js';
import { lexArith, type ArithToken } from './arith_lexer.js';

const logger = createLogger('arith-parser');

export interface ArithParseError {
  readonly message: string;
  /** UTF-8 byte offset into the source. */
  readonly offset: number;
}

export interface ArithParse {
  readonly root: GreenNode;
  readonly errors: readonly ArithParseError[];
}

export interface ArithTree {
  readonly tree: SyntaxNode<unknown, TokenInterner>;
  readonly errors: readonly ArithParseError[];
  readonly stats: NodeCacheStats;
}

/** Binding power of binary operators; higher binds tighter. */
function bindingPower(kind: ArithKind): number {
  switch (kind) {
    case ArithKind.Plus:
    case ArithKind.Minus:
      return 1;
    case ArithKind.Star:
    case ArithKind.Slash:
      return 2;
    default:
      return 0;
  }
}

class Parser<I extends Interner> {
  private pos = 0;
  private offset = 0;
  readonly errors: ArithParseError[] = [];

  constructor(
    private readonly tokens: readonly ArithToken[],
    private readonly builder: GreenNodeBuilder<I>
  ) {}

  parseRoot(): void {
    this.builder.startNode(ArithKind.Root);
    this.skipTrivia();
    if (!this.atEnd()) {
      this.expr(0);
    }
    for (;;) {
      this.skipTrivia();
      if (this.atEnd()) break;
      this.unexpected();
    }
    this.builder.finishNode();
  }

  private expr(minBp: number): void {
    this.skipTrivia();
    const checkpoint = this.builder.checkpoint();
    this.atom();
    for (;;) {
      const op = this.peekKind(true);
      if (op === undefined) break;
      const bp = bindingPower(op);
      if (bp <= minBp) break;
      this.builder.startNodeAt(checkpoint, ArithKind.BinaryExpr);
      this.skipTrivia();
      this.bump();
      this.expr(bp);
      this.builder.finishNode();
    }
  }

  private atom(): void {
    const kind = this.peekKind(false);
    switch (kind) {
      case ArithKind.Number:
        this.wrap(ArithKind.Literal);
        return;
      case ArithKind.Ident:
        this.wrap(ArithKind.Name);
        return;
      case ArithKind.LParen:
        this.builder.startNode(ArithKind.ParenExpr);
        this.bump();
        this.expr(0);
        this.skipTrivia();
        if (this.peekKind(false) === ArithKind.RParen) {
          this.bump();
        } else {
          this.error("expected ')'");
        }
        this.builder.finishNode();
        return;
      case ArithKind.Minus:
        this.builder.startNode(ArithKind.UnaryExpr);
        this.bump();
        this.skipTrivia();
        this.atom();
        this.builder.finishNode();
        return;
      case ArithKind.RParen:
      case undefined:
        this.error('expected expression');
        this.builder.startNode(ArithKind.Error);
        this.builder.finishNode();
        return;
      default:
        this.unexpected();
    }
  }

  private unexpected(): void {
    const token = this.tokens[this.pos];
    this.error(`unexpected ${JSON.stringify(token?.text ?? '')}`);
    this.wrap(ArithKind.Error);
  }

  private wrap(kind: ArithKind): void {
    this.builder.startNode(kind);
    this.bump();
    this.builder.finishNode();
  }

  private bump(): void {
    const token = this.tokens[this.pos];
    if (token === undefined) return;
    if (arithSyntax.staticText?.(token.kind) === token.text) {
      this.builder.staticToken(token.kind);
    } else {
      this.builder.token(token.kind, token.text);
    }
    this.pos++;
    this.offset += utf8Length(token.text);
  }

  private skipTrivia(): void {
    for (let token = this.tokens[this.pos]; token !== undefined && isTrivia(token.kind); token = this.tokens[this.pos]) {
      this.bump();
    }
  }

  /** Kind of the next token, optionally looking past trivia. */
  private peekKind(skipTrivia: boolean): ArithKind | undefined {
    let i = this.pos;
    let token = this.tokens[i];
    while (skipTrivia && token !== undefined && isTrivia(token.kind)) {
      token = this.tokens[++i];
    }
    return token?.kind;
  }

  private atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  private error(message: string): void {
    this.errors.push({ message, offset: this.offset });
  }
}

/** Parse `source` into a green tree built through `cache`. */
export function parseArith<I extends Interner>(source: string, cache: NodeCache<I>): ArithParse {
  const builder = GreenNodeBuilder.fromCache(cache, { syntax: arithSyntax });
  const parser = new Parser(lexArith(source), builder);
  parser.parseRoot();
  const { root } = builder.finish();
  if (parser.errors.length > 0) {
    logger.debug('arith parse finished with errors', { errors: parser.errors.length });
  }
  return { root, errors: parser.errors };
}

/** Parse `source` with a fresh cache into a tree that owns its interner. */
export function parseArithTree(source: string): ArithTree {
  const cache = NodeCache.create();
  const { root, errors } = parseArith(source, cache);
  return {
    tree: SyntaxNode.newRootWithResolver<unknown, TokenInterner>(root, cache.interner(), { syntax: arithSyntax }),
    errors,
    stats: cache.stats(),
  };
}

/**
 * @module node-cache
 *
 * 节点缓存：对构建出的子树做哈希合并（hash-consing）。
 *
 * 结构签名 = kind + 子元素身份（子元素已经过同一缓存规范化，
 * 因此 id 相同即结构相同）。命中时返回已注册的共享节点，
 * 传入的子元素被丢弃；未命中时注册新节点。
 */

import { TokenInterner, type Interner, type TokenKey } from '../interning/interner.js';
import type { RawSyntaxKind } from '../syntax/kind.js';
import { createLogger } from '../utils/logger.js';
import { utf8Length } from '../utils/utf8.js';
import { GreenNode, GreenToken, type GreenElement } from './element.js';

const logger = createLogger('node-cache');

export interface NodeCacheStats {
  readonly nodes: number;
  readonly tokens: number;
  readonly nodeHits: number;
  readonly nodeMisses: number;
  readonly tokenHits: number;
  readonly tokenMisses: number;
}

export class NodeCache<I extends Interner = Interner> {
  private readonly nodes = new Map<string, GreenNode>();
  private readonly tokens = new Map<string, GreenToken>();
  private nodeHits = 0;
  private nodeMisses = 0;
  private tokenHits = 0;
  private tokenMisses = 0;
  private ownedInterner: I | undefined;

  private constructor(private readonly internerRef: I, owned: boolean) {
    this.ownedInterner = owned ? internerRef : undefined;
  }

  /** A cache with its own private interner. */
  static create(): NodeCache<TokenInterner> {
    return new NodeCache(new TokenInterner(), true);
  }

  /**
   * A cache over a caller's interner. Caches sharing one interner hand out
   * equal keys for equal text.
   */
  static withInterner<I extends Interner>(interner: I): NodeCache<I> {
    return new NodeCache(interner, false);
  }

  get ownsInterner(): boolean {
    return this.ownedInterner !== undefined;
  }

  interner(): I {
    return this.internerRef;
  }

  /**
   * Hand the owned interner to the caller. Returns `undefined` when the
   * interner is borrowed or was already taken.
   */
  takeInterner(): I | undefined {
    const interner = this.ownedInterner;
    this.ownedInterner = undefined;
    return interner;
  }

  intern(text: string): TokenKey {
    return this.internerRef.intern(text);
  }

  getOrInsertToken(kind: RawSyntaxKind, text: string): GreenToken {
    const textKey = this.internerRef.intern(text);
    const signature = `${kind}:${textKey}`;
    const cached = this.tokens.get(signature);
    if (cached) {
      this.tokenHits++;
      return cached;
    }
    this.tokenMisses++;
    const token = new GreenToken(kind, textKey, utf8Length(text));
    this.tokens.set(signature, token);
    return token;
  }

  getOrInsertNode(kind: RawSyntaxKind, children: readonly GreenElement[]): GreenNode {
    const signature = nodeSignature(kind, children);
    const cached = this.nodes.get(signature);
    if (cached) {
      this.nodeHits++;
      return cached;
    }
    this.nodeMisses++;
    const node = new GreenNode(kind, children);
    this.nodes.set(signature, node);
    return node;
  }

  stats(): NodeCacheStats {
    return {
      nodes: this.nodes.size,
      tokens: this.tokens.size,
      nodeHits: this.nodeHits,
      nodeMisses: this.nodeMisses,
      tokenHits: this.tokenHits,
      tokenMisses: this.tokenMisses,
    };
  }

  /**
   * Forget every registered element. Trees built earlier stay valid; later
   * builds no longer share structure with them. The interner is kept.
   */
  clear(): void {
    logger.debug('clearing node cache', { ...this.stats() });
    this.nodes.clear();
    this.tokens.clear();
    this.nodeHits = 0;
    this.nodeMisses = 0;
    this.tokenHits = 0;
    this.tokenMisses = 0;
  }
}

function nodeSignature(kind: RawSyntaxKind, children: readonly GreenElement[]): string {
  let signature = `${kind}|`;
  for (const child of children) {
    signature += `${child.id},`;
  }
  return signature;
}

/**
 * @module builder
 *
 * 基于栈的绿树构建器。
 *
 * 解析器按深度优先顺序发送 startNode / token / finishNode 事件，
 * 每个节点结束时交给 NodeCache 规范化。构建器不校验 kind 的语义，
 * 只保证调用平衡。
 *
 * ```typescript
 * const builder = GreenNodeBuilder.create();
 * builder.startNode(Kind.Root);
 * builder.token(Kind.Ident, 'x');
 * builder.finishNode();
 * const { root, interner } = builder.finish();
 * ```
 */

import { ConfigService } from '../config/config-service.js';
import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { Interner, TokenInterner } from '../interning/interner.js';
import type { RawSyntaxKind, SyntaxSpec } from '../syntax/kind.js';
import { LogLevel, createLogger } from '../utils/logger.js';
import { GreenToken, type GreenElement, type GreenNode } from './element.js';
import { NodeCache } from './node_cache.js';

const logger = createLogger('builder');

/**
 * A position in the child list of the innermost open node, captured so a
 * node can later be opened "in the past" with `startNodeAt`.
 */
export class Checkpoint {
  constructor(
    readonly childIndex: number,
    /** Serial of the node that was innermost when the checkpoint was taken. */
    readonly owner: number
  ) {
    Object.freeze(this);
  }
}

export interface BuildResult<I extends Interner> {
  readonly root: GreenNode;
  /** The interner, if the builder owned it. */
  readonly interner: I | undefined;
}

export interface GreenNodeBuilderOptions {
  /** Supplies fixed texts for `staticToken`. */
  readonly syntax?: SyntaxSpec;
}

interface OpenNode {
  readonly kind: RawSyntaxKind;
  readonly firstChild: number;
  readonly serial: number;
  /** Opened by `startNodeAt`. */
  readonly wrapped: boolean;
}

// Checkpoints taken outside every node belong to this owner.
const TOP_LEVEL = 0;

export class GreenNodeBuilder<I extends Interner = Interner> {
  // Open nodes and the flat list of pending children; an open node owns
  // children[firstChild..].
  private readonly parents: OpenNode[] = [];
  private readonly children: GreenElement[] = [];
  private finished = false;
  private nextSerial = TOP_LEVEL + 1;
  private readonly trace: boolean;

  private constructor(
    private readonly nodeCache: NodeCache<I>,
    private readonly ownsCache: boolean,
    private readonly syntax: SyntaxSpec | undefined
  ) {
    this.trace = ConfigService.getInstance().traceBuilder;
  }

  /** A builder with its own cache and interner; `finish` returns the interner. */
  static create(options: GreenNodeBuilderOptions = {}): GreenNodeBuilder<TokenInterner> {
    return new GreenNodeBuilder(NodeCache.create(), true, options.syntax);
  }

  /** A builder over a long-lived cache; subtrees are shared with other builds. */
  static fromCache<I extends Interner>(
    cache: NodeCache<I>,
    options: GreenNodeBuilderOptions = {}
  ): GreenNodeBuilder<I> {
    return new GreenNodeBuilder(cache, false, options.syntax);
  }

  /** A builder with its own cache over a caller's interner. */
  static withInterner<I extends Interner>(
    interner: I,
    options: GreenNodeBuilderOptions = {}
  ): GreenNodeBuilder<I> {
    return new GreenNodeBuilder(NodeCache.withInterner(interner), true, options.syntax);
  }

  /** Number of currently open nodes. */
  get depth(): number {
    return this.parents.length;
  }

  cache(): NodeCache<I> {
    return this.nodeCache;
  }

  interner(): I {
    return this.nodeCache.interner();
  }

  startNode(kind: RawSyntaxKind): void {
    this.ensureActive();
    if (this.trace) logger.debug('startNode', { kind, depth: this.parents.length });
    this.parents.push({ kind, firstChild: this.children.length, serial: this.nextSerial++, wrapped: false });
  }

  token(kind: RawSyntaxKind, text: string): void {
    this.ensureActive();
    if (this.trace) logger.debug('token', { kind, text });
    this.children.push(this.nodeCache.getOrInsertToken(kind, text));
  }

  /** Push a token whose text is the static text of `kind`. */
  staticToken(kind: RawSyntaxKind): void {
    const text = this.syntax?.staticText?.(kind);
    if (text === undefined) {
      throw new CstError(ErrorCode.MISSING_STATIC_TEXT, { kind });
    }
    this.token(kind, text);
  }

  finishNode(): void {
    this.ensureActive();
    const open = this.parents.pop();
    if (open === undefined) {
      throw new CstError(ErrorCode.FINISH_NODE_WITHOUT_START);
    }
    const children = this.children.splice(open.firstChild);
    const node = this.nodeCache.getOrInsertNode(open.kind, children);
    if (this.trace) {
      logger.debug('finishNode', { kind: open.kind, children: children.length, textLength: node.textLength });
    }
    this.children.push(node);
  }

  checkpoint(): Checkpoint {
    this.ensureActive();
    return new Checkpoint(this.children.length, this.innermostSerial());
  }

  /**
   * Open a node of `kind` that adopts every child pushed since `checkpoint`.
   * The checkpoint must have been taken inside the currently innermost node;
   * one taken inside a node that has since been finished is rejected.
   */
  startNodeAt(checkpoint: Checkpoint, kind: RawSyntaxKind): void {
    this.ensureActive();
    const first = this.parents[this.parents.length - 1]?.firstChild ?? 0;
    const index = checkpoint.childIndex;
    if (!this.ownsCheckpoint(checkpoint) || index < first || index > this.children.length) {
      throw new CstError(ErrorCode.INVALID_CHECKPOINT, {
        checkpoint: index,
        first,
        len: this.children.length,
      });
    }
    if (this.trace) logger.debug('startNodeAt', { kind, checkpoint: index });
    this.parents.push({ kind, firstChild: index, serial: this.nextSerial++, wrapped: true });
  }

  /**
   * Complete the build. Exactly one root node must have been finished and no
   * node may remain open.
   */
  finish(): BuildResult<I> {
    this.ensureActive();
    if (this.parents.length > 0) {
      throw new CstError(ErrorCode.UNFINISHED_NODES, { count: this.parents.length });
    }
    if (this.children.length === 0) {
      throw new CstError(ErrorCode.EMPTY_TREE);
    }
    if (this.children.length > 1) {
      throw new CstError(ErrorCode.MULTIPLE_ROOTS, { count: this.children.length });
    }
    const root = this.children[0];
    if (root === undefined || root instanceof GreenToken) {
      throw new CstError(ErrorCode.ROOT_IS_TOKEN, { kind: root?.kind ?? -1 });
    }
    this.finished = true;
    this.children.length = 0;

    if (logger.isEnabled(LogLevel.DEBUG)) {
      logger.debug('green tree built', { kind: root.kind, textLength: root.textLength, ...this.nodeCache.stats() });
    }
    return {
      root,
      interner: this.ownsCache ? this.nodeCache.takeInterner() : undefined,
    };
  }

  private innermostSerial(): number {
    return this.parents[this.parents.length - 1]?.serial ?? TOP_LEVEL;
  }

  // The checkpoint's node must be innermost, or be wrapped only by nodes
  // opened at that same checkpoint.
  private ownsCheckpoint(checkpoint: Checkpoint): boolean {
    for (let i = this.parents.length - 1; i >= 0; i--) {
      const open = this.parents[i];
      if (open === undefined) break;
      if (open.serial === checkpoint.owner) return true;
      if (!open.wrapped || open.firstChild !== checkpoint.childIndex) return false;
    }
    return checkpoint.owner === TOP_LEVEL;
  }

  private ensureActive(): void {
    if (this.finished) throw new CstError(ErrorCode.BUILDER_FINISHED);
  }
}

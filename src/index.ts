/**
 * @module lossless-cst
 *
 * 无损具体语法树（CST）引擎。
 *
 * **数据流**：
 * ```
 * 解析器事件 → GreenNodeBuilder → NodeCache（哈希合并）→ 绿树根 → SyntaxNode（红树游标）
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { GreenNodeBuilder, NodeCache, SyntaxNode } from 'lossless-cst';
 *
 * const cache = NodeCache.create();
 * const builder = GreenNodeBuilder.fromCache(cache);
 * builder.startNode(0);
 * builder.token(1, 'let');
 * builder.token(2, ' ');
 * builder.token(3, 'x');
 * builder.finishNode();
 * const { root } = builder.finish();
 *
 * const tree = SyntaxNode.newRootWithResolver(root, cache.interner());
 * console.log(tree.text());            // "let x"
 * console.log(tree.toDebugString(true));
 * ```
 */

// 文本范围
export { TextRange, type TextSize } from './text/index.js';

// 文本驻留
export {
  TokenInterner,
  isResolver,
  tokenKey,
  type Interner,
  type Resolver,
  type TokenKey,
} from './interning/index.js';

// 语法种类
export { formatKind, syntaxFromEnum, type RawSyntaxKind, type SyntaxSpec } from './syntax/index.js';

// 绿树
export {
  Checkpoint,
  GreenNode,
  GreenNodeBuilder,
  GreenToken,
  NodeCache,
  forEachGreenToken,
  isGreenNode,
  isGreenToken,
  type BuildResult,
  type GreenElement,
  type GreenNodeBuilderOptions,
  type NodeCacheStats,
} from './green/index.js';

// 红树
export {
  DataTable,
  Direction,
  Sequence,
  SyntaxNode,
  SyntaxText,
  SyntaxToken,
  TreeContext,
  debugLine,
  debugTree,
  leftBiased,
  rightBiased,
  tokensAtOffset,
  type DataHandle,
  type PositionKey,
  type RootOptions,
  type SyntaxElement,
  type TokenAtOffset,
  type TrySetResult,
  type WalkEvent,
} from './red/index.js';

// 示例语法
export {
  ArithKind,
  arithSyntax,
  lexArith,
  parseArith,
  parseArithTree,
  type ArithParse,
  type ArithParseError,
  type ArithTree,
} from './demo/index.js';

// 错误处理
export { CstError, ErrorCode, formatErrorMessage, isCstError } from './diagnostics/index.js';

// 日志与配置
export { Logger, LogLevel, createLogger, type LogMetadata, type LogSink } from './utils/logger.js';
export { ConfigService } from './config/config-service.js';

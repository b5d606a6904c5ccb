/**
 * @module green
 *
 * 绿树：不可变、与位置无关、结构共享的语法树，及其缓存与构建器。
 */

export {
  GreenNode,
  GreenToken,
  forEachGreenToken,
  isGreenNode,
  isGreenToken,
  type GreenElement,
} from './element.js';
export { NodeCache, type NodeCacheStats } from './node_cache.js';
export {
  Checkpoint,
  GreenNodeBuilder,
  type BuildResult,
  type GreenNodeBuilderOptions,
} from './builder.js';

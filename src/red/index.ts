/**
 * @module red
 *
 * 红树游标层：在绿树之上按需计算父节点链接和绝对偏移。
 *
 * 包含：
 * - 游标 (SyntaxNode, SyntaxToken, SyntaxElement)
 * - 遍历辅助 (Direction, WalkEvent, TokenAtOffset, Sequence)
 * - 位置数据表 (DataTable, DataHandle, TrySetResult)
 * - 文本视图 (SyntaxText)
 */

export { SyntaxNode } from './syntax_node.js';
export { SyntaxToken } from './syntax_token.js';
export type { SyntaxElement } from './element.js';
export { SyntaxText } from './syntax_text.js';
export { Sequence } from './sequence.js';
export {
  Direction,
  leftBiased,
  rightBiased,
  tokensAtOffset,
  type TokenAtOffset,
  type WalkEvent,
} from './traversal.js';
export { DataTable, type DataHandle, type PositionKey, type TrySetResult } from './data_table.js';
export { TreeContext, type RootOptions } from './tree.js';
export { debugLine, debugTree } from './display.js';

/**
 * @module demo
 *
 * 示例语法：带注释和空白的算术表达式。
 */

export { ArithKind, arithSyntax, isTrivia } from './arith_kinds.js';
export { lexArith, type ArithToken } from './arith_lexer.js';
export {
  parseArith,
  parseArithTree,
  type ArithParse,
  type ArithParseError,
  type ArithTree,
} from './arith_parser.js';

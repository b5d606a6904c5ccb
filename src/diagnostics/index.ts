/**
 * @module diagnostics
 *
 * 错误处理模块。
 *
 * 包含：
 * - 错误码定义 (ErrorCode, ERROR_MESSAGES)
 * - 错误类型 (CstError)
 */

export {
  ErrorCode,
  ERROR_MESSAGES,
  formatErrorMessage,
  getErrorCategory,
  type ErrorCategory,
} from './error_codes.js';

export { CstError, isCstError } from './errors.js';

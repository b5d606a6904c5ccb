import { isCstError, type CstError } from '../../diagnostics/errors.js';
import { error as logError, warn as logWarn } from './logger.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function hintFor(error: CstError): string | null {
  switch (error.category) {
    case 'builder':
      return '构建事件不平衡，请检查 startNode / finishNode 是否成对调用';
    case 'interning':
      return 'token 键来自其他 Interner，请使用构建该树的 Resolver';
    default:
      return null;
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    case 'EISDIR':
      logError(`目标是目录而不是文件：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

/** Report `error` on stderr; the returned exit status is always 1. */
export function reportError(error: unknown): number {
  if (isCstError(error)) {
    logError(`[${error.code}] ${error.message}`);
    const hint = hintFor(error);
    if (hint) {
      logWarn(hint);
    }
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }
  return 1;
}

export function handleError(error: unknown): void {
  process.exit(reportError(error));
}

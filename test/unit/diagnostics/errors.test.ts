import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CstError, isCstError } from '../../../src/diagnostics/errors.js';
import { ErrorCode, ERROR_MESSAGES, formatErrorMessage, getErrorCategory } from '../../../src/diagnostics/error_codes.js';

describe('错误码', () => {
  it('每个错误码都有消息模板', () => {
    for (const code of Object.values(ErrorCode)) {
      assert.equal(typeof ERROR_MESSAGES[code], 'string');
    }
  });

  it('formatErrorMessage 应该替换占位符', () => {
    assert.equal(
      formatErrorMessage(ErrorCode.UNFINISHED_NODES, { count: 2 }),
      'finish() called with 2 unfinished node(s)'
    );
    assert.equal(formatErrorMessage(ErrorCode.INVALID_RANGE, { start: 5, end: 2 }), 'invalid text range 5..2');
  });

  it('缺少参数时保留占位符', () => {
    assert.equal(formatErrorMessage(ErrorCode.MISSING_STATIC_TEXT), 'kind {kind} has no static text');
  });

  it('getErrorCategory 按前缀分类', () => {
    assert.equal(getErrorCategory(ErrorCode.EMPTY_TREE), 'builder');
    assert.equal(getErrorCategory(ErrorCode.UNKNOWN_TOKEN_KEY), 'interning');
    assert.equal(getErrorCategory(ErrorCode.NOT_A_CHAR_BOUNDARY), 'text');
    assert.equal(getErrorCategory(ErrorCode.CHILD_INDEX_OUT_OF_RANGE), 'cursor');
  });
});

describe('CstError', () => {
  it('应该携带错误码、参数和格式化后的消息', () => {
    const error = new CstError(ErrorCode.MULTIPLE_ROOTS, { count: 3 });
    assert.ok(error instanceof Error);
    assert.equal(error.name, 'CstError');
    assert.equal(error.code, 'B004');
    assert.deepEqual(error.params, { count: 3 });
    assert.equal(error.message, 'finish() found 3 top-level elements, expected exactly one root node');
    assert.equal(error.category, 'builder');
  });

  it('isCstError 只识别 CstError', () => {
    assert.equal(isCstError(new CstError(ErrorCode.EMPTY_TREE)), true);
    assert.equal(isCstError(new Error('plain')), false);
    assert.equal(isCstError('B003'), false);
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TextRange } from '../../../src/text/text_range.js';
import { CstError } from '../../../src/diagnostics/errors.js';
import { ErrorCode } from '../../../src/diagnostics/error_codes.js';

describe('TextRange', () => {
  describe('构造', () => {
    it('应该构造半开区间', () => {
      const range = TextRange.new(2, 5);
      assert.equal(range.start, 2);
      assert.equal(range.end, 5);
      assert.equal(range.length, 3);
      assert.equal(range.toString(), '2..5');
    });

    it('start 大于 end 时应该抛出 INVALID_RANGE', () => {
      assert.throws(
        () => TextRange.new(5, 2),
        (error: unknown) => error instanceof CstError && error.code === ErrorCode.INVALID_RANGE
      );
    });

    it('负数或非整数偏移应该被拒绝', () => {
      assert.throws(() => TextRange.new(-1, 2), CstError);
      assert.throws(() => TextRange.new(0, 1.5), CstError);
    });

    it('at / empty / upTo 应该给出对应区间', () => {
      assert.equal(TextRange.at(3, 4).toString(), '3..7');
      assert.equal(TextRange.empty(4).toString(), '4..4');
      assert.equal(TextRange.empty(4).isEmpty(), true);
      assert.equal(TextRange.upTo(5).toString(), '0..5');
    });
  });

  describe('包含关系', () => {
    const range = TextRange.new(2, 5);

    it('contains 不包含 end', () => {
      assert.equal(range.contains(2), true);
      assert.equal(range.contains(4), true);
      assert.equal(range.contains(5), false);
      assert.equal(range.contains(1), false);
    });

    it('containsInclusive 包含 end', () => {
      assert.equal(range.containsInclusive(5), true);
      assert.equal(range.containsInclusive(6), false);
    });

    it('containsRange 判断子区间', () => {
      assert.equal(range.containsRange(TextRange.new(3, 5)), true);
      assert.equal(range.containsRange(TextRange.empty(5)), true);
      assert.equal(range.containsRange(TextRange.new(4, 6)), false);
    });
  });

  describe('区间运算', () => {
    it('intersect 返回公共部分，相邻时为空区间', () => {
      assert.equal(TextRange.new(0, 5).intersect(TextRange.new(3, 8))?.toString(), '3..5');
      assert.equal(TextRange.new(0, 3).intersect(TextRange.new(3, 5))?.toString(), '3..3');
      assert.equal(TextRange.new(0, 2).intersect(TextRange.new(3, 5)), undefined);
    });

    it('cover 与 coverOffset 覆盖两端', () => {
      assert.equal(TextRange.new(0, 2).cover(TextRange.new(4, 6)).toString(), '0..6');
      assert.equal(TextRange.new(2, 4).coverOffset(7).toString(), '2..7');
      assert.equal(TextRange.new(2, 4).coverOffset(0).toString(), '0..4');
    });

    it('shift 平移区间', () => {
      assert.equal(TextRange.new(2, 4).shift(3).toString(), '5..7');
      assert.throws(() => TextRange.new(2, 4).shift(-3), CstError);
    });

    it('equals 与 compare', () => {
      assert.equal(TextRange.new(1, 2).equals(TextRange.at(1, 1)), true);
      assert.ok(TextRange.new(0, 2).compare(TextRange.new(1, 2)) < 0);
      assert.ok(TextRange.new(1, 3).compare(TextRange.new(1, 2)) > 0);
      assert.equal(TextRange.new(1, 2).compare(TextRange.new(1, 2)), 0);
    });
  });
});

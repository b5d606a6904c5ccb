import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TokenInterner, isResolver, tokenKey } from '../../../src/interning/interner.js';
import { CstError } from '../../../src/diagnostics/errors.js';
import { ErrorCode } from '../../../src/diagnostics/error_codes.js';

describe('TokenInterner', () => {
  it('相同文本得到相同的键', () => {
    const interner = new TokenInterner();
    const a = interner.intern('let');
    const b = interner.intern('x');
    assert.equal(interner.intern('let'), a);
    assert.notEqual(a, b);
    assert.equal(interner.size, 2);
  });

  it('resolve 返回驻留的文本', () => {
    const interner = new TokenInterner();
    const key = interner.intern('中文');
    assert.equal(interner.resolve(key), '中文');
    assert.equal(interner.get('中文'), key);
    assert.equal(interner.get('missing'), undefined);
  });

  it('未知键应该抛出 UNKNOWN_TOKEN_KEY', () => {
    const interner = new TokenInterner();
    assert.throws(
      () => interner.resolve(tokenKey(7)),
      (error: unknown) => error instanceof CstError && error.code === ErrorCode.UNKNOWN_TOKEN_KEY
    );
    assert.equal(interner.tryResolve(tokenKey(7)), undefined);
  });

  it('空字符串也可以驻留', () => {
    const interner = new TokenInterner();
    const key = interner.intern('');
    assert.equal(interner.resolve(key), '');
  });

  it('按键顺序迭代所有条目', () => {
    const interner = new TokenInterner();
    interner.intern('a');
    interner.intern('b');
    interner.intern('a');
    assert.deepEqual([...interner].map(([, text]) => text), ['a', 'b']);
  });

  it('isResolver 识别带 resolve 方法的对象', () => {
    assert.equal(isResolver(new TokenInterner()), true);
    assert.equal(isResolver({ resolve: () => '' }), true);
    assert.equal(isResolver({}), false);
    assert.equal(isResolver(null), false);
  });
});

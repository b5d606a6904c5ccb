import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DataTable } from '../../../src/red/data_table.js';
import { SyntaxNode } from '../../../src/red/syntax_node.js';
import { buildTree, twoLevelTree } from '../../helpers/tree-builders.js';

describe('DataTable', () => {
  it('trySet 只在位置为空时写入', () => {
    const table = new DataTable<number>();
    const first = table.trySet('1', 10);
    assert.equal(first.ok, true);
    const second = table.trySet('1', 20);
    assert.equal(second.ok, false);
    if (!second.ok) {
      assert.equal(second.rejected, 20);
      assert.equal(second.existing.value, 10);
    }
    assert.equal(table.get('1')?.value, 10);
    assert.equal(table.size, 1);
  });

  it('set 无条件覆盖并返回新句柄', () => {
    const table = new DataTable<string>();
    const old = table.set('0.1', 'a');
    const replaced = table.set('0.1', 'b');
    assert.equal(old.value, 'a');
    assert.equal(replaced.value, 'b');
    assert.equal(table.get('0.1'), replaced);
  });

  it('句柄不可变，clear 之后仍然可读', () => {
    const table = new DataTable<string>();
    const data = table.set('', 'root');
    assert.equal(Object.isFrozen(data), true);
    assert.equal(table.clear(''), true);
    assert.equal(table.clear(''), false);
    assert.equal(data.value, 'root');
    assert.equal(table.get(''), undefined);
    assert.equal(table.size, 0);
  });

  it('允许存储 undefined 等假值', () => {
    const table = new DataTable<number | undefined>();
    table.set('2', undefined);
    const handle = table.get('2');
    assert.ok(handle !== undefined);
    assert.equal(handle.value, undefined);
    assert.equal(table.trySet('2', 0).ok, false);
  });
});

describe('游标上的附加数据', () => {
  it('同一位置的任意游标共享数据', () => {
    const tree = SyntaxNode.newRoot<{ visited: boolean }>(buildTree(twoLevelTree()).root);
    tree.children().nth(1)?.setData({ visited: true });
    const again = tree.firstChild()?.nextSibling();
    assert.deepEqual(again?.getData()?.value, { visited: true });
    assert.equal(tree.getData(), undefined);
  });

  it('每个根拥有独立的数据表', () => {
    const { root } = buildTree(twoLevelTree());
    const a = SyntaxNode.newRoot<string>(root);
    const b = SyntaxNode.newRoot<string>(root);
    a.setData('only in a');
    assert.equal(b.getData(), undefined);
    assert.equal(a.tree.data.size, 1);
  });
});

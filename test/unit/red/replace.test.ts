import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NodeCache } from '../../../src/green/node_cache.js';
import { SyntaxNode } from '../../../src/red/syntax_node.js';
import { buildTreeWithCache, twoLevelTree } from '../../helpers/tree-builders.js';

function setup() {
  const cache = NodeCache.create();
  const green = buildTreeWithCache(twoLevelTree(), cache);
  const tree = SyntaxNode.newRootWithResolver(green, cache.interner());
  return { cache, green, tree };
}

describe('派生新树', () => {
  it('替换节点得到新根，原树保持不变', () => {
    const { cache, green, tree } = setup();
    const middle = tree.children().nth(1);
    assert.ok(middle);
    const replacement = cache.getOrInsertNode(4, [cache.getOrInsertToken(5, 'one')]);
    const updated = middle.replaceWith(replacement, cache);
    assert.equal(updated.resolveText(cache.interner()), '0.00.1one2.02.12.2');
    assert.equal(tree.text(), '0.00.11.02.02.12.2');
    assert.equal(updated.child(0), green.child(0));
    assert.equal(updated.child(2), green.child(2));
  });

  it('替换 token 只重建到根的路径', () => {
    const { cache, green, tree } = setup();
    const leaf = tree.lastChild()?.childAt(1)?.asToken();
    assert.ok(leaf);
    const updated = leaf.replaceWith(cache.getOrInsertToken(8, 'X'));
    assert.equal(updated.resolveText(cache.interner()), '0.00.11.02.0X2.2');
    assert.equal(updated.textLength, 16);
    assert.equal(updated.child(1), green.child(1));
    assert.notEqual(updated.child(2), green.child(2));
  });

  it('经过缓存时，用原节点替换得到同一个根', () => {
    const { cache, green, tree } = setup();
    const first = tree.firstChild();
    assert.ok(first);
    assert.equal(first.replaceWith(first.green(), cache), green);
  });

  it('不经过缓存时得到结构相等的新根', () => {
    const { green, tree } = setup();
    const first = tree.firstChild();
    assert.ok(first);
    const rebuilt = first.replaceWith(first.green());
    assert.notEqual(rebuilt, green);
    assert.equal(rebuilt.structurallyEquals(green), true);
  });

  it('替换根节点直接返回替换值', () => {
    const { cache, tree } = setup();
    const replacement = cache.getOrInsertNode(0, []);
    assert.equal(tree.replaceWith(replacement), replacement);
  });
});

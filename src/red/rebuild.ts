import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import { GreenNode, type GreenElement } from '../green/element.js';
import type { NodeCache } from '../green/node_cache.js';
import type { Interner, Resolver } from '../interning/interner.js';
import type { SyntaxNode } from './syntax_node.js';

/**
 * Put `replacement` at child `index` of `parent` and rebuild every ancestor
 * up to the root, returning the new green root. Only the path to the root is
 * copied; all other subtrees are shared with the old tree.
 */
export function rebuildAncestors<D, R extends Resolver | undefined>(
  parent: SyntaxNode<D, R> | undefined,
  index: number,
  replacement: GreenElement,
  cache?: NodeCache<Interner>
): GreenNode {
  let green = replacement;
  let childIndex = index;
  for (let node = parent; node !== undefined; node = node.parent()) {
    const original = node.green();
    if (cache) {
      const children = [...original.children];
      children[childIndex] = green;
      green = cache.getOrInsertNode(original.kind, children);
    } else {
      green = original.replaceChild(childIndex, green);
    }
    childIndex = node.index();
  }
  if (!(green instanceof GreenNode)) {
    // A token always has a parent, so the loop ran at least once.
    throw new CstError(ErrorCode.ROOT_IS_TOKEN, { kind: green.kind });
  }
  return green;
}

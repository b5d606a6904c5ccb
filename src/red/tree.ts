import type { GreenNode } from '../green/element.js';
import type { Resolver } from '../interning/interner.js';
import type { SyntaxSpec } from '../syntax/kind.js';
import { DataTable } from './data_table.js';

export interface RootOptions {
  /** Used to render kinds by name in debug output. */
  readonly syntax?: SyntaxSpec;
}

/**
 * State shared by every cursor created from one root: the green root, the
 * owned resolver (if any) and the data table.
 */
export class TreeContext<D, R extends Resolver | undefined> {
  readonly data = new DataTable<D>();

  constructor(
    readonly root: GreenNode,
    readonly resolver: R,
    readonly syntax: SyntaxSpec | undefined
  ) {}
}

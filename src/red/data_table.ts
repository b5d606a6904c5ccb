/**
 * @module data-table
 *
 * 位置数据表：按位置身份（而不是游标对象）存放附加数据。
 *
 * 游标是临时对象，每次遍历都会重新创建；同一位置的任意游标
 * 都观察到同一条目。读取返回的句柄与条目解耦：之后的 set / clear
 * 不会改变已取得句柄中的值。
 *
 * JavaScript 的执行是 run-to-completion 的，trySet 的检查与插入
 * 之间不会交错其他操作。
 */

/** Identity of a position inside one tree, see `SyntaxNode.positionKey`. */
export type PositionKey = string;

export interface DataHandle<D> {
  readonly value: D;
}

export type TrySetResult<D> =
  | { readonly ok: true; readonly data: DataHandle<D> }
  | { readonly ok: false; readonly rejected: D; readonly existing: DataHandle<D> };

function handle<D>(value: D): DataHandle<D> {
  return Object.freeze({ value });
}

export class DataTable<D> {
  private readonly entries = new Map<PositionKey, DataHandle<D>>();

  get size(): number {
    return this.entries.size;
  }

  /** Insert only if the position is empty. */
  trySet(key: PositionKey, value: D): TrySetResult<D> {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return { ok: false, rejected: value, existing };
    }
    const data = handle(value);
    this.entries.set(key, data);
    return { ok: true, data };
  }

  set(key: PositionKey, value: D): DataHandle<D> {
    const data = handle(value);
    this.entries.set(key, data);
    return data;
  }

  get(key: PositionKey): DataHandle<D> | undefined {
    return this.entries.get(key);
  }

  /** Remove the entry. Returns false when there was none. */
  clear(key: PositionKey): boolean {
    return this.entries.delete(key);
  }
}

/**
 * A lazy, restartable sequence. Each iteration calls the source again, so a
 * sequence of child cursors can be walked any number of times.
 */
export class Sequence<T> implements Iterable<T> {
  constructor(private readonly source: () => Iterator<T>) {}

  [Symbol.iterator](): Iterator<T> {
    return this.source();
  }

  first(): T | undefined {
    for (const item of this) return item;
    return undefined;
  }

  last(): T | undefined {
    let last: T | undefined;
    for (const item of this) last = item;
    return last;
  }

  nth(index: number): T | undefined {
    if (index < 0) return undefined;
    let i = 0;
    for (const item of this) {
      if (i === index) return item;
      i++;
    }
    return undefined;
  }

  count(): number {
    let n = 0;
    for (const _ of this) n++;
    return n;
  }

  find(predicate: (item: T) => boolean): T | undefined {
    for (const item of this) {
      if (predicate(item)) return item;
    }
    return undefined;
  }

  some(predicate: (item: T) => boolean): boolean {
    for (const item of this) {
      if (predicate(item)) return true;
    }
    return false;
  }

  filter<S extends T>(predicate: (item: T) => item is S): Sequence<S>;
  filter(predicate: (item: T) => boolean): Sequence<T>;
  filter(predicate: (item: T) => boolean): Sequence<T> {
    const source = this.source;
    return new Sequence(function* () {
      const it = source();
      for (let next = it.next(); !next.done; next = it.next()) {
        if (predicate(next.value)) yield next.value;
      }
    });
  }

  map<U>(transform: (item: T) => U): Sequence<U> {
    const source = this.source;
    return new Sequence(function* () {
      const it = source();
      for (let next = it.next(); !next.done; next = it.next()) {
        yield transform(next.value);
      }
    });
  }

  toArray(): T[] {
    return [...this];
  }
}

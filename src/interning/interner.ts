/**
 * @module interning
 *
 * 文本驻留接口。
 *
 * - `Interner`：构建期使用，文本 → 键
 * - `Resolver`：查询期使用，键 → 文本
 *
 * 多个构建会话可以共享同一个 Interner，相同文本得到相同的键。
 */

import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';

declare const tokenKeyBrand: unique symbol;

/** Opaque key an interner hands out for a token text. */
export type TokenKey = number & { readonly [tokenKeyBrand]: 'TokenKey' };

/**
 * Create a TokenKey from a number. Only interners should mint keys.
 */
export function tokenKey(value: number): TokenKey {
  return value as TokenKey;
}

export interface Resolver {
  resolve(key: TokenKey): string;
  tryResolve?(key: TokenKey): string | undefined;
}

export interface Interner extends Resolver {
  intern(text: string): TokenKey;
  get(text: string): TokenKey | undefined;
  readonly size: number;
}

export function isResolver(value: unknown): value is Resolver {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}

/**
 * Default in-memory interner. Keys are dense indices into the string table.
 */
export class TokenInterner implements Interner, Iterable<readonly [TokenKey, string]> {
  private readonly strings: string[] = [];
  private readonly keys = new Map<string, TokenKey>();

  get size(): number {
    return this.strings.length;
  }

  intern(text: string): TokenKey {
    const existing = this.keys.get(text);
    if (existing !== undefined) return existing;
    const key = tokenKey(this.strings.length);
    this.strings.push(text);
    this.keys.set(text, key);
    return key;
  }

  get(text: string): TokenKey | undefined {
    return this.keys.get(text);
  }

  resolve(key: TokenKey): string {
    const text = this.strings[key];
    if (text === undefined) {
      throw new CstError(ErrorCode.UNKNOWN_TOKEN_KEY, { key });
    }
    return text;
  }

  tryResolve(key: TokenKey): string | undefined {
    return this.strings[key];
  }

  *[Symbol.iterator](): Iterator<readonly [TokenKey, string]> {
    for (let i = 0; i < this.strings.length; i++) {
      const text = this.strings[i];
      if (text !== undefined) yield [tokenKey(i), text] as const;
    }
  }
}

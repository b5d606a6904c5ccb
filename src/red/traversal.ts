export enum Direction {
  Next = 'next',
  Prev = 'prev',
}

/** Emitted by preorder walks: `enter` before an element's children, `leave` after. */
export type WalkEvent<T> =
  | { readonly type: 'enter'; readonly item: T }
  | { readonly type: 'leave'; readonly item: T };

export function enter<T>(item: T): WalkEvent<T> {
  return { type: 'enter', item };
}

export function leave<T>(item: T): WalkEvent<T> {
  return { type: 'leave', item };
}

/**
 * Tokens touching an offset. An offset on the boundary of two tokens
 * touches both.
 */
export type TokenAtOffset<T> =
  | { readonly type: 'none' }
  | { readonly type: 'single'; readonly token: T }
  | { readonly type: 'between'; readonly left: T; readonly right: T };

export function leftBiased<T>(at: TokenAtOffset<T>): T | undefined {
  switch (at.type) {
    case 'none':
      return undefined;
    case 'single':
      return at.token;
    case 'between':
      return at.left;
  }
}

export function rightBiased<T>(at: TokenAtOffset<T>): T | undefined {
  switch (at.type) {
    case 'none':
      return undefined;
    case 'single':
      return at.token;
    case 'between':
      return at.right;
  }
}

export function tokensAtOffset<T>(at: TokenAtOffset<T>): T[] {
  switch (at.type) {
    case 'none':
      return [];
    case 'single':
      return [at.token];
    case 'between':
      return [at.left, at.right];
  }
}

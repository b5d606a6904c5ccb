export {
  TokenInterner,
  isResolver,
  tokenKey,
  type Interner,
  type Resolver,
  type TokenKey,
} from './interner.js';

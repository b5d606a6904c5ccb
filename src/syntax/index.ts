export { formatKind, syntaxFromEnum, type RawSyntaxKind, type SyntaxSpec } from './kind.js';

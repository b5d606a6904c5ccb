// Error codes for programmer misuse of the tree APIs.

export enum ErrorCode {
  // Builder errors (B001-B099)
  FINISH_NODE_WITHOUT_START = 'B001',
  UNFINISHED_NODES = 'B002',
  EMPTY_TREE = 'B003',
  MULTIPLE_ROOTS = 'B004',
  ROOT_IS_TOKEN = 'B005',
  INVALID_CHECKPOINT = 'B006',
  MISSING_STATIC_TEXT = 'B007',
  BUILDER_FINISHED = 'B008',

  // Interning errors (I001-I099)
  UNKNOWN_TOKEN_KEY = 'I001',

  // Text errors (T001-T099)
  INVALID_RANGE = 'T001',
  OFFSET_OUT_OF_RANGE = 'T002',
  RANGE_OUT_OF_BOUNDS = 'T003',
  NOT_A_CHAR_BOUNDARY = 'T004',

  // Cursor errors (R001-R099)
  CHILD_INDEX_OUT_OF_RANGE = 'R001',
}

export type ErrorCategory = 'builder' | 'interning' | 'text' | 'cursor';

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.FINISH_NODE_WITHOUT_START]: 'finishNode() called with no open node',
  [ErrorCode.UNFINISHED_NODES]: 'finish() called with {count} unfinished node(s)',
  [ErrorCode.EMPTY_TREE]: 'finish() called before any node was built',
  [ErrorCode.MULTIPLE_ROOTS]: 'finish() found {count} top-level elements, expected exactly one root node',
  [ErrorCode.ROOT_IS_TOKEN]: 'the root element must be a node, found token of kind {kind}',
  [ErrorCode.INVALID_CHECKPOINT]: 'checkpoint {checkpoint} is outside the innermost open node (children {first}..{len})',
  [ErrorCode.MISSING_STATIC_TEXT]: 'kind {kind} has no static text',
  [ErrorCode.BUILDER_FINISHED]: 'builder is already finished',
  [ErrorCode.UNKNOWN_TOKEN_KEY]: 'token key {key} was not produced by this interner',
  [ErrorCode.INVALID_RANGE]: 'invalid text range {start}..{end}',
  [ErrorCode.OFFSET_OUT_OF_RANGE]: 'offset {offset} is outside of {range}',
  [ErrorCode.RANGE_OUT_OF_BOUNDS]: 'range {range} is not contained in {bounds}',
  [ErrorCode.NOT_A_CHAR_BOUNDARY]: 'byte offset {offset} is not a character boundary',
  [ErrorCode.CHILD_INDEX_OUT_OF_RANGE]: 'child index {index} is out of range for a node with {count} children',
};

export function getErrorCategory(code: ErrorCode): ErrorCategory {
  switch (code[0]) {
    case 'B':
      return 'builder';
    case 'I':
      return 'interning';
    case 'T':
      return 'text';
    default:
      return 'cursor';
  }
}

export function formatErrorMessage(
  code: ErrorCode,
  params: Readonly<Record<string, string | number>> = {}
): string {
  return ERROR_MESSAGES[code].replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

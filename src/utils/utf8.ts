import { CstError } from '../diagnostics/errors.js';
import { ErrorCode } from '../diagnostics/error_codes.js';

/** UTF-8 byte length of `text`. */
export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/**
 * Slice `text` by UTF-8 byte offsets. Both offsets must fall on character
 * boundaries.
 */
export function sliceUtf8(text: string, start: number, end: number): string {
  // Fast path: ASCII-only text has byte offsets equal to string indices.
  if (utf8Length(text) === text.length) return text.slice(start, end);

  const bytes = Buffer.from(text, 'utf8');
  for (const offset of [start, end]) {
    if (offset < 0 || offset > bytes.length) {
      throw new CstError(ErrorCode.OFFSET_OUT_OF_RANGE, { offset, range: `0..${bytes.length}` });
    }
    if (isContinuationByte(bytes[offset])) {
      throw new CstError(ErrorCode.NOT_A_CHAR_BOUNDARY, { offset });
    }
  }
  return bytes.subarray(start, end).toString('utf8');
}

/**
 * The character starting at UTF-8 byte `offset`, or `undefined` when the
 * offset is past the end or inside a multi-byte character.
 */
export function charAtUtf8(text: string, offset: number): string | undefined {
  const bytes = Buffer.from(text, 'utf8');
  const lead = bytes[offset];
  if (lead === undefined || isContinuationByte(lead)) return undefined;
  const width = lead < 0x80 ? 1 : lead < 0xe0 ? 2 : lead < 0xf0 ? 3 : 4;
  return bytes.subarray(offset, offset + width).toString('utf8');
}

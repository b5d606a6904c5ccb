import { readFile } from 'node:fs/promises';
import { parseArithTree } from '../../demo/arith_parser.js';
import { warn } from '../utils/logger.js';

export interface ParseOptions {
  /** Parse this source text instead of reading a file. */
  expr?: string;
}

export async function readSource(file: string | undefined, expr: string | undefined): Promise<string> {
  if (expr !== undefined) return expr;
  if (file === undefined) {
    throw new Error('请指定输入文件或使用 --expr 传入表达式');
  }
  return readFile(file, 'utf8');
}

/** The recursive debug tree of the parsed source. Parse errors are reported as warnings. */
export async function parseCommand(file: string | undefined, options: ParseOptions): Promise<string> {
  const source = await readSource(file, options.expr);
  const { tree, errors } = parseArithTree(source);
  for (const err of errors) {
    warn(`${err.offset}: ${err.message}`);
  }
  return tree.toDebugString(true);
}

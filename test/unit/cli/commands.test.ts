import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseCommand, readSource } from '../../../src/cli/commands/parse.js';
import { collectStats, formatStats, statsCommand } from '../../../src/cli/commands/stats.js';
import { reportError } from '../../../src/cli/utils/error-handler.js';
import { createCli, rawOptionValue } from '../../../src/cli/program.js';
import { CstError } from '../../../src/diagnostics/errors.js';
import { ErrorCode } from '../../../src/diagnostics/error_codes.js';

describe('cst CLI 命令', () => {
  let dir = '';
  let file = '';

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cst-cli-'));
    file = join(dir, 'expr.txt');
    await writeFile(file, '1+1', 'utf8');
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parse --expr 输出递归调试树', async () => {
    const output = await parseCommand(undefined, { expr: '1+1' });
    assert.equal(
      output,
      'Root@0..3\n' +
        '  BinaryExpr@0..3\n' +
        '    Literal@0..1\n' +
        '      Number@0..1 "1"\n' +
        '    Plus@1..2 "+"\n' +
        '    Literal@2..3\n' +
        '      Number@2..3 "1"\n'
    );
  });

  it('parse 可以读取文件', async () => {
    assert.equal(await parseCommand(file, {}), await parseCommand(undefined, { expr: '1+1' }));
  });

  it('没有输入时应该报错', async () => {
    await assert.rejects(readSource(undefined, undefined), /--expr/);
  });

  it('文件不存在时抛出 ENOENT', async () => {
    await assert.rejects(readSource(join(dir, 'missing.txt'), undefined), { code: 'ENOENT' });
  });

  it('stats 统计节点、token 与缓存命中', async () => {
    const stats = collectStats('1+1');
    assert.deepEqual(stats, {
      textLength: 3,
      nodes: 4,
      tokens: 3,
      errors: 0,
      cacheNodes: 3,
      cacheTokens: 2,
      nodeHits: 1,
      tokenHits: 1,
    });
    assert.equal(
      await statsCommand(file, {}),
      'text length: 3\nnodes: 4\ntokens: 3\nerrors: 0\ncache nodes: 3 (hits 1)\ncache tokens: 2 (hits 1)'
    );
  });

  it('formatStats 包含错误数量', () => {
    assert.match(formatStats(collectStats('1 )')), /^errors: 1$/m);
  });

  async function run(...args: string[]): Promise<string> {
    const chunks: string[] = [];
    const cli = createCli({ write: text => chunks.push(text) });
    cli.parse(['node', 'cst', ...args], { run: false });
    await cli.runMatchedCommand();
    return chunks.join('');
  }

  it('通过 cac 调用 parse 时 --expr 原样保留', async () => {
    assert.equal(await run('parse', '--expr', '007'), 'Root@0..3\n  Literal@0..3\n    Number@0..3 "007"\n');
    assert.equal(
      await run('parse', '--expr', ' 1'),
      'Root@0..2\n  Whitespace@0..1 " "\n  Literal@1..2\n    Number@1..2 "1"\n'
    );
  });

  it('通过 cac 调用 stats 时统计原始表达式', async () => {
    assert.equal(
      await run('stats', '--expr=007'),
      'text length: 3\nnodes: 2\ntokens: 1\nerrors: 0\ncache nodes: 2 (hits 0)\ncache tokens: 1 (hits 0)\n'
    );
  });

  it('rawOptionValue 读取命令行上的原始值', () => {
    const argv = ['node', 'cst', 'parse', '--expr', '1e3'];
    assert.equal(rawOptionValue(argv, 'expr'), '1e3');
    assert.equal(rawOptionValue(['--expr=0x10'], 'expr'), '0x10');
    assert.equal(rawOptionValue(['--', '--expr', '1'], 'expr'), undefined);
    assert.equal(rawOptionValue(['parse', 'file.txt'], 'expr'), undefined);
  });

  it('reportError 总是返回退出码 1', () => {
    const original = console.error;
    const lines: string[] = [];
    console.error = (line: string) => {
      lines.push(line);
    };
    try {
      assert.equal(reportError(new CstError(ErrorCode.EMPTY_TREE)), 1);
      assert.equal(reportError('oops'), 1);
    } finally {
      console.error = original;
    }
    assert.equal(lines.length, 2);
    assert.ok(lines[0]?.endsWith('[B003] finish() called before any node was built'));
  });
});

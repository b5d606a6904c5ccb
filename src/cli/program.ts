import { cac } from 'cac';
import { parseCommand } from './commands/parse.js';
import { statsCommand } from './commands/stats.js';
import { handleError } from './utils/error-handler.js';

export interface CliOutput {
  write(text: string): void;
}

const stdout: CliOutput = {
  write: text => {
    process.stdout.write(text);
  },
};

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * The value of `--name <value>` or `--name=<value>` exactly as given on the
 * command line. cac turns numeric-looking values into numbers, which would
 * rewrite sources such as `007` or `1e3`.
 */
export function rawOptionValue(argv: readonly string[], name: string): string | undefined {
  const flag = `--${name}`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') return undefined;
    if (arg === flag) return argv[i + 1];
    if (arg?.startsWith(`${flag}=`)) return arg.slice(flag.length + 1);
  }
  return undefined;
}

export function createCli(out: CliOutput = stdout) {
  const cli = cac('cst');
  const expr = (): string | undefined => rawOptionValue(cli.rawArgs, 'expr');

  cli
    .command('parse [file]', '解析算术表达式并输出语法树')
    .option('--expr <source>', '直接解析给定的表达式')
    .action(
      wrapAction(async (file: string | undefined) => {
        out.write(await parseCommand(file, { expr: expr() }));
      })
    );

  cli
    .command('stats [file]', '输出节点/token 数量与缓存命中统计')
    .option('--expr <source>', '直接统计给定的表达式')
    .action(
      wrapAction(async (file: string | undefined) => {
        out.write(`${await statsCommand(file, { expr: expr() })}\n`);
      })
    );

  cli.help();
  cli.version('0.1.0');
  return cli;
}

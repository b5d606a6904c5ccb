import { parseArithTree } from '../../demo/arith_parser.js';
import { readSource } from './parse.js';

export interface StatsOptions {
  expr?: string;
}

export interface TreeStats {
  readonly textLength: number;
  readonly nodes: number;
  readonly tokens: number;
  readonly errors: number;
  readonly cacheNodes: number;
  readonly cacheTokens: number;
  readonly nodeHits: number;
  readonly tokenHits: number;
}

export function collectStats(source: string): TreeStats {
  const { tree, errors, stats } = parseArithTree(source);
  let nodes = 0;
  let tokens = 0;
  for (const element of tree.descendantsWithTokens()) {
    if (element.asToken() === undefined) nodes++;
    else tokens++;
  }
  return {
    textLength: tree.textRange().length,
    nodes,
    tokens,
    errors: errors.length,
    cacheNodes: stats.nodes,
    cacheTokens: stats.tokens,
    nodeHits: stats.nodeHits,
    tokenHits: stats.tokenHits,
  };
}

export function formatStats(stats: TreeStats): string {
  return [
    `text length: ${stats.textLength}`,
    `nodes: ${stats.nodes}`,
    `tokens: ${stats.tokens}`,
    `errors: ${stats.errors}`,
    `cache nodes: ${stats.cacheNodes} (hits ${stats.nodeHits})`,
    `cache tokens: ${stats.cacheTokens} (hits ${stats.tokenHits})`,
  ].join('\n');
}

export async function statsCommand(file: string | undefined, options: StatsOptions): Promise<string> {
  return formatStats(collectStats(await readSource(file, options.expr)));
}

/**
 * CLI 专用日志工具，提供带颜色的统一输出格式。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  if (process.env.NO_COLOR !== undefined) {
    return `${symbol} ${message}`;
  }
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}

/**
 * CLI 专用输出工具：带颜色的符号前缀，诊断信息写入 stderr。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Gray = '\u001B[90m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function success(message: string): void {
  console.error(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}

// Indented continuation lines, e.g. a source excerpt under an error
export function detail(message: string): void {
  for (const line of message.split('\n')) {
    console.error(`${AnsiColor.Gray}  ${line}${AnsiColor.Reset}`);
  }
}

/**
 * @module tokens
 *
 * Token 分类以及扫描器一侧的拆分策略。
 */

import { TokenKind } from '../types.js';
import type { Token } from '../types.js';

export { TokenKind };

/**
 * 决定某类 token 之后是否为首选的拆分边界。
 */
export type SplitPolicy = (kind: TokenKind) => boolean;

const SPLIT_AFTER: ReadonlySet<TokenKind> = new Set([
  TokenKind.TOP_KEYWORD,
  TokenKind.COMMA,
  TokenKind.BRACKET_OPEN,
  TokenKind.STATEMENT_START,
]);

export const splitAfter: SplitPolicy = kind => SPLIT_AFTER.has(kind);

/**
 * 值相等比较：重建的行会重放同一批 token，但比较不依赖对象身份。
 */
export function sameToken(a: Token, b: Token): boolean {
  return (
    a === b ||
    (a.kind === b.kind &&
      a.text === b.text &&
      a.start.line === b.start.line &&
      a.start.col === b.start.col &&
      a.end.line === b.end.line &&
      a.end.col === b.end.col)
  );
}

/**
 * @module frontend
 *
 * 前端模块：SQL 扫描器与 token 分类。
 *
 * 包含：
 * - 词法分析器 (lexer)
 * - Token 分类与拆分策略 (tokens)
 */

export { lex } from './lexer.js';
export {
  TokenKind,
  splitAfter,
  sameToken,
  type SplitPolicy,
} from './tokens.js';

/**
 * @module lexer
 *
 * SQL 扫描器：把源码切分为带位置信息的 Token 流。
 *
 * **功能**：
 * - 按规则表逐条尝试匹配（先匹配者胜），规则使用粘性正则
 * - 顶层关键字（select、from、group by …）与 case/end 单独分类
 * - 单引号字符串与双引号、反引号标识符统一视为 QUOTED_NAME
 * - token 之间的空白保存在后一个 token 的 prefix 中
 * - 换行本身是 NEWLINE token，格式化核心据此划分行
 */

import { TokenKind } from './tokens.js';
import type { Token, Position } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

interface LexRule {
  readonly kind: TokenKind;
  readonly pattern: RegExp;
}

const TOP_KEYWORDS = [
  'with(?:[ \\t]+recursive)?',
  'select(?:[ \\t]+(?:distinct|all))?',
  'from',
  'where',
  'group[ \\t]+by',
  'having',
  'order[ \\t]+by',
  'limit',
  'offset',
  'union(?:[ \\t]+all)?',
  'intersect',
  'except',
  'window',
  'qualify',
  'insert[ \\t]+into',
  'values',
  'update',
  'set',
  'delete[ \\t]+from',
  'returning',
  'on[ \\t]+conflict',
];

function keyword(alternatives: readonly string[]): RegExp {
  return new RegExp(`(?:${alternatives.join('|')})(?![A-Za-z0-9_$])`, 'iy');
}

// Order matters: the first rule that matches at the cursor wins.
const RULES: readonly LexRule[] = [
  { kind: TokenKind.NEWLINE, pattern: /\r\n|\r|\n/y },
  { kind: TokenKind.COMMENT, pattern: /(?:--|#)[^\r\n]*/y },
  { kind: TokenKind.COMMENT, pattern: /\/\*[\s\S]*?\*\//y },
  { kind: TokenKind.QUOTED_NAME, pattern: /"(?:[^"]|"")*"|`(?:[^`]|``)*`|'(?:[^'\\]|''|\\[\s\S])*'/y },
  { kind: TokenKind.STATEMENT_START, pattern: keyword(['case']) },
  { kind: TokenKind.STATEMENT_END, pattern: keyword(['end']) },
  { kind: TokenKind.TOP_KEYWORD, pattern: keyword(TOP_KEYWORDS) },
  { kind: TokenKind.DOUBLE_COLON, pattern: /::/y },
  { kind: TokenKind.NUMBER, pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y },
  { kind: TokenKind.COMMA, pattern: /,/y },
  { kind: TokenKind.DOT, pattern: /\./y },
  { kind: TokenKind.SEMICOLON, pattern: /;/y },
  { kind: TokenKind.BRACKET_OPEN, pattern: /[([{]/y },
  { kind: TokenKind.BRACKET_CLOSE, pattern: /[)\]}]/y },
  { kind: TokenKind.STAR, pattern: /\*/y },
  { kind: TokenKind.OPERATOR, pattern: /<>|!=|>=|<=|\|\||->>|->|[+\-%<>=|&^~!]|\/(?!\*)/y },
  { kind: TokenKind.NAME, pattern: /[A-Za-z_@$][A-Za-z0-9_$]*/y },
];

const LINE_BREAK = /\r\n|\r|\n/;
const HORIZONTAL_SPACE = /[ \t\f\v]+/y;
const UNTERMINATED = /\/\*|["'`]/y;

function matchAt(pattern: RegExp, source: string, offset: number): string | null {
  pattern.lastIndex = offset;
  const match = pattern.exec(source);
  return match ? match[0] : null;
}

/**
 * 将 SQL 源码转换为 Token 数组。
 *
 * @throws {DiagnosticError} L001 无法识别的字符；L002 未闭合的引号或块注释
 */
export function lex(source: string): Token[] {
  const lines = source.split(LINE_BREAK);
  const tokens: Token[] = [];

  let offset = 0;
  let line = 0;
  let col = 0;

  // multi-line tokens (block comments, quoted text) move the cursor across lines
  const advance = (text: string): Position => {
    const breaks = text.split(LINE_BREAK);
    if (breaks.length === 1) {
      col += text.length;
    } else {
      line += breaks.length - 1;
      col = breaks[breaks.length - 1]?.length ?? 0;
    }
    offset += text.length;
    return { line, col };
  };

  while (offset < source.length) {
    const space = matchAt(HORIZONTAL_SPACE, source, offset) ?? '';
    if (space) advance(space);
    if (offset >= source.length) break;

    const start: Position = { line, col };
    const sourceLine = lines[line] ?? '';
    let matched = false;

    for (const rule of RULES) {
      const text = matchAt(rule.pattern, source, offset);
      if (text === null || text.length === 0) continue;
      let end: Position;
      if (rule.kind === TokenKind.NEWLINE) {
        // a newline ends on the line it terminates
        end = { line, col: col + text.length };
        offset += text.length;
        line += 1;
        col = 0;
      } else {
        end = advance(text);
      }
      tokens.push({ kind: rule.kind, prefix: space, text, start, end, line: sourceLine });
      matched = true;
      break;
    }

    if (!matched) {
      const opening = matchAt(UNTERMINATED, source, offset);
      if (opening !== null) {
        Diagnostics.unterminatedText(opening, start).throw();
      }
      Diagnostics.unexpectedCharacter(source.charAt(offset), start).throw();
    }
  }

  return tokens;
}

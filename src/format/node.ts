/**
 * @module format/node
 *
 * 单个 token 的格式化记录。
 *
 * **计算流程**：
 * 1. 从前驱 Node 继承深度（前驱的 depth + changeInDepth）与开括号栈
 * 2. 按 token 分类调整栈，得出 changeBefore / changeAfter
 * 3. 依据是否行首、深度与前一个 token 计算前导空白
 * 4. 关键字、名称与语句标记统一小写
 *
 * TOP_KEYWORD 被当作自闭合的伪括号：同一层级出现下一个顶层关键字时，
 * 上一个自动关闭，从而在没有语法树的情况下表达 SQL 子句结构。
 */

import { TokenKind } from '../types.js';
import type { Token } from '../types.js';
import { MismatchedBracketPairError, UnmatchedCloserError } from '../diagnostics/diagnostics.js';
import { BracketStack } from './bracket-stack.js';

export interface Node {
  /** 在所属 NodeArena 中的下标 */
  readonly index: number;
  readonly token: Token;
  /** 前驱 Node 的下标，可能位于上一行；查询中的第一个 Node 为 null */
  readonly previous: number | null;
  readonly inheritedDepth: number;
  readonly depth: number;
  readonly changeInDepth: number;
  readonly prefix: string;
  readonly value: string;
  readonly openBrackets: BracketStack;
}

export interface DepthResult {
  readonly depth: number;
  readonly changeInDepth: number;
  readonly openBrackets: BracketStack;
}

const INDENT = '    ';
const SPACE = ' ';
const NO_SPACE = '';

const MATCHING_CLOSER: Readonly<Record<string, string>> = {
  '(': ')',
  '[': ']',
  '{': '}',
};

function assertNever(kind: never): never {
  throw new Error(`Unhandled token kind: ${String(kind)}`);
}

export function createNode(token: Token, previous: Node | null, index: number): Node {
  const inheritedDepth = previous ? previous.depth + previous.changeInDepth : 0;
  const inheritedBrackets = previous ? previous.openBrackets : BracketStack.EMPTY;

  const { depth, changeInDepth, openBrackets } = calculateDepth(token, inheritedDepth, inheritedBrackets);

  const isFirstOnLine = previous === null || previous.token.kind === TokenKind.NEWLINE;
  const previousToken = isFirstOnLine || previous === null ? null : previous.token;

  return Object.freeze({
    index,
    token,
    previous: previous ? previous.index : null,
    inheritedDepth,
    depth,
    changeInDepth,
    prefix: whitespace(token, isFirstOnLine, depth, previousToken),
    value: capitalize(token),
    openBrackets,
  });
}

/**
 * 计算 Node 的深度统计。
 *
 * token 既可能影响自身的缩进（changeBefore），也可能影响后续 token
 * （changeAfter，即返回值中的 changeInDepth）。
 *
 * @throws {UnmatchedCloserError} 闭合括号出现时栈中没有对应的开括号
 * @throws {MismatchedBracketPairError} 闭合括号与最近的开括号类型不符
 */
export function calculateDepth(token: Token, inheritedDepth: number, openBrackets: BracketStack): DepthResult {
  let changeBefore = 0;
  let changeAfter = 0;
  let brackets = openBrackets;

  switch (token.kind) {
    case TokenKind.TOP_KEYWORD: {
      const popped = brackets.pop();
      if (popped && popped.top.kind === TokenKind.TOP_KEYWORD) {
        // a keyword like 'from' following another top keyword closes it
        changeBefore = -1;
        brackets = popped.rest;
      }
      brackets = brackets.push(token);
      changeAfter = 1;
      break;
    }
    case TokenKind.BRACKET_OPEN:
      brackets = brackets.push(token);
      changeAfter = 1;
      break;
    case TokenKind.BRACKET_CLOSE: {
      let popped = brackets.pop();
      if (popped === null) {
        throw new UnmatchedCloserError(token.text, { start: token.start, end: token.end });
      }
      changeBefore = -1;
      // a keyword still open inside the brackets (e.g. a subquery's 'from')
      // sits above the matching opener
      if (popped.top.kind === TokenKind.TOP_KEYWORD) {
        popped = popped.rest.pop();
        if (popped === null) {
          throw new UnmatchedCloserError(token.text, { start: token.start, end: token.end });
        }
        changeBefore -= 1;
      }
      const opener = popped.top;
      if (opener.kind !== TokenKind.BRACKET_OPEN || MATCHING_CLOSER[opener.text] !== token.text) {
        throw new MismatchedBracketPairError(
          token.text,
          { start: token.start, end: token.end },
          opener.text,
          { start: opener.start, end: opener.end }
        );
      }
      brackets = popped.rest;
      break;
    }
    case TokenKind.STATEMENT_START:
      changeAfter = 1;
      break;
    case TokenKind.STATEMENT_END:
      changeBefore = -1;
      break;
    case TokenKind.NAME:
    case TokenKind.QUOTED_NAME:
    case TokenKind.COMMA:
    case TokenKind.DOT:
    case TokenKind.DOUBLE_COLON:
    case TokenKind.COMMENT:
    case TokenKind.NEWLINE:
    case TokenKind.NUMBER:
    case TokenKind.STAR:
    case TokenKind.OPERATOR:
    case TokenKind.SEMICOLON:
      break;
    default:
      return assertNever(token.kind);
  }

  return {
    depth: inheritedDepth + changeBefore,
    changeInDepth: changeAfter,
    openBrackets: brackets,
  };
}

/**
 * 返回 token 字面量之前应有的空白。多数 token 前是一个空格，例外如下。
 */
export function whitespace(
  token: Token,
  isFirstOnLine: boolean,
  depth: number,
  previousToken: Token | null
): string {
  if (isFirstOnLine) {
    return INDENT.repeat(Math.max(depth, 0));
  }

  switch (token.kind) {
    // never preceded by a space
    case TokenKind.BRACKET_CLOSE:
    case TokenKind.DOUBLE_COLON:
    case TokenKind.COMMA:
    case TokenKind.DOT:
    case TokenKind.NEWLINE:
      return NO_SPACE;
    // namespaced identifiers
    case TokenKind.NAME:
    case TokenKind.QUOTED_NAME:
      if (previousToken?.kind === TokenKind.DOT) return NO_SPACE;
      break;
    // function calls, unless the name declares a CTE ('as') or a window ('over')
    case TokenKind.BRACKET_OPEN:
      if (previousToken?.kind === TokenKind.NAME && !['as', 'over'].includes(previousToken.text.toLowerCase())) {
        return NO_SPACE;
      }
      return SPACE;
    default:
      break;
  }

  if (previousToken?.kind === TokenKind.BRACKET_OPEN || previousToken?.kind === TokenKind.DOUBLE_COLON) {
    return NO_SPACE;
  }
  return SPACE;
}

/**
 * 关键字、语句标记与普通名称统一小写。无法小写的数据库标识符应当加引号。
 * 对大小写敏感的方言可能需要调整此规则。
 */
export function capitalize(token: Token): string {
  switch (token.kind) {
    case TokenKind.TOP_KEYWORD:
    case TokenKind.NAME:
    case TokenKind.STATEMENT_START:
    case TokenKind.STATEMENT_END:
      return token.text.toLowerCase();
    default:
      return token.text;
  }
}

export function renderNode(node: Node): string {
  return node.prefix + node.value;
}

export function nodeLength(node: Node): number {
  return renderNode(node).length;
}

/**
 * 调试用的多行描述。前驱只以其 token 表示，避免沿链条无限展开。
 */
export function describeNode(node: Node, previous: Node | null): string {
  const prev = previous ? `Node(token=${JSON.stringify(previous.token.text)})` : 'None';
  const brackets = node.openBrackets.toArray().map(t => JSON.stringify(t.text));
  return [
    'Node(',
    `\ttoken=${JSON.stringify(node.token.text)},`,
    `\tprevious_node=${prev},`,
    `\tinherited_depth=${node.inheritedDepth},`,
    `\tdepth=${node.depth},`,
    `\tchange_in_depth=${node.changeInDepth},`,
    `\tprefix=${JSON.stringify(node.prefix)},`,
    `\tvalue=${JSON.stringify(node.value)},`,
    `\topen_brackets=[${brackets.join(', ')}]`,
    ')',
  ].join('\n');
}

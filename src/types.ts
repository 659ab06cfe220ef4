// Core type definitions for sqlindent

/**
 * 源码位置。行与列均从 0 开始计数，`end` 为开区间。
 */
export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export enum TokenKind {
  TOP_KEYWORD = 'TOP_KEYWORD',
  BRACKET_OPEN = 'BRACKET_OPEN',
  BRACKET_CLOSE = 'BRACKET_CLOSE',
  STATEMENT_START = 'STATEMENT_START',
  STATEMENT_END = 'STATEMENT_END',
  NAME = 'NAME',
  QUOTED_NAME = 'QUOTED_NAME',
  COMMA = 'COMMA',
  DOT = 'DOT',
  DOUBLE_COLON = 'DOUBLE_COLON',
  COMMENT = 'COMMENT',
  NEWLINE = 'NEWLINE',
  NUMBER = 'NUMBER',
  STAR = 'STAR',
  OPERATOR = 'OPERATOR',
  SEMICOLON = 'SEMICOLON',
}

/**
 * 词法单元。由扫描器产生，格式化核心只读不写。
 */
export interface Token {
  readonly kind: TokenKind;
  /** 源码中紧邻 token 之前的空白 */
  readonly prefix: string;
  /** token 的字面文本 */
  readonly text: string;
  readonly start: Position;
  readonly end: Position;
  /** token 所在的整行源码 */
  readonly line: string;
}

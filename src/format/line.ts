/**
 * @module format/line
 *
 * 行累加器：逐个追加 token，维护整行的深度统计与候选拆分位置。
 *
 * Line 对应原始输入中的一行（尚未重排）。下游的重排步骤读取
 * depthSplit / firstComma 决定在哪里拆分，并通过 fromNodes 构造新行，
 * 不会修改已有 Node。
 */

import { TokenKind } from '../types.js';
import type { Token } from '../types.js';
import { splitAfter, type SplitPolicy } from '../frontend/tokens.js';
import { BracketStack } from './bracket-stack.js';
import type { NodeArena } from './arena.js';
import { renderNode, type Node } from './node.js';

export interface LineState {
  /** 已并入的 Node 数 */
  readonly length: number;
  readonly depth: number;
  readonly changeInDepth: number;
  readonly openBrackets: BracketStack;
  readonly depthSplit: number | null;
  readonly firstComma: number | null;
}

export function initialLineState(previousNode: Node | null): LineState {
  return {
    length: 0,
    depth: previousNode ? previousNode.depth + previousNode.changeInDepth : 0,
    changeInDepth: 0,
    openBrackets: BracketStack.EMPTY,
    depthSplit: null,
    firstComma: null,
  };
}

/**
 * 把一个已创建的 Node 并入行状态，返回新状态。Node 序列本身由调用方保存。
 *
 * 拆分由外向内：缩进的行在第一个增加深度的 Node 处拆分，
 * 减少缩进的行在最后一个减少深度的 Node 处拆分。
 */
export function stepLine(state: LineState, node: Node, policy: SplitPolicy = splitAfter): LineState {
  const isFirst = state.length === 0;
  const depth = isFirst ? node.depth : state.depth;
  const changeInDepth = isFirst ? node.changeInDepth : node.depth - state.depth + node.changeInDepth;
  const openBrackets = isFirst ? node.openBrackets : state.openBrackets;

  const changeOverNode = node.depth - node.inheritedDepth + node.changeInDepth;
  const position = state.length;
  const splitIndex = policy(node.token.kind) ? position + 1 : position;

  let depthSplit = state.depthSplit;
  if (node.token.kind === TokenKind.COMMENT) {
    depthSplit = splitIndex;
  }
  if (changeInDepth < 0 && changeOverNode < 0 && splitIndex > 0) {
    depthSplit = splitIndex;
  } else if (depthSplit === null && node.changeInDepth > 0) {
    depthSplit = splitIndex;
  }

  let firstComma = state.firstComma;
  if (firstComma === null && node.token.kind === TokenKind.COMMA && node.openBrackets.equals(openBrackets)) {
    firstComma = position;
  }

  return {
    length: position + 1,
    depth,
    changeInDepth,
    openBrackets,
    depthSplit,
    firstComma,
  };
}

export interface LineOptions {
  readonly arena: NodeArena;
  /** 查询的完整源码 */
  readonly sourceString: string;
  /** 上一行的最后一个 Node */
  readonly previousNode?: Node | null;
  readonly splitPolicy?: SplitPolicy;
}

export class Line {
  readonly arena: NodeArena;
  readonly sourceString: string;
  readonly previousNode: Node | null;
  readonly splitPolicy: SplitPolicy;
  private readonly nodeList: Node[] = [];
  private state: LineState;

  constructor(options: LineOptions) {
    this.arena = options.arena;
    this.sourceString = options.sourceString;
    this.previousNode = options.previousNode ?? null;
    this.splitPolicy = options.splitPolicy ?? splitAfter;
    this.state = initialLineState(this.previousNode);
  }

  /**
   * 用一组已有 Node 的 token 重放出一条新行，供拆分与合并使用。
   */
  static fromNodes(options: LineOptions & { readonly nodes: readonly Node[] }): Line {
    const line = new Line(options);
    for (const node of options.nodes) {
      line.appendToken(node.token);
    }
    return line;
  }

  get nodes(): readonly Node[] {
    return this.nodeList;
  }

  get depth(): number {
    return this.state.depth;
  }

  get changeInDepth(): number {
    return this.state.changeInDepth;
  }

  get openBrackets(): BracketStack {
    return this.state.openBrackets;
  }

  get depthSplit(): number | null {
    return this.state.depthSplit;
  }

  get firstComma(): number | null {
    return this.state.firstComma;
  }

  get lastNode(): Node | null {
    return this.nodeList[this.nodeList.length - 1] ?? null;
  }

  appendToken(token: Token): Node {
    const previous = this.lastNode ?? this.previousNode;
    const node = this.arena.append(token, previous);
    this.state = stepLine(this.state, node, this.splitPolicy);
    this.nodeList.push(node);
    return node;
  }

  /**
   * 在行尾追加一个合成的 NEWLINE token，位置紧跟前一个 token。
   */
  appendNewline(): Node {
    const previousToken = this.lastNode?.token ?? this.previousNode?.token ?? null;
    const newline: Token = previousToken
      ? {
          kind: TokenKind.NEWLINE,
          prefix: '',
          text: '\n',
          start: { line: previousToken.end.line, col: previousToken.end.col + 1 },
          end: { line: previousToken.end.line, col: previousToken.end.col + 2 },
          line: previousToken.line,
        }
      : {
          kind: TokenKind.NEWLINE,
          prefix: '',
          text: '\n',
          start: { line: 0, col: 0 },
          end: { line: 0, col: 1 },
          line: '',
        };
    return this.appendToken(newline);
  }

  get tokens(): Token[] {
    return this.nodeList.map(node => node.token);
  }

  get startsWithTopKeyword(): boolean {
    return this.nodeList[0]?.token.kind === TokenKind.TOP_KEYWORD;
  }

  get endsWithComma(): boolean {
    return this.endsWith(TokenKind.COMMA);
  }

  get endsWithComment(): boolean {
    return this.endsWith(TokenKind.COMMENT);
  }

  // a trailing newline does not count
  private endsWith(kind: TokenKind): boolean {
    const nodes = this.nodeList;
    const last = nodes[nodes.length - 1];
    if (last === undefined) return false;
    if (last.token.kind === kind) return true;
    const beforeLast = nodes[nodes.length - 2];
    return last.token.kind === TokenKind.NEWLINE && beforeLast?.token.kind === kind;
  }

  render(): string {
    return this.nodeList.map(renderNode).join('');
  }

  toString(): string {
    return this.render();
  }

  get length(): number {
    return this.render().length;
  }
}

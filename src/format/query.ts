/**
 * @module format/query
 *
 * 对整个 token 流做一次从左到右的遍历，按 NEWLINE 切分为 Line。
 * 同一查询的所有 Node 存放在同一个 NodeArena 中。
 */

import { TokenKind } from '../types.js';
import type { Token } from '../types.js';
import type { SplitPolicy } from '../frontend/tokens.js';
import { lex } from '../frontend/lexer.js';
import { ConfigService } from '../config/config-service.js';
import { createLogger } from '../utils/logger.js';
import { NodeArena } from './arena.js';
import { Line } from './line.js';

export interface Query {
  readonly sourceString: string;
  readonly lines: readonly Line[];
  readonly arena: NodeArena;
}

export interface BuildQueryOptions {
  readonly splitPolicy?: SplitPolicy;
}

export interface LineSummary {
  /** 从 1 开始的行号 */
  readonly number: number;
  readonly depth: number;
  readonly changeInDepth: number;
  readonly depthSplit: number | null;
  readonly firstComma: number | null;
  readonly text: string;
}

export function buildQuery(source: string, tokens: readonly Token[], options: BuildQueryOptions = {}): Query {
  const logger = createLogger('format.query');
  const arena = new NodeArena();
  const lines: Line[] = [];
  const newLine = (previous: Line | null): Line =>
    new Line({
      arena,
      sourceString: source,
      previousNode: previous?.lastNode ?? null,
      ...(options.splitPolicy ? { splitPolicy: options.splitPolicy } : {}),
    });

  let current = newLine(null);
  for (const token of tokens) {
    current.appendToken(token);
    if (token.kind === TokenKind.NEWLINE) {
      lines.push(current);
      current = newLine(current);
    }
  }
  if (current.nodes.length > 0) {
    current.appendNewline();
    lines.push(current);
  }

  logger.debug('built query', { lines: lines.length, nodes: arena.size });
  if (ConfigService.getInstance().traceLines) {
    for (const summary of summarizeLines({ sourceString: source, lines, arena })) {
      logger.debug('line', { ...summary });
    }
  }

  return { sourceString: source, lines, arena };
}

export function renderQuery(query: Query): string {
  return query.lines.map(line => line.render()).join('');
}

export function summarizeLines(query: Query): LineSummary[] {
  return query.lines.map((line, i) => ({
    number: i + 1,
    depth: line.depth,
    changeInDepth: line.changeInDepth,
    depthSplit: line.depthSplit,
    firstComma: line.firstComma,
    text: line.render(),
  }));
}

/**
 * 扫描、构建并渲染：把 SQL 源码重新缩进。
 */
export function formatSql(source: string, options: BuildQueryOptions = {}): string {
  return renderQuery(buildQuery(source, lex(source), options));
}

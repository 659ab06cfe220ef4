/**
 * @module sqlindent
 *
 * SQL 格式化器的深度与版式引擎。
 *
 * **处理管道**：
 * ```
 * SQL 源码 → lex → Token[] → buildQuery → Line[]（每个 Node 已有深度、前导空白与拆分标记）→ renderQuery
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { lex, buildQuery, renderQuery } from 'sqlindent';
 *
 * const src = 'SELECT a, b\nFROM t\n';
 * const query = buildQuery(src, lex(src));
 * console.log(query.lines[0]?.firstComma); // 2
 * console.log(renderQuery(query));         // "select a, b\nfrom t\n"
 * ```
 */

export type { Position, Span, Token } from './types.js';
export * from './frontend/index.js';
export * from './format/index.js';
export * from './diagnostics/index.js';

export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, logPerformance, type LogMetadata } from './utils/logger.js';

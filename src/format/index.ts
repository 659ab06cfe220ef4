/**
 * @module format
 *
 * 深度与版式引擎：Node（单个 token）、Line（一行 Node）与 Query（整段 SQL）。
 */

export { BracketStack, type PopResult } from './bracket-stack.js';
export {
  createNode,
  calculateDepth,
  whitespace,
  capitalize,
  renderNode,
  nodeLength,
  describeNode,
  type Node,
  type DepthResult,
} from './node.js';
export { NodeArena } from './arena.js';
export { Line, stepLine, initialLineState, type LineState, type LineOptions } from './line.js';
export {
  buildQuery,
  renderQuery,
  summarizeLines,
  formatSql,
  type Query,
  type BuildQueryOptions,
  type LineSummary,
} from './query.js';

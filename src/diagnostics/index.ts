/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 括号配对错误 (UnmatchedCloserError, MismatchedBracketPairError)
 * - 诊断严重级别与诊断代码
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  UnmatchedCloserError,
  MismatchedBracketPairError,
  Diagnostics,
  formatDiagnostic,
  formatPosition,
  type Diagnostic,
  type RelatedInformation,
} from './diagnostics.js';

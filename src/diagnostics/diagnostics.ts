// Structured diagnostics with error codes, spans, and related locations

import type { Position, Span } from '../types.js';

// Every diagnostic raised here aborts formatting of the input
export enum DiagnosticSeverity {
  Error = 'error',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnexpectedCharacter = 'L001',
  L002_UnterminatedText = 'L002',

  // Formatter errors (F001-F099)
  F001_UnmatchedCloser = 'F001',
  F002_MismatchedBracketPair = 'F002',
}

export interface RelatedInformation {
  readonly span: Span;
  readonly message: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly relatedInformation?: readonly RelatedInformation[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

/**
 * 闭合括号出现时栈已为空：源码中的括号确实不配对，属于用户输入错误。
 */
export class UnmatchedCloserError extends DiagnosticError {
  constructor(
    readonly bracket: string,
    span: Span
  ) {
    super(
      DiagnosticBuilder.error(DiagnosticCode.F001_UnmatchedCloser)
        .withMessage(
          `Closing bracket '${bracket}' found at ${formatPosition(span.start)} before bracket was opened.`
        )
        .withSpan(span)
        .build()
    );
    this.name = 'UnmatchedCloserError';
  }
}

/**
 * 闭合括号与栈顶的开括号类型不一致。扫描器应当已经拦截这种输入，
 * 出现即说明上游存在缺陷。
 */
export class MismatchedBracketPairError extends DiagnosticError {
  constructor(
    readonly closer: string,
    closerSpan: Span,
    readonly opener: string,
    openerSpan: Span
  ) {
    super(
      DiagnosticBuilder.error(DiagnosticCode.F002_MismatchedBracketPair)
        .withMessage(
          `Closing bracket '${closer}' found at ${formatPosition(closerSpan.start)} does not match ` +
            `last opened bracket '${opener}' found at ${formatPosition(openerSpan.start)}.`
        )
        .withSpan(closerSpan)
        .withRelated(openerSpan, `'${opener}' opened here`)
        .build()
    );
    this.name = 'MismatchedBracketPairError';
  }
}

export class DiagnosticBuilder {
  private readonly severity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private relatedInformation: RelatedInformation[] = [];

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCode(code);
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withRelated(span: Span, message: string): DiagnosticBuilder {
    this.relatedInformation.push({ span, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    const diagnostic: Diagnostic = {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
    };

    if (this.relatedInformation.length > 0) {
      return { ...diagnostic, relatedInformation: [...this.relatedInformation] };
    }
    return diagnostic;
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unexpectedCharacter: (char: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_UnexpectedCharacter)
      .withMessage(`Unexpected character '${char}'`)
      .withPosition(pos),

  unterminatedText: (opening: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedText)
      .withMessage(`Unterminated text starting with '${opening}'`)
      .withPosition(pos),
};

// Positions are zero-based internally; humans read them one-based
export function formatPosition(pos: Position): string {
  return `${pos.line + 1}:${pos.col + 1}`;
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;

  let result = `${severity} ${code}: ${message} at ${formatPosition(span.start)}`;

  if (diagnostic.relatedInformation) {
    for (const related of diagnostic.relatedInformation) {
      result += `\n  note: ${related.message} at ${formatPosition(related.span.start)}`;
    }
  }

  if (source) {
    const lines = source.split(/\r\n|\r|\n/);
    const line = lines[span.start.line];
    if (line !== undefined) {
      const lineNo = String(span.start.line + 1);
      result += `\n> ${lineNo}| ${line}`;
      result += `\n> ${' '.repeat(lineNo.length)}  ${' '.repeat(span.start.col)}^`;
    }
  }

  return result;
}

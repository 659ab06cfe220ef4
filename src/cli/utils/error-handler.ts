import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticError, formatPosition } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn, detail as logDetail } from './logger.js';

type CliErrorCategory = 'syntax' | 'brackets' | 'internal' | 'unknown';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: string): CliErrorCategory {
  if (code.startsWith('L00')) return 'syntax';
  if (code === 'F001') return 'brackets';
  if (code === 'F002') return 'internal';
  return 'unknown';
}

function hintFor(code: string): string | null {
  switch (classify(code)) {
    case 'syntax':
      return 'The scanner could not read the input; check quoting and comments near this position';
    case 'brackets':
      return 'Every closing bracket needs an opening bracket earlier in the query';
    case 'internal':
      return 'Brackets reached the formatter unbalanced; this is a scanner defect, please report it with the input';
    default:
      return null;
  }
}

function printDiagnostic(diag: Diagnostic): void {
  logError(`[${diag.code}] ${diag.message}`);
  for (const related of diag.relatedInformation ?? []) {
    logDetail(`${related.message} (${formatPosition(related.span.start)})`);
  }
  const hint = hintFor(diag.code);
  if (hint) {
    logWarn(hint);
  }
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`Permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`File not found: ${error.message}`);
      break;
    default:
      logError(`File system error (${code}): ${error.message}`);
      break;
  }
}

export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostic(error.diagnostic);
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('An unknown error occurred');
  }

  process.exit(1);
}

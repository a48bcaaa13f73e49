import { DiagnosticCode, DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { DiacriticAssertionError } from '../../diacritics/preview.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'table' | 'symbols' | 'stale' | 'lookup' | 'unknown';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('D00')) return 'table';
  if (code.startsWith('S00')) return 'symbols';
  if (code === DiagnosticCode.G001_StaleOutput) return 'stale';
  if (code === DiagnosticCode.G002_UnknownDiacritic) return 'lookup';
  return 'unknown';
}

function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'table':
      return 'Check src/_diacritics.csv: header row and one complete record per line';
    case 'symbols':
      return 'Run the command from the package root or pass --root <dir>';
    case 'stale':
      return 'Re-run the generator without --check and commit the result';
    case 'lookup':
      return 'Use a tyipa-name or alias from src/_diacritics.csv';
    default:
      return null;
  }
}

function printDiagnostic(error: DiagnosticError): void {
  logError(formatDiagnostic(error.diagnostic));
  const hint = hintFor(error.code);
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

export function handleError(error: unknown): void {
  if (error instanceof DiagnosticError) {
    printDiagnostic(error);
    process.exit(1);
  }

  if (error instanceof DiacriticAssertionError) {
    logError(`assertion failed: ${error.message}`);
    process.exit(1);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('Unknown error');
  }

  process.exit(1);
}

// Structured diagnostics with error codes and source locations

import type { SourceLocation } from '../types.js';

// Generators only fail hard; there is no warning channel.
export enum DiagnosticSeverity {
  Error = 'error',
}

export enum DiagnosticCode {
  // Definition loader errors (D001-D099)
  D001_TableNotFound = 'D001',
  D002_TableUnreadable = 'D002',
  D003_MalformedTable = 'D003',
  D004_MissingColumn = 'D004',
  D005_MissingField = 'D005',
  D006_DuplicateName = 'D006',
  D007_InvalidCodePoint = 'D007',

  // Symbol scanner errors (S001-S099)
  S001_SourceNotFound = 'S001',
  S002_SourceUnreadable = 'S002',

  // Generation errors (G001-G099)
  G001_StaleOutput = 'G001',
  G002_UnknownDiacritic = 'G002',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly location?: SourceLocation;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }
}

/** Raised while reading the diacritic definition table. */
export class LoadError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = 'LoadError';
  }
}

/** Raised while reading the symbol source file. */
export class ScanError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = 'ScanError';
  }
}

type DiagnosticErrorClass = new (diagnostic: Diagnostic) => DiagnosticError;

export class DiagnosticBuilder {
  private code?: DiagnosticCode;
  private message?: string;
  private location?: SourceLocation;

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

  at(file: string, line?: number): DiagnosticBuilder {
    this.location = line === undefined ? { file } : { file, line };
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    const diagnostic: Diagnostic = {
      severity: DiagnosticSeverity.Error,
      code: this.code,
      message: this.message,
    };
    return this.location ? { ...diagnostic, location: this.location } : diagnostic;
  }

  throw(errorClass: DiagnosticErrorClass = DiagnosticError): never {
    throw new errorClass(this.build());
  }
}

export function formatLocation(location: SourceLocation): string {
  return location.line === undefined ? location.file : `${location.file}:${location.line}`;
}

// Format a diagnostic for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.location ? ` (${formatLocation(diagnostic.location)})` : '';
  return `[${diagnostic.code}] ${diagnostic.message}${where}`;
}

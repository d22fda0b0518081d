// Structured diagnostics with error codes and spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnterminatedString = 'L001',
  L002_UnterminatedComment = 'L002',
  L003_UnterminatedHeredoc = 'L003',

  // Parser errors (P001-P099)
  P001_ExpectedIdentifier = 'P001',
  P002_ExpectedBlockOrAttribute = 'P002',
  P003_UnexpectedToken = 'P003',
  P004_UnclosedBlock = 'P004',
  P005_UnbalancedBrace = 'P005',
  P006_MissingAttributeValue = 'P006',

  // Decoder warnings (D001-D099)
  D001_DuplicateAttribute = 'D001',
  D002_NonLiteralModuleSource = 'D002',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
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

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
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

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unterminatedString: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_UnterminatedString)
      .withMessage('Unterminated string literal')
      .withPosition(pos),

  unterminatedComment: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedComment)
      .withMessage('Unterminated block comment')
      .withPosition(pos),

  unterminatedHeredoc: (marker: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L003_UnterminatedHeredoc)
      .withMessage(`Heredoc is missing its closing marker "${marker}"`)
      .withPosition(pos),

  expectedIdentifier: (actual: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P001_ExpectedIdentifier)
      .withMessage(`Expected an identifier, found ${actual}`)
      .withSpan(span),

  expectedBlockOrAttribute: (name: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P002_ExpectedBlockOrAttribute)
      .withMessage(`Expected "=" or "{" after "${name}"`)
      .withSpan(span),

  unexpectedToken: (actual: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P003_UnexpectedToken)
      .withMessage(`Unexpected ${actual}`)
      .withSpan(span),

  unclosedBlock: (blockType: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P004_UnclosedBlock)
      .withMessage(`Block "${blockType}" is missing its closing "}"`)
      .withSpan(span),

  unbalancedBrace: (span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P005_UnbalancedBrace)
      .withMessage('Unmatched closing brace')
      .withSpan(span),

  missingAttributeValue: (name: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P006_MissingAttributeValue)
      .withMessage(`Attribute "${name}" is missing a value`)
      .withSpan(span),

  duplicateAttribute: (name: string, span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.D001_DuplicateAttribute)
      .withMessage(`Attribute "${name}" is defined more than once`)
      .withSpan(span),

  nonLiteralModuleSource: (span: Span): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.D002_NonLiteralModuleSource)
      .withMessage('Module source must be a literal string')
      .withSpan(span),
};

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { line, character } = diagnostic.span.start;
  return `${diagnostic.severity} ${diagnostic.code} at ${line + 1}:${character + 1}: ${diagnostic.message}`;
}

/** Severity classes used by parser, aggregation, and generation diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
}

/** True when at least one diagnostic carries `error` severity. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

/** Single-line rendering used by the command-line runner. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.source
    ? ` (${diagnostic.source.name ? `${diagnostic.source.name}:` : ''}${diagnostic.source.line}:${diagnostic.source.column})`
    : '';
  const path = diagnostic.xmlPath ? ` at ${diagnostic.xmlPath}` : '';
  return `[${diagnostic.severity}] ${diagnostic.code}: ${diagnostic.message}${location}${path}`;
}

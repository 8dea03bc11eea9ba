export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly assetPath?: string;
  readonly entityId?: string;
}

export const hasErrorDiagnostics = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((diagnostic) => diagnostic.severity === 'error');

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const suffix = diagnostic.suggestion === undefined ? '' : ` ${diagnostic.suggestion}`;
  return `[${diagnostic.severity}] ${diagnostic.code} at ${diagnostic.path}: ${diagnostic.message}${suffix}`;
}

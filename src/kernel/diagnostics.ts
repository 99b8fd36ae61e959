export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly alternatives?: readonly string[];
  readonly sourcePath?: string;
  readonly entityId?: string;
}

export const hasErrorDiagnostics = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((diagnostic) => diagnostic.severity === 'error');

export const summarizeDiagnostics = (diagnostics: readonly Diagnostic[]): string =>
  diagnostics
    .slice(0, 5)
    .map((diagnostic) => `${diagnostic.code}@${diagnostic.path}`)
    .join(', ');

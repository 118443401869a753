export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly alternatives?: readonly string[];
  readonly collection?: string;
  readonly entityId?: string;
  readonly sourceId?: string;
  readonly filePath?: string;
}

export const isFatalDiagnostic = (diagnostic: Diagnostic): boolean => diagnostic.severity === 'error';

export const hasFatalDiagnostics = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some(isFatalDiagnostic);

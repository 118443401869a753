import type { Diagnostic, DiagnosticSeverity } from './diagnostics.js';

const DIAGNOSTIC_SEVERITY_RANK: Readonly<Record<DiagnosticSeverity, number>> = {
  error: 0,
  warning: 1,
  info: 2,
};

export function getDiagnosticSeverityRank(severity: DiagnosticSeverity): number {
  return DIAGNOSTIC_SEVERITY_RANK[severity];
}

// Plain code-unit comparison: localeCompare depends on the host's ICU data.
export function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function compareDiagnosticsDeterministic(left: Diagnostic, right: Diagnostic): number {
  const pathComparison = compareText(left.path, right.path);
  if (pathComparison !== 0) {
    return pathComparison;
  }

  const severityDelta = getDiagnosticSeverityRank(left.severity) - getDiagnosticSeverityRank(right.severity);
  if (severityDelta !== 0) {
    return severityDelta;
  }

  const codeComparison = compareText(left.code, right.code);
  if (codeComparison !== 0) {
    return codeComparison;
  }

  return compareText(left.message, right.message);
}

export function sortDiagnosticsDeterministic(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  return [...diagnostics].sort(compareDiagnosticsDeterministic);
}

export function dedupeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  const seen = new Set<string>();
  const deduped: Diagnostic[] = [];

  for (const diagnostic of diagnostics) {
    const key = serializeDiagnosticForDeduping(diagnostic);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    deduped.push(diagnostic);
  }

  return deduped;
}

export function normalizeDiagnostics(diagnostics: readonly Diagnostic[]): readonly Diagnostic[] {
  return sortDiagnosticsDeterministic(dedupeDiagnostics(diagnostics));
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const suggestion = diagnostic.suggestion === undefined ? '' : ` (${diagnostic.suggestion})`;
  return `[${diagnostic.severity}] ${diagnostic.code} ${diagnostic.path}: ${diagnostic.message}${suggestion}`;
}

function serializeDiagnosticForDeduping(diagnostic: Diagnostic): string {
  const alternatives = diagnostic.alternatives === undefined ? '' : diagnostic.alternatives.join('\u001f');
  return [
    diagnostic.code,
    diagnostic.path,
    diagnostic.severity,
    diagnostic.message,
    diagnostic.suggestion ?? '',
    alternatives,
    diagnostic.collection ?? '',
    diagnostic.entityId ?? '',
    diagnostic.sourceId ?? '',
    diagnostic.filePath ?? '',
  ].join('\u001e');
}

import type { Diagnostic } from './diagnostics.js';

export const CONTENT_DIAGNOSTIC_CODES = Object.freeze({
  CONTENT_PARSE_ERROR: 'CONTENT_PARSE_ERROR',
  CONTENT_SCHEMA_INVALID: 'CONTENT_SCHEMA_INVALID',
  CONTENT_FORMAT_AMBIGUOUS: 'CONTENT_FORMAT_AMBIGUOUS',
  CONTENT_SCHEMA_VERSION_REJECTED: 'CONTENT_SCHEMA_VERSION_REJECTED',
  CONTENT_MOD_SKIPPED: 'CONTENT_MOD_SKIPPED',
  CONTENT_MOD_UNRECOGNIZED: 'CONTENT_MOD_UNRECOGNIZED',
  CONTENT_DUPLICATE_ID: 'CONTENT_DUPLICATE_ID',
  CONTENT_INVARIANT_VIOLATION: 'CONTENT_INVARIANT_VIOLATION',
  CONTENT_UNRESOLVED_REFERENCE: 'CONTENT_UNRESOLVED_REFERENCE',
  CONTENT_LOCALIZATION_MISSING: 'CONTENT_LOCALIZATION_MISSING',
  CONTENT_ID_NAMING: 'CONTENT_ID_NAMING',
} as const);

export type ContentDiagnosticCode = (typeof CONTENT_DIAGNOSTIC_CODES)[keyof typeof CONTENT_DIAGNOSTIC_CODES];

export interface EntityDiagnosticInput {
  readonly collection: string;
  readonly entityId: string;
  readonly path: string;
  readonly sourceId?: string;
}

export function buildDuplicateIdDiagnostic(input: EntityDiagnosticInput, detail: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_DUPLICATE_ID,
    path: input.path,
    severity: 'error',
    message: `Duplicate id "${input.entityId}" in ${input.collection}: ${detail}.`,
    suggestion: 'Give each record in a collection its own id, or move the override into a mod.',
    collection: input.collection,
    entityId: input.entityId,
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
}

export function buildInvariantDiagnostic(input: EntityDiagnosticInput, message: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_INVARIANT_VIOLATION,
    path: input.path,
    severity: 'error',
    message,
    collection: input.collection,
    entityId: input.entityId,
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
}

export function buildUnresolvedReferenceDiagnostic(
  input: EntityDiagnosticInput,
  target: string,
  referencedId: string,
  alternatives: readonly string[],
): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_UNRESOLVED_REFERENCE,
    path: input.path,
    severity: 'error',
    message: `Reference "${referencedId}" does not resolve to an id in ${target}.`,
    suggestion:
      alternatives.length > 0 ? `Did you mean "${alternatives[0]}"?` : `Use an id defined in ${target}.`,
    collection: input.collection,
    entityId: input.entityId,
    ...(alternatives.length === 0 ? {} : { alternatives: [...alternatives] }),
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
}

export function buildLocalizationWarning(input: EntityDiagnosticInput, field: string, locale: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_LOCALIZATION_MISSING,
    path: input.path,
    severity: 'warning',
    message: `Missing "${locale}" text for ${field} of "${input.entityId}".`,
    collection: input.collection,
    entityId: input.entityId,
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
}

export function buildNamingWarning(input: EntityDiagnosticInput, pattern: string): Diagnostic {
  return {
    code: CONTENT_DIAGNOSTIC_CODES.CONTENT_ID_NAMING,
    path: input.path,
    severity: 'warning',
    message: `Id "${input.entityId}" does not match the naming convention ${pattern}.`,
    suggestion: 'Use lowercase words separated by underscores.',
    collection: input.collection,
    entityId: input.entityId,
    ...(input.sourceId === undefined ? {} : { sourceId: input.sourceId }),
  };
}

/** Re-labels file-level failures of a mod as non-fatal once the mod has been excluded. */
export function downgradeToWarning(diagnostic: Diagnostic): Diagnostic {
  return diagnostic.severity === 'error' ? { ...diagnostic, severity: 'warning' } : diagnostic;
}

import { getAlternatives } from '../kernel/alternatives.js';
import {
  buildDuplicateIdDiagnostic,
  buildInvariantDiagnostic,
  buildLocalizationWarning,
  buildNamingWarning,
  buildUnresolvedReferenceDiagnostic,
} from '../kernel/diagnostic-codes.js';
import type { EntityDiagnosticInput } from '../kernel/diagnostic-codes.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { COLLECTION_KEYS, COLLECTION_RULES } from './collections.js';
import type { CollectionKey, CollectionLists, EntityRecordMap } from './collections.js';
import { lastWriterOf, techEdgeKey } from './merge.js';
import type { MergedContent, MergeTrail } from './merge.js';
import type { LocalizedText } from './schemas.js';

export interface ValidationOptions {
  /** Locales every display text should carry; `en` is always required by the schema. */
  readonly locales: readonly string[];
  readonly namingPattern: string;
}

/**
 * Runs the fatal and advisory rules over merged content. Any `error` diagnostic
 * means the candidate must not be published.
 */
export function validateMergedContent(merged: MergedContent, options: ValidationOptions): readonly Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const naming = new RegExp(options.namingPattern);
  const localesToCheck = options.locales.filter((locale) => locale !== 'en');

  for (const duplicate of merged.duplicates) {
    diagnostics.push(
      buildDuplicateIdDiagnostic(
        {
          collection: duplicate.collection,
          entityId: duplicate.entityId,
          path: `${duplicate.collection}.${duplicate.entityId}`,
          sourceId: duplicate.sourceId,
        },
        `listed more than once by ${duplicate.sourceId} (again at position ${duplicate.position})`,
      ),
    );
  }

  const context: RuleContext = {
    collections: merged.collections,
    trail: merged.trail,
    naming,
    namingPattern: options.namingPattern,
    localesToCheck,
    diagnostics,
  };
  for (const key of COLLECTION_KEYS) {
    validateCollection(key, context);
  }

  validateTechEdges(merged, diagnostics);

  const threshold = merged.victoryRules.dominationThreshold;
  if (!isWithinUnitRange(threshold)) {
    diagnostics.push(
      buildInvariantDiagnostic(
        {
          collection: 'victoryRules',
          entityId: 'victoryRules',
          path: 'victoryRules.dominationThreshold',
          ...(merged.victoryRulesSourceId === null ? {} : { sourceId: merged.victoryRulesSourceId }),
        },
        `dominationThreshold must be within [0, 1] (got ${threshold})`,
      ),
    );
  }

  return diagnostics;
}

export function isWithinUnitRange(value: number): boolean {
  return value >= 0 && value <= 1;
}

interface RuleContext {
  readonly collections: CollectionLists;
  readonly trail: MergeTrail;
  readonly naming: RegExp;
  readonly namingPattern: string;
  readonly localesToCheck: readonly string[];
  readonly diagnostics: Diagnostic[];
}

function validateCollection<K extends CollectionKey>(key: K, context: RuleContext): void {
  const rules = COLLECTION_RULES[key];
  const records: readonly EntityRecordMap[K][] = context.collections[key];
  const seen = new Set<string>();

  for (const record of records) {
    const subject = (field?: string): EntityDiagnosticInput => {
      const sourceId = lastWriterOf(context.trail, key, record.id);
      return {
        collection: key,
        entityId: record.id,
        path: field === undefined ? `${key}.${record.id}` : `${key}.${record.id}.${field}`,
        ...(sourceId === undefined ? {} : { sourceId }),
      };
    };

    if (seen.has(record.id)) {
      context.diagnostics.push(buildDuplicateIdDiagnostic(subject(), 'present more than once after merge'));
    }
    seen.add(record.id);

    for (const field of rules.positive) {
      const value: unknown = record[field];
      if (typeof value === 'number' && !(Number.isFinite(value) && value > 0)) {
        context.diagnostics.push(
          buildInvariantDiagnostic(subject(field), `${key}.${field} must be greater than 0 (got ${value})`),
        );
      }
    }

    for (const field of rules.nonNegative) {
      const value: unknown = record[field];
      if (typeof value === 'number' && !(Number.isFinite(value) && value >= 0)) {
        context.diagnostics.push(
          buildInvariantDiagnostic(subject(field), `${key}.${field} must be 0 or greater (got ${value})`),
        );
      }
    }

    for (const reference of rules.references) {
      const value: unknown = record[reference.field];
      if (typeof value !== 'string') {
        continue;
      }
      const targetIds = idsOf(context.collections, reference.target);
      if (!targetIds.includes(value)) {
        context.diagnostics.push(
          buildUnresolvedReferenceDiagnostic(
            subject(reference.field),
            reference.target,
            value,
            getAlternatives(value, targetIds),
          ),
        );
      }
    }

    for (const invariant of rules.invariants) {
      const violation = invariant.check(record);
      if (violation !== null) {
        context.diagnostics.push(buildInvariantDiagnostic(subject(invariant.field), violation));
      }
    }

    if (!context.naming.test(record.id)) {
      context.diagnostics.push(buildNamingWarning(subject(), context.namingPattern));
    }

    checkLocalization(record.name, 'name', subject, context);
    if (record.description !== undefined) {
      checkLocalization(record.description, 'description', subject, context);
    }
  }
}

function checkLocalization(
  text: LocalizedText,
  field: string,
  subject: (field?: string) => EntityDiagnosticInput,
  context: RuleContext,
): void {
  for (const locale of context.localesToCheck) {
    const value = text[locale];
    if (value === undefined || value.trim() === '') {
      context.diagnostics.push(buildLocalizationWarning(subject(`${field}.${locale}`), field, locale));
    }
  }
}

function validateTechEdges(merged: MergedContent, diagnostics: Diagnostic[]): void {
  const techIds = idsOf(merged.collections, 'techs');
  const known = new Set(techIds);

  for (const edge of merged.techEdges) {
    const edgeKey = techEdgeKey(edge);
    const sourceId = lastWriterOf(merged.trail, 'techEdges', edgeKey);
    const subject = (field: string): EntityDiagnosticInput => ({
      collection: 'techEdges',
      entityId: edgeKey,
      path: `techEdges.${edgeKey}.${field}`,
      ...(sourceId === undefined ? {} : { sourceId }),
    });

    for (const field of ['from', 'to'] as const) {
      if (!known.has(edge[field])) {
        diagnostics.push(
          buildUnresolvedReferenceDiagnostic(subject(field), 'techs', edge[field], getAlternatives(edge[field], techIds)),
        );
      }
    }
    if (edge.from === edge.to) {
      diagnostics.push(buildInvariantDiagnostic(subject('to'), `Technology "${edge.from}" cannot be its own prerequisite`));
    }
  }

  for (const cycle of findPrerequisiteCycles(merged)) {
    diagnostics.push(
      buildInvariantDiagnostic(
        { collection: 'techEdges', entityId: cycle[0] ?? '', path: 'techEdges' },
        `Technology prerequisites form a cycle: ${cycle.join(' -> ')}`,
      ),
    );
  }
}

/** Cycles of length two or more, each listed from its first-visited node back to itself. */
export function findPrerequisiteCycles(merged: Pick<MergedContent, 'collections' | 'techEdges'>): readonly string[][] {
  const successors = new Map<string, string[]>();
  for (const edge of merged.techEdges) {
    if (edge.from === edge.to) {
      continue;
    }
    const next = successors.get(edge.from) ?? [];
    next.push(edge.to);
    successors.set(edge.from, next);
  }

  const roots = [...idsOf(merged.collections, 'techs'), ...successors.keys()];
  const state = new Map<string, 'active' | 'done'>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (node: string): void => {
    state.set(node, 'active');
    stack.push(node);
    for (const next of successors.get(node) ?? []) {
      const nextState = state.get(next);
      if (nextState === 'active') {
        cycles.push([...stack.slice(stack.indexOf(next)), next]);
      } else if (nextState === undefined) {
        visit(next);
      }
    }
    stack.pop();
    state.set(node, 'done');
  };

  for (const root of roots) {
    if (!state.has(root)) {
      visit(root);
    }
  }
  return cycles;
}

function idsOf(collections: CollectionLists, key: CollectionKey): readonly string[] {
  return collections[key].map((record) => record.id);
}

import type { Diagnostic } from '../kernel/diagnostics.js';
import { hasFatalDiagnostics } from '../kernel/diagnostics.js';
import { normalizeDiagnostics } from '../kernel/diagnostic-order.js';
import type { Logger } from '../kernel/logger.js';
import { silentLogger } from '../kernel/logger.js';
import type { PipelineConfig } from './config.js';
import { deriveAll } from './derive.js';
import { loadSource } from './load-source.js';
import type { LoadedSource } from './load-source.js';
import { mergeSources } from './merge.js';
import type { MergedContent, MergeInput } from './merge.js';
import { throwIfAborted } from './pack-files.js';
import { GameRegistry } from './registry.js';
import { resolveSources } from './resolve-sources.js';
import type { ContentSource, ResolvedManifest } from './resolve-sources.js';
import { computeContentFingerprint, deepFreeze } from './snapshot.js';
import type { ContentSnapshot, SourceSummary } from './snapshot.js';
import { validateMergedContent } from './validate.js';

export interface LoadContentOptions {
  readonly signal?: AbortSignal;
  /** Generation number stamped on the snapshot; defaults to 0. */
  readonly generation?: number;
  readonly logger?: Logger;
}

export type LoadOutcome =
  | { readonly ok: true; readonly snapshot: ContentSnapshot }
  | { readonly ok: false; readonly diagnostics: readonly Diagnostic[] };

export interface LintReport {
  readonly diagnostics: readonly Diagnostic[];
  readonly fatal: boolean;
}

interface Candidate {
  readonly manifest: ResolvedManifest;
  readonly merged: MergedContent;
  readonly mergedSources: readonly ContentSource[];
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Runs every stage against the current file-system contents. Fatal diagnostics
 * reject the whole candidate; nothing partial is ever returned.
 */
export async function loadContent(config: PipelineConfig, options: LoadContentOptions = {}): Promise<LoadOutcome> {
  const logger = options.logger ?? silentLogger();
  const candidate = await buildCandidate(config, options.signal, logger);
  if (hasFatalDiagnostics(candidate.diagnostics)) {
    return { ok: false, diagnostics: candidate.diagnostics };
  }

  throwIfAborted(options.signal, 'derive');
  const { merged } = candidate;
  const derived = deriveAll(merged.collections, merged.techEdges);

  throwIfAborted(options.signal, 'registry');
  const registry = GameRegistry.build(merged.collections, derived);
  const snapshot: ContentSnapshot = deepFreeze({
    generation: options.generation ?? 0,
    fingerprint: computeContentFingerprint(merged),
    effectiveSchemaVersion: effectiveSchemaVersion(candidate.manifest, candidate.mergedSources),
    manifest: candidate.manifest,
    sources: candidate.mergedSources.map(summarizeSource),
    registry,
    techEdges: merged.techEdges,
    settings: { victoryRules: merged.victoryRules },
    diagnostics: candidate.diagnostics,
  });
  logger.debug('Built content snapshot', {
    generation: snapshot.generation,
    fingerprint: snapshot.fingerprint,
    sources: snapshot.sources.map((source) => source.id),
  });
  return { ok: true, snapshot };
}

/** Resolves, decodes, merges and validates without building a registry. */
export async function lintContent(
  config: PipelineConfig,
  options: Pick<LoadContentOptions, 'signal' | 'logger'> = {},
): Promise<LintReport> {
  const candidate = await buildCandidate(config, options.signal, options.logger ?? silentLogger());
  return { diagnostics: candidate.diagnostics, fatal: hasFatalDiagnostics(candidate.diagnostics) };
}

/** The lowest schema version among the manifest and every merged mod. */
export function effectiveSchemaVersion(manifest: ResolvedManifest, sources: readonly ContentSource[]): number {
  return sources.reduce((lowest, source) => Math.min(lowest, source.schemaVersion), manifest.schemaVersion);
}

async function buildCandidate(
  config: PipelineConfig,
  signal: AbortSignal | undefined,
  logger: Logger,
): Promise<Candidate> {
  const resolution = await resolveSources(config, signal === undefined ? {} : { signal });
  const diagnostics: Diagnostic[] = [...resolution.diagnostics];
  logger.debug('Resolved content sources', { sources: resolution.sources.map((source) => source.id) });

  const loaded: LoadedSource[] = [];
  for (const source of resolution.sources) {
    throwIfAborted(signal, source.id);
    const result = await loadSource(source, signal);
    diagnostics.push(...result.diagnostics);
    loaded.push(result);
  }

  throwIfAborted(signal, 'merge');
  const inputs: MergeInput[] = [];
  const mergedSources: ContentSource[] = [];
  for (const { source, data } of loaded) {
    if (data !== null) {
      inputs.push({ sourceId: source.id, data });
      mergedSources.push(source);
    }
  }
  const merged = mergeSources(inputs);

  throwIfAborted(signal, 'validate');
  diagnostics.push(
    ...validateMergedContent(merged, {
      locales: resolution.manifest.locales,
      namingPattern: config.namingPattern,
    }),
  );

  return {
    manifest: resolution.manifest,
    merged,
    mergedSources,
    diagnostics: normalizeDiagnostics(diagnostics),
  };
}

function summarizeSource(source: ContentSource): SourceSummary {
  return {
    id: source.id,
    name: source.name,
    kind: source.kind,
    priority: source.priority,
    schemaVersion: source.schemaVersion,
  };
}

import { CONTENT_DIAGNOSTIC_CODES, downgradeToWarning } from '../kernel/diagnostic-codes.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { hasFatalDiagnostics } from '../kernel/diagnostics.js';
import { COLLECTION_KEYS, createEmptyCollectionLists } from './collections.js';
import type { CollectionKey, CollectionLists, MutableCollectionLists } from './collections.js';
import { decodeDataFile } from './decode-file.js';
import { readPackFile } from './pack-files.js';
import type { PackFile } from './pack-files.js';
import { skippedModDiagnostic } from './resolve-sources.js';
import type { ContentSource } from './resolve-sources.js';
import type { TechEdge, VictoryRules } from './schemas.js';

/** Everything one source contributes, in file order. */
export interface SourceData {
  readonly collections: CollectionLists;
  readonly techEdges: readonly TechEdge[];
  readonly victoryRules: VictoryRules | null;
}

export interface LoadedSource {
  readonly source: ContentSource;
  /** Null when a mod was excluded because one of its files failed to decode. */
  readonly data: SourceData | null;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Reads and decodes every data file of one source. A decode failure in a mod
 * excludes the whole mod and is reported as warnings; in the base pack it stays fatal.
 */
export async function loadSource(source: ContentSource, signal?: AbortSignal): Promise<LoadedSource> {
  const diagnostics: Diagnostic[] = [];
  const collections = createEmptyCollectionLists();
  const techEdges: TechEdge[] = [];
  let victoryRules: VictoryRules | null = null;

  for (const key of COLLECTION_KEYS) {
    const files = filesFor(source, key, diagnostics);
    for (const file of files) {
      await readCollectionFile(collections, key, file, source, signal, diagnostics);
    }
  }

  for (const file of filesFor(source, 'techEdges', diagnostics)) {
    const decoded = decodeDataFile({
      key: 'techEdges',
      text: await readPackFile(file, signal),
      format: file.format,
      filePath: file.filePath,
      sourceId: source.id,
    });
    diagnostics.push(...decoded.diagnostics);
    techEdges.push(...(decoded.value ?? []));
  }

  for (const file of filesFor(source, 'victoryRules', diagnostics)) {
    const decoded = decodeDataFile({
      key: 'victoryRules',
      text: await readPackFile(file, signal),
      format: file.format,
      filePath: file.filePath,
      sourceId: source.id,
    });
    diagnostics.push(...decoded.diagnostics);
    victoryRules = decoded.value ?? victoryRules;
  }

  if (source.kind === 'mod' && hasFatalDiagnostics(diagnostics)) {
    return {
      source,
      data: null,
      diagnostics: [
        ...diagnostics.map(downgradeToWarning),
        skippedModDiagnostic(source.folder, 'one of its files could not be decoded'),
      ],
    };
  }

  return { source, data: { collections, techEdges, victoryRules }, diagnostics };
}

async function readCollectionFile<K extends CollectionKey>(
  collections: MutableCollectionLists,
  key: K,
  file: PackFile,
  source: ContentSource,
  signal: AbortSignal | undefined,
  diagnostics: Diagnostic[],
): Promise<void> {
  const decoded = decodeDataFile({
    key,
    text: await readPackFile(file, signal),
    format: file.format,
    filePath: file.filePath,
    sourceId: source.id,
  });
  diagnostics.push(...decoded.diagnostics);
  if (decoded.value !== null) {
    const records: CollectionLists[K] = decoded.value;
    collections[key].push(...records);
  }
}

function filesFor(source: ContentSource, key: string, diagnostics: Diagnostic[]): readonly PackFile[] {
  const files = source.files.get(key) ?? [];
  if (files.length > 1) {
    diagnostics.push({
      code: CONTENT_DIAGNOSTIC_CODES.CONTENT_FORMAT_AMBIGUOUS,
      path: key,
      severity: 'warning',
      message: `${source.id} holds ${key} in ${files.length} files (${files.map((file) => file.fileName).join(', ')}); they are read in this order.`,
      suggestion: 'Keep one encoding per collection.',
      collection: key,
      sourceId: source.id,
    });
  }
  return files;
}

import type { CollectionKey, CollectionLists, EntityRecordMap } from './collections.js';
import type { SourceData } from './load-source.js';
import type { TechEdge, VictoryRules } from './schemas.js';

export const DEFAULT_VICTORY_RULES: VictoryRules = { dominationThreshold: 0.5 };

export interface MergeInput {
  readonly sourceId: string;
  readonly data: SourceData;
}

/** The same id listed twice by one source; merging would otherwise hide it. */
export interface DuplicateOccurrence {
  readonly collection: CollectionKey;
  readonly entityId: string;
  readonly sourceId: string;
  /** Position of the repeated record in that source's list. */
  readonly position: number;
}

/** For each collection key, the id (or `from->to` edge key) mapped to the source that last wrote it. */
export type MergeTrail = ReadonlyMap<string, ReadonlyMap<string, string>>;

export interface MergedContent {
  readonly collections: CollectionLists;
  readonly techEdges: readonly TechEdge[];
  readonly victoryRules: VictoryRules;
  readonly victoryRulesSourceId: string | null;
  readonly trail: MergeTrail;
  readonly duplicates: readonly DuplicateOccurrence[];
}

/**
 * Folds sources in load order. The first occurrence of an id fixes its position;
 * each later occurrence replaces the whole record.
 */
export function mergeSources(inputs: readonly MergeInput[]): MergedContent {
  const trail = new Map<string, ReadonlyMap<string, string>>();
  const duplicates: DuplicateOccurrence[] = [];
  const take = <K extends CollectionKey>(key: K): readonly EntityRecordMap[K][] => {
    const { records, writers } = mergeCollection(key, inputs, duplicates);
    trail.set(key, writers);
    return records;
  };

  const collections: CollectionLists = {
    species: take('species'),
    planetSizes: take('planetSizes'),
    surfaceTypes: take('surfaceTypes'),
    cellTypes: take('cellTypes'),
    buildings: take('buildings'),
    hulls: take('hulls'),
    engines: take('engines'),
    weapons: take('weapons'),
    shields: take('shields'),
    scanners: take('scanners'),
    techs: take('techs'),
    victoryConditions: take('victoryConditions'),
    scenarios: take('scenarios'),
  };

  const edges = new Map<string, TechEdge>();
  const edgeWriters = new Map<string, string>();
  let victoryRules = DEFAULT_VICTORY_RULES;
  let victoryRulesSourceId: string | null = null;
  for (const { sourceId, data } of inputs) {
    for (const edge of data.techEdges) {
      const edgeKey = techEdgeKey(edge);
      edges.set(edgeKey, edge);
      edgeWriters.set(edgeKey, sourceId);
    }
    if (data.victoryRules !== null) {
      victoryRules = data.victoryRules;
      victoryRulesSourceId = sourceId;
    }
  }
  trail.set('techEdges', edgeWriters);

  return {
    collections,
    techEdges: [...edges.values()],
    victoryRules,
    victoryRulesSourceId,
    trail,
    duplicates,
  };
}

export function techEdgeKey(edge: TechEdge): string {
  return `${edge.from}->${edge.to}`;
}

export function lastWriterOf(trail: MergeTrail, collection: string, key: string): string | undefined {
  return trail.get(collection)?.get(key);
}

interface MergedCollection<K extends CollectionKey> {
  readonly records: readonly EntityRecordMap[K][];
  readonly writers: ReadonlyMap<string, string>;
}

function mergeCollection<K extends CollectionKey>(
  key: K,
  inputs: readonly MergeInput[],
  duplicates: DuplicateOccurrence[],
): MergedCollection<K> {
  const merged = new Map<string, EntityRecordMap[K]>();
  const writers = new Map<string, string>();

  for (const { sourceId, data } of inputs) {
    const seen = new Set<string>();
    const records: readonly EntityRecordMap[K][] = data.collections[key];
    records.forEach((record, position) => {
      if (seen.has(record.id)) {
        duplicates.push({ collection: key, entityId: record.id, sourceId, position });
      }
      seen.add(record.id);
      // Map.set keeps the original insertion slot for an existing key.
      merged.set(record.id, record);
      writers.set(record.id, sourceId);
    });
  }

  return { records: [...merged.values()], writers };
}

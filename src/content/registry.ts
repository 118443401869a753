import { asEntityIndex, asTypedId, isEntityIndexInRange } from '../kernel/branded.js';
import type { EntityIndex, TypedId } from '../kernel/branded.js';
import { ContentError } from '../kernel/content-error.js';
import type { CollectionKey, CollectionLists, EntityRecordMap } from './collections.js';
import type { DerivedStatsFor, DerivedStatsMap, DerivedTables } from './derive.js';

export interface RegistryEntry<K extends CollectionKey> {
  readonly index: EntityIndex<K>;
  readonly id: TypedId<K>;
  readonly record: EntityRecordMap[K];
  readonly derived: DerivedStatsMap[K];
}

interface CollectionTable<K extends CollectionKey> {
  readonly entries: readonly RegistryEntry<K>[];
  readonly indexById: ReadonlyMap<string, EntityIndex<K>>;
}

type RegistryTables = { readonly [K in CollectionKey]: CollectionTable<K> };

/**
 * Read-only id/index lookup over one validated load. Indices follow merge order
 * and are stable only within the snapshot that produced them.
 */
export class GameRegistry {
  private readonly tables: RegistryTables;

  private constructor(tables: RegistryTables) {
    this.tables = tables;
  }

  static build(collections: CollectionLists, derived: DerivedTables): GameRegistry {
    return new GameRegistry({
      species: buildTable('species', collections.species, derived.species),
      planetSizes: buildTable('planetSizes', collections.planetSizes, derived.planetSizes),
      surfaceTypes: buildTable('surfaceTypes', collections.surfaceTypes, derived.surfaceTypes),
      cellTypes: buildTable('cellTypes', collections.cellTypes, derived.cellTypes),
      buildings: buildTable('buildings', collections.buildings, derived.buildings),
      hulls: buildTable('hulls', collections.hulls, derived.hulls),
      engines: buildTable('engines', collections.engines, derived.engines),
      weapons: buildTable('weapons', collections.weapons, derived.weapons),
      shields: buildTable('shields', collections.shields, derived.shields),
      scanners: buildTable('scanners', collections.scanners, derived.scanners),
      techs: buildTable('techs', collections.techs, derived.techs),
      victoryConditions: buildTable('victoryConditions', collections.victoryConditions, derived.victoryConditions),
      scenarios: buildTable('scenarios', collections.scenarios, derived.scenarios),
    });
  }

  resolve<K extends CollectionKey>(collection: K, id: string): EntityIndex<K> | null {
    return this.tables[collection].indexById.get(id) ?? null;
  }

  get<K extends CollectionKey>(collection: K, index: EntityIndex<NoInfer<K>>): EntityRecordMap[K] {
    return this.entryAt(collection, index).record;
  }

  getDerived<K extends CollectionKey>(collection: K, index: EntityIndex<NoInfer<K>>): DerivedStatsFor<K> {
    return this.entryAt(collection, index).derived;
  }

  idOf<K extends CollectionKey>(collection: K, index: EntityIndex<NoInfer<K>>): TypedId<K> {
    return this.entryAt(collection, index).id;
  }

  /** Record for `id`, or undefined when the collection has no such id. */
  lookup<K extends CollectionKey>(collection: K, id: string): EntityRecordMap[K] | undefined {
    const index = this.resolve(collection, id);
    return index === null ? undefined : this.get(collection, index);
  }

  size(collection: CollectionKey): number {
    return this.tables[collection].entries.length;
  }

  entries<K extends CollectionKey>(collection: K): readonly RegistryEntry<K>[] {
    return this.tables[collection].entries;
  }

  private entryAt<K extends CollectionKey>(collection: K, index: EntityIndex<K>): RegistryEntry<K> {
    const { entries } = this.tables[collection];
    const entry = isEntityIndexInRange(index, entries.length) ? entries[index] : undefined;
    if (entry === undefined) {
      throw new ContentError('CONTENT_INDEX_OUT_OF_RANGE', `Index ${index} is out of range for ${collection}.`, {
        collection,
        index,
        size: this.size(collection),
      });
    }
    return entry;
  }
}

function buildTable<K extends CollectionKey>(
  collection: K,
  records: readonly EntityRecordMap[K][],
  derived: readonly DerivedStatsMap[K][],
): CollectionTable<K> {
  const indexById = new Map<string, EntityIndex<K>>();
  const entries = records.map((record, position): RegistryEntry<K> => {
    const stats = derived[position];
    if (stats === undefined) {
      throw new ContentError('CONTENT_INDEX_OUT_OF_RANGE', `Missing derived stats for ${collection}[${position}].`, {
        collection,
        position,
      });
    }
    const index = asEntityIndex(collection, position);
    indexById.set(record.id, index);
    return { index, id: asTypedId(collection, record.id), record, derived: stats };
  });
  return { entries, indexById };
}

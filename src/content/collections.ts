import { z } from 'zod';
import {
  BuildingSchema,
  CellTypeSchema,
  EngineSchema,
  HullSchema,
  PlanetSizeSchema,
  ScannerSchema,
  ScenarioSchema,
  ShieldSchema,
  SpeciesSchema,
  SurfaceTypeSchema,
  TechEdgeSchema,
  TechSchema,
  VictoryConditionSchema,
  VictoryRulesSchema,
  WeaponSchema,
} from './schemas.js';
import type { TechEdge, VictoryRules } from './schemas.js';

const ENTITY_SCHEMA_DEFS = {
  species: SpeciesSchema,
  planetSizes: PlanetSizeSchema,
  surfaceTypes: SurfaceTypeSchema,
  cellTypes: CellTypeSchema,
  buildings: BuildingSchema,
  hulls: HullSchema,
  engines: EngineSchema,
  weapons: WeaponSchema,
  shields: ShieldSchema,
  scanners: ScannerSchema,
  techs: TechSchema,
  victoryConditions: VictoryConditionSchema,
  scenarios: ScenarioSchema,
};

export type CollectionKey = keyof typeof ENTITY_SCHEMA_DEFS;

export type EntityRecordMap = { readonly [K in CollectionKey]: z.infer<(typeof ENTITY_SCHEMA_DEFS)[K]> };

/** Load and display order of the entity collections. */
export const COLLECTION_KEYS: readonly CollectionKey[] = [
  'species',
  'planetSizes',
  'surfaceTypes',
  'cellTypes',
  'buildings',
  'hulls',
  'engines',
  'weapons',
  'shields',
  'scanners',
  'techs',
  'victoryConditions',
  'scenarios',
];

export const RELATION_KEYS = ['techEdges'] as const;
export type RelationKey = (typeof RELATION_KEYS)[number];

export const SETTINGS_KEYS = ['victoryRules'] as const;
export type SettingsKey = (typeof SETTINGS_KEYS)[number];

export type DataFileKey = CollectionKey | RelationKey | SettingsKey;

export const DATA_FILE_KEYS: readonly DataFileKey[] = [...COLLECTION_KEYS, ...RELATION_KEYS, ...SETTINGS_KEYS];

const DATA_FILE_KEY_SET: ReadonlySet<string> = new Set(DATA_FILE_KEYS);

export const isDataFileKey = (value: string): value is DataFileKey => DATA_FILE_KEY_SET.has(value);

type NumericFieldOf<K extends CollectionKey> = {
  [F in keyof EntityRecordMap[K]]-?: EntityRecordMap[K][F] extends number ? F : never;
}[keyof EntityRecordMap[K]] &
  string;

type ReferenceFieldOf<K extends CollectionKey> = {
  [F in keyof EntityRecordMap[K]]-?: F extends 'id' ? never : EntityRecordMap[K][F] extends string | undefined ? F : never;
}[keyof EntityRecordMap[K]] &
  string;

export interface ReferenceRule<K extends CollectionKey> {
  readonly field: ReferenceFieldOf<K>;
  readonly target: CollectionKey;
}

export interface InvariantCheck<K extends CollectionKey> {
  readonly field: string;
  readonly check: (record: EntityRecordMap[K]) => string | null;
}

export interface CollectionRules<K extends CollectionKey> {
  readonly positive: readonly NumericFieldOf<K>[];
  readonly nonNegative: readonly NumericFieldOf<K>[];
  readonly references: readonly ReferenceRule<K>[];
  readonly invariants: readonly InvariantCheck<K>[];
}

const NO_RULES = { positive: [], nonNegative: [], references: [], invariants: [] } as const;

export const COLLECTION_RULES: { readonly [K in CollectionKey]: CollectionRules<K> } = {
  species: NO_RULES,
  planetSizes: { ...NO_RULES, positive: ['surfaceSlots', 'orbitalSlots'] },
  surfaceTypes: {
    ...NO_RULES,
    invariants: [
      {
        field: 'tileDistribution',
        check: ({ tileDistribution: { black, white, red, green, blue } }) => {
          const buckets = [black, white, red, green, blue];
          if (buckets.some((bucket) => bucket < 0)) {
            return 'tileDistribution buckets must be non-negative';
          }
          const total = buckets.reduce((sum, bucket) => sum + bucket, 0);
          return total === 100 ? null : `tileDistribution must sum to 100 (got ${total})`;
        },
      },
    ],
  },
  cellTypes: NO_RULES,
  buildings: {
    ...NO_RULES,
    positive: ['productionCost', 'slotSize'],
    references: [{ field: 'unlockedBy', target: 'techs' }],
  },
  hulls: { ...NO_RULES, positive: ['sizeIndex', 'maxItems'] },
  engines: { ...NO_RULES, positive: ['thrustRating', 'industryCost'], nonNegative: ['powerUse'] },
  weapons: {
    ...NO_RULES,
    positive: ['damage', 'fireRate', 'range', 'industryCost'],
    nonNegative: ['powerUse'],
    references: [{ field: 'unlockedBy', target: 'techs' }],
  },
  shields: { ...NO_RULES, positive: ['strength', 'industryCost'] },
  scanners: { ...NO_RULES, positive: ['range', 'strength', 'industryCost'] },
  techs: { ...NO_RULES, positive: ['researchCost'] },
  victoryConditions: NO_RULES,
  scenarios: {
    ...NO_RULES,
    positive: ['gridWidth', 'gridHeight'],
    references: [
      { field: 'startBuilding', target: 'buildings' },
      { field: 'victoryCondition', target: 'victoryConditions' },
    ],
    invariants: [
      {
        field: 'blackRatio',
        check: ({ blackRatio }) =>
          blackRatio >= 0 && blackRatio <= 1 ? null : `blackRatio must be within [0, 1] (got ${blackRatio})`,
      },
    ],
  },
};

/** Per-collection record lists, in load order. */
export type CollectionLists = { readonly [K in CollectionKey]: readonly EntityRecordMap[K][] };

export type MutableCollectionLists = { [K in CollectionKey]: EntityRecordMap[K][] };

export function createEmptyCollectionLists(): MutableCollectionLists {
  return {
    species: [],
    planetSizes: [],
    surfaceTypes: [],
    cellTypes: [],
    buildings: [],
    hulls: [],
    engines: [],
    weapons: [],
    shields: [],
    scanners: [],
    techs: [],
    victoryConditions: [],
    scenarios: [],
  };
}

/** Decoded value of each data file's root key. */
export interface DataFileValueMap extends CollectionLists {
  readonly techEdges: readonly TechEdge[];
  readonly victoryRules: VictoryRules;
}

export const DATA_FILE_SCHEMAS: { readonly [K in DataFileKey]: z.ZodType<DataFileValueMap[K]> } = {
  species: z.array(SpeciesSchema),
  planetSizes: z.array(PlanetSizeSchema),
  surfaceTypes: z.array(SurfaceTypeSchema),
  cellTypes: z.array(CellTypeSchema),
  buildings: z.array(BuildingSchema),
  hulls: z.array(HullSchema),
  engines: z.array(EngineSchema),
  weapons: z.array(WeaponSchema),
  shields: z.array(ShieldSchema),
  scanners: z.array(ScannerSchema),
  techs: z.array(TechSchema),
  victoryConditions: z.array(VictoryConditionSchema),
  scenarios: z.array(ScenarioSchema),
  techEdges: z.array(TechEdgeSchema),
  victoryRules: VictoryRulesSchema,
};

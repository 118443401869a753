import { createEmptyCollectionLists } from '../../src/content/collections.js';
import type { CollectionLists, EntityRecordMap } from '../../src/content/collections.js';
import type { SourceData } from '../../src/content/load-source.js';
import type { TechEdge, VictoryRules } from '../../src/content/schemas.js';

type Overrides<K extends keyof EntityRecordMap> = Partial<EntityRecordMap[K]>;

export const buildingRecord = (id: string, overrides: Overrides<'buildings'> = {}): EntityRecordMap['buildings'] => ({
  id,
  name: { en: id },
  productionCost: 5,
  slotSize: 1,
  yields: { food: 0, housing: 1, production: 0, science: 0 },
  countsForAdjacency: true,
  buildableOn: 'white',
  specialBehavior: 'none',
  ...overrides,
});

export const weaponRecord = (id: string, overrides: Overrides<'weapons'> = {}): EntityRecordMap['weapons'] => ({
  id,
  name: { en: id },
  damage: 10,
  fireRate: 2,
  range: 3,
  powerUse: 1,
  industryCost: 5,
  ...overrides,
});

export const engineRecord = (id: string, overrides: Overrides<'engines'> = {}): EntityRecordMap['engines'] => ({
  id,
  name: { en: id },
  powerUse: 2,
  thrustRating: 6,
  industryCost: 8,
  ...overrides,
});

export const techRecord = (id: string, overrides: Overrides<'techs'> = {}): EntityRecordMap['techs'] => ({
  id,
  name: { en: id },
  researchCost: 10,
  ...overrides,
});

export const surfaceTypeRecord = (
  id: string,
  overrides: Overrides<'surfaceTypes'> = {},
): EntityRecordMap['surfaceTypes'] => ({
  id,
  name: { en: id },
  tileDistribution: { black: 20, white: 50, red: 10, green: 10, blue: 10 },
  ...overrides,
});

export const scenarioRecord = (id: string, overrides: Overrides<'scenarios'> = {}): EntityRecordMap['scenarios'] => ({
  id,
  name: { en: id },
  gridWidth: 5,
  gridHeight: 5,
  blackRatio: 0.2,
  generationMode: 'randomWhiteBlack',
  startBuilding: 'housing',
  victoryCondition: 'cover_all_tiles',
  ...overrides,
});

export const victoryConditionRecord = (id: string): EntityRecordMap['victoryConditions'] => ({
  id,
  name: { en: id },
  kind: 'coverAllTiles',
});

export interface SourceDataInput {
  readonly collections?: Partial<CollectionLists>;
  readonly techEdges?: readonly TechEdge[];
  readonly victoryRules?: VictoryRules | null;
}

export function sourceData(input: SourceDataInput = {}): SourceData {
  return {
    collections: { ...createEmptyCollectionLists(), ...input.collections },
    techEdges: input.techEdges ?? [],
    victoryRules: input.victoryRules ?? null,
  };
}

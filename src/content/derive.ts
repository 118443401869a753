import { asTypedId } from '../kernel/branded.js';
import type { TypedId } from '../kernel/branded.js';
import type { CollectionKey, CollectionLists, EntityRecordMap } from './collections.js';
import type { TechEdge } from './schemas.js';

export interface WeaponStats {
  /** Damage per turn: damage × fireRate. */
  readonly throughput: number;
  readonly costEfficiency: number;
}

export interface EngineStats {
  /** Thrust per unit of power; null for engines that draw no power. */
  readonly efficiency: number | null;
}

export interface BuildingStats {
  readonly totalYield: number;
  readonly yieldPerCost: number;
}

export interface ShieldStats {
  readonly strengthPerCost: number;
}

export interface PlanetSizeStats {
  readonly totalSlots: number;
}

export interface ScenarioStats {
  readonly cellCount: number;
  readonly blackCells: number;
}

export interface TechStats {
  readonly prerequisites: readonly TypedId<'techs'>[];
  readonly unlocks: readonly TypedId<'techs'>[];
  /** Longest prerequisite chain below this tech; 0 for roots. */
  readonly depth: number;
}

export interface DerivedStatsMap {
  readonly species: null;
  readonly planetSizes: PlanetSizeStats;
  readonly surfaceTypes: null;
  readonly cellTypes: null;
  readonly buildings: BuildingStats;
  readonly hulls: null;
  readonly engines: EngineStats;
  readonly weapons: WeaponStats;
  readonly shields: ShieldStats;
  readonly scanners: null;
  readonly techs: TechStats;
  readonly victoryConditions: null;
  readonly scenarios: ScenarioStats;
}

export type DerivedStatsFor<K extends CollectionKey> = DerivedStatsMap[K];

/** Derived stats per collection, aligned by position with the merged record lists. */
export type DerivedTables = { readonly [K in CollectionKey]: readonly DerivedStatsMap[K][] };

export const deriveWeaponStats = (weapon: EntityRecordMap['weapons']): WeaponStats => {
  const throughput = weapon.damage * weapon.fireRate;
  return { throughput, costEfficiency: throughput / weapon.industryCost };
};

export const deriveEngineStats = (engine: EntityRecordMap['engines']): EngineStats => ({
  efficiency: engine.powerUse > 0 ? engine.thrustRating / engine.powerUse : null,
});

export const deriveBuildingStats = (building: EntityRecordMap['buildings']): BuildingStats => {
  const { food, housing, production, science } = building.yields;
  const totalYield = food + housing + production + science;
  return { totalYield, yieldPerCost: totalYield / building.productionCost };
};

export const deriveShieldStats = (shield: EntityRecordMap['shields']): ShieldStats => ({
  strengthPerCost: shield.strength / shield.industryCost,
});

export const derivePlanetSizeStats = (size: EntityRecordMap['planetSizes']): PlanetSizeStats => ({
  totalSlots: size.surfaceSlots + size.orbitalSlots,
});

export const deriveScenarioStats = (scenario: EntityRecordMap['scenarios']): ScenarioStats => {
  const cellCount = scenario.gridWidth * scenario.gridHeight;
  return { cellCount, blackCells: Math.round(cellCount * scenario.blackRatio) };
};

export function deriveTechStats(
  techs: readonly EntityRecordMap['techs'][],
  edges: readonly TechEdge[],
): readonly TechStats[] {
  const prerequisites = new Map<string, TypedId<'techs'>[]>();
  const unlocks = new Map<string, TypedId<'techs'>[]>();
  for (const edge of edges) {
    appendTo(prerequisites, edge.to, asTypedId('techs', edge.from));
    appendTo(unlocks, edge.from, asTypedId('techs', edge.to));
  }

  const depths = new Map<string, number>();
  const pending = new Set<string>();
  const depthOf = (id: string): number => {
    const known = depths.get(id);
    if (known !== undefined) {
      return known;
    }
    if (pending.has(id)) {
      // Validation rejects cycles; this only bounds the recursion.
      return 0;
    }
    pending.add(id);
    const below = (prerequisites.get(id) ?? []).map((prerequisite) => depthOf(prerequisite) + 1);
    pending.delete(id);
    const depth = Math.max(0, ...below);
    depths.set(id, depth);
    return depth;
  };

  return techs.map((tech) => ({
    prerequisites: prerequisites.get(tech.id) ?? [],
    unlocks: unlocks.get(tech.id) ?? [],
    depth: depthOf(tech.id),
  }));
}

/** Recomputes every derived table from validated records. */
export function deriveAll(collections: CollectionLists, techEdges: readonly TechEdge[]): DerivedTables {
  const none = (records: readonly unknown[]): readonly null[] => records.map(() => null);
  return {
    species: none(collections.species),
    planetSizes: collections.planetSizes.map(derivePlanetSizeStats),
    surfaceTypes: none(collections.surfaceTypes),
    cellTypes: none(collections.cellTypes),
    buildings: collections.buildings.map(deriveBuildingStats),
    hulls: none(collections.hulls),
    engines: collections.engines.map(deriveEngineStats),
    weapons: collections.weapons.map(deriveWeaponStats),
    shields: collections.shields.map(deriveShieldStats),
    scanners: none(collections.scanners),
    techs: deriveTechStats(collections.techs, techEdges),
    victoryConditions: none(collections.victoryConditions),
    scenarios: collections.scenarios.map(deriveScenarioStats),
  };
}

function appendTo(map: Map<string, TypedId<'techs'>[]>, key: string, value: TypedId<'techs'>): void {
  const list = map.get(key) ?? [];
  list.push(value);
  map.set(key, list);
}

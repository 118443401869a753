import { z } from 'zod';

const StringSchema = z.string();
export const IdSchema = z.string().min(1);
export const IntegerSchema = z.number().int();
export const NumberSchema = z.number();
const BooleanSchema = z.boolean();

export type LocalizedText = Readonly<{ en: string } & Record<string, string>>;

const LocalizedMappingSchema = z.object({ en: StringSchema }).catchall(StringSchema);

/** Plain strings are English; the mapping form must carry `en`. */
export const LocalizedTextSchema = z
  .union([StringSchema, LocalizedMappingSchema])
  .transform((value): LocalizedText => (typeof value === 'string' ? { en: value } : value));

const entityShape = {
  id: IdSchema,
  name: LocalizedTextSchema,
  description: LocalizedTextSchema.optional(),
};

export const SpeciesSchema = z.object(entityShape).strict();

export const PlanetSizeSchema = z
  .object({
    ...entityShape,
    surfaceSlots: IntegerSchema,
    orbitalSlots: IntegerSchema,
  })
  .strict();

export const TileDistributionSchema = z
  .object({
    black: IntegerSchema,
    white: IntegerSchema,
    red: IntegerSchema,
    green: IntegerSchema,
    blue: IntegerSchema,
  })
  .strict();

export const SurfaceTypeSchema = z
  .object({
    ...entityShape,
    tileDistribution: TileDistributionSchema,
  })
  .strict();

export const CellTypeSchema = z
  .object({
    ...entityShape,
    isUsable: BooleanSchema,
  })
  .strict();

export const BuildingYieldsSchema = z
  .object({
    food: IntegerSchema,
    housing: IntegerSchema,
    production: IntegerSchema,
    science: IntegerSchema,
  })
  .strict();

export const BuildingSchema = z
  .object({
    ...entityShape,
    productionCost: IntegerSchema,
    slotSize: IntegerSchema,
    yields: BuildingYieldsSchema,
    countsForAdjacency: BooleanSchema,
    buildableOn: z.enum(['white', 'black']),
    specialBehavior: z.enum(['none', 'terraformer']).default('none'),
    unlockedBy: IdSchema.optional(),
  })
  .strict();

export const HullSchema = z
  .object({
    ...entityShape,
    sizeIndex: IntegerSchema,
    maxItems: IntegerSchema,
  })
  .strict();

export const EngineSchema = z
  .object({
    ...entityShape,
    powerUse: NumberSchema,
    thrustRating: NumberSchema,
    industryCost: NumberSchema,
  })
  .strict();

export const WeaponSchema = z
  .object({
    ...entityShape,
    damage: NumberSchema,
    fireRate: NumberSchema,
    range: NumberSchema,
    powerUse: NumberSchema,
    industryCost: NumberSchema,
    unlockedBy: IdSchema.optional(),
  })
  .strict();

export const ShieldSchema = z
  .object({
    ...entityShape,
    strength: NumberSchema,
    industryCost: NumberSchema,
  })
  .strict();

export const ScannerSchema = z
  .object({
    ...entityShape,
    range: NumberSchema,
    strength: NumberSchema,
    industryCost: NumberSchema,
  })
  .strict();

export const TechSchema = z
  .object({
    ...entityShape,
    researchCost: NumberSchema,
  })
  .strict();

export const VictoryConditionSchema = z
  .object({
    ...entityShape,
    kind: z.enum(['coverAllTiles', 'domination', 'technology']),
  })
  .strict();

export const ScenarioSchema = z
  .object({
    ...entityShape,
    gridWidth: IntegerSchema,
    gridHeight: IntegerSchema,
    blackRatio: NumberSchema,
    generationMode: z.enum(['randomWhiteBlack']),
    startBuilding: IdSchema,
    victoryCondition: IdSchema,
  })
  .strict();

export const TechEdgeSchema = z
  .object({
    from: IdSchema,
    to: IdSchema,
  })
  .strict();

export const VictoryRulesSchema = z
  .object({
    dominationThreshold: NumberSchema.default(0.5),
  })
  .strict();

export const ManifestSchema = z
  .object({
    schemaVersion: IntegerSchema.min(1),
    locales: z.array(StringSchema.min(1)).min(1).optional(),
  })
  .strict();

export const ModDescriptorSchema = z
  .object({
    name: StringSchema.optional(),
    priority: IntegerSchema.default(0),
    schemaVersion: IntegerSchema.min(1).optional(),
  })
  .strict();

export type TechEdge = z.infer<typeof TechEdgeSchema>;
export type VictoryRules = z.infer<typeof VictoryRulesSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type ModDescriptor = z.infer<typeof ModDescriptorSchema>;

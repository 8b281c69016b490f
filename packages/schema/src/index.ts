import { z } from 'zod';

export const ZoneId = z.union([z.string().min(1), z.number().int()]);
export type ZoneId = z.infer<typeof ZoneId>;

const Position = z.array(z.number()).min(2);

export const PointGeometry = z.object({
  type: z.literal('Point'),
  coordinates: Position,
});
export type PointGeometry = z.infer<typeof PointGeometry>;

export const ZoneGeometry = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(Position)) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(Position))) }),
]);
export type ZoneGeometry = z.infer<typeof ZoneGeometry>;

export const GeoFeature = z.object({
  type: z.literal('Feature'),
  properties: z.record(z.unknown()).nullish(),
  geometry: z.object({ type: z.string() }).passthrough().nullish(),
});
export type GeoFeature = z.infer<typeof GeoFeature>;

export const GeoFeatureCollection = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(GeoFeature),
});
export type GeoFeatureCollection = z.infer<typeof GeoFeatureCollection>;

export const ZoneRecord = z.object({
  zoneId: ZoneId,
  properties: z.record(z.unknown()).default({}),
  geometry: ZoneGeometry.optional(),
});
export type ZoneRecord = z.infer<typeof ZoneRecord>;
export type ZoneRecordInput = z.input<typeof ZoneRecord>;

export const DietCategory = z.enum(['prey', 'other']);
export type DietCategory = z.infer<typeof DietCategory>;

// Ordered from broadest to lowest tier.
export const TrophicTier = z.enum(['D1', 'D2', 'D3']);
export type TrophicTier = z.infer<typeof TrophicTier>;

export const SubstitutionClass = z.enum(['threatened', 'alien_alternative', 'alternative', 'normal']);
export type SubstitutionClass = z.infer<typeof SubstitutionClass>;

export const SpeciesTrait = z.object({
  speciesName: z.string().min(1),
  diet: DietCategory,
  trophicTier: TrophicTier,
  substitution: SubstitutionClass,
});
export type SpeciesTrait = z.infer<typeof SpeciesTrait>;

export const Observation = z.object({
  zoneId: ZoneId.nullable(),
  speciesName: z.string(),
  individualCount: z.number().nonnegative(),
  // Null when the species has no trait-table match
  diet: DietCategory.nullable(),
  trophicTier: TrophicTier.nullable(),
  substitution: SubstitutionClass.nullable(),
});
export type Observation = z.infer<typeof Observation>;

export const PlaceholderPolicy = z.enum(['drop', 'fallback']);
export type PlaceholderPolicy = z.infer<typeof PlaceholderPolicy>;

export const DegenerateNormalization = z.enum(['zero', 'error']);
export type DegenerateNormalization = z.infer<typeof DegenerateNormalization>;

export const IndexCode = z.enum(['F1', 'F2', 'F3', 'F4', 'F5']);
export type IndexCode = z.infer<typeof IndexCode>;

export const TrophicScores = z.tuple([z.number(), z.number(), z.number()]);
export type TrophicScores = z.infer<typeof TrophicScores>;

export const PipelineConfig = z.object({
  zonesPath: z.string().min(1),
  surveyPath: z.string().min(1),
  traitTablePath: z.string().min(1),
  outDir: z.string().min(1).default('data/out'),
  zoneIdField: z.string().min(1).default('BT_ID'),
  traitTableEncoding: z.string().default('utf-8'),
  placeholderPolicy: PlaceholderPolicy.default('drop'),
  trophicScores: TrophicScores.default([1, 0.6, 0.3]),
  degenerateNormalization: DegenerateNormalization.default('zero'),
  indices: z.array(IndexCode).nonempty().default(['F1', 'F2', 'F3', 'F4', 'F5']),
});
export type PipelineConfig = z.infer<typeof PipelineConfig>;
export type PipelineConfigInput = z.input<typeof PipelineConfig>;

export type PreyRatioRow = { zoneId: ZoneId; preyCount: number; totalCount: number; result: number };
export type DiversityRow = { zoneId: ZoneId; preyCount: number; shannon: number; result: number };
export type TrophicCoverageRow = { zoneId: ZoneId; d1Count: number; d2Count: number; d3Count: number; result: number };
export type ConnectionRow = { zoneId: ZoneId; preyCount: number; result: number };
export type SubstitutionRow = {
  zoneId: ZoneId;
  threatenedCount: number;
  alienCount: number;
  alternativeCount: number;
  normalCount: number;
  result: number;
};
export type HabitatProbabilityRow = { zoneId: ZoneId; count: number; area: number; result: number };

export type IndexRowMap = {
  F1: PreyRatioRow;
  F2: DiversityRow;
  F3: TrophicCoverageRow;
  F4: ConnectionRow;
  F5: SubstitutionRow;
};

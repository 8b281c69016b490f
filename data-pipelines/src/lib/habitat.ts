import type { HabitatProbabilityRow, ZoneId } from '@foodchain/schema';
import { isPlaceholderName } from './enrich.js';
import type { SurveyPoint } from './spatial.js';
import { aliasGet } from './utils.js';
import { joinZones, type ZoneUniverse } from './zones.js';

/** Handle to a raster owned by the geoprocessing backend. */
export type RasterRef = { uri: string };

export type PresenceSample = { speciesName: string; longitude: number; latitude: number };

export type ZonalMeanRow = { zoneId: ZoneId; count: number; area: number; mean: number | null };

/**
 * Raster and modelling work the habitat index delegates. Implementations wrap
 * a GIS backend; nothing here knows how they compute.
 */
export interface GeoprocessingServices {
  /** Reprojects survey points into the environment layers' coordinate system. */
  project(points: readonly SurveyPoint[]): Promise<SurveyPoint[]>;
  /** Presence-only distribution model; one probability raster per run or replicate. */
  speciesDistributionModel(samples: readonly PresenceSample[], environmentLayers: readonly RasterRef[]): Promise<RasterRef[]>;
  cellMean(rasters: readonly RasterRef[]): Promise<RasterRef>;
  zonalMean(universe: ZoneUniverse, raster: RasterRef): Promise<ZonalMeanRow[]>;
}

export type HabitatInput = {
  universe: ZoneUniverse;
  points: readonly SurveyPoint[];
  environmentLayers: readonly RasterRef[];
};

export function toPresenceSamples(points: readonly SurveyPoint[]): PresenceSample[] {
  const samples: PresenceSample[] = [];
  for (const pt of points) {
    const name = aliasGet(pt.properties, 'speciesName');
    const [longitude, latitude] = pt.coordinates;
    if (isPlaceholderName(name) || longitude === undefined || latitude === undefined) continue;
    samples.push({ speciesName: String(name).trim(), longitude, latitude });
  }
  return samples;
}

/** F6: mean modelled presence probability of food species inside each zone. */
export async function evaluateHabitatProbability(
  services: GeoprocessingServices,
  input: HabitatInput,
): Promise<HabitatProbabilityRow[]> {
  const projected = await services.project(input.points);
  const samples = toPresenceSamples(projected);
  if (samples.length === 0) {
    return joinZones(input.universe, [], zoneId => ({ zoneId, count: 0, area: 0, result: 0 }));
  }
  const rasters = await services.speciesDistributionModel(samples, input.environmentLayers);
  const mean = await services.cellMean(rasters);
  const zonal = await services.zonalMean(input.universe, mean);
  const rows = zonal.map(z => ({ zoneId: z.zoneId, count: z.count, area: z.area, result: z.mean ?? 0 }));
  return joinZones(input.universe, rows, zoneId => ({ zoneId, count: 0, area: 0, result: 0 }));
}

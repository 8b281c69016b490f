import { FALLBACK_TRAIT, UNIDENTIFIED_SPECIES_NAME } from '@foodchain/config';
import type { Observation, PlaceholderPolicy } from '@foodchain/schema';
import type { SpatialJoin, SurveyPoint } from './spatial.js';
import type { TraitTable } from './traits.js';
import { aliasGet } from './utils.js';

export type EnrichOptions = { placeholderPolicy?: PlaceholderPolicy };

export type EnrichmentReport = {
  points: number;
  unmatchedZone: number;
  placeholderDropped: number;
  placeholderReplaced: number;
  unmatchedTrait: number;
  countsDefaulted: number;
};

export type Enrichment = {
  observations: readonly Observation[];
  report: EnrichmentReport;
};

export function isPlaceholderName(name: unknown): boolean {
  return name == null || String(name).trim() === '';
}

/**
 * Parses a raw count field. Anything that is not a finite, non-negative number
 * (absent, blank, text, negative) stands for a single individual.
 */
export function coerceCount(raw: unknown): { count: number; defaulted: boolean } {
  let n: number | undefined;
  if (typeof raw === 'number') n = raw;
  else if (typeof raw === 'string' && raw.trim() !== '') n = Number(raw.trim());
  if (n === undefined || !Number.isFinite(n) || n < 0) return { count: 1, defaulted: true };
  return { count: n, defaulted: false };
}

/**
 * Builds the observation snapshot every index is computed from. Points
 * outside all zones are kept with a null zone id; calculators skip them.
 * The returned array and its records are frozen.
 */
export function enrich(
  points: readonly SurveyPoint[],
  locate: SpatialJoin,
  traits: TraitTable,
  opts: EnrichOptions = {},
): Enrichment {
  const policy = opts.placeholderPolicy ?? 'drop';
  const zoneIds = locate(points);
  const report: EnrichmentReport = {
    points: points.length,
    unmatchedZone: 0,
    placeholderDropped: 0,
    placeholderReplaced: 0,
    unmatchedTrait: 0,
    countsDefaulted: 0,
  };
  const observations: Observation[] = [];

  points.forEach((pt, i) => {
    const zoneId = zoneIds[i] ?? null;
    const rawName = aliasGet(pt.properties, 'speciesName');
    const { count, defaulted } = coerceCount(aliasGet(pt.properties, 'individualCount'));

    let obs: Observation;
    if (isPlaceholderName(rawName)) {
      if (policy === 'drop') { report.placeholderDropped++; return; }
      report.placeholderReplaced++;
      obs = { zoneId, speciesName: UNIDENTIFIED_SPECIES_NAME, individualCount: count, ...FALLBACK_TRAIT };
    } else {
      const speciesName = String(rawName).trim();
      const trait = traits.bySpecies.get(speciesName);
      if (!trait) report.unmatchedTrait++;
      obs = {
        zoneId,
        speciesName,
        individualCount: count,
        diet: trait?.diet ?? null,
        trophicTier: trait?.trophicTier ?? null,
        substitution: trait?.substitution ?? null,
      };
    }
    if (zoneId === null) report.unmatchedZone++;
    if (defaulted) report.countsDefaulted++;
    observations.push(Object.freeze(obs));
  });

  return { observations: Object.freeze(observations), report };
}

import { OUTPUT_COLUMNS } from '@foodchain/config';
import {
  IndexCode,
  type DegenerateNormalization,
  type HabitatProbabilityRow,
  type IndexRowMap,
  type Observation,
  type TrophicScores,
  type ZoneId,
} from '@foodchain/schema';
import { computeConnection } from './indices/connection.js';
import { computeDiversity } from './indices/diversity.js';
import { computePreyRatio } from './indices/preyRatio.js';
import { computeSubstitution } from './indices/substitution.js';
import { computeTrophicCoverage } from './indices/trophicCoverage.js';
import { joinZones, type ZoneUniverse } from './zones.js';

export type IndexOptions = {
  trophicScores?: TrophicScores;
  degenerateNormalization?: DegenerateNormalization;
};

export type IndexTables = { [C in IndexCode]?: IndexRowMap[C][] };

type Calculator<C extends IndexCode> = (observations: readonly Observation[], opts: IndexOptions) => IndexRowMap[C][];

const CALCULATORS: { [C in IndexCode]: Calculator<C> } = {
  F1: obs => computePreyRatio(obs),
  F2: (obs, opts) => computeDiversity(obs, { degenerate: opts.degenerateNormalization }),
  F3: (obs, opts) => computeTrophicCoverage(obs, opts.trophicScores),
  F4: obs => computeConnection(obs),
  F5: obs => computeSubstitution(obs),
};

// Rows for zones nothing was observed in
const EMPTY_ROWS: { [C in IndexCode]: (zoneId: ZoneId) => IndexRowMap[C] } = {
  F1: zoneId => ({ zoneId, preyCount: 0, totalCount: 0, result: 0 }),
  F2: zoneId => ({ zoneId, preyCount: 0, shannon: 0, result: 0 }),
  F3: zoneId => ({ zoneId, d1Count: 0, d2Count: 0, d3Count: 0, result: 0 }),
  F4: zoneId => ({ zoneId, preyCount: 0, result: 0 }),
  F5: zoneId => ({ zoneId, threatenedCount: 0, alienCount: 0, alternativeCount: 0, normalCount: 0, result: 0 }),
};

/** Computes one index from an enrichment snapshot and joins it onto the universe. */
export function scoreIndex<C extends IndexCode>(
  code: C,
  universe: ZoneUniverse,
  observations: readonly Observation[],
  opts: IndexOptions = {},
): IndexRowMap[C][] {
  const calculate: Calculator<C> = CALCULATORS[code];
  return joinZones(universe, calculate(observations, opts), EMPTY_ROWS[code]);
}

/** Scores every requested index from the same snapshot. */
export function runIndices(
  universe: ZoneUniverse,
  observations: readonly Observation[],
  opts: IndexOptions & { indices?: readonly IndexCode[] } = {},
): IndexTables {
  const want = new Set<IndexCode>(opts.indices ?? IndexCode.options);
  return {
    F1: want.has('F1') ? scoreIndex('F1', universe, observations, opts) : undefined,
    F2: want.has('F2') ? scoreIndex('F2', universe, observations, opts) : undefined,
    F3: want.has('F3') ? scoreIndex('F3', universe, observations, opts) : undefined,
    F4: want.has('F4') ? scoreIndex('F4', universe, observations, opts) : undefined,
    F5: want.has('F5') ? scoreIndex('F5', universe, observations, opts) : undefined,
  };
}

export type OutputRecord = Record<string, string | number>;

/** Renames row fields to the published column names (`F1_PREY_N`, ...). */
export function toOutputRecords(
  code: IndexCode | 'F6',
  rows: readonly (IndexRowMap[IndexCode] | HabitatProbabilityRow)[],
  idField: string,
): OutputRecord[] {
  const names: Record<string, string> = OUTPUT_COLUMNS[code];
  return rows.map(row => {
    const out: OutputRecord = {};
    for (const [key, value] of Object.entries(row)) {
      if (key === 'zoneId') out[idField] = value;
      else out[names[key] ?? key] = value;
    }
    return out;
  });
}

export type ZoneFeatureCollection = {
  type: 'FeatureCollection';
  features: { type: 'Feature'; properties: Record<string, unknown>; geometry: unknown }[];
};

/** Zone layer with every computed index column merged into its properties. */
export function attachToZones(universe: ZoneUniverse, tables: IndexTables, idField: string): ZoneFeatureCollection {
  const columns = new Map<ZoneId, OutputRecord>();
  for (const code of IndexCode.options) {
    const rows = tables[code];
    if (!rows) continue;
    for (const rec of toOutputRecords(code, rows, idField)) {
      const zoneId = rec[idField];
      if (zoneId !== undefined) columns.set(zoneId, { ...columns.get(zoneId), ...rec });
    }
  }
  return {
    type: 'FeatureCollection',
    features: universe.records.map(rec => ({
      type: 'Feature',
      properties: { ...rec.properties, ...columns.get(rec.zoneId), [idField]: rec.zoneId },
      geometry: rec.geometry ?? null,
    })),
  };
}

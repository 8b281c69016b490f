import type { DegenerateNormalization, DiversityRow, Observation } from '@foodchain/schema';
import { DegenerateNormalizationError } from '../errors.js';
import { groupByZone, isPrey } from './group.js';

export type DiversityOptions = { degenerate?: DegenerateNormalization };

/** Shannon entropy in bits. Zero counts contribute nothing; an empty or single-species sample is 0. */
export function shannonIndex(counts: readonly number[]): number {
  const total = counts.reduce((a, b) => a + b, 0);
  if (total <= 0) return 0;
  let h = 0;
  for (const c of counts) {
    if (c <= 0) continue;
    const p = c / total;
    h -= p * Math.log2(p);
  }
  // -0 and float dust for a lone species
  return h > 0 ? h : 0;
}

/**
 * Rescales values to [0,1] against the batch's own min and max. When every
 * value is equal the scale is undefined: `zero` maps all of them to 0,
 * `error` throws.
 */
export function minMaxNormalize(
  values: readonly number[],
  degenerate: DegenerateNormalization = 'zero',
  onDegenerate?: (value: number) => Error,
): number[] {
  if (values.length === 0) return [];
  const min = values.reduce((a, b) => Math.min(a, b));
  const max = values.reduce((a, b) => Math.max(a, b));
  if (max === min) {
    if (degenerate === 'error') throw onDegenerate?.(min) ?? new Error(`Cannot normalize constant values (${min})`);
    return values.map(() => 0);
  }
  return values.map(v => (v - min) / (max - min));
}

/**
 * F2: prey-species diversity. Entropy is computed per zone first, then
 * normalized across every zone of the batch, so a zone's result depends on
 * which other zones were scored with it. Zones observed without any prey
 * take part with an entropy of 0.
 */
export function computeDiversity(observations: readonly Observation[], opts: DiversityOptions = {}): DiversityRow[] {
  const raw: Omit<DiversityRow, 'result'>[] = [];
  for (const [zoneId, group] of groupByZone(observations)) {
    const perSpecies = new Map<string, number>();
    let preyCount = 0;
    for (const o of group.filter(isPrey)) {
      perSpecies.set(o.speciesName, (perSpecies.get(o.speciesName) ?? 0) + o.individualCount);
      preyCount += o.individualCount;
    }
    raw.push({ zoneId, preyCount, shannon: shannonIndex([...perSpecies.values()]) });
  }

  const normalized = minMaxNormalize(
    raw.map(r => r.shannon),
    opts.degenerate,
    value => new DegenerateNormalizationError(value, raw.map(r => r.zoneId)),
  );
  return raw.map((r, i) => ({ ...r, result: normalized[i] ?? 0 }));
}

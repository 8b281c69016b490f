import type { Observation, ZoneId } from '@foodchain/schema';

/**
 * Groups observations by zone, skipping those without a zone and those the
 * predicate rejects. Zones with nothing left produce no group.
 */
export function groupByZone(
  observations: readonly Observation[],
  keep: (o: Observation) => boolean = () => true,
): Map<ZoneId, Observation[]> {
  const groups = new Map<ZoneId, Observation[]>();
  for (const o of observations) {
    if (o.zoneId === null || !keep(o)) continue;
    const g = groups.get(o.zoneId);
    if (g) g.push(o);
    else groups.set(o.zoneId, [o]);
  }
  return groups;
}

export function sumCounts(observations: readonly Observation[]): number {
  let total = 0;
  for (const o of observations) total += o.individualCount;
  return total;
}

export function isPrey(o: Observation): boolean {
  return o.diet === 'prey';
}

import type { Observation, PreyRatioRow } from '@foodchain/schema';
import { groupByZone, isPrey, sumCounts } from './group.js';

/** F1: share of individuals in a zone that belong to prey species. */
export function computePreyRatio(observations: readonly Observation[]): PreyRatioRow[] {
  const rows: PreyRatioRow[] = [];
  for (const [zoneId, group] of groupByZone(observations)) {
    const totalCount = sumCounts(group);
    const preyCount = sumCounts(group.filter(isPrey));
    rows.push({ zoneId, preyCount, totalCount, result: totalCount > 0 ? preyCount / totalCount : 0 });
  }
  return rows;
}

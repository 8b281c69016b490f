import { DEFAULT_TROPHIC_SCORES } from '@foodchain/config';
import { TrophicScores, type Observation, type TrophicCoverageRow } from '@foodchain/schema';
import { groupByZone } from './group.js';

/**
 * F3: how many of the three trophic tiers a zone's observations span.
 * `scores` is ordered from all tiers present to a single tier present.
 */
export function computeTrophicCoverage(
  observations: readonly Observation[],
  scores: TrophicScores = DEFAULT_TROPHIC_SCORES,
): TrophicCoverageRow[] {
  const table = TrophicScores.parse(scores);
  const rows: TrophicCoverageRow[] = [];
  for (const [zoneId, group] of groupByZone(observations, o => o.trophicTier !== null)) {
    const tally = { D1: 0, D2: 0, D3: 0 };
    for (const o of group) if (o.trophicTier) tally[o.trophicTier]++;
    const distinct = [tally.D1, tally.D2, tally.D3].filter(n => n > 0).length;
    rows.push({
      zoneId,
      d1Count: tally.D1,
      d2Count: tally.D2,
      d3Count: tally.D3,
      result: table[3 - distinct] ?? 0,
    });
  }
  return rows;
}

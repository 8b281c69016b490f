import type { Observation, SubstitutionClass, SubstitutionRow } from '@foodchain/schema';
import { groupByZone } from './group.js';

/**
 * F5: observations per substitution class. A zone scores 1 when at least one
 * alternative species was recorded there.
 */
export function computeSubstitution(observations: readonly Observation[]): SubstitutionRow[] {
  const rows: SubstitutionRow[] = [];
  for (const [zoneId, group] of groupByZone(observations)) {
    const tally: Record<SubstitutionClass, number> = { threatened: 0, alien_alternative: 0, alternative: 0, normal: 0 };
    for (const o of group) if (o.substitution) tally[o.substitution]++;
    rows.push({
      zoneId,
      threatenedCount: tally.threatened,
      alienCount: tally.alien_alternative,
      alternativeCount: tally.alternative,
      normalCount: tally.normal,
      result: tally.alternative > 0 ? 1 : 0,
    });
  }
  return rows;
}

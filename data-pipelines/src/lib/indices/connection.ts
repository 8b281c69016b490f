import type { ConnectionRow, Observation } from '@foodchain/schema';
import { groupByZone, isPrey } from './group.js';

/** F4: prey observations per zone; any prey record confirms the connection. */
export function computeConnection(observations: readonly Observation[]): ConnectionRow[] {
  const rows: ConnectionRow[] = [];
  for (const [zoneId, group] of groupByZone(observations, isPrey)) {
    const preyCount = group.length;
    rows.push({ zoneId, preyCount, result: preyCount > 0 ? 1 : 0 });
  }
  return rows;
}

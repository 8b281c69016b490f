import { ZoneGeometry, ZoneId, ZoneRecord, type GeoFeatureCollection, type ZoneRecordInput } from '@foodchain/schema';
import { ZoneUniverseError } from './errors.js';

/** The fixed set of zones a run scores. Order is the input order. */
export class ZoneUniverse {
  private readonly byId: ReadonlyMap<ZoneId, ZoneRecord>;

  private constructor(readonly records: readonly ZoneRecord[]) {
    const byId = new Map<ZoneId, ZoneRecord>();
    for (const rec of records) {
      if (byId.has(rec.zoneId)) throw new ZoneUniverseError(`Duplicate zone id: ${rec.zoneId}`);
      byId.set(rec.zoneId, rec);
    }
    this.byId = byId;
  }

  static fromRecords(records: ZoneRecordInput[]): ZoneUniverse {
    const parsed = records.map((r, i) => {
      const res = ZoneRecord.safeParse(r);
      if (!res.success) throw new ZoneUniverseError(`Zone record ${i} is invalid: ${res.error.issues[0]?.message}`);
      return Object.freeze(res.data);
    });
    return new ZoneUniverse(Object.freeze(parsed));
  }

  static fromFeatures(fc: GeoFeatureCollection, idField: string): ZoneUniverse {
    const records = fc.features.map((f, i) => {
      const properties = f.properties ?? {};
      const id = ZoneId.safeParse(properties[idField]);
      if (!id.success) throw new ZoneUniverseError(`Zone feature ${i} has no usable "${idField}"`);
      const geometry = ZoneGeometry.safeParse(f.geometry);
      if (!geometry.success) throw new ZoneUniverseError(`Zone ${id.data} is not a polygon`);
      return { zoneId: id.data, properties, geometry: geometry.data };
    });
    return ZoneUniverse.fromRecords(records);
  }

  get size(): number { return this.records.length; }

  get ids(): ZoneId[] { return this.records.map(r => r.zoneId); }

  has(zoneId: ZoneId): boolean { return this.byId.has(zoneId); }

  get(zoneId: ZoneId): ZoneRecord | undefined { return this.byId.get(zoneId); }
}

/**
 * Universe-driven left join: exactly one row per universe zone, in universe
 * order. Zones without a computed row get `fill(zoneId)`; rows for unknown
 * zones are dropped. A non-finite result is replaced by the fill's result.
 */
export function joinZones<R extends { zoneId: ZoneId; result: number }>(
  universe: ZoneUniverse,
  rows: readonly R[],
  fill: (zoneId: ZoneId) => R,
): R[] {
  const computed = new Map<ZoneId, R>();
  for (const row of rows) computed.set(row.zoneId, row);
  return universe.ids.map(zoneId => {
    const hit = computed.get(zoneId);
    if (!hit) return fill(zoneId);
    return Number.isFinite(hit.result) ? hit : { ...hit, result: fill(zoneId).result };
  });
}

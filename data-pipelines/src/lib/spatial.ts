import bbox from '@turf/bbox';
import booleanPointInPolygon from '@turf/boolean-point-in-polygon';
import RBush from 'rbush';
import type { ZoneGeometry, ZoneId } from '@foodchain/schema';
import type { ZoneUniverse } from './zones.js';

export type SurveyPoint = {
  /** [longitude, latitude] in the zone layer's coordinate system */
  coordinates: number[];
  properties: Record<string, unknown>;
};

/** Assigns each point the id of the zone containing it, or null when none does. */
export type SpatialJoin = (points: readonly SurveyPoint[]) => (ZoneId | null)[];

type BoxItem = {
  minX: number; minY: number; maxX: number; maxY: number;
  /** Position in the universe; overlapping zones resolve by it */
  order: number;
  zoneId: ZoneId;
  geom: ZoneGeometry;
};

function toBox(order: number, zoneId: ZoneId, geom: ZoneGeometry): BoxItem {
  const bb = bbox(geom);
  const [minX, minY, maxX, maxY] = bb.length === 6 ? [bb[0], bb[1], bb[3], bb[4]] : bb;
  return { minX, minY, maxX, maxY, order, zoneId, geom };
}

/**
 * Point-in-polygon join against the universe's zone geometries. Points on a
 * boundary count as inside; when zones overlap the first in universe order wins.
 */
export function createZoneLocator(universe: ZoneUniverse): SpatialJoin {
  const boxes: BoxItem[] = [];
  universe.records.forEach((rec, i) => {
    if (rec.geometry) boxes.push(toBox(i, rec.zoneId, rec.geometry));
  });
  const idx = new RBush<BoxItem>();
  idx.load(boxes);
  return points => points.map(pt => {
    const [x, y] = pt.coordinates;
    if (x === undefined || y === undefined || !Number.isFinite(x) || !Number.isFinite(y)) return null;
    const cands = idx.search({ minX: x, minY: y, maxX: x, maxY: y }).sort((a, b) => a.order - b.order);
    for (const cand of cands) {
      if (booleanPointInPolygon([x, y], cand.geom)) return cand.zoneId;
    }
    return null;
  });
}

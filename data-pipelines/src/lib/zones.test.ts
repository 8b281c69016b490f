import { describe, it, expect } from 'vitest';
import type { ZoneId } from '@foodchain/schema';
import { ZoneUniverseError } from './errors.js';
import { joinZones, ZoneUniverse } from './zones.js';

const square = (x: number) => ({
  type: 'Polygon' as const,
  coordinates: [[[x, 0], [x + 10, 0], [x + 10, 10], [x, 10], [x, 0]]],
});

describe('ZoneUniverse', () => {
  it('builds from a zone layer keyed by the id field', () => {
    const universe = ZoneUniverse.fromFeatures({
      type: 'FeatureCollection',
      features: [
        { type: 'Feature', properties: { BT_ID: 7, label: 'wetland' }, geometry: square(0) },
        { type: 'Feature', properties: { BT_ID: 'B-2' }, geometry: square(10) },
      ],
    }, 'BT_ID');
    expect(universe.ids).toEqual([7, 'B-2']);
    expect(universe.get(7)?.properties).toEqual({ BT_ID: 7, label: 'wetland' });
    expect(universe.has('7')).toBe(false);
  });

  it('rejects duplicate ids', () => {
    expect(() => ZoneUniverse.fromRecords([{ zoneId: 'Z1' }, { zoneId: 'Z1' }])).toThrow('Duplicate zone id: Z1');
  });

  it('rejects features without an id', () => {
    expect(() => ZoneUniverse.fromFeatures({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: {}, geometry: square(0) }],
    }, 'BT_ID')).toThrow(ZoneUniverseError);
  });

  it('rejects non-polygon zones', () => {
    expect(() => ZoneUniverse.fromFeatures({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: { BT_ID: 1 }, geometry: { type: 'Point', coordinates: [0, 0] } }],
    }, 'BT_ID')).toThrow('Zone 1 is not a polygon');
  });
});

describe('joinZones', () => {
  const universe = ZoneUniverse.fromRecords([{ zoneId: 'Z1' }, { zoneId: 'Z2' }, { zoneId: 'Z3' }]);
  type Row = { zoneId: ZoneId; hits: number; result: number };
  const fill = (zoneId: ZoneId): Row => ({ zoneId, hits: 0, result: 0 });

  it('returns one row per universe zone in universe order', () => {
    const rows = joinZones<Row>(universe, [{ zoneId: 'Z3', hits: 2, result: 0.5 }], fill);
    expect(rows).toEqual([
      { zoneId: 'Z1', hits: 0, result: 0 },
      { zoneId: 'Z2', hits: 0, result: 0 },
      { zoneId: 'Z3', hits: 2, result: 0.5 },
    ]);
  });

  it('drops rows for zones outside the universe', () => {
    const rows = joinZones<Row>(universe, [{ zoneId: 'Z9', hits: 1, result: 1 }], fill);
    expect(rows).toHaveLength(universe.size);
    expect(rows.map(r => r.zoneId)).toEqual(['Z1', 'Z2', 'Z3']);
  });

  it('replaces a non-finite result with the default', () => {
    const rows = joinZones<Row>(universe, [{ zoneId: 'Z1', hits: 4, result: Number.NaN }], fill);
    expect(rows[0]).toEqual({ zoneId: 'Z1', hits: 4, result: 0 });
  });
});

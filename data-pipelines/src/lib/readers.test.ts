import { describe, it, expect } from 'vitest';
import {
  parseDelimited,
  parseFeatureCollection,
  parseNDJSON,
  surveyPointsFromFeatures,
  surveyPointsFromRows,
} from './readers.js';

describe('parseDelimited', () => {
  it('reads headed rows as strings and skips blank lines', () => {
    const rows = parseDelimited('S_Name,Owls_foods\nVole,Prey_S\n\nHeron,Normal_S\n', ',');
    expect(rows).toEqual([
      { S_Name: 'Vole', Owls_foods: 'Prey_S' },
      { S_Name: 'Heron', Owls_foods: 'Normal_S' },
    ]);
  });

  it('trims header names', () => {
    expect(parseDelimited(' S_Name \tD_Level\nVole\tD2', '\t')).toEqual([{ S_Name: 'Vole', D_Level: 'D2' }]);
  });
});

describe('parseNDJSON', () => {
  it('keeps object lines and skips the rest', () => {
    expect(parseNDJSON('{"a":1}\nnot json\n[1,2]\n{"b":2}')).toEqual([{ a: 1 }, { b: 2 }]);
  });
});

describe('survey points', () => {
  it('takes point features and ignores other geometries', () => {
    const fc = parseFeatureCollection(JSON.stringify({
      type: 'FeatureCollection',
      features: [
        { type: 'Feature', properties: { 국명: 'Vole' }, geometry: { type: 'Point', coordinates: [127.1, 37.2] } },
        { type: 'Feature', properties: { 국명: 'Heron' }, geometry: { type: 'LineString', coordinates: [[0, 0], [1, 1]] } },
        { type: 'Feature', properties: null, geometry: null },
      ],
    }));
    expect(surveyPointsFromFeatures(fc)).toEqual([{ coordinates: [127.1, 37.2], properties: { 국명: 'Vole' } }]);
  });

  it('builds points from latitude and longitude columns', () => {
    const points = surveyPointsFromRows([
      { lat: '37.5', lon: '127', speciesName: 'Vole' },
      { latitude: 'n/a', longitude: '127', speciesName: 'Heron' },
    ]);
    expect(points).toEqual([{ coordinates: [127, 37.5], properties: { lat: '37.5', lon: '127', speciesName: 'Vole' } }]);
  });

  it('rejects documents that are not feature collections', () => {
    expect(() => parseFeatureCollection('{"type":"Feature"}', 'zones.geojson')).toThrow(/^zones\.geojson is not a GeoJSON FeatureCollection/);
  });
});

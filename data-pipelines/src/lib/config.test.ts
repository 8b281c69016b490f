import { describe, it, expect } from 'vitest';
import { parsePipelineConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('parsePipelineConfig', () => {
  it('fills defaults', () => {
    const cfg = parsePipelineConfig({ zonesPath: 'z.geojson', surveyPath: 's.geojson', traitTablePath: 't.csv' });
    expect(cfg).toEqual({
      zonesPath: 'z.geojson',
      surveyPath: 's.geojson',
      traitTablePath: 't.csv',
      outDir: 'data/out',
      zoneIdField: 'BT_ID',
      traitTableEncoding: 'utf-8',
      placeholderPolicy: 'drop',
      trophicScores: [1, 0.6, 0.3],
      degenerateNormalization: 'zero',
      indices: ['F1', 'F2', 'F3', 'F4', 'F5'],
    });
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      parsePipelineConfig({ zonesPath: 'z', surveyPath: 's', trophicScores: [1, 0.5], placeholderPolicy: 'skip' }, 'cfg.json');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const err = caught instanceof ConfigError ? caught : undefined;
    expect(err?.file).toBe('cfg.json');
    expect(err?.issues.map(i => i.split(':')[0])).toEqual(['traitTablePath', 'placeholderPolicy', 'trophicScores']);
  });
});

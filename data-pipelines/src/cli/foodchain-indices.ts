#!/usr/bin/env node
import path from 'path';
import { PATHS } from '@foodchain/config';
import { loadPipelineConfig } from '../lib/config.js';
import { enrich } from '../lib/enrich.js';
import { runIndices, attachToZones, toOutputRecords } from '../lib/pipeline.js';
import { readFeatureCollection, readSurveyPoints } from '../lib/readers.js';
import { createZoneLocator } from '../lib/spatial.js';
import { loadTraitTable } from '../lib/traits.js';
import { writeCSV, writeJSON, writeNDJSON } from '../lib/utils.js';
import { ZoneUniverse } from '../lib/zones.js';

async function main(): Promise<void> {
  const cfgPath = path.resolve(process.argv[2] ?? PATHS.configFile);
  const cfg = await loadPipelineConfig(cfgPath);

  const universe = ZoneUniverse.fromFeatures(await readFeatureCollection(cfg.zonesPath), cfg.zoneIdField);
  console.log('Zones:', universe.size);

  const points = await readSurveyPoints(cfg.surveyPath);
  console.log('Survey points:', points.length);

  const traits = await loadTraitTable(cfg.traitTablePath, { encoding: cfg.traitTableEncoding });
  console.log('Trait table:', traits.bySpecies.size, 'species', traits.skippedRows ? `(${traits.skippedRows} rows without a name)` : '');

  const { observations, report } = enrich(points, createZoneLocator(universe), traits, {
    placeholderPolicy: cfg.placeholderPolicy,
  });
  console.log('Enriched observations:', observations.length, 'rows');
  console.log(
    `  outside zones ${report.unmatchedZone}, unidentified ${cfg.placeholderPolicy === 'drop' ? 'dropped' : 'kept'} ` +
    `${report.placeholderDropped + report.placeholderReplaced}, no trait match ${report.unmatchedTrait}, ` +
    `count defaulted to 1 ${report.countsDefaulted}`,
  );

  const tables = runIndices(universe, observations, {
    indices: cfg.indices,
    trophicScores: cfg.trophicScores,
    degenerateNormalization: cfg.degenerateNormalization,
  });

  for (const code of cfg.indices) {
    const rows = tables[code];
    if (!rows) continue;
    const records = toOutputRecords(code, rows, cfg.zoneIdField);
    await writeCSV(path.join(cfg.outDir, `${code.toLowerCase()}_result.csv`), records);
    await writeNDJSON(path.join(cfg.outDir, `${code.toLowerCase()}_result.ndjson`), records);
    let scored = 0;
    for (const r of rows) if (r.result > 0) scored++;
    console.log(`${code}: ${rows.length} zones, ${scored} with a non-zero result`);
  }

  await writeJSON(path.join(cfg.outDir, 'zones_indices.geojson'), attachToZones(universe, tables, cfg.zoneIdField));
  console.log('Wrote results to', cfg.outDir);
}

main().catch(e => { console.error(e); process.exit(1); });

import fs from 'fs/promises';
import path from 'path';
import { promisify } from 'util';
import { gunzip } from 'zlib';
import Papa from 'papaparse';
import { GeoFeatureCollection, PointGeometry } from '@foodchain/schema';
import { aliasGet, isRecord, toFiniteNumber } from './utils.js';
import type { SurveyPoint } from './spatial.js';

const gunzipAsync = promisify(gunzip);

export type ReadOptions = { encoding?: string };

function baseExt(file: string): string {
  const lower = file.toLowerCase();
  const stripped = lower.endsWith('.gz') ? lower.slice(0, -3) : lower;
  return path.extname(stripped);
}

export async function readText(file: string, opts: ReadOptions = {}): Promise<string> {
  let buf = await fs.readFile(file);
  if (file.toLowerCase().endsWith('.gz')) buf = await gunzipAsync(buf);
  return new TextDecoder(opts.encoding ?? 'utf-8').decode(buf);
}

export function parseDelimited(content: string, delimiter: string): Record<string, unknown>[] {
  const res = Papa.parse<Record<string, unknown>>(content, {
    header: true,
    delimiter,
    skipEmptyLines: true,
    transformHeader: h => h.trim(),
  });
  return res.data.filter(isRecord);
}

export function parseNDJSON(content: string): Record<string, unknown>[] {
  const rows: Record<string, unknown>[] = [];
  for (const line of content.split(/\r?\n/).filter(Boolean)) {
    let rec: unknown;
    try { rec = JSON.parse(line); } catch { continue; }
    if (isRecord(rec)) rows.push(rec);
  }
  return rows;
}

export function parseFeatureCollection(content: string, file = '<inline>'): GeoFeatureCollection {
  const parsed = GeoFeatureCollection.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`${file} is not a GeoJSON FeatureCollection: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

/** Reads tabular rows from CSV, TSV, NDJSON or GeoJSON (feature properties), optionally gzipped. */
export async function readRowsGeneric(file: string, opts: ReadOptions = {}): Promise<Record<string, unknown>[]> {
  const content = await readText(file, opts);
  switch (baseExt(file)) {
    case '.csv': return parseDelimited(content, ',');
    case '.tsv': return parseDelimited(content, '\t');
    case '.ndjson': return parseNDJSON(content);
    case '.geojson':
    case '.json':
      return parseFeatureCollection(content, file).features.map(f => f.properties ?? {});
    default:
      throw new Error(`Unsupported table format: ${file}`);
  }
}

export async function readFeatureCollection(file: string, opts: ReadOptions = {}): Promise<GeoFeatureCollection> {
  return parseFeatureCollection(await readText(file, opts), file);
}

export function surveyPointsFromFeatures(fc: GeoFeatureCollection): SurveyPoint[] {
  const points: SurveyPoint[] = [];
  for (const f of fc.features) {
    const geom = PointGeometry.safeParse(f.geometry);
    if (!geom.success) continue;
    points.push({ coordinates: geom.data.coordinates, properties: f.properties ?? {} });
  }
  return points;
}

export function surveyPointsFromRows(rows: Record<string, unknown>[]): SurveyPoint[] {
  const points: SurveyPoint[] = [];
  for (const r of rows) {
    const lat = toFiniteNumber(aliasGet(r, 'decimalLatitude'));
    const lon = toFiniteNumber(aliasGet(r, 'decimalLongitude'));
    if (lat === undefined || lon === undefined) continue;
    points.push({ coordinates: [lon, lat], properties: r });
  }
  return points;
}

/** Survey points from a GeoJSON point layer, or from a table with latitude/longitude columns. */
export async function readSurveyPoints(file: string, opts: ReadOptions = {}): Promise<SurveyPoint[]> {
  const ext = baseExt(file);
  if (ext === '.geojson' || ext === '.json') {
    return surveyPointsFromFeatures(await readFeatureCollection(file, opts));
  }
  return surveyPointsFromRows(await readRowsGeneric(file, opts));
}

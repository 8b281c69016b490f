import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import { FIELD_ALIASES } from '@foodchain/config';

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export async function writeNDJSON(file: string, rows: unknown[]): Promise<void> {
  await ensureDir(path.dirname(file));
  const content = rows.map(r => JSON.stringify(r)).join('\n');
  await fs.writeFile(file, content);
}

export async function writeJSON(file: string, obj: unknown): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, JSON.stringify(obj));
}

export async function writeCSV(file: string, rows: Record<string, unknown>[]): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, Papa.unparse(rows));
}

export function normalizeHeaderKey(s: string): string {
  return s.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

/**
 * Looks a logical field up in a loosely-shaped record through `FIELD_ALIASES`,
 * first by exact key, then ignoring case and punctuation. Blank values count as absent.
 */
export function aliasGet(rec: Record<string, unknown>, target: keyof typeof FIELD_ALIASES): unknown {
  const aliases = FIELD_ALIASES[target] ?? [target];
  for (const k of aliases) {
    if (rec[k] != null && rec[k] !== '') return rec[k];
  }
  const normToValue: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(rec)) normToValue[normalizeHeaderKey(k)] = v;
  for (const k of aliases) {
    const v = normToValue[normalizeHeaderKey(k)];
    if (v != null && v !== '') return v;
  }
  return undefined;
}

export function toFiniteNumber(v: unknown): number | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  const n = Number(v.trim());
  return Number.isFinite(n) ? n : undefined;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

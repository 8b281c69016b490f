import fs from 'fs/promises';
import { DIET_CODES, SUBSTITUTION_CODES, TROPHIC_CODES } from '@foodchain/config';
import type { SpeciesTrait } from '@foodchain/schema';
import { DuplicateTraitError, InvalidCategoryError } from './errors.js';
import { readRowsGeneric, type ReadOptions } from './readers.js';
import { aliasGet } from './utils.js';

export type TraitTable = {
  bySpecies: ReadonlyMap<string, SpeciesTrait>;
  /** Rows without a species name; they can never join. */
  skippedRows: number;
};

export const EMPTY_TRAIT_TABLE: TraitTable = { bySpecies: new Map(), skippedRows: 0 };

function decode<T extends string>(codes: Record<string, T>, field: string, raw: unknown, speciesName: string): T {
  const value = String(raw ?? '').trim();
  const hit = Object.prototype.hasOwnProperty.call(codes, value) ? codes[value] : undefined;
  if (hit === undefined) throw new InvalidCategoryError(field, value, speciesName);
  return hit;
}

export function parseTraitRows(rows: Record<string, unknown>[]): TraitTable {
  const bySpecies = new Map<string, SpeciesTrait>();
  let skippedRows = 0;
  for (const r of rows) {
    const speciesName = String(aliasGet(r, 'speciesName') ?? '').trim();
    if (!speciesName) { skippedRows++; continue; }
    if (bySpecies.has(speciesName)) throw new DuplicateTraitError(speciesName);
    bySpecies.set(speciesName, {
      speciesName,
      diet: decode(DIET_CODES, 'diet', aliasGet(r, 'diet'), speciesName),
      trophicTier: decode(TROPHIC_CODES, 'trophicTier', aliasGet(r, 'trophicTier'), speciesName),
      substitution: decode(SUBSTITUTION_CODES, 'substitution', aliasGet(r, 'substitution'), speciesName),
    });
  }
  return { bySpecies, skippedRows };
}

/**
 * Loads the trait sheet. A file that cannot be read or parsed yields an empty
 * table so enrichment still runs with null traits; bad category codes and
 * duplicate species still throw.
 */
export async function loadTraitTable(file: string, opts: ReadOptions = {}): Promise<TraitTable> {
  let rows: Record<string, unknown>[];
  try {
    await fs.access(file);
    rows = await readRowsGeneric(file, opts);
  } catch (e) {
    console.warn('Trait table unreadable, continuing without traits:', file, e instanceof Error ? e.message : e);
    return EMPTY_TRAIT_TABLE;
  }
  return parseTraitRows(rows);
}

import { describe, it, expect, vi, afterEach } from 'vitest';
import { DuplicateTraitError, InvalidCategoryError } from './errors.js';
import { loadTraitTable, parseTraitRows } from './traits.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseTraitRows', () => {
  it('decodes sheet codes into categories', () => {
    const table = parseTraitRows([
      { S_Name: 'Vole', Owls_foods: 'Prey_S', D_Level: 'D2', Alternative_S: 'Alt_S' },
      { S_Name: 'Heron', Owls_foods: 'Normal_S', D_Level: 'D1', Alternative_S: 'Threatened_S' },
      { S_Name: 'Bullfrog', Owls_foods: 'Prey_S', D_Level: 'D3', Alternative_S: 'Alt_Alien_S' },
    ]);
    expect(table.bySpecies.get('Vole')).toEqual({ speciesName: 'Vole', diet: 'prey', trophicTier: 'D2', substitution: 'alternative' });
    expect(table.bySpecies.get('Heron')).toEqual({ speciesName: 'Heron', diet: 'other', trophicTier: 'D1', substitution: 'threatened' });
    expect(table.bySpecies.get('Bullfrog')?.substitution).toBe('alien_alternative');
  });

  it('accepts the category names themselves', () => {
    const table = parseTraitRows([{ speciesName: 'Vole', diet: 'prey', trophicTier: 'D3', substitution: 'normal' }]);
    expect(table.bySpecies.get('Vole')?.diet).toBe('prey');
  });

  it('rejects unknown codes when the table is built', () => {
    expect(() => parseTraitRows([{ S_Name: 'Vole', Owls_foods: 'Snack', D_Level: 'D2', Alternative_S: 'Alt_S' }]))
      .toThrow(InvalidCategoryError);
    expect(() => parseTraitRows([{ S_Name: 'Vole', Owls_foods: 'Prey_S', D_Level: 'D4', Alternative_S: 'Alt_S' }]))
      .toThrow('Unknown trophicTier code "D4" for species "Vole"');
  });

  it('rejects a species listed twice', () => {
    const row = { S_Name: 'Vole', Owls_foods: 'Prey_S', D_Level: 'D2', Alternative_S: 'Alt_S' };
    expect(() => parseTraitRows([row, row])).toThrow(DuplicateTraitError);
  });

  it('skips rows without a species name', () => {
    const table = parseTraitRows([{ S_Name: '  ', Owls_foods: 'Prey_S', D_Level: 'D2', Alternative_S: 'Alt_S' }]);
    expect(table.bySpecies.size).toBe(0);
    expect(table.skippedRows).toBe(1);
  });
});

describe('loadTraitTable', () => {
  it('falls back to an empty table when the file is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const table = await loadTraitTable('/nonexistent/foodchain_traits.csv');
    expect(table.bySpecies.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

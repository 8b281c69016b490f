import type { ZoneId } from '@foodchain/schema';

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  constructor(readonly file: string, readonly issues: string[]) {
    super(`Invalid config ${file}: ${issues.join('; ')}`);
  }
}

export class ZoneUniverseError extends Error {
  override readonly name = 'ZoneUniverseError';
}

/** A trait-table cell holds a code outside the closed category set. */
export class InvalidCategoryError extends Error {
  override readonly name = 'InvalidCategoryError';
  constructor(readonly field: string, readonly value: string, readonly speciesName: string) {
    super(`Unknown ${field} code "${value}" for species "${speciesName}"`);
  }
}

export class DuplicateTraitError extends Error {
  override readonly name = 'DuplicateTraitError';
  constructor(readonly speciesName: string) {
    super(`Species "${speciesName}" appears more than once in the trait table`);
  }
}

/** Every zone in the batch has the same entropy, so min-max scaling is undefined. */
export class DegenerateNormalizationError extends Error {
  override readonly name = 'DegenerateNormalizationError';
  constructor(readonly value: number, readonly zoneIds: readonly ZoneId[]) {
    super(`Cannot min-max normalize: all ${zoneIds.length} zone(s) share the value ${value}`);
  }
}

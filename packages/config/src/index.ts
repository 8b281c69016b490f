import type {
  DietCategory,
  HabitatProbabilityRow,
  IndexRowMap,
  SpeciesTrait,
  SubstitutionClass,
  TrophicScores,
  TrophicTier,
} from '@foodchain/schema';

export const UNIDENTIFIED_SPECIES_NAME = 'Noname';

// Traits written onto unidentified observations under the fallback policy
export const FALLBACK_TRAIT: Omit<SpeciesTrait, 'speciesName'> = {
  diet: 'other',
  trophicTier: 'D3',
  substitution: 'normal',
};

export const DEFAULT_TROPHIC_SCORES: TrophicScores = [1, 0.6, 0.3];

export const PATHS = {
  configFile: 'vendor/foodchain/config.json',
};

// Codes used by the survey agency's trait sheets, plus the domain names themselves
export const DIET_CODES: Record<string, DietCategory> = {
  Prey_S: 'prey',
  Normal_S: 'other',
  prey: 'prey',
  other: 'other',
};

export const TROPHIC_CODES: Record<string, TrophicTier> = {
  D1: 'D1',
  D2: 'D2',
  D3: 'D3',
};

export const SUBSTITUTION_CODES: Record<string, SubstitutionClass> = {
  Threatened_S: 'threatened',
  Alt_Alien_S: 'alien_alternative',
  Alt_S: 'alternative',
  Normal_S: 'normal',
  threatened: 'threatened',
  alien_alternative: 'alien_alternative',
  alternative: 'alternative',
  normal: 'normal',
};

export const FIELD_ALIASES: Record<string, string[]> = {
  speciesName: ['speciesName', 'S_Name', '국명'],
  individualCount: ['individualCount', 'count', '개체수', 'individuals'],
  decimalLatitude: ['decimalLatitude', 'latitude', 'lat'],
  decimalLongitude: ['decimalLongitude', 'longitude', 'lon'],
  diet: ['diet', 'Owls_foods'],
  trophicTier: ['trophicTier', 'D_Level'],
  substitution: ['substitution', 'Alternative_S', 'Alternative_s'],
};

type ColumnNames<R> = { [K in Exclude<keyof R, 'zoneId'>]: string };

export const OUTPUT_COLUMNS: { [C in keyof IndexRowMap]: ColumnNames<IndexRowMap[C]> } & {
  F6: ColumnNames<HabitatProbabilityRow>;
} = {
  F1: { preyCount: 'F1_PREY_N', totalCount: 'F1_TOTAL_N', result: 'F1_RESULT' },
  F2: { preyCount: 'F2_PREY_N', shannon: 'F2_SHANNON', result: 'F2_RESULT' },
  F3: { d1Count: 'F3_D1_N', d2Count: 'F3_D2_N', d3Count: 'F3_D3_N', result: 'F3_RESULT' },
  F4: { preyCount: 'F4_PREY_N', result: 'F4_RESULT' },
  F5: {
    threatenedCount: 'F5_THRT_N',
    alienCount: 'F5_ALIEN_N',
    alternativeCount: 'F5_ALT_N',
    normalCount: 'F5_NORM_N',
    result: 'F5_RESULT',
  },
  F6: { count: 'F6_COUNT', area: 'F6_AREA', result: 'F6_RESULT' },
};

import type { AnalysisOptions } from '@/types/gradation';

// Particle size boundaries (mm)
export const CLASSIFICATION_THRESHOLDS = {
  fineUpper: 0.075, // below: fine soil (silt/clay)
  sandUpper: 2.0, // below: sand, at or above: gravel/coarse soil
} as const;

// Well-graded when Cu > minCu and ccMin < Cc < ccMax
export const GRADATION_CRITERIA = {
  minCu: 4,
  ccMin: 1,
  ccMax: 3,
} as const;

export const TARGET_PERCENTS = [10, 30, 60] as const;

export const DISPLAY_PRECISION = {
  sieveSize: 3,
  weight: 2,
  percent: 2,
  diameter: 3,
  coefficient: 2,
} as const;

// Residual cumulative sums below this are treated as exactly 100 %
export const PASSING_SNAP_EPSILON = 1e-9;

export const DEFAULT_SIEVE_SET_ID = 'standard';

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  includePan: true,
  interpolation: 'linear',
};

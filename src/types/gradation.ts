export interface SieveSpec {
  id: string;
  name: string;
  sizes: readonly number[]; // mm, strictly decreasing, pan (0) last
}

export interface GradationRow {
  sieveSize: number; // mm, 0 for the pan
  isPan: boolean;
  weightRetained: number; // g
  percentRetained: number; // %
  cumulativePercentRetained: number; // %
  percentPassing: number; // %
}

export type GradationTable = readonly GradationRow[];

export type InterpolationMethod = 'linear' | 'log-linear';

export interface PassingCurvePoint {
  percentPassing: number; // %
  sieveSize: number; // mm
}

export type DiameterRange = 'within' | 'below' | 'above';

export interface CharacteristicDiameter {
  percent: number; // % finer
  value: number; // mm
  range: DiameterRange;
}

export interface CharacteristicDiameters {
  d10: CharacteristicDiameter;
  d30: CharacteristicDiameter;
  d60: CharacteristicDiameter;
}

export interface DerivedMetrics {
  cu: number; // Infinity when D10 = 0
  cc: number; // Infinity when D10 = 0 or D60 = 0
}

export type SoilType = 'fine' | 'sand' | 'gravel';

export type GradationType = 'well-graded' | 'poorly-graded';

export interface Classification {
  soilType: SoilType;
  gradation: GradationType;
  soilLabel: string;
  gradationLabel: string;
}

export interface GradationAnalysis {
  sieveSpec: SieveSpec;
  totalWeight: number; // g
  table: GradationTable;
  curve: readonly PassingCurvePoint[];
  diameters: CharacteristicDiameters;
  metrics: DerivedMetrics;
  classification: Classification;
  interpolation: InterpolationMethod;
}

export interface ParseError {
  kind: 'ParseError';
  token: string;
  position: number; // 1-based
  reason: 'not-a-number' | 'negative';
  message: string;
}

export interface CountMismatchError {
  kind: 'CountMismatchError';
  expected: number;
  received: number;
  includesPan: boolean;
  message: string;
}

export interface DegenerateInputError {
  kind: 'DegenerateInputError';
  totalWeight: number;
  message: string;
}

export type WeightInputError = ParseError | CountMismatchError;

export type GradationError = ParseError | CountMismatchError | DegenerateInputError;

export type WeightParseOutcome =
  | { ok: true; weights: number[] }
  | { ok: false; error: WeightInputError };

export type AnalysisOutcome =
  | { ok: true; analysis: GradationAnalysis }
  | { ok: false; error: GradationError };

export interface WeightInputOptions {
  includePan: boolean;
}

export interface AnalysisOptions extends WeightInputOptions {
  interpolation: InterpolationMethod;
}

export interface SampleDetails {
  projectName?: string;
  sampleId?: string;
  location?: string;
  testedBy?: string;
}

import type {
  SieveSpec,
  GradationRow,
  GradationTable,
  PassingCurvePoint,
  InterpolationMethod,
  CharacteristicDiameter,
  CharacteristicDiameters,
  DiameterRange,
  DerivedMetrics,
  Classification,
  SoilType,
  GradationType,
  DegenerateInputError,
  AnalysisOutcome,
  AnalysisOptions,
} from '@/types/gradation';
import {
  CLASSIFICATION_THRESHOLDS,
  GRADATION_CRITERIA,
  PASSING_SNAP_EPSILON,
  TARGET_PERCENTS,
  DEFAULT_ANALYSIS_OPTIONS,
} from '@/config/gradation';
import { parseWeightInput } from '@/utils/sieveInput';

export const SOIL_TYPE_LABELS: Record<SoilType, string> = {
  fine: 'Fine soil (silt/clay)',
  sand: 'Sand',
  gravel: 'Gravel/coarse soil',
};

export const GRADATION_LABELS: Record<GradationType, string> = {
  'well-graded': 'Well-graded',
  'poorly-graded': 'Poorly-graded',
};

function degenerateInputError(totalWeight: number): DegenerateInputError {
  const message = Number.isFinite(totalWeight)
    ? 'Total weight retained is zero; enter at least one weight above zero.'
    : 'Total weight retained is too large to compute; enter the weights in smaller units.';
  return { kind: 'DegenerateInputError', totalWeight, message };
}

/**
 * Turn retained weights into the sieve analysis table.
 *
 * % retained = W_i / ΣW × 100
 * cumulative % retained = running sum of % retained, coarsest sieve first
 * % passing = 100 − cumulative % retained
 *
 * Rows keep the order of `spec.sizes`. A zero total mass, or one that
 * overflows to Infinity, has no meaningful percentages and is returned as a
 * DegenerateInputError.
 */
export function computeGradationTable(
  spec: SieveSpec,
  weights: readonly number[]
): GradationTable | DegenerateInputError {
  if (weights.length !== spec.sizes.length) {
    throw new Error(
      `Expected ${spec.sizes.length} weights for sieve set "${spec.id}", got ${weights.length}`
    );
  }

  const totalWeight = weights.reduce((sum, w) => sum + w, 0);
  if (totalWeight <= 0 || !Number.isFinite(totalWeight)) {
    return degenerateInputError(totalWeight);
  }

  let cumulative = 0;
  const rows = spec.sizes.map((sieveSize, i): GradationRow => {
    const weightRetained = weights[i];
    const percentRetained = (weightRetained / totalWeight) * 100;
    cumulative += percentRetained;

    let percentPassing = 100 - cumulative;
    // Floating point leaves ~1e-14 residue once everything has been retained
    if (Math.abs(percentPassing) < PASSING_SNAP_EPSILON) {
      percentPassing = 0;
    }

    return Object.freeze({
      sieveSize,
      isPan: sieveSize === 0,
      weightRetained,
      percentRetained,
      cumulativePercentRetained: cumulative,
      percentPassing,
    });
  });

  return Object.freeze(rows);
}

/**
 * (% passing, size) pairs for the sieves above the pan, ordered by ascending
 * % passing. The pan has no opening so it only contributes mass.
 */
export function buildPassingCurve(table: GradationTable): PassingCurvePoint[] {
  return table
    .filter(row => row.sieveSize > 0)
    .map(row => ({ percentPassing: row.percentPassing, sieveSize: row.sieveSize }))
    .reverse();
}

/**
 * Grain diameter at which `percent` of the sample mass is finer.
 *
 * Outside the measured curve the value is clamped to the nearest endpoint:
 * the finest opening when more than `percent` already passes it ('below'),
 * the coarsest opening when less than `percent` passes even that ('above').
 * Where several sieves share the same % passing the coarsest of them is read.
 *
 * 'linear' interpolates the opening size directly; 'log-linear' interpolates
 * log10(size), i.e. a straight line on the semi-log gradation chart.
 */
export function interpolateDiameter(
  curve: readonly PassingCurvePoint[],
  percent: number,
  method: InterpolationMethod = 'linear'
): CharacteristicDiameter {
  if (curve.length === 0) {
    throw new Error('Passing curve is empty; the sieve set has no openings above the pan');
  }

  const first = curve[0];
  const last = curve[curve.length - 1];

  if (percent < first.percentPassing) {
    return { percent, value: first.sieveSize, range: 'below' };
  }
  if (percent > last.percentPassing) {
    return { percent, value: last.sieveSize, range: 'above' };
  }

  // Last point whose % passing does not exceed the target
  let j = 0;
  while (j + 1 < curve.length && curve[j + 1].percentPassing <= percent) {
    j++;
  }

  const lower = curve[j];
  if (lower.percentPassing === percent || j === curve.length - 1) {
    return { percent, value: lower.sieveSize, range: 'within' };
  }

  const upper = curve[j + 1];
  const t = (percent - lower.percentPassing) / (upper.percentPassing - lower.percentPassing);

  const value = method === 'log-linear'
    ? Math.pow(10, Math.log10(lower.sieveSize) + t * (Math.log10(upper.sieveSize) - Math.log10(lower.sieveSize)))
    : lower.sieveSize + t * (upper.sieveSize - lower.sieveSize);

  return { percent, value, range: 'within' };
}

export function computeCharacteristicDiameters(
  curve: readonly PassingCurvePoint[],
  method: InterpolationMethod = 'linear'
): CharacteristicDiameters {
  const [p10, p30, p60] = TARGET_PERCENTS;
  return {
    d10: interpolateDiameter(curve, p10, method),
    d30: interpolateDiameter(curve, p30, method),
    d60: interpolateDiameter(curve, p60, method),
  };
}

/**
 * Cu = D60 / D10
 * Cc = D30² / (D10 × D60)
 *
 * A zero divisor yields Infinity rather than NaN or a fault.
 */
export function computeCoefficients(d10: number, d30: number, d60: number): DerivedMetrics {
  const cu = d10 === 0 ? Infinity : d60 / d10;
  const cc = d10 === 0 || d60 === 0 ? Infinity : (d30 * d30) / (d10 * d60);
  return { cu, cc };
}

export function classifyGradation({ cu, cc }: DerivedMetrics): GradationType {
  const wellGraded = cu > GRADATION_CRITERIA.minCu
    && cc > GRADATION_CRITERIA.ccMin
    && cc < GRADATION_CRITERIA.ccMax;
  return wellGraded ? 'well-graded' : 'poorly-graded';
}

/**
 * D10 < 0.075 mm: fine soil, D10 < 2 mm: sand, otherwise gravel/coarse soil.
 * A D10 clamped to the finest sieve ('below') lies strictly under that
 * opening, so an opening equal to a boundary falls in the finer class.
 */
export function classifySoil(d10: number, range: DiameterRange = 'within'): SoilType {
  const strictlyBelow = range === 'below';
  const under = (limit: number) => d10 < limit || (strictlyBelow && d10 <= limit);

  if (under(CLASSIFICATION_THRESHOLDS.fineUpper)) return 'fine';
  if (under(CLASSIFICATION_THRESHOLDS.sandUpper)) return 'sand';
  return 'gravel';
}

export function classifySample(d10: CharacteristicDiameter, metrics: DerivedMetrics): Classification {
  const soilType = classifySoil(d10.value, d10.range);
  const gradation = classifyGradation(metrics);
  return {
    soilType,
    gradation,
    soilLabel: SOIL_TYPE_LABELS[soilType],
    gradationLabel: GRADATION_LABELS[gradation],
  };
}

export interface SieveSampleInput {
  sieveSpec: SieveSpec;
  weights: readonly number[];
  interpolation?: InterpolationMethod;
}

/**
 * Full analysis of one validated sample: table, D10/D30/D60, Cu/Cc and
 * classification. Pure; every call works on its own copies.
 */
export function analyzeSieveSample({
  sieveSpec,
  weights,
  interpolation = DEFAULT_ANALYSIS_OPTIONS.interpolation,
}: SieveSampleInput): AnalysisOutcome {
  const table = computeGradationTable(sieveSpec, weights);
  if ('kind' in table) {
    return { ok: false, error: table };
  }

  const totalWeight = weights.reduce((sum, w) => sum + w, 0);
  const curve = buildPassingCurve(table);
  const diameters = computeCharacteristicDiameters(curve, interpolation);
  const metrics = computeCoefficients(diameters.d10.value, diameters.d30.value, diameters.d60.value);
  const classification = classifySample(diameters.d10, metrics);

  return {
    ok: true,
    analysis: {
      sieveSpec,
      totalWeight,
      table,
      curve,
      diameters,
      metrics,
      classification,
      interpolation,
    },
  };
}

/**
 * Parse the comma-separated weights typed by the user and analyse them.
 * Parse, count and zero-mass failures come back as error variants.
 */
export function analyzeSieveInput(
  text: string,
  sieveSpec: SieveSpec,
  options: AnalysisOptions = DEFAULT_ANALYSIS_OPTIONS
): AnalysisOutcome {
  const parsed = parseWeightInput(text, sieveSpec, options);
  if (!parsed.ok) {
    return parsed;
  }

  return analyzeSieveSample({
    sieveSpec,
    weights: parsed.weights,
    interpolation: options.interpolation,
  });
}

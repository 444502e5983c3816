import type {
  CharacteristicDiameter,
  GradationAnalysis,
  GradationRow,
  SieveSpec,
} from '@/types/gradation';
import { DISPLAY_PRECISION } from '@/config/gradation';
import { getSieveOpenings } from '@/data/sieveSets';

export const REPORT_TITLE = 'Sieve Analysis Report';

export const TABLE_HEADERS = [
  'Sieve Size (mm)',
  'Weight Retained (g)',
  '% Retained',
  'Cum. % Retained',
  '% Passing',
] as const;

export interface FormattedGradationRow {
  sieveSize: string;
  weightRetained: string;
  percentRetained: string;
  cumulativePercentRetained: string;
  percentPassing: string;
}

export interface InterpretationLine {
  label: string;
  value: string;
  unit?: string;
}

export interface ChartPoint {
  size: number;
  passing: number;
}

export function formatSieveSize(size: number): string {
  return size === 0 ? 'Pan' : size.toFixed(DISPLAY_PRECISION.sieveSize);
}

export function formatWeight(weight: number): string {
  return weight.toFixed(DISPLAY_PRECISION.weight);
}

export function formatPercent(percent: number): string {
  return percent.toFixed(DISPLAY_PRECISION.percent);
}

/** '<' / '>' marks a diameter clamped to the finest / coarsest sieve */
export function formatDiameter({ value, range }: CharacteristicDiameter): string {
  const prefix = range === 'below' ? '<' : range === 'above' ? '>' : '';
  return `${prefix}${value.toFixed(DISPLAY_PRECISION.diameter)}`;
}

export function formatCoefficient(value: number): string {
  return Number.isFinite(value) ? value.toFixed(DISPLAY_PRECISION.coefficient) : '∞';
}

export function formatRow(row: GradationRow): FormattedGradationRow {
  return {
    sieveSize: formatSieveSize(row.sieveSize),
    weightRetained: formatWeight(row.weightRetained),
    percentRetained: formatPercent(row.percentRetained),
    cumulativePercentRetained: formatPercent(row.cumulativePercentRetained),
    percentPassing: formatPercent(row.percentPassing),
  };
}

export function buildTableRows(analysis: GradationAnalysis): FormattedGradationRow[] {
  return analysis.table.map(formatRow);
}

export function buildInterpretationLines(analysis: GradationAnalysis): InterpretationLine[] {
  const { diameters, metrics, classification } = analysis;
  return [
    { label: 'D10', value: formatDiameter(diameters.d10), unit: 'mm' },
    { label: 'D30', value: formatDiameter(diameters.d30), unit: 'mm' },
    { label: 'D60', value: formatDiameter(diameters.d60), unit: 'mm' },
    { label: 'Uniformity Coefficient (Cu)', value: formatCoefficient(metrics.cu) },
    { label: 'Coefficient of Curvature (Cc)', value: formatCoefficient(metrics.cc) },
    { label: 'Gradation', value: classification.gradationLabel },
    { label: 'Soil Classification', value: classification.soilLabel },
  ];
}

export function formatInterpretationLine({ label, value, unit }: InterpretationLine): string {
  return unit ? `${label} = ${value} ${unit}` : `${label} = ${value}`;
}

/** Notes for diameters read outside the measured curve, empty when all are within it */
export function buildRangeNotes(analysis: GradationAnalysis): string[] {
  const { d10, d30, d60 } = analysis.diameters;
  return [d10, d30, d60]
    .filter(d => d.range !== 'within')
    .map(d => d.range === 'below'
      ? `D${d.percent}: more than ${d.percent}% passes the finest sieve; value clamped to ${formatSieveSize(d.value)} mm.`
      : `D${d.percent}: less than ${d.percent}% passes the coarsest sieve; value clamped to ${formatSieveSize(d.value)} mm.`);
}

/** Points for the semi-log passing curve, coarsest first, pan excluded */
export function buildChartPoints(analysis: GradationAnalysis): ChartPoint[] {
  return analysis.table
    .filter(row => !row.isPan)
    .map(row => ({ size: row.sieveSize, passing: row.percentPassing }));
}

/** Standard sieve openings used as x-axis ticks, finest first */
export function getChartTicks(spec: SieveSpec): number[] {
  return getSieveOpenings(spec).reverse();
}

export function getInterpolationLabel(analysis: GradationAnalysis): string {
  return analysis.interpolation === 'log-linear'
    ? 'Log-linear interpolation on the passing curve'
    : 'Linear interpolation on the passing curve';
}

export function reportFileName(baseName: string | undefined, extension: 'pdf' | 'doc'): string {
  const cleaned = baseName?.trim().replace(/\s+/g, '_').replace(/[^\w.-]/g, '');
  return cleaned ? `Sieve_Analysis_${cleaned}.${extension}` : `sieve_analysis_report.${extension}`;
}

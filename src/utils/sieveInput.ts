import type {
  SieveSpec,
  WeightInputOptions,
  WeightParseOutcome,
  ParseError,
  CountMismatchError,
} from '@/types/gradation';
import { DEFAULT_ANALYSIS_OPTIONS } from '@/config/gradation';
import { getSieveOpenings } from '@/data/sieveSets';

// Plain decimal literal: optional sign, digits with optional fraction, optional exponent.
// Rejects hex, Infinity, NaN and empty tokens that Number() would accept.
const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Number of weights the user must type for a sieve set.
 * With the pan excluded, its weight is taken as zero.
 */
export function expectedWeightCount(spec: SieveSpec, includePan: boolean): number {
  return includePan ? spec.sizes.length : getSieveOpenings(spec).length;
}

export function parseError(token: string, position: number, reason: ParseError['reason']): ParseError {
  const shown = token === '' ? '(empty)' : `"${token}"`;
  const message = reason === 'negative'
    ? `Value ${position} ${shown} is negative; weights retained must be zero or more.`
    : `Value ${position} ${shown} is not a valid number.`;
  return { kind: 'ParseError', token, position, reason, message };
}

export function countMismatchError(expected: number, received: number, includesPan: boolean): CountMismatchError {
  const panNote = includesPan ? 'including pan' : 'excluding pan';
  return {
    kind: 'CountMismatchError',
    expected,
    received,
    includesPan,
    message: `Please enter exactly ${expected} values (${panNote}); received ${received}.`,
  };
}

/**
 * Parse a comma-separated list of retained weights (g), coarsest sieve first.
 *
 * The first invalid token wins over a count mismatch. When `includePan` is
 * false the list covers the sieves only and a zero pan weight is appended,
 * so a successful result always has one weight per entry of `spec.sizes`.
 */
export function parseWeightInput(
  text: string,
  spec: SieveSpec,
  options: WeightInputOptions = DEFAULT_ANALYSIS_OPTIONS
): WeightParseOutcome {
  const { includePan } = options;
  const tokens = text.trim() === '' ? [] : text.split(',').map(t => t.trim());

  const weights: number[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!NUMBER_PATTERN.test(token)) {
      return { ok: false, error: parseError(token, i + 1, 'not-a-number') };
    }

    const value = Number(token);
    if (!Number.isFinite(value)) {
      return { ok: false, error: parseError(token, i + 1, 'not-a-number') };
    }
    if (value < 0) {
      return { ok: false, error: parseError(token, i + 1, 'negative') };
    }

    // Normalise "-0" so it prints as 0.00
    weights.push(value === 0 ? 0 : value);
  }

  const expected = expectedWeightCount(spec, includePan);
  if (weights.length !== expected) {
    return { ok: false, error: countMismatchError(expected, weights.length, includePan) };
  }

  if (!includePan) {
    weights.push(0);
  }

  return { ok: true, weights };
}

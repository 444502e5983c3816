import type { SieveSpec } from '@/types/gradation';
import { DEFAULT_SIEVE_SET_ID } from '@/config/gradation';

/**
 * Build a sieve set, checking that the openings are strictly decreasing and
 * end with the pan (size 0). Throws on a malformed set since sieve sets are
 * fixed configuration, not user input.
 */
export function createSieveSpec(id: string, name: string, sizes: readonly number[]): SieveSpec {
  if (sizes.length < 2) {
    throw new Error(`Sieve set "${id}" needs at least one sieve and the pan`);
  }

  if (sizes[sizes.length - 1] !== 0) {
    throw new Error(`Sieve set "${id}" must end with the pan (size 0)`);
  }

  for (let i = 0; i < sizes.length; i++) {
    const size = sizes[i];
    if (!Number.isFinite(size) || size < 0) {
      throw new Error(`Sieve set "${id}" has an invalid opening at position ${i + 1}: ${size}`);
    }
    if (i > 0 && size >= sizes[i - 1]) {
      throw new Error(`Sieve set "${id}" openings must be strictly decreasing (position ${i + 1})`);
    }
  }

  return Object.freeze({ id, name, sizes: Object.freeze([...sizes]) });
}

export const SIEVE_SETS: readonly SieveSpec[] = [
  createSieveSpec('standard', 'Standard (4.75 mm – 75 µm)', [4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075, 0]),
  createSieveSpec('extended', 'Extended gravel (19 mm – 75 µm)', [19, 9.5, 4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075, 0]),
];

export function getSieveSet(id: string): SieveSpec {
  const set = SIEVE_SETS.find(s => s.id === id);
  if (!set) {
    throw new Error(`Unknown sieve set: ${id}`);
  }
  return set;
}

export const defaultSieveSet = getSieveSet(DEFAULT_SIEVE_SET_ID);

/** Openings above zero, i.e. everything but the pan */
export function getSieveOpenings(spec: SieveSpec): number[] {
  return spec.sizes.filter(size => size > 0);
}

import type { Granularity } from '../../shared/types';
import { align, type Alignment } from './alignment';

const PRECISION = 10_000;

export function roundRatio(value: number): number {
  return Math.round(value * PRECISION) / PRECISION;
}

/**
 * `2 * M / T` over an existing alignment, where M is the matched unit count
 * and T the unit count of both sides.
 */
export function similarityFromAlignment(alignment: Alignment): number {
  const sizeA = alignment.unitsA.length;
  const sizeB = alignment.unitsB.length;

  if (sizeA === 0 && sizeB === 0) return 1;
  if (sizeA === 0 || sizeB === 0) return 0;

  return roundRatio((2 * alignment.matched) / (sizeA + sizeB));
}

export function similarity(textA: string, textB: string, granularity: Granularity = 'char'): number {
  return similarityFromAlignment(align(textA, textB, granularity));
}

import { DomainError } from './errors';

/**
 * Applies a per-sample loss function to a scalar current density or to every
 * element of a sequence, returning the same shape.
 * Each sample is checked before and after evaluation; the first failure
 * aborts the whole call.
 */
export function mapCurrentDensity(input: number, calculator: string, fn: (i: number) => number): number;
export function mapCurrentDensity(input: readonly number[], calculator: string, fn: (i: number) => number): number[];
export function mapCurrentDensity(
  input: number | readonly number[],
  calculator: string,
  fn: (i: number) => number
): number | number[];
export function mapCurrentDensity(
  input: number | readonly number[],
  calculator: string,
  fn: (i: number) => number
): number | number[] {
  const evaluate = (i: number): number => {
    if (!Number.isFinite(i)) {
      throw new DomainError(calculator, i, 'current density must be finite');
    }
    if (i < 0) {
      throw new DomainError(calculator, i, 'current density must be non-negative');
    }

    const loss = fn(i);
    if (!Number.isFinite(loss)) {
      throw new DomainError(calculator, i, 'loss is not finite');
    }
    return loss;
  };

  return typeof input === 'number' ? evaluate(input) : input.map(i => evaluate(i));
}

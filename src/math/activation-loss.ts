import { mapCurrentDensity } from './elementwise';
import type { FuelCellParameters } from './fuel-cell-parameters';

export const EXCHANGE_CURRENT_DENSITY = 1e-3;  // i0 (A/cm²)
export const ACTIVATION_EPSILON = 1e-6;        // keeps ln() defined at i = 0

/**
 * Voltage lost to slow electrode kinetics (Tafel equation):
 *
 *   v_act = (RT / 2αF)·ln((i + ε) / i0), floored at 0
 *
 * Below i0 the raw expression turns negative; a loss is never reported as a
 * gain.
 */
export function calcActivationLoss(currentDensity: number, params: FuelCellParameters): number;
export function calcActivationLoss(currentDensity: readonly number[], params: FuelCellParameters): number[];
export function calcActivationLoss(
  currentDensity: number | readonly number[],
  params: FuelCellParameters
): number | number[] {
  const tafelSlope = (params.gasConstant * params.temperature) / (2 * params.alpha * params.faradayConstant);

  return mapCurrentDensity(currentDensity, 'activation loss', i =>
    Math.max(0, tafelSlope * Math.log((i + ACTIVATION_EPSILON) / EXCHANGE_CURRENT_DENSITY))
  );
}

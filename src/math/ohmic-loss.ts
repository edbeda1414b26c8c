import { mapCurrentDensity } from './elementwise';
import type { FuelCellParameters } from './fuel-cell-parameters';

/**
 * Resistive loss across the membrane, v = i·R_area.
 */
export function calcOhmicLoss(currentDensity: number, params: FuelCellParameters): number;
export function calcOhmicLoss(currentDensity: readonly number[], params: FuelCellParameters): number[];
export function calcOhmicLoss(
  currentDensity: number | readonly number[],
  params: FuelCellParameters
): number | number[] {
  return mapCurrentDensity(currentDensity, 'ohmic loss', i => i * params.areaResistance);
}

import { mapCurrentDensity } from './elementwise';
import { DomainError } from './errors';
import { thermalVoltage, type FuelCellParameters } from './fuel-cell-parameters';

export const LIMIT_GUARD = 1e-4;  // δ: closest approach to i_limit (A/cm²)

/**
 * Mass-transport loss when gas supply cannot keep up:
 *
 *   i_safe = min(i, i_limit − δ)
 *   v_conc = −(RT/2F)·ln(1 − i_safe / i_limit)
 *
 * Rises steeply as i approaches the limiting current. Requests at or past the
 * limit saturate at the value for i_limit − δ instead of failing. A limiting
 * current at or below δ leaves no room for the clamp and is a DomainError.
 */
export function calcConcentrationLoss(currentDensity: number, params: FuelCellParameters): number;
export function calcConcentrationLoss(currentDensity: readonly number[], params: FuelCellParameters): number[];
export function calcConcentrationLoss(
  currentDensity: number | readonly number[],
  params: FuelCellParameters
): number | number[] {
  const scale = thermalVoltage(params);
  const limit = params.limitingCurrentDensity;

  return mapCurrentDensity(currentDensity, 'concentration loss', i => {
    if (limit <= LIMIT_GUARD) {
      throw new DomainError('concentration loss', i, `limiting current density must exceed ${LIMIT_GUARD} A/cm²`);
    }
    const safe = Math.min(i, limit - LIMIT_GUARD);
    return -scale * Math.log(1 - safe / limit);
  });
}

import { InvalidParameterError } from './errors';
import { thermalVoltage, type FuelCellParameters } from './fuel-cell-parameters';

export const STANDARD_POTENTIAL = 1.229;          // E0 at 298.15 K (V)
export const STANDARD_TEMPERATURE = 298.15;       // K
export const TEMPERATURE_COEFFICIENT = 0.85e-3;   // V/K, linear approximation

/**
 * Theoretical open-circuit voltage.
 *
 *   E = E0 − 0.85e-3·(T − 298.15) + (RT/2F)·ln(P_H2·√P_O2)
 *
 * Higher temperature lowers the standard potential slightly; higher reactant
 * pressure raises it.
 *
 * @throws InvalidParameterError if a partial pressure is not positive
 */
export const calcNernstVoltage = (params: FuelCellParameters): number => {
  if (!(params.hydrogenPressure > 0)) {
    throw new InvalidParameterError('hydrogenPressure', params.hydrogenPressure, '> 0');
  }
  if (!(params.oxygenPressure > 0)) {
    throw new InvalidParameterError('oxygenPressure', params.oxygenPressure, '> 0');
  }

  const standardAtT = STANDARD_POTENTIAL - TEMPERATURE_COEFFICIENT * (params.temperature - STANDARD_TEMPERATURE);
  const pressureTerm = thermalVoltage(params) * Math.log(params.hydrogenPressure * Math.sqrt(params.oxygenPressure));

  return standardAtT + pressureTerm;
};

/**
 * Unified fuel-cell analysis.
 * Single entry point that orchestrates the math modules:
 *   parameters → sweep → operating point → peak power
 *
 * Components and App.tsx should ONLY call analyzeFuelCell(), no physics outside src/math/.
 */

import { createFuelCellParameters, type FuelCellParameters } from './fuel-cell-parameters';
import { findOperatingPoint, findPeakPower } from './operating-point';
import { simulateFuelCell } from './polarization-sweep';
import type { OperatingPoint, PeakPower, PolarizationCurve, SimulationConfig } from '../types';

export interface FuelCellAnalysis {
  params: FuelCellParameters;
  curve: PolarizationCurve;
  operatingPoint: OperatingPoint;
  peakPower: PeakPower;
  targetCurrentDensity: number;   // Requested operating point, before any sample snapping
  warnings: string[];
}

/**
 * Runs one complete simulation for a configuration.
 * Any invalid parameter or calculator failure is thrown; there is no partial
 * result.
 */
export const analyzeFuelCell = (config: SimulationConfig): FuelCellAnalysis => {
  const params = createFuelCellParameters({
    temperature: config.temperature,
    hydrogenPressure: config.hydrogenPressure,
    oxygenPressure: config.oxygenPressure,
    alpha: config.alpha,
    areaResistance: config.areaResistance,
    limitingCurrentDensity: config.limitingCurrentDensity
  });

  const curve = simulateFuelCell(params, {
    sampleCount: config.sampleCount,
    start: config.sweepStart,
    endMargin: config.sweepEndMargin
  });

  const { point: operatingPoint, warnings: lookupWarnings } = findOperatingPoint(
    curve,
    config.operatingCurrentDensity,
    config.operatingPointMethod
  );

  return {
    params,
    curve,
    operatingPoint,
    peakPower: findPeakPower(curve),
    targetCurrentDensity: config.operatingCurrentDensity,
    warnings: [...curve.warnings, ...lookupWarnings]
  };
};

/**
 * Polarization sweep.
 *
 * Generates current densities across (0, i_limit), evaluates the Nernst
 * voltage and the three loss terms, and combines them into index-aligned
 * voltage and power curves.
 */

import { calcActivationLoss } from './activation-loss';
import { calcConcentrationLoss } from './concentration-loss';
import { InvalidParameterError } from './errors';
import { calcNernstVoltage } from './nernst-voltage';
import { calcOhmicLoss } from './ohmic-loss';
import { findPeakPower } from './operating-point';
import type { FuelCellParameters } from './fuel-cell-parameters';
import type { PolarizationCurve } from '../types';

export interface SweepConfig {
  sampleCount: number;  // Number of evenly spaced samples (≥ 2)
  start: number;        // First current density (A/cm²), > 0
  endMargin: number;    // Last sample sits this far below i_limit (A/cm²), > 0
}

export const DEFAULT_SWEEP: SweepConfig = {
  sampleCount: 100,
  start: 0.001,
  endMargin: 0.05
};

/**
 * Evenly spaced values from start to end inclusive. The last element is
 * exactly `end`.
 */
export const linspace = (start: number, end: number, count: number): number[] => {
  if (count === 1) return [start];

  const values: number[] = [];
  const span = end - start;
  for (let k = 0; k < count; k++) {
    values.push(k === count - 1 ? end : start + (span * k) / (count - 1));
  }
  return values;
};

const buildCurrentDensities = (params: FuelCellParameters, sweep: SweepConfig): number[] => {
  const { sampleCount, start, endMargin } = sweep;

  if (!Number.isInteger(sampleCount) || sampleCount < 2) {
    throw new InvalidParameterError('sampleCount', sampleCount, 'an integer >= 2');
  }
  if (!Number.isFinite(start) || start <= 0) {
    throw new InvalidParameterError('sweepStart', start, '> 0');
  }
  if (!Number.isFinite(endMargin) || endMargin <= 0) {
    throw new InvalidParameterError('sweepEndMargin', endMargin, '> 0');
  }

  const end = params.limitingCurrentDensity - endMargin;
  if (start >= end) {
    throw new InvalidParameterError('sweepStart', start, `< i_limit − endMargin (${end})`);
  }

  return linspace(start, end, sampleCount);
};

/**
 * Runs the steady-state sweep for one parameter set.
 *
 * Pipeline:
 *   1. Current densities (linspace inside the limiting current)
 *   2. Nernst voltage (constant over the sweep)
 *   3. Activation, ohmic and concentration losses
 *   4. v_cell = E − v_act − v_ohmic − v_conc
 *   5. p_cell = v_cell · i
 *
 * Calculator errors propagate unchanged; no partial curve is returned.
 */
export const simulateFuelCell = (
  params: FuelCellParameters,
  sweep: SweepConfig = DEFAULT_SWEEP
): PolarizationCurve => {
  const warnings: string[] = [];

  // Step 1: Current densities
  const currentDensity = buildCurrentDensities(params, sweep);

  // Step 2: Theoretical max voltage
  const nernstVoltage = calcNernstVoltage(params);

  // Step 3: Losses
  const activation = calcActivationLoss(currentDensity, params);
  const ohmic = calcOhmicLoss(currentDensity, params);
  const concentration = calcConcentrationLoss(currentDensity, params);

  // Step 4: Net cell voltage
  const cellVoltage = currentDensity.map((_, k) =>
    nernstVoltage - activation[k] - ohmic[k] - concentration[k]
  );

  // Step 5: Power density (W/cm²)
  const powerDensity = cellVoltage.map((v, k) => v * currentDensity[k]);

  const negativeSamples = cellVoltage.filter(v => v < 0).length;
  if (negativeSamples > 0) {
    warnings.push(`Net cell voltage is negative at ${negativeSamples} of ${cellVoltage.length} samples`);
  }

  const curve: PolarizationCurve = {
    nernstVoltage,
    currentDensity,
    cellVoltage,
    powerDensity,
    losses: { activation, ohmic, concentration },
    warnings
  };

  const { index: peakIndex } = findPeakPower(curve);
  if (peakIndex === 0 || peakIndex === powerDensity.length - 1) {
    warnings.push('Peak power lies on the edge of the sweep, the true maximum may be outside the sampled range');
  }

  return curve;
};

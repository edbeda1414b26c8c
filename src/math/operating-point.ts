import { DomainError } from './errors';
import type { OperatingPoint, OperatingPointMethod, PeakPower, PolarizationCurve } from '../types';

export interface OperatingPointResult {
  point: OperatingPoint;
  warnings: string[];
}

const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

/**
 * Index of the sample closest to `target`. Ties go to the lower index.
 */
export const nearestSampleIndex = (samples: readonly number[], target: number): number => {
  let best = 0;
  let bestDistance = Infinity;
  for (let k = 0; k < samples.length; k++) {
    const distance = Math.abs(samples[k] - target);
    if (distance < bestDistance) {
      best = k;
      bestDistance = distance;
    }
  }
  return best;
};

const pointAt = (curve: PolarizationCurve, k: number, method: OperatingPointMethod): OperatingPoint => ({
  index: k,
  method,
  currentDensity: curve.currentDensity[k],
  cellVoltage: curve.cellVoltage[k],
  powerDensity: curve.powerDensity[k],
  nernstVoltage: curve.nernstVoltage,
  losses: {
    activation: curve.losses.activation[k],
    ohmic: curve.losses.ohmic[k],
    concentration: curve.losses.concentration[k]
  }
});

/**
 * Reads voltage, power and the loss breakdown at a requested current density.
 *
 * 'nearest' returns the closest sweep sample unchanged. 'interpolate' blends
 * the two bracketing samples linearly, so the returned current density is the
 * requested one. Targets outside the sweep are clamped to its first or last
 * sample.
 */
export const findOperatingPoint = (
  curve: PolarizationCurve,
  targetCurrentDensity: number,
  method: OperatingPointMethod = 'nearest'
): OperatingPointResult => {
  const warnings: string[] = [];
  const samples = curve.currentDensity;

  if (!Number.isFinite(targetCurrentDensity)) {
    throw new DomainError('operating point', targetCurrentDensity, 'target current density must be finite');
  }
  if (samples.length === 0) {
    throw new Error('Polarization curve has no samples');
  }

  const first = samples[0];
  const last = samples[samples.length - 1];

  if (targetCurrentDensity <= first || targetCurrentDensity >= last) {
    if (targetCurrentDensity < first || targetCurrentDensity > last) {
      warnings.push(
        `Requested ${targetCurrentDensity} A/cm² is outside the sweep [${first}, ${last}], using the closest end`
      );
    }
    const edge = targetCurrentDensity <= first ? 0 : samples.length - 1;
    return { point: pointAt(curve, edge, method), warnings };
  }

  if (method === 'nearest') {
    return { point: pointAt(curve, nearestSampleIndex(samples, targetCurrentDensity), method), warnings };
  }

  // Lower bracket: last sample not above the target
  let lo = 0;
  while (lo < samples.length - 2 && samples[lo + 1] <= targetCurrentDensity) lo++;
  const hi = lo + 1;
  const t = (targetCurrentDensity - samples[lo]) / (samples[hi] - samples[lo]);

  const { losses } = curve;
  return {
    point: {
      index: lo,
      method,
      currentDensity: targetCurrentDensity,
      cellVoltage: lerp(curve.cellVoltage[lo], curve.cellVoltage[hi], t),
      powerDensity: lerp(curve.powerDensity[lo], curve.powerDensity[hi], t),
      nernstVoltage: curve.nernstVoltage,
      losses: {
        activation: lerp(losses.activation[lo], losses.activation[hi], t),
        ohmic: lerp(losses.ohmic[lo], losses.ohmic[hi], t),
        concentration: lerp(losses.concentration[lo], losses.concentration[hi], t)
      }
    },
    warnings
  };
};

/**
 * Maximum power sample of the sweep (first one on ties).
 */
export const findPeakPower = (curve: PolarizationCurve): PeakPower => {
  if (curve.powerDensity.length === 0) {
    throw new Error('Polarization curve has no samples');
  }

  let index = 0;
  for (let k = 1; k < curve.powerDensity.length; k++) {
    if (curve.powerDensity[k] > curve.powerDensity[index]) index = k;
  }

  return {
    index,
    currentDensity: curve.currentDensity[index],
    cellVoltage: curve.cellVoltage[index],
    powerDensity: curve.powerDensity[index]
  };
};

import { describe, it, expect } from 'vitest';
import { calcConcentrationLoss, LIMIT_GUARD } from './concentration-loss';
import { createFuelCellParameters } from './fuel-cell-parameters';
import { DomainError } from './errors';

const params = createFuelCellParameters({ temperature: 353, hydrogenPressure: 3, oxygenPressure: 3 });

// -(RT/2F)·ln(δ / i_limit) for the default 1.8 A/cm² limit
const SATURATED_LOSS = 0.14901774757301323;

describe('calcConcentrationLoss', () => {
  it('matches the mass-transport formula', () => {
    expect(calcConcentrationLoss(1.0, params)).toBeCloseTo(0.012333274900869374, 10);
    expect(calcConcentrationLoss(1.7, params)).toBeCloseTo(0.043959083954435894, 10);
    expect(calcConcentrationLoss(0, params)).toBeCloseTo(0, 12);
  });

  it('rises steeply near the limiting current', () => {
    const currents = [0.2, 0.6, 1.0, 1.4, 1.7, 1.79, 1.799];
    const losses = calcConcentrationLoss(currents, params);

    for (let k = 1; k < losses.length; k++) {
      expect(losses[k]).toBeGreaterThan(losses[k - 1]);
    }
    expect(losses[5] - losses[4]).toBeGreaterThan(losses[1] - losses[0]);
  });

  it('saturates at the limit instead of failing', () => {
    expect(calcConcentrationLoss(1.8, params)).toBeCloseTo(SATURATED_LOSS, 10);
    expect(calcConcentrationLoss(2.5, params)).toBeCloseTo(SATURATED_LOSS, 10);
    expect(calcConcentrationLoss(1.8 - LIMIT_GUARD, params)).toBeCloseTo(SATURATED_LOSS, 10);
  });

  it('rejects a limiting current that leaves no room below the guard', () => {
    const starved = createFuelCellParameters({
      temperature: 353,
      hydrogenPressure: 3,
      oxygenPressure: 3,
      limitingCurrentDensity: 5e-5
    });

    expect(() => calcConcentrationLoss(0.01, starved)).toThrow(
      'concentration loss: limiting current density must exceed 0.0001 A/cm² (i = 0.01 A/cm²)'
    );
    expect(() => calcConcentrationLoss([0, 0.01], starved)).toThrow(DomainError);
  });

  it('rejects non-finite current densities', () => {
    expect(() => calcConcentrationLoss(Number.NaN, params)).toThrow(DomainError);
    expect(() => calcConcentrationLoss([1.0, -0.2], params)).toThrow(
      'concentration loss: current density must be non-negative (i = -0.2 A/cm²)'
    );
  });
});

import { describe, it, expect } from 'vitest';
import { buildChartData } from './chart-data';
import type { PolarizationCurve } from '../types';

describe('buildChartData', () => {
  it('zips the sweep arrays by index', () => {
    const curve: PolarizationCurve = {
      nernstVoltage: 1.2,
      currentDensity: [0.1, 0.2],
      cellVoltage: [1.0, 0.9],
      powerDensity: [0.1, 0.18],
      losses: { activation: [0.1, 0.2], ohmic: [0.02, 0.04], concentration: [0.08, 0.06] },
      warnings: []
    };

    expect(buildChartData(curve)).toEqual([
      { currentDensity: 0.1, cellVoltage: 1.0, powerDensity: 0.1, activationLoss: 0.1, ohmicLoss: 0.02, concentrationLoss: 0.08, dataIndex: 0 },
      { currentDensity: 0.2, cellVoltage: 0.9, powerDensity: 0.18, activationLoss: 0.2, ohmicLoss: 0.04, concentrationLoss: 0.06, dataIndex: 1 }
    ]);
  });
});

import { describe, it, expect } from 'vitest';
import { formatBreakdownReport } from './report';
import { analyzeFuelCell } from '../math/fuel-cell-analysis';
import { DEFAULT_SIMULATION_CONFIG } from '../config';

describe('formatBreakdownReport', () => {
  it('prints the breakdown at 1.0 A/cm² for the reference cell', () => {
    const lines = formatBreakdownReport(analyzeFuelCell(DEFAULT_SIMULATION_CONFIG));

    expect(lines).toEqual([
      '--- Simulation Results at 1.0 A/cm^2 ---',
      'Nernst Voltage:     1.2074 V',
      'Total Voltage:      0.7830 V',
      'Power Density:      0.7893 W/cm^2',
      'Max Power Peak:     1.0154 W/cm^2 at 1.697 A/cm^2',
      'Loss Breakdown:',
      '  - Activation Loss: 0.2104 V (Starting the reaction)',
      '  - Ohmic Loss:      0.2016 V (Resistance)',
      '  - Mass Transport:  0.0125 V (Gas starvation)'
    ]);
  });

  it('labels a fractional target as requested', () => {
    const lines = formatBreakdownReport(
      analyzeFuelCell({ ...DEFAULT_SIMULATION_CONFIG, operatingCurrentDensity: 1.25 })
    );

    expect(lines[0]).toBe('--- Simulation Results at 1.25 A/cm^2 ---');
  });
});

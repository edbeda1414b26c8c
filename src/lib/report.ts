import type { FuelCellAnalysis } from '../math/fuel-cell-analysis';

const formatTarget = (value: number): string =>
  Number.isInteger(value) ? value.toFixed(1) : String(value);

/**
 * Plain-text loss breakdown at the requested operating point, one entry per
 * line.
 */
export const formatBreakdownReport = (analysis: FuelCellAnalysis): string[] => {
  const { operatingPoint: op, peakPower } = analysis;

  return [
    `--- Simulation Results at ${formatTarget(analysis.targetCurrentDensity)} A/cm^2 ---`,
    `Nernst Voltage:     ${op.nernstVoltage.toFixed(4)} V`,
    `Total Voltage:      ${op.cellVoltage.toFixed(4)} V`,
    `Power Density:      ${op.powerDensity.toFixed(4)} W/cm^2`,
    `Max Power Peak:     ${peakPower.powerDensity.toFixed(4)} W/cm^2 at ${peakPower.currentDensity.toFixed(3)} A/cm^2`,
    'Loss Breakdown:',
    `  - Activation Loss: ${op.losses.activation.toFixed(4)} V (Starting the reaction)`,
    `  - Ohmic Loss:      ${op.losses.ohmic.toFixed(4)} V (Resistance)`,
    `  - Mass Transport:  ${op.losses.concentration.toFixed(4)} V (Gas starvation)`
  ];
};

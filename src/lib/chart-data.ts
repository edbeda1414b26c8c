import type { PolarizationCurve } from '../types';

export interface ChartDataPoint {
  currentDensity: number;     // A/cm²
  cellVoltage: number;        // V
  powerDensity: number;       // W/cm²
  activationLoss: number;     // V
  ohmicLoss: number;          // V
  concentrationLoss: number;  // V
  dataIndex: number;          // Index into the sweep arrays
}

/**
 * Zips the index-aligned sweep arrays into one record per sample.
 */
export const buildChartData = (curve: PolarizationCurve): ChartDataPoint[] =>
  curve.currentDensity.map((currentDensity, index) => ({
    currentDensity,
    cellVoltage: curve.cellVoltage[index],
    powerDensity: curve.powerDensity[index],
    activationLoss: curve.losses.activation[index],
    ohmicLoss: curve.losses.ohmic[index],
    concentrationLoss: curve.losses.concentration[index],
    dataIndex: index
  }));

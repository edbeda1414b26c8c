import {
  DEFAULT_ALPHA,
  DEFAULT_AREA_RESISTANCE,
  DEFAULT_LIMITING_CURRENT_DENSITY
} from './math/fuel-cell-parameters';
import { DEFAULT_SWEEP } from './math/polarization-sweep';
import type { SimulationConfig } from './types';

// Reference run: 80 °C, 3 atm on both electrodes, report at 1.0 A/cm²
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  temperature: 353,
  hydrogenPressure: 3.0,
  oxygenPressure: 3.0,
  alpha: DEFAULT_ALPHA,
  areaResistance: DEFAULT_AREA_RESISTANCE,
  limitingCurrentDensity: DEFAULT_LIMITING_CURRENT_DENSITY,
  sampleCount: DEFAULT_SWEEP.sampleCount,
  sweepStart: DEFAULT_SWEEP.start,
  sweepEndMargin: DEFAULT_SWEEP.endMargin,
  operatingCurrentDensity: 1.0,
  operatingPointMethod: 'nearest'
};

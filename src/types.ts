export interface FuelCellParameterInput {
  temperature: number;             // Cell temperature (K)
  hydrogenPressure: number;        // H2 partial pressure (atm)
  oxygenPressure: number;          // O2 partial pressure (atm)
  alpha?: number;                  // Charge-transfer coefficient, 0 < α ≤ 1 (default 0.5)
  areaResistance?: number;         // Membrane area-specific resistance (Ω·cm², default 0.2)
  limitingCurrentDensity?: number; // Current density where reactant supply runs out (A/cm², default 1.8)
}

export type OperatingPointMethod = 'nearest' | 'interpolate';

export interface SimulationConfig {
  // Operating conditions
  temperature: number;                 // K
  hydrogenPressure: number;            // atm
  oxygenPressure: number;              // atm

  // Cell construction
  alpha: number;
  areaResistance: number;              // Ω·cm²
  limitingCurrentDensity: number;      // A/cm²

  // Sweep
  sampleCount: number;                 // Number of current-density samples (default 100)
  sweepStart: number;                  // First sample (A/cm², default 0.001)
  sweepEndMargin: number;              // Gap kept below the limiting current (A/cm², default 0.05)

  // Reporting
  operatingCurrentDensity: number;     // Current density for the loss breakdown (A/cm², default 1.0)
  operatingPointMethod: OperatingPointMethod;
}

/**
 * Voltage losses at one or more operating points.
 * Each entry is non-negative and expressed in volts.
 */
export interface LossBreakdown<T = number> {
  activation: T;     // Reaction kinetics (Tafel)
  ohmic: T;          // Membrane resistance (V = i·R)
  concentration: T;  // Mass transport / gas starvation
}

export interface PolarizationCurve {
  nernstVoltage: number;            // Open-circuit voltage, constant across the sweep (V)
  currentDensity: number[];         // Strictly increasing samples inside (0, i_limit) (A/cm²)
  cellVoltage: number[];            // Net voltage E − losses (V)
  powerDensity: number[];           // v_cell · i (W/cm²)
  losses: LossBreakdown<number[]>;
  warnings: string[];
}

export interface OperatingPoint {
  index: number;                    // Sample used (lower bracket when interpolating)
  method: OperatingPointMethod;
  currentDensity: number;           // A/cm²
  cellVoltage: number;              // V
  powerDensity: number;             // W/cm²
  nernstVoltage: number;            // V
  losses: LossBreakdown;
}

export interface PeakPower {
  index: number;
  currentDensity: number;           // A/cm²
  cellVoltage: number;              // V
  powerDensity: number;             // W/cm²
}

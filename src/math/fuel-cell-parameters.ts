import { InvalidParameterError } from './errors';
import type { FuelCellParameterInput } from '../types';

export const GAS_CONSTANT = 8.314;       // J/(mol·K)
export const FARADAY_CONSTANT = 96485;   // C/mol

export const DEFAULT_ALPHA = 0.5;
export const DEFAULT_AREA_RESISTANCE = 0.2;           // Ω·cm²
export const DEFAULT_LIMITING_CURRENT_DENSITY = 1.8;  // A/cm²

/**
 * Physical constants plus operating and construction parameters of one cell.
 * Built once by createFuelCellParameters() and never mutated; every calculator
 * reads it as-is.
 */
export type FuelCellParameters = Readonly<{
  gasConstant: number;
  faradayConstant: number;
  temperature: number;
  hydrogenPressure: number;
  oxygenPressure: number;
  alpha: number;
  areaResistance: number;
  limitingCurrentDensity: number;
}>;

interface FieldRule {
  constraint: string;
  isValid: (value: number) => boolean;
}

const positive: FieldRule = { constraint: '> 0', isValid: v => v > 0 };

const fieldRules: Record<keyof FuelCellParameterInput, FieldRule> = {
  temperature: positive,
  hydrogenPressure: positive,
  oxygenPressure: positive,
  alpha: { constraint: 'in (0, 1]', isValid: v => v > 0 && v <= 1 },
  areaResistance: { constraint: '>= 0', isValid: v => v >= 0 },
  limitingCurrentDensity: positive
};

const assertField = (name: keyof FuelCellParameterInput, value: number): void => {
  const rule = fieldRules[name];
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, value, `a finite number ${rule.constraint}`);
  }
  if (!rule.isValid(value)) {
    throw new InvalidParameterError(name, value, rule.constraint);
  }
};

/**
 * Validates the operating conditions and construction parameters and returns
 * a frozen parameter set. Construction parameters fall back to their defaults
 * (α = 0.5, 0.2 Ω·cm², 1.8 A/cm²).
 *
 * @throws InvalidParameterError for the first field outside its domain
 */
export const createFuelCellParameters = (input: FuelCellParameterInput): FuelCellParameters => {
  const {
    temperature,
    hydrogenPressure,
    oxygenPressure,
    alpha = DEFAULT_ALPHA,
    areaResistance = DEFAULT_AREA_RESISTANCE,
    limitingCurrentDensity = DEFAULT_LIMITING_CURRENT_DENSITY
  } = input;

  assertField('temperature', temperature);
  assertField('hydrogenPressure', hydrogenPressure);
  assertField('oxygenPressure', oxygenPressure);
  assertField('alpha', alpha);
  assertField('areaResistance', areaResistance);
  assertField('limitingCurrentDensity', limitingCurrentDensity);

  return Object.freeze({
    gasConstant: GAS_CONSTANT,
    faradayConstant: FARADAY_CONSTANT,
    temperature,
    hydrogenPressure,
    oxygenPressure,
    alpha,
    areaResistance,
    limitingCurrentDensity
  });
};

/**
 * RT/2F — the thermal voltage scale shared by the Nernst and mass-transport
 * terms (two electrons per H2).
 */
export const thermalVoltage = (params: FuelCellParameters): number =>
  (params.gasConstant * params.temperature) / (2 * params.faradayConstant);

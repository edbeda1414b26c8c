/**
 * Raised when a fuel-cell or sweep parameter lies outside its physical domain.
 */
export class InvalidParameterError extends Error {
  readonly parameter: string;
  readonly value: number;

  constructor(parameter: string, value: number, constraint: string) {
    super(`Invalid parameter ${parameter} = ${value}: must be ${constraint}`);
    this.parameter = parameter;
    this.value = value;
    this.name = 'InvalidParameterError';
  }
}

/**
 * Raised when a loss calculator receives a current density it cannot evaluate
 * (non-finite or negative), or would produce a non-finite loss.
 */
export class DomainError extends Error {
  readonly calculator: string;
  readonly currentDensity: number;

  constructor(calculator: string, currentDensity: number, reason: string) {
    super(`${calculator}: ${reason} (i = ${currentDensity} A/cm²)`);
    this.calculator = calculator;
    this.currentDensity = currentDensity;
    this.name = 'DomainError';
  }
}

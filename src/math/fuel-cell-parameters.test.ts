import { describe, it, expect } from 'vitest';
import {
  createFuelCellParameters,
  thermalVoltage,
  FARADAY_CONSTANT,
  GAS_CONSTANT
} from './fuel-cell-parameters';
import { InvalidParameterError } from './errors';

const operating = { temperature: 353, hydrogenPressure: 3.0, oxygenPressure: 3.0 };

describe('createFuelCellParameters', () => {
  it('applies construction defaults and the fixed constants', () => {
    const params = createFuelCellParameters(operating);

    expect(params).toEqual({
      gasConstant: GAS_CONSTANT,
      faradayConstant: FARADAY_CONSTANT,
      temperature: 353,
      hydrogenPressure: 3.0,
      oxygenPressure: 3.0,
      alpha: 0.5,
      areaResistance: 0.2,
      limitingCurrentDensity: 1.8
    });
    expect(GAS_CONSTANT).toBe(8.314);
    expect(FARADAY_CONSTANT).toBe(96485);
  });

  it('keeps overrides for construction parameters', () => {
    const params = createFuelCellParameters({ ...operating, alpha: 1, areaResistance: 0, limitingCurrentDensity: 2.2 });

    expect(params.alpha).toBe(1);
    expect(params.areaResistance).toBe(0);
    expect(params.limitingCurrentDensity).toBe(2.2);
  });

  it('returns a frozen value', () => {
    const params = createFuelCellParameters(operating);

    expect(Object.isFrozen(params)).toBe(true);
  });

  it.each([
    ['temperature', { ...operating, temperature: 0 }],
    ['temperature', { ...operating, temperature: -10 }],
    ['hydrogenPressure', { ...operating, hydrogenPressure: 0 }],
    ['oxygenPressure', { ...operating, oxygenPressure: -1 }],
    ['alpha', { ...operating, alpha: 0 }],
    ['alpha', { ...operating, alpha: 1.2 }],
    ['areaResistance', { ...operating, areaResistance: -0.01 }],
    ['limitingCurrentDensity', { ...operating, limitingCurrentDensity: 0 }],
    ['temperature', { ...operating, temperature: Number.NaN }],
    ['oxygenPressure', { ...operating, oxygenPressure: Number.POSITIVE_INFINITY }]
  ])('rejects an out-of-domain %s', (field, input) => {
    expect(() => createFuelCellParameters(input)).toThrow(InvalidParameterError);
    try {
      createFuelCellParameters(input);
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidParameterError);
      if (err instanceof InvalidParameterError) {
        expect(err.parameter).toBe(field);
        expect(err.name).toBe('InvalidParameterError');
      }
    }
  });

  it('names the field, value and constraint in the message', () => {
    expect(() => createFuelCellParameters({ ...operating, alpha: 1.5 }))
      .toThrow('Invalid parameter alpha = 1.5: must be in (0, 1]');
  });
});

describe('thermalVoltage', () => {
  it('computes RT/2F', () => {
    const params = createFuelCellParameters(operating);

    expect(thermalVoltage(params)).toBeCloseTo(0.015208799295227239, 12);
  });
});

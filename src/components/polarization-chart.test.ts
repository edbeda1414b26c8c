import { describe, expect, it } from 'vitest';
import { getPowerDomain, getVoltageDomain } from './polarization-chart';

const SAMPLE_COUNT = 500000;
const ramp = Array.from({ length: SAMPLE_COUNT }, (_, k) => k / (SAMPLE_COUNT - 1));

describe('getVoltageDomain', () => {
  it('keeps the 0–1.2 V window when the data fits', () => {
    expect(getVoltageDomain(ramp.map(v => v * 0.9))).toEqual([0, 1.2]);
  });

  it('widens for a Nernst voltage above 1.2 V', () => {
    const [min, max] = getVoltageDomain(ramp, 1.2074403607024353);

    expect(min).toBe(0);
    expect(max).toBeCloseTo(1.2074403607024353 * 1.05, 12);
  });

  it('extends below zero for negative voltages', () => {
    expect(getVoltageDomain([-0.25, 0.4, Number.NaN])).toEqual([-0.25, 1.2]);
  });
});

describe('getPowerDomain', () => {
  it('pads the peak of long sweeps', () => {
    expect(getPowerDomain(ramp)).toEqual([0, 1.1]);
  });

  it('falls back to a unit range without finite values', () => {
    expect(getPowerDomain([])).toEqual([0, 1]);
    expect(getPowerDomain([Number.NaN])).toEqual([0, 1]);
    expect(getPowerDomain([0, 0])).toEqual([0, 1]);
  });
});

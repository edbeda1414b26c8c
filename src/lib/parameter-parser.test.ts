import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { parseParameterFile } from './parameter-parser';

describe('parseParameterFile', () => {
  it('reads the bundled reference cell file', () => {
    const content = readFileSync(new URL('../../samples/reference-cell.txt', import.meta.url), 'utf8');
    const result = parseParameterFile(content);

    expect(result.error).toBeNull();
    expect(result.config).toEqual({
      temperature: 353.15,
      hydrogenPressure: 3.0,
      oxygenPressure: 3.0,
      alpha: 0.5,
      areaResistance: 0.2,
      limitingCurrentDensity: 1.8,
      operatingCurrentDensity: 1.0,
      operatingPointMethod: 'nearest'
    });
    expect(result.warnings).toEqual(['Line 2: temperature converted from °C to 353.15 K']);
  });

  it('accepts the different separators and aliases', () => {
    const result = parseParameterFile([
      'T_kelvin: 340',
      'P_H2_atm\t2.5',
      'oxygen_pressure, 1.5',
      'R_area = 0.15',
      'limiting_current_density = 2.0',
      'samples = 50',
      'sweep_start = 0.005',
      'sweep_end_margin = 0.1',
      'lookup = Interpolate'
    ].join('\n'));

    expect(result.error).toBeNull();
    expect(result.warnings).toEqual([]);
    expect(result.config).toEqual({
      temperature: 340,
      hydrogenPressure: 2.5,
      oxygenPressure: 1.5,
      areaResistance: 0.15,
      limitingCurrentDensity: 2.0,
      sampleCount: 50,
      sweepStart: 0.005,
      sweepEndMargin: 0.1,
      operatingPointMethod: 'interpolate'
    });
  });

  it('keeps kelvin temperatures and scientific notation as written', () => {
    const result = parseParameterFile('T = 353 K\r\nalpha = 5e-1\r\n');

    expect(result.config).toEqual({ temperature: 353, alpha: 0.5 });
    expect(result.warnings).toEqual([]);
  });

  it('skips unknown keys and unparsable values with a warning', () => {
    const result = parseParameterFile([
      '# cell under test',
      'T = 353',
      'humidity = 0.8',
      'alpha = fast',
      'just some text',
      'lookup = cubic',
      'P_H2 = 2 K',
      'T = 360 # overridden'
    ].join('\n'));

    expect(result.error).toBeNull();
    expect(result.config).toEqual({ temperature: 360, hydrogenPressure: 2 });
    expect(result.warnings).toEqual([
      'Line 3: unknown parameter "humidity", skipped',
      'Line 4: could not parse "fast" for alpha',
      'Line 5: expected "key = value", skipped',
      'Line 6: lookup must be "nearest" or "interpolate", got "cubic"',
      'Line 7: unit "K" ignored for hydrogenPressure',
      'Line 8: temperature set more than once, using the last value'
    ]);
  });

  it('reports an error when nothing is recognized', () => {
    const result = parseParameterFile('# empty\n\nfoo = 1\n');

    expect(result.error).toBe('No recognized parameters found in file');
    expect(result.config).toEqual({});
    expect(result.warnings).toEqual(['Line 3: unknown parameter "foo", skipped']);
  });

  it('does not treat object prototype names as parameters', () => {
    const result = parseParameterFile('constructor = 1');

    expect(result.error).toBe('No recognized parameters found in file');
  });
});

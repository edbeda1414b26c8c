import type { OperatingPointMethod, SimulationConfig } from '../types';

export interface ParameterParseResult {
  config: Partial<SimulationConfig>;  // Only the entries found in the file
  error: string | null;
  warnings: string[];
}

type NumericKey = Exclude<keyof SimulationConfig, 'operatingPointMethod'>;

// Lower-cased aliases accepted in parameter files
const numericAliases = new Map<string, NumericKey>([
  ['t', 'temperature'],
  ['temperature', 'temperature'],
  ['t_kelvin', 'temperature'],
  ['p_h2', 'hydrogenPressure'],
  ['p_h2_atm', 'hydrogenPressure'],
  ['hydrogen_pressure', 'hydrogenPressure'],
  ['p_o2', 'oxygenPressure'],
  ['p_o2_atm', 'oxygenPressure'],
  ['oxygen_pressure', 'oxygenPressure'],
  ['alpha', 'alpha'],
  ['area_resistance', 'areaResistance'],
  ['r_area', 'areaResistance'],
  ['i_limit', 'limitingCurrentDensity'],
  ['limiting_current_density', 'limitingCurrentDensity'],
  ['samples', 'sampleCount'],
  ['sweep_start', 'sweepStart'],
  ['sweep_end_margin', 'sweepEndMargin'],
  ['operating_current_density', 'operatingCurrentDensity']
]);

const LOOKUP_KEY = 'lookup';
const CELSIUS_OFFSET = 273.15;

const linePattern = /^([^=:\t,]+?)\s*[=:\t,]\s*(.+)$/;
const valuePattern = /^([-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?)\s*(°\s*c|c|k)?$/i;

const parseLookupMethod = (value: string): OperatingPointMethod | null => {
  const normalized = value.toLowerCase();
  if (normalized === 'nearest' || normalized === 'interpolate') return normalized;
  return null;
};

/**
 * Parses a simulation parameter file.
 *
 * One `key = value` pair per line (`:`, tab and comma also separate);
 * `#` starts a comment. Temperatures may carry a °C suffix and are converted
 * to kelvin. Values are not range-checked here, analyzeFuelCell() does that.
 */
export const parseParameterFile = (content: string): ParameterParseResult => {
  const warnings: string[] = [];
  const config: Partial<SimulationConfig> = {};
  const seen = new Set<string>();

  const lines = content.split(/\r?\n/);
  let recognized = 0;

  lines.forEach((rawLine, lineIndex) => {
    const lineNumber = lineIndex + 1;
    const line = rawLine.split('#')[0].trim();
    if (!line) return;

    const match = linePattern.exec(line);
    if (!match) {
      warnings.push(`Line ${lineNumber}: expected "key = value", skipped`);
      return;
    }

    const key = match[1].trim().toLowerCase();
    const value = match[2].trim();

    if (key === LOOKUP_KEY) {
      const method = parseLookupMethod(value);
      if (method === null) {
        warnings.push(`Line ${lineNumber}: lookup must be "nearest" or "interpolate", got "${value}"`);
        return;
      }
      config.operatingPointMethod = method;
      recognized++;
      return;
    }

    const target = numericAliases.get(key);
    if (target === undefined) {
      warnings.push(`Line ${lineNumber}: unknown parameter "${match[1].trim()}", skipped`);
      return;
    }

    const valueMatch = valuePattern.exec(value);
    if (!valueMatch) {
      warnings.push(`Line ${lineNumber}: could not parse "${value}" for ${target}`);
      return;
    }

    let parsed = Number(valueMatch[1]);
    const unit = valueMatch[2]?.replace(/[\s°]/g, '').toLowerCase();
    if (unit !== undefined && target !== 'temperature') {
      warnings.push(`Line ${lineNumber}: unit "${valueMatch[2]}" ignored for ${target}`);
    } else if (unit === 'c') {
      parsed += CELSIUS_OFFSET;
      warnings.push(`Line ${lineNumber}: temperature converted from °C to ${parsed.toFixed(2)} K`);
    }

    if (seen.has(target)) {
      warnings.push(`Line ${lineNumber}: ${target} set more than once, using the last value`);
    }
    seen.add(target);

    config[target] = parsed;
    recognized++;
  });

  if (recognized === 0) {
    return { config: {}, error: 'No recognized parameters found in file', warnings };
  }

  return { config, error: null, warnings };
};

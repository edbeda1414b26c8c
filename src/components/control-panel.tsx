import React from 'react';
import { Card } from './ui/card';
import { Button } from './ui/button';
import { Label } from './ui/label';
import { DEFAULT_SIMULATION_CONFIG } from '../config';
import type { OperatingPointMethod, SimulationConfig } from '../types';

export interface ControlPanelProps {
  config: SimulationConfig;
  onConfigChange: (config: SimulationConfig) => void;
  className?: string;
}

type SliderKey =
  | 'temperature'
  | 'hydrogenPressure'
  | 'oxygenPressure'
  | 'alpha'
  | 'areaResistance'
  | 'limitingCurrentDensity'
  | 'operatingCurrentDensity';

interface SliderOptions {
  key: SliderKey;
  label: string;
  min: number;
  max: number;
  step: number;
  format: (value: number) => string;
}

const operatingSliders: SliderOptions[] = [
  { key: 'temperature', label: 'Temperature', min: 273, max: 373, step: 1, format: v => `${v.toFixed(0)} K (${(v - 273.15).toFixed(0)} °C)` },
  { key: 'hydrogenPressure', label: 'H₂ pressure', min: 0.5, max: 5, step: 0.1, format: v => `${v.toFixed(1)} atm` },
  { key: 'oxygenPressure', label: 'O₂ pressure', min: 0.1, max: 5, step: 0.1, format: v => `${v.toFixed(1)} atm` }
];

const cellSliders: SliderOptions[] = [
  { key: 'alpha', label: 'α (charge transfer)', min: 0.1, max: 1, step: 0.05, format: v => v.toFixed(2) },
  { key: 'areaResistance', label: 'Area resistance', min: 0, max: 0.5, step: 0.01, format: v => `${v.toFixed(2)} Ω·cm²` },
  { key: 'limitingCurrentDensity', label: 'Limiting current', min: 0.5, max: 3, step: 0.05, format: v => `${v.toFixed(2)} A/cm²` }
];

const lookupOptions: Array<{ key: OperatingPointMethod; label: string }> = [
  { key: 'nearest', label: 'Nearest' },
  { key: 'interpolate', label: 'Interpolate' }
];

export const ControlPanel: React.FC<ControlPanelProps> = ({
  config,
  onConfigChange,
  className = ""
}) => {
  const renderSlider = (slider: SliderOptions) => (
    <div key={slider.key}>
      <div className="flex items-center justify-between mb-1">
        <span className="text-[10px] text-gray-500">{slider.label}</span>
        <span className="text-[10px] font-mono text-gray-700" data-testid={`${slider.key}-value`}>
          {slider.format(config[slider.key])}
        </span>
      </div>
      <input
        type="range"
        aria-label={slider.label}
        min={slider.min}
        max={slider.max}
        step={slider.step}
        value={config[slider.key]}
        onChange={e => onConfigChange({ ...config, [slider.key]: parseFloat(e.target.value) })}
        className="w-full h-1.5 accent-blue-500"
      />
    </div>
  );

  // The report point can only move inside the sweep
  const operatingPointSlider: SliderOptions = {
    key: 'operatingCurrentDensity',
    label: 'Current density',
    min: 0.05,
    max: Math.max(0.05, config.limitingCurrentDensity - config.sweepEndMargin),
    step: 0.05,
    format: v => `${v.toFixed(2)} A/cm²`
  };

  return (
    <Card className={`p-4 ${className}`}>
      <div className="space-y-4">
        <div className="flex items-center justify-between">
          <h3 className="text-sm font-semibold text-gray-800">Parameters</h3>
          <Button
            variant="outline"
            size="sm"
            onClick={() => onConfigChange({ ...DEFAULT_SIMULATION_CONFIG })}
            className="h-5 px-1.5 text-[10px] text-gray-400 hover:text-gray-600"
          >
            Reset
          </Button>
        </div>

        <div className="space-y-2">
          <Label className="text-xs font-medium text-gray-500 uppercase tracking-wide">Operating Conditions</Label>
          {operatingSliders.map(slider => renderSlider(slider))}
        </div>

        <div className="space-y-2">
          <Label className="text-xs font-medium text-gray-500 uppercase tracking-wide">Cell</Label>
          {cellSliders.map(slider => renderSlider(slider))}
        </div>

        <div className="space-y-2">
          <Label className="text-xs font-medium text-gray-500 uppercase tracking-wide">Operating Point</Label>
          {renderSlider(operatingPointSlider)}
          <div className="flex gap-1.5">
            {lookupOptions.map(({ key, label }) => (
              <Button
                key={key}
                variant="outline"
                size="sm"
                onClick={() => onConfigChange({ ...config, operatingPointMethod: key })}
                className="h-7 flex-1 text-xs"
                style={config.operatingPointMethod === key
                  ? { borderColor: '#10b981', color: '#10b981', backgroundColor: '#10b98110' }
                  : {}
                }
              >
                {label}
              </Button>
            ))}
          </div>
        </div>
      </div>
    </Card>
  );
};

export default ControlPanel;

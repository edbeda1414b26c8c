// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ControlPanel } from './control-panel';
import { DEFAULT_SIMULATION_CONFIG } from '../config';
import type { SimulationConfig } from '../types';

describe('ControlPanel', () => {
  afterEach(() => {
    cleanup();
  });

  it('shows the current operating conditions', () => {
    render(<ControlPanel config={DEFAULT_SIMULATION_CONFIG} onConfigChange={vi.fn()} />);

    expect(screen.getByTestId('temperature-value').textContent).toBe('353 K (80 °C)');
    expect(screen.getByTestId('hydrogenPressure-value').textContent).toBe('3.0 atm');
    expect(screen.getByTestId('areaResistance-value').textContent).toBe('0.20 Ω·cm²');
    expect(screen.getByTestId('operatingCurrentDensity-value').textContent).toBe('1.00 A/cm²');
  });

  it('reports slider changes as a new configuration', () => {
    const onConfigChange = vi.fn<(config: SimulationConfig) => void>();
    render(<ControlPanel config={DEFAULT_SIMULATION_CONFIG} onConfigChange={onConfigChange} />);

    fireEvent.change(screen.getByLabelText('Temperature'), { target: { value: '300' } });

    expect(onConfigChange).toHaveBeenCalledTimes(1);
    expect(onConfigChange).toHaveBeenCalledWith({ ...DEFAULT_SIMULATION_CONFIG, temperature: 300 });
  });

  it('switches the operating point lookup', () => {
    const onConfigChange = vi.fn<(config: SimulationConfig) => void>();
    render(<ControlPanel config={DEFAULT_SIMULATION_CONFIG} onConfigChange={onConfigChange} />);

    fireEvent.click(screen.getByText('Interpolate'));

    expect(onConfigChange).toHaveBeenCalledWith({ ...DEFAULT_SIMULATION_CONFIG, operatingPointMethod: 'interpolate' });
  });

  it('resets to the reference configuration', () => {
    const onConfigChange = vi.fn<(config: SimulationConfig) => void>();
    const modified: SimulationConfig = { ...DEFAULT_SIMULATION_CONFIG, temperature: 330, alpha: 0.8 };
    render(<ControlPanel config={modified} onConfigChange={onConfigChange} />);

    fireEvent.click(screen.getByText('Reset'));

    expect(onConfigChange).toHaveBeenCalledWith(DEFAULT_SIMULATION_CONFIG);
  });
});

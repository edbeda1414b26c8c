// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { DisplayOptions } from './display-options';

describe('DisplayOptions', () => {
  afterEach(() => {
    cleanup();
  });

  it('toggles each curve layer', () => {
    const onToggleLosses = vi.fn<(show: boolean) => void>();
    const onTogglePower = vi.fn<(show: boolean) => void>();
    render(
      <DisplayOptions
        showVoltage
        showPower
        showLosses={false}
        showMarkers
        onToggleVoltage={vi.fn()}
        onTogglePower={onTogglePower}
        onToggleLosses={onToggleLosses}
        onToggleMarkers={vi.fn()}
      />
    );

    fireEvent.click(screen.getByText('Losses'));
    fireEvent.click(screen.getByText('Power'));

    expect(onToggleLosses).toHaveBeenCalledWith(true);
    expect(onTogglePower).toHaveBeenCalledWith(false);
  });
});

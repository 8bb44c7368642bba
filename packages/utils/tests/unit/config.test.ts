import { describe, it, expect } from 'vitest';
import {
  getSimulationEnvConfig,
  DEFAULT_FEE_RATE,
  DEFAULT_INITIAL_CASH,
  DEFAULT_PRIMARY_TIMEFRAME,
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors.js';

describe('getSimulationEnvConfig', () => {
  it('should fall back to defaults when nothing is set', () => {
    expect(getSimulationEnvConfig({})).toEqual({
      initialCash: DEFAULT_INITIAL_CASH,
      feeRate: DEFAULT_FEE_RATE,
      primaryTimeframe: DEFAULT_PRIMARY_TIMEFRAME,
    });
  });

  it('should read values from the environment', () => {
    expect(
      getSimulationEnvConfig({
        TRADESIM_INITIAL_CASH: '2500',
        TRADESIM_FEE_RATE: '0.002',
        TRADESIM_PRIMARY_TIMEFRAME: ' 4H ',
      })
    ).toEqual({ initialCash: 2500, feeRate: 0.002, primaryTimeframe: '4H' });
  });

  it('should treat blank values as unset', () => {
    expect(getSimulationEnvConfig({ TRADESIM_FEE_RATE: '  ' }).feeRate).toBe(DEFAULT_FEE_RATE);
  });

  it('should reject non-numeric values', () => {
    expect(() => getSimulationEnvConfig({ TRADESIM_INITIAL_CASH: 'lots' })).toThrow(
      ConfigurationError
    );
    expect(() => getSimulationEnvConfig({ TRADESIM_INITIAL_CASH: 'lots' })).toThrow(
      "TRADESIM_INITIAL_CASH must be a finite number, got 'lots'"
    );
  });

  it('should reject out-of-range values', () => {
    expect(() => getSimulationEnvConfig({ TRADESIM_INITIAL_CASH: '0' })).toThrow(
      'TRADESIM_INITIAL_CASH must be positive, got 0'
    );
    expect(() => getSimulationEnvConfig({ TRADESIM_FEE_RATE: '1.5' })).toThrow(
      'TRADESIM_FEE_RATE must be between 0 and 1, got 1.5'
    );
  });
});

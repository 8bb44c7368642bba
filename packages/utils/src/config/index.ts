/**
 * Configuration loading from environment variables
 *
 * Provides typed defaults for simulation runs. Values given explicitly on the
 * command line or in code always win over these.
 */

import { ConfigurationError } from '../errors.js';

export interface SimulationEnvConfig {
  initialCash: number;
  feeRate: number;
  primaryTimeframe: string;
}

export const DEFAULT_INITIAL_CASH = 1000;
export const DEFAULT_FEE_RATE = 0.001;
export const DEFAULT_PRIMARY_TIMEFRAME = '1H';

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a finite number, got '${raw}'`, key);
  }
  return value;
}

/**
 * Load simulation defaults from environment variables
 */
export function getSimulationEnvConfig(env: Env = process.env): SimulationEnvConfig {
  const initialCash = readNumber(env, 'TRADESIM_INITIAL_CASH', DEFAULT_INITIAL_CASH);
  if (initialCash <= 0) {
    throw new ConfigurationError(
      `TRADESIM_INITIAL_CASH must be positive, got ${initialCash}`,
      'TRADESIM_INITIAL_CASH'
    );
  }

  const feeRate = readNumber(env, 'TRADESIM_FEE_RATE', DEFAULT_FEE_RATE);
  if (feeRate < 0 || feeRate > 1) {
    throw new ConfigurationError(
      `TRADESIM_FEE_RATE must be between 0 and 1, got ${feeRate}`,
      'TRADESIM_FEE_RATE'
    );
  }

  return {
    initialCash,
    feeRate,
    primaryTimeframe: env.TRADESIM_PRIMARY_TIMEFRAME?.trim() || DEFAULT_PRIMARY_TIMEFRAME,
  };
}

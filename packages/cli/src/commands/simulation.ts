/**
 * Simulation Commands
 *
 * `tradesim simulate` replays a signals CSV against a candles CSV and prints
 * the run summary, performance metrics and score.
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import type { CommandContext } from '../core/command-context.js';
import { die } from '../core/error-handler.js';
import { coerceBoolean, coerceNumber } from '../core/coerce.js';
import { simulateSchema } from '../command-defs/simulation.js';
import { reportToRows, runSimulationHandler } from './simulation/run-simulation.js';

export interface RegisterSimulationOptions {
  context?: CommandContext;
  write?: (text: string) => void;
  onError?: (e: unknown) => never;
}

export function registerSimulationCommands(
  program: Command,
  options: RegisterSimulationOptions = {}
): void {
  const simulateCmd = program
    .command('simulate')
    .description('Replay trading signals against historical candles')
    .requiredOption('--signals <path>', 'Signals CSV (timestamp, symbol, signal, position_size)')
    .requiredOption('--candles <path>', 'Candles CSV, long or wide layout')
    .option('--initial-cash <amount>', 'Starting cash (default: TRADESIM_INITIAL_CASH or 1000)')
    .option('--fee-rate <rate>', 'Fee per trade as a fraction (default: TRADESIM_FEE_RATE or 0.001)')
    .option('--primary-timeframe <tf>', 'Timeframe looked up first (1H, 2H, 4H, 12H, 1D)')
    .option('--metadata <path>', 'Strategy metadata JSON with targets and anchors')
    .option('--min-pairs <n>', 'Minimum buy/sell pairs required')
    .option('--max-staleness-hours <hours>', 'Oldest prior candle accepted as a price')
    .option('--trade-log <path>', 'Write the trade log CSV here')
    .option('--fail-on-rejection', 'Stop at the first rejected signal')
    .option('--format <format>', 'Output format (table, json)', 'table')
    .option('--submission-id <id>', 'Identifier appended to error messages');

  defineCommand(simulateCmd, {
    name: 'simulate',
    schema: simulateSchema,
    coerce: (raw) => ({
      ...raw,
      initialCash: coerceNumber(raw.initialCash, 'initial-cash'),
      feeRate: coerceNumber(raw.feeRate, 'fee-rate'),
      minPairs: coerceNumber(raw.minPairs, 'min-pairs'),
      maxStalenessHours: coerceNumber(raw.maxStalenessHours, 'max-staleness-hours'),
      failOnRejection: coerceBoolean(raw.failOnRejection, 'fail-on-rejection'),
    }),
    handler: runSimulationHandler,
    format: (args) => args.format,
    present: (report, format) => (format === 'table' ? reportToRows(report) : report),
    context: options.context,
    write: options.write,
    onError: options.onError ?? die,
  });
}

/**
 * Builds the tradesim command tree. The bin entry parses process.argv with
 * it; tests build their own with overrides.
 */

import { Command } from 'commander';
import { registerSimulationCommands } from './commands/simulation.js';
import type { RegisterSimulationOptions } from './commands/simulation.js';

export function createProgram(options: RegisterSimulationOptions = {}): Command {
  const program = new Command();

  program
    .name('tradesim')
    .description('Replay strategy signals against historical candles and score the result')
    .version('0.1.0');

  registerSimulationCommands(program, options);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}

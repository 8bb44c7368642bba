/**
 * @tradesim/cli - Command-line interface
 *
 * Public API exports for the CLI package
 */

export { createProgram } from './program.js';
export { registerSimulationCommands } from './commands/simulation.js';
export type { RegisterSimulationOptions } from './commands/simulation.js';
export { runSimulationHandler, reportToRows } from './commands/simulation/run-simulation.js';
export type { SimulationReport, ReportRow } from './commands/simulation/run-simulation.js';
export * from './command-defs/simulation.js';
export * from './core/command-context.js';
export * from './core/dataset-loader.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export { defineCommand, validateArgs } from './core/defineCommand.js';
export type { DefineCommandArgs } from './core/defineCommand.js';

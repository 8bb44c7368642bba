/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create the
 * services handlers need. Tests pass overrides instead of touching disk or
 * the process environment.
 */

import { getSimulationEnvConfig } from '@tradesim/utils';
import type { SimulationEnvConfig } from '@tradesim/utils';
import { FileDatasetStore } from './dataset-loader.js';
import type { DatasetStore } from './dataset-loader.js';

export interface CommandServices {
  datasets(): DatasetStore;
  envConfig(): SimulationEnvConfig;
}

export interface CommandContextOptions {
  datasetStoreOverride?: DatasetStore;
  /** Environment to read TRADESIM_* defaults from, process.env by default */
  env?: Record<string, string | undefined>;
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    let datasets: DatasetStore | null = this._options.datasetStoreOverride ?? null;
    let envConfig: SimulationEnvConfig | null = null;
    const env = this._options.env ?? process.env;

    return {
      datasets: () => {
        if (!datasets) {
          datasets = new FileDatasetStore();
        }
        return datasets;
      },
      envConfig: () => {
        if (!envConfig) {
          envConfig = getSimulationEnvConfig(env);
        }
        return envConfig;
      },
    };
  }
}

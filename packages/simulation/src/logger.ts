/**
 * Simulation Package Logger
 * =========================
 * Centralized logger for the simulation package with namespace '@tradesim/simulation'
 */

import { createPackageLogger } from '@tradesim/utils';

export const logger = createPackageLogger('@tradesim/simulation');

/**
 * Simulation Package Logger
 * =========================
 * Centralized logger for the simulation package with namespace '@crossbar/simulation'
 */

import { createPackageLogger } from '@crossbar/utils';

export const logger = createPackageLogger('@crossbar/simulation');

/**
 * Simulation Package Logger
 * =========================
 * Centralized logger for the simulation package with namespace '@sizinglab/simulation'
 */

import { createPackageLogger } from '@sizinglab/utils';

export const logger = createPackageLogger('@sizinglab/simulation');

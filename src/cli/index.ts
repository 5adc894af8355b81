#!/usr/bin/env node

import { buildProgram, reportError } from './program.js';
import { logger } from '../utils/logger.js';

buildProgram()
    .parseAsync()
    .catch((error: unknown) => {
        reportError(error);
        logger.debug({ error }, 'CLI error');
        process.exit(1);
    });

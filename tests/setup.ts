/**
 * Test Setup
 *
 * This file is preloaded before running tests.
 * It sets up environment variables and other test configuration.
 */

import { configureLogger } from '../src/shared/logging/structured.js';

// Set test environment
process.env.NODE_ENV = 'test';

// Keep test output quiet; forked workers and span servers inherit this
process.env.LOG_LEVEL = 'error';
process.env.TREETRACE_PLAIN_LOGS = '1';

configureLogger({ level: 'error', colorize: false });

#!/usr/bin/env node
/**
 * streamflow-bmorph
 * Entry point
 */

import { processHandlers, runCli } from './cli.js';
import { createLogger } from './logger.js';

const handlers = processHandlers(createLogger(), code => process.exit(code));
process.on('unhandledRejection', handlers.unhandledRejection);
process.on('uncaughtException', handlers.uncaughtException);

// exitCode instead of exit() so file transports can flush
process.exitCode = runCli(process.argv.slice(2));

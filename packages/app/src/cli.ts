#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point for the crossover command.
 */

import 'dotenv/config';
import { attachGlobalHandlers } from '@crossover/logger';
import { runCli } from './program.js';

process.exitCode = await runCli(process.argv, { onLogger: attachGlobalHandlers });

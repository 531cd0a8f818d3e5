#!/usr/bin/env node
/**
 * quarry CLI
 *
 * Main entry point for the quarry command.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();

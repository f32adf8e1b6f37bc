#!/usr/bin/env tsx

/**
 * CLI entry point for the risk-range command
 */

// Load environment variables from .env file
import 'dotenv/config';

import { run } from './start.js';

process.exitCode = await run(process.argv.slice(2), { processEvents: process });

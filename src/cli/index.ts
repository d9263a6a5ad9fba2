#!/usr/bin/env node
/**
 * sales-report CLI
 *
 *   sales-report vendas.csv
 *   sales-report vendas.csv --format json
 *   sales-report vendas.csv --start-date 2025-06-01 --end-date 2025-06-30
 */

// Load .env from the working directory before anything reads the environment
import 'dotenv/config';
import { createProgram } from './program.js';
import { logger } from '../utils/logger.js';

process.on('uncaughtException', (error) => {
  logger.error({ err: error }, 'Uncaught exception');
  process.exit(1);
});

createProgram().parse(process.argv);

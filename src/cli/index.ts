#!/usr/bin/env node
import process from 'process';
import chalk from 'chalk';
import { logger } from '../utils';
import { createProgram, fail } from './program';

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  console.error(chalk.red('\nUnhandled promise rejection:'), reason);
  process.exit(1);
});

createProgram().parseAsync().catch(fail);

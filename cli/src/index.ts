#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { isVerbose, logger, validateEnv } from '@mnemy/shared';

import { createProgram, hasVerboseFlag } from './program.js';

async function main(): Promise<void> {
  if (hasVerboseFlag(process.argv)) {
    logger.configure({ console: true, level: 'debug', verbose: true });
  } else {
    logger.configure({ console: isVerbose() });
  }

  const envCheck = validateEnv();
  for (const warning of envCheck.warnings) {
    console.error(chalk.yellow(`Warning: ${warning}`));
  }
  if (!envCheck.valid) {
    for (const error of envCheck.errors) {
      console.error(chalk.red(`Invalid configuration: ${error}`));
    }
    process.exit(1);
  }

  await createProgram().parseAsync(process.argv);
}

main().catch((error) => {
  console.error('CLI error:', error);
  process.exit(1);
});

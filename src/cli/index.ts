/**
 * search-validator CLI
 *
 * Loads .env, then routes to the run, check and tests commands.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { runCommand } from './commands/run';
import { checkCommand } from './commands/check';
import { testsCommand } from './commands/tests';
import { reportError } from './output';

const program = new Command('search-validator')
  .description('Validate vector search relevance against known-good test cases')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(checkCommand);
program.addCommand(testsCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  process.exitCode = reportError(error);
});

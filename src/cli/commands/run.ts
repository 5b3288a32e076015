/**
 * `search-validator run` - execute the test cases against the backend
 *
 * Options:
 *   --tests-file <path>      - Test case file (default: TESTS_FILE)
 *   --ids <a,b>              - Only these case ids
 *   --category <name...>     - Only these categories
 *   --concurrency <n>        - Worker pool size
 *   --formats <json,csv>     - Report formats
 *   --report-dir <dir>       - Report directory
 *   --timeout <seconds>      - Run timeout
 *   --mode <mode>            - Search mode for cases that set none
 *   --debug                  - Run logger DEBUG lines and wire details
 */

import { Command } from 'commander';
import type { SearchMode } from '@/lib/core/types';
import type { RunConfig } from '@/lib/services/config';
import { parseReportFormats } from '@/lib/services/config';
import { SearchValidator } from '@/lib/services/search-validator';
import { exitCodeForSummary, formatResultLine, formatSummary, reportError } from '../output';
import { parseList, parsePositiveInt, parsePositiveNumber, parseSearchMode } from '../parsers';

interface RunCommandOptions {
  testsFile?: string;
  ids?: string[];
  category?: string[];
  concurrency?: number;
  formats?: string;
  reportDir?: string;
  timeout?: number;
  mode?: SearchMode;
  quiet?: boolean;
  debug?: boolean;
}

/**
 * Environment for the validator, with `--debug` switching on DEBUG_VALIDATOR.
 */
export function validatorEnv(options: Pick<RunCommandOptions, 'debug'>, env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  return options.debug ? { ...env, DEBUG_VALIDATOR: 'true' } : env;
}

export async function runValidation(options: RunCommandOptions, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const validator = SearchValidator.fromEnv(validatorEnv(options, env));

    const overrides: Partial<RunConfig> = {
      concurrency: options.concurrency,
      runTimeoutSeconds: options.timeout,
      searchMode: options.mode,
      reportDir: options.reportDir,
      reportFormats: options.formats !== undefined ? parseReportFormats(options.formats) : undefined,
    };

    const { summary, reports } = await validator.validate({
      testsFile: options.testsFile,
      selection: { ids: options.ids, categories: options.category },
      overrides,
      onResult: options.quiet ? undefined : (result) => console.log(formatResultLine(result)),
    });

    console.log(formatSummary(summary, reports));
    return exitCodeForSummary(summary);
  } catch (error) {
    return reportError(error);
  }
}

export const runCommand = new Command('run')
  .description('Run the relevance test cases and write reports')
  .option('-t, --tests-file <path>', 'Test case file (default: TESTS_FILE)')
  .option('--ids <ids>', 'Comma-separated case ids to run', parseList)
  .option('-c, --category <names...>', 'Only run these categories')
  .option('--concurrency <n>', 'Cases in flight at once', parsePositiveInt)
  .option('-f, --formats <formats>', 'Report formats (json,csv,xlsx)')
  .option('-o, --report-dir <dir>', 'Report directory')
  .option('--timeout <seconds>', 'Run timeout in seconds', parsePositiveNumber)
  .option('-m, --mode <mode>', 'Search mode: dense, sparse or hybrid', parseSearchMode)
  .option('-q, --quiet', 'Only print the summary')
  .option('--debug', 'Log case candidates and backend/embedder wire details')
  .action(async (options: RunCommandOptions) => {
    process.exitCode = await runValidation(options);
  });

export default runCommand;

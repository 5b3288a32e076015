/**
 * `search-validator tests` - maintain the test case file
 *
 * Commands:
 *   tests list                - Print the cases
 *   tests add --id ... ...    - Append a case
 *   tests remove <id>         - Delete a case
 */

import { Command } from 'commander';
import { configService } from '@/lib/services/config';
import { TestCaseRegistry, type TestCaseInput } from '@/lib/services/registry/test-case-registry';
import { EXIT_SUCCESS, formatTestCase, reportError } from '../output';
import type { SearchMode } from '@/lib/core/types';
import { parsePositiveInt, parseScore, parseSearchMode } from '../parsers';

interface FileOption {
  file?: string;
}

interface AddOptions extends FileOption {
  id: string;
  query: string;
  expected: string;
  category?: string;
  maxRank?: number;
  minScore?: number;
  name?: string;
  description?: string;
  alt?: string[];
  mode?: SearchMode;
  collection?: string;
}

/**
 * Tests file from the option, else TESTS_FILE, else the default.
 * Only the tests file setting is read, so no backend settings are needed.
 */
function testsFile(options: FileOption, env: NodeJS.ProcessEnv): string {
  return options.file ?? configService.testsFileFromEnv(env);
}

export async function listTests(options: FileOption, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const registry = await TestCaseRegistry.fromFile(testsFile(options, env));
    const cases = registry.list();

    if (cases.length === 0) {
      console.log('No test cases.');
      return EXIT_SUCCESS;
    }

    console.log(`\n${cases.length} test case(s):\n`);
    for (const testCase of cases) {
      console.log(formatTestCase(testCase));
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

export async function addTest(options: AddOptions, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const file = testsFile(options, env);
    const registry = await TestCaseRegistry.fromFile(file, { allowMissing: true });

    const input: TestCaseInput = {
      id: options.id,
      queryText: options.query,
      expectedDocumentId: options.expected,
      category: options.category,
      maxAllowedRank: options.maxRank,
      minScoreThreshold: options.minScore,
      name: options.name,
      description: options.description,
      alternativeDocumentIds: options.alt,
      searchMode: options.mode,
      collection: options.collection,
    };

    const added = registry.add(input);
    await registry.save();
    console.log(`Added ${added.id} to ${file}`);
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

export async function removeTest(id: string, options: FileOption, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const file = testsFile(options, env);
    const registry = await TestCaseRegistry.fromFile(file);
    registry.remove(id);
    await registry.save();
    console.log(`Removed ${id} from ${file}`);
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

export const testsCommand = new Command('tests').description('Manage the test case file');

testsCommand
  .command('list')
  .description('List test cases')
  .option('-t, --file <path>', 'Test case file (default: TESTS_FILE)')
  .action(async (options: FileOption) => {
    process.exitCode = await listTests(options);
  });

testsCommand
  .command('add')
  .description('Add a test case')
  .requiredOption('--id <id>', 'Unique case id')
  .requiredOption('--query <text>', 'Query text')
  .requiredOption('--expected <documentId>', 'Expected document id')
  .option('--category <name>', 'Grouping label')
  .option('--max-rank <n>', 'Maximum allowed rank', parsePositiveInt)
  .option('--min-score <score>', 'Minimum score', parseScore)
  .option('--name <name>', 'Display name')
  .option('--description <text>', 'Description')
  .option('--alt <documentIds...>', 'Other accepted document ids')
  .option('--mode <mode>', 'Search mode for this case (dense, sparse, hybrid)', parseSearchMode)
  .option('--collection <name>', 'Collection to search instead of COLLECTION_NAME')
  .option('-t, --file <path>', 'Test case file (default: TESTS_FILE)')
  .action(async (options: AddOptions) => {
    process.exitCode = await addTest(options);
  });

testsCommand
  .command('remove <id>')
  .description('Remove a test case')
  .option('-t, --file <path>', 'Test case file (default: TESTS_FILE)')
  .action(async (id: string, options: FileOption) => {
    process.exitCode = await removeTest(id, options);
  });

export default testsCommand;

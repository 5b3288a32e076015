import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { TestCase, TestCaseFile, TestCaseSelection } from '@/lib/core/types';
import { SEARCH_MODES } from '@/lib/core/types';
import { ConfigurationError, DuplicateTestCaseError } from '@/lib/utils/errors';

const FILE_VERSION = '1.0';

const nonEmpty = (field: string) => z.string().trim().min(1, `${field} must not be empty`);

export const testCaseSchema = z.object({
  id: nonEmpty('id'),
  queryText: nonEmpty('queryText'),
  expectedDocumentId: nonEmpty('expectedDocumentId'),
  alternativeDocumentIds: z.array(nonEmpty('alternativeDocumentIds[]')).optional(),
  category: nonEmpty('category').optional(),
  maxAllowedRank: z.number().int().positive().optional(),
  minScoreThreshold: z.number().finite().optional(),
  searchMode: z.enum(SEARCH_MODES).optional(),
  collection: nonEmpty('collection').optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

const testCaseFileSchema = z.union([
  z.object({
    version: z.string().default(FILE_VERSION),
    updatedAt: z.string().optional(),
    tests: z.array(z.unknown()),
  }),
  z.array(z.unknown()),
]);

export type TestCaseInput = z.input<typeof testCaseSchema>;
export type TestCasePatch = Partial<Omit<TestCaseInput, 'id' | 'createdAt' | 'updatedAt'>>;

/**
 * Validate raw entries and return frozen test cases in input order.
 * Every schema issue is collected before throwing; duplicate ids fail fast.
 */
export function parseTestCases(entries: readonly unknown[]): TestCase[] {
  const issues: string[] = [];
  const cases: TestCase[] = [];

  entries.forEach((entry, index) => {
    const parsed = testCaseSchema.safeParse(entry);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const field = issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
        issues.push(`tests[${index}]${field}: ${issue.message}`);
      }
      return;
    }
    cases.push(freezeCase(parsed.data));
  });

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid test cases', issues);
  }

  const seen = new Set<string>();
  for (const testCase of cases) {
    if (seen.has(testCase.id)) {
      throw new DuplicateTestCaseError(testCase.id);
    }
    seen.add(testCase.id);
  }

  return cases;
}

function freezeCase(testCase: TestCase): TestCase {
  const alternatives = testCase.alternativeDocumentIds;
  return Object.freeze({
    ...testCase,
    ...(alternatives !== undefined && { alternativeDocumentIds: Object.freeze([...alternatives]) }),
  });
}

/**
 * Test Case Registry
 *
 * Loads, validates and maintains the set of test cases. Cases are frozen on
 * load; edits replace a case instead of mutating it.
 */
export class TestCaseRegistry {
  private cases: TestCase[];
  private version: string;

  private constructor(cases: TestCase[], private filePath: string | null, version: string = FILE_VERSION) {
    this.cases = cases;
    this.version = version;
  }

  /**
   * Load test cases from a JSON file: `{ version, updatedAt?, tests }` or a bare array.
   * @param options.allowMissing start empty when the file does not exist
   */
  static async fromFile(filePath: string, options: { allowMissing?: boolean } = {}): Promise<TestCaseRegistry> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        if (options.allowMissing) return new TestCaseRegistry([], filePath);
        throw new ConfigurationError(`Test case file not found: ${filePath}`);
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Test case file is not valid JSON: ${filePath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    const parsed = testCaseFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Test case file has an unexpected layout: ${filePath}`, [
        'expected an array of test cases or an object with a "tests" array',
      ]);
    }

    if (Array.isArray(parsed.data)) {
      return new TestCaseRegistry(parseTestCases(parsed.data), filePath);
    }
    return new TestCaseRegistry(parseTestCases(parsed.data.tests), filePath, parsed.data.version);
  }

  /**
   * Build a registry from in-memory entries. `save()` then needs a path.
   */
  static fromArray(entries: readonly unknown[]): TestCaseRegistry {
    return new TestCaseRegistry(parseTestCases(entries), null);
  }

  /** All cases in load order */
  list(): readonly TestCase[] {
    return [...this.cases];
  }

  get(id: string): TestCase | undefined {
    return this.cases.find((c) => c.id === id);
  }

  /**
   * Filter by ids and/or categories, keeping load order.
   * @throws ConfigurationError for ids that are not loaded
   */
  select(selection: TestCaseSelection = {}): TestCase[] {
    const { ids, categories } = selection;

    if (ids && ids.length > 0) {
      const unknown = ids.filter((id) => !this.get(id));
      if (unknown.length > 0) {
        throw new ConfigurationError(`Unknown test case ids: ${unknown.join(', ')}`);
      }
    }

    return this.cases.filter((c) => {
      if (ids && ids.length > 0 && !ids.includes(c.id)) return false;
      if (categories && categories.length > 0 && (c.category === undefined || !categories.includes(c.category))) {
        return false;
      }
      return true;
    });
  }

  add(input: TestCaseInput, now: Date = new Date()): TestCase {
    const stamp = now.toISOString();
    const [testCase] = parseTestCases([{ ...input, createdAt: stamp, updatedAt: stamp }]);

    if (this.get(testCase.id)) {
      throw new DuplicateTestCaseError(testCase.id);
    }

    this.cases = [...this.cases, testCase];
    return testCase;
  }

  update(id: string, patch: TestCasePatch, now: Date = new Date()): TestCase {
    const index = this.indexOf(id);
    const current = this.cases[index];
    const [updated] = parseTestCases([{ ...current, ...patch, id, updatedAt: now.toISOString() }]);

    this.cases = this.cases.map((c, i) => (i === index ? updated : c));
    return updated;
  }

  remove(id: string): TestCase {
    const index = this.indexOf(id);
    const removed = this.cases[index];
    this.cases = this.cases.filter((_, i) => i !== index);
    return removed;
  }

  /**
   * Write the cases back as `{ version, updatedAt, tests }`.
   * @returns the path written
   */
  async save(filePath: string | null = this.filePath, now: Date = new Date()): Promise<string> {
    if (!filePath) {
      throw new ConfigurationError('No test case file path to save to');
    }

    const file: TestCaseFile = {
      version: this.version,
      updatedAt: now.toISOString(),
      tests: this.cases,
    };

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(file, null, 2), 'utf-8');
    this.filePath = filePath;
    return filePath;
  }

  get size(): number {
    return this.cases.length;
  }

  private indexOf(id: string): number {
    const index = this.cases.findIndex((c) => c.id === id);
    if (index === -1) {
      throw new ConfigurationError(`Test case not found: ${id}`);
    }
    return index;
  }
}

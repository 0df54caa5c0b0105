import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import type { GitDefaults, ReportContext, TestCase, TestSuite } from './types';

// ============================================================================
// Field readers
// ============================================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: JsonRecord, key: string, path: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new Error(`Invalid report context: "${path}.${key}" must be a string, got ${describe(value)}`);
  }
  return value;
}

function readCount(record: JsonRecord, key: string, path: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new Error(
      `Invalid report context: "${path}.${key}" must be a non-negative integer, got ${describe(value)}`
    );
  }
  return value;
}

function readArray(record: JsonRecord, key: string, path: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw new Error(`Invalid report context: "${path}.${key}" must be an array, got ${describe(value)}`);
  }
  return value;
}

function readGitField(
  record: JsonRecord,
  key: keyof GitDefaults,
  defaults: GitDefaults
): string {
  const value = record[key];
  if (value === undefined || value === null) {
    const fallback = defaults[key];
    if (fallback === undefined) {
      throw new Error(
        `Invalid report context: "${key}" is missing and could not be read from the workflow context.\n` +
        `💡 Add "${key}" to the report context file.`
      );
    }
    return fallback;
  }
  return readString(record, key, 'context');
}

function describe(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `${typeof value} ${JSON.stringify(value)}`;
}

// ============================================================================
// Record parsers
// ============================================================================

function parseTestCase(raw: unknown, path: string): TestCase {
  if (!isRecord(raw)) {
    throw new Error(`Invalid report context: "${path}" must be an object, got ${describe(raw)}`);
  }
  return {
    name: readString(raw, 'name', path),
    status: readString(raw, 'status', path),
  };
}

function parseTestSuite(raw: unknown, path: string): TestSuite {
  if (!isRecord(raw)) {
    throw new Error(`Invalid report context: "${path}" must be an object, got ${describe(raw)}`);
  }
  return {
    name: readString(raw, 'name', path),
    board: readString(raw, 'board', path),
    total_tests: readCount(raw, 'total_tests', path),
    total_pass: readCount(raw, 'total_pass', path),
    total_fail: readCount(raw, 'total_fail', path),
    total_skip: readCount(raw, 'total_skip', path),
    defconfig_full: readString(raw, 'defconfig_full', path),
    lab_name: readString(raw, 'lab_name', path),
    created_on: readString(raw, 'created_on', path),
    test_case_list: readArray(raw, 'test_case_list', path).map((testCase, index) =>
      parseTestCase(testCase, `${path}.test_case_list[${index}]`)
    ),
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validates parsed report-context JSON and returns it typed.
 * Git metadata missing from the file is taken from `defaults`.
 *
 * @throws {Error} Naming the first field that is missing or has the wrong type.
 */
export function parseReportContext(raw: unknown, defaults: GitDefaults = {}): ReportContext {
  if (!isRecord(raw)) {
    throw new Error(`Invalid report context: expected a JSON object, got ${describe(raw)}`);
  }

  return {
    tree: readString(raw, 'tree', 'context'),
    branch: readGitField(raw, 'branch', defaults),
    kernel: readString(raw, 'kernel', 'context'),
    git_url: readGitField(raw, 'git_url', defaults),
    git_commit: readGitField(raw, 'git_commit', defaults),
    testsuites: readArray(raw, 'testsuites', 'context').map((suite, index) =>
      parseTestSuite(suite, `testsuites[${index}]`)
    ),
  };
}

/**
 * Reads a report-context file from disk and validates it.
 */
export async function loadReportContext(filePath: string, defaults: GitDefaults = {}): Promise<ReportContext> {
  if (!existsSync(filePath)) {
    throw new Error(
      `❌ Report context file not found: "${filePath}"\n\n` +
      '💡 Make sure the step that collects test results runs before this action and the path is correct.\n' +
      '   Example: report-context: results/report-context.json'
    );
  }

  let raw: unknown;
  try {
    const contents = await readFile(filePath, 'utf-8');
    raw = JSON.parse(contents);
  } catch (error) {
    throw new Error(
      `❌ Failed to read or parse report context "${filePath}": ${error instanceof Error ? error.message : String(error)}\n\n` +
      '💡 Ensure the file is valid JSON.'
    );
  }

  return parseReportContext(raw, defaults);
}

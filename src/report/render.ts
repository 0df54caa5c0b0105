import { escapeText, formatSummaryRow, padRight } from './format';
import type { ReportContext, TestSuite } from './types';

// ============================================================================
// Helpers
// ============================================================================

function compareNames(a: TestSuite, b: TestSuite): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function headerLine(label: string, value: string): string {
  return `${padRight(`${label}:`, 9)}${value}`;
}

function detailLine(label: string, value: string): string {
  return `  ${padRight(`${label}:`, 12)}${value}`;
}

function renderSuiteDetails(suite: TestSuite): string[] {
  const lines = [
    `${escapeText(suite.name)} - ${suite.total_tests} tests: ` +
      `${suite.total_pass}  PASS, ${suite.total_fail} FAIL, ${suite.total_skip} SKIP`,
    detailLine('Config', suite.defconfig_full),
    detailLine('Lab Name', suite.lab_name),
    detailLine('Board', suite.board),
    detailLine('Date', suite.created_on),
    '  Test cases:',
  ];

  for (const testCase of suite.test_case_list) {
    lines.push(`    * ${testCase.name} : ${testCase.status}`);
  }

  return lines;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Returns the suites ordered by name, ignoring case. Suites with the same
 * name keep their input order. The input array is left untouched.
 */
export function sortSuitesByName(suites: readonly TestSuite[]): TestSuite[] {
  return [...suites].sort(compareNames);
}

/**
 * Lists the suites whose total_tests differs from pass + fail + skip.
 * The report still shows the values as given.
 */
export function findInconsistentSuites(context: ReportContext): TestSuite[] {
  return context.testsuites.filter(
    (suite) => suite.total_tests !== suite.total_pass + suite.total_fail + suite.total_skip
  );
}

/**
 * Renders the plain-text test report for one kernel build.
 *
 * The header carries the build metadata, the Summary section has one aligned
 * row per suite and the Tests section lists every suite's details and test
 * cases. Both sections share the same name ordering.
 */
export function renderTestReport(context: ReportContext): string {
  const suites = sortSuitesByName(context.testsuites);

  const lines = [
    headerLine('Tree', context.tree),
    headerLine('Branch', context.branch),
    headerLine('Kernel', context.kernel),
    headerLine('URL', context.git_url),
    headerLine('Commit', context.git_commit),
    '',
    'Summary',
    '-------',
    `${suites.length} test suites results`,
    ...suites.map(formatSummaryRow),
    '',
    'Tests',
    '-----',
  ];

  for (const suite of suites) {
    lines.push('', ...renderSuiteDetails(suite));
  }

  return `${lines.join('\n')}\n`;
}

import { describe, it, expect } from 'vitest';
import { findInconsistentSuites, renderTestReport, sortSuitesByName } from '../../report/render';
import type { ReportContext, TestSuite } from '../../report/types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeSuite(overrides: Partial<TestSuite> = {}): TestSuite {
  return {
    name: 'suiteA',
    board: 'qemu_x86',
    total_tests: 3,
    total_pass: 2,
    total_fail: 1,
    total_skip: 0,
    defconfig_full: 'x86_64_defconfig',
    lab_name: 'lab-test',
    created_on: '2024-01-15T10:00:00Z',
    test_case_list: [
      { name: 't1', status: 'PASS' },
      { name: 't2', status: 'PASS' },
      { name: 't3', status: 'FAIL' },
    ],
    ...overrides,
  };
}

function makeContext(testsuites: TestSuite[]): ReportContext {
  return {
    tree: 'mainline',
    branch: 'master',
    kernel: 'v6.1-rc3',
    git_url: 'https://git.example.org/linux.git',
    git_commit: 'abc123',
    testsuites,
  };
}

const HEADER = [
  'Tree:    mainline',
  'Branch:  master',
  'Kernel:  v6.1-rc3',
  'URL:     https://git.example.org/linux.git',
  'Commit:  abc123',
  '',
  'Summary',
  '-------',
];

// ---------------------------------------------------------------------------
// renderTestReport
// ---------------------------------------------------------------------------

describe('renderTestReport', () => {
  it('renders a single suite with its summary row and test cases', () => {
    const expected = [
      ...HEADER,
      '1 test suites results',
      'suiteA     | qemu_x86               |   3 total:   2 PASS   1 FAIL   0 SKIP',
      '',
      'Tests',
      '-----',
      '',
      'suiteA - 3 tests: 2  PASS, 1 FAIL, 0 SKIP',
      '  Config:     x86_64_defconfig',
      '  Lab Name:   lab-test',
      '  Board:      qemu_x86',
      '  Date:       2024-01-15T10:00:00Z',
      '  Test cases:',
      '    * t1 : PASS',
      '    * t2 : PASS',
      '    * t3 : FAIL',
      '',
    ].join('\n');

    expect(renderTestReport(makeContext([makeSuite()]))).toBe(expected);
  });

  it('renders an empty Tests section when there are no suites', () => {
    const expected = [...HEADER, '0 test suites results', '', 'Tests', '-----', ''].join('\n');

    expect(renderTestReport(makeContext([]))).toBe(expected);
  });

  it('orders suites by name in both sections', () => {
    const context = makeContext([
      makeSuite({ name: 'usb', test_case_list: [] }),
      makeSuite({ name: 'boot', test_case_list: [] }),
      makeSuite({ name: 'kselftest', test_case_list: [] }),
    ]);

    const lines = renderTestReport(context).split('\n');
    const summaryRows = lines.filter((line) => line.includes(' | '));
    const detailHeads = lines.filter((line) => / - \d+ tests: /.test(line));

    expect(summaryRows.map((line) => line.split(' ')[0])).toEqual(['boot', 'kselftest', 'usb']);
    expect(detailHeads.map((line) => line.split(' ')[0])).toEqual(['boot', 'kselftest', 'usb']);
  });

  it('keeps test cases in input order', () => {
    const context = makeContext([
      makeSuite({
        test_case_list: [
          { name: 'zeta', status: 'SKIP' },
          { name: 'alpha', status: 'PASS' },
        ],
      }),
    ]);

    const report = renderTestReport(context);
    expect(report.endsWith('    * zeta : SKIP\n    * alpha : PASS\n')).toBe(true);
  });

  it('renders total_tests as given instead of summing the counts', () => {
    const context = makeContext([makeSuite({ total_tests: 10 })]);
    const lines = renderTestReport(context).split('\n');

    expect(lines).toContain('suiteA     | qemu_x86               |  10 total:   2 PASS   1 FAIL   0 SKIP');
    expect(lines).toContain('suiteA - 10 tests: 2  PASS, 1 FAIL, 0 SKIP');
  });

  it('escapes the suite name in the Tests section only', () => {
    const context = makeContext([makeSuite({ name: 'a<b>&"c"', test_case_list: [] })]);
    const lines = renderTestReport(context).split('\n');

    expect(lines).toContain('a<b>&"c"   | qemu_x86               |   3 total:   2 PASS   1 FAIL   0 SKIP');
    expect(lines).toContain('a&lt;b&gt;&amp;&#34;c&#34; - 3 tests: 2  PASS, 1 FAIL, 0 SKIP');
  });

  it('does not truncate names wider than the column', () => {
    const context = makeContext([makeSuite({ name: 'kselftest-cpufreq', board: 'x', test_case_list: [] })]);
    const lines = renderTestReport(context).split('\n');

    expect(lines).toContain(
      'kselftest-cpufreq | x                      |   3 total:   2 PASS   1 FAIL   0 SKIP'
    );
  });

  it('produces identical output when rendered twice', () => {
    const context = makeContext([makeSuite({ name: 'b' }), makeSuite({ name: 'a' })]);
    expect(renderTestReport(context)).toBe(renderTestReport(context));
  });

  it('does not reorder the input suites', () => {
    const context = makeContext([makeSuite({ name: 'b' }), makeSuite({ name: 'a' })]);
    renderTestReport(context);
    expect(context.testsuites.map((s) => s.name)).toEqual(['b', 'a']);
  });
});

// ---------------------------------------------------------------------------
// sortSuitesByName
// ---------------------------------------------------------------------------

describe('sortSuitesByName', () => {
  it('ignores case when ordering', () => {
    const sorted = sortSuitesByName([
      makeSuite({ name: 'usb' }),
      makeSuite({ name: 'Boot' }),
      makeSuite({ name: 'kselftest' }),
    ]);
    expect(sorted.map((s) => s.name)).toEqual(['Boot', 'kselftest', 'usb']);
  });

  it('keeps input order for equal names', () => {
    const sorted = sortSuitesByName([
      makeSuite({ name: 'boot', board: 'second-board' }),
      makeSuite({ name: 'alpha' }),
      makeSuite({ name: 'BOOT', board: 'third-board' }),
      makeSuite({ name: 'boot', board: 'fourth-board' }),
    ]);
    expect(sorted.map((s) => s.board)).toEqual(['qemu_x86', 'second-board', 'third-board', 'fourth-board']);
  });
});

// ---------------------------------------------------------------------------
// findInconsistentSuites
// ---------------------------------------------------------------------------

describe('findInconsistentSuites', () => {
  it('returns nothing when every total matches its counts', () => {
    expect(findInconsistentSuites(makeContext([makeSuite()]))).toEqual([]);
  });

  it('returns the suites whose total differs from pass + fail + skip', () => {
    const broken = makeSuite({ name: 'broken', total_tests: 5 });
    const context = makeContext([makeSuite(), broken]);
    expect(findInconsistentSuites(context)).toEqual([broken]);
  });
});

/**
 * Report context types.
 * These mirror the report-context JSON written by the result aggregator,
 * so keys stay in its snake_case.
 */

export interface TestCase {
  name: string;
  /** PASS, FAIL, SKIP, ... rendered as given */
  status: string;
}

export interface TestSuite {
  name: string;
  board: string;
  total_tests: number;
  total_pass: number;
  total_fail: number;
  total_skip: number;
  defconfig_full: string;
  lab_name: string;
  created_on: string;
  test_case_list: TestCase[];
}

export interface ReportContext {
  tree: string;
  branch: string;
  kernel: string;
  git_url: string;
  git_commit: string;
  testsuites: TestSuite[];
}

/**
 * Git metadata the file may leave out; filled from the workflow context.
 */
export interface GitDefaults {
  branch?: string;
  git_url?: string;
  git_commit?: string;
}

import * as core from '@actions/core';
import { getActionInputs } from './validation';
import { getGitDefaults } from './report/context';
import { loadReportContext } from './report/load';
import { renderTestReport } from './report/render';
import { processReport, warnInconsistentSuites } from './output';

/**
 * Main action entry point
 */
async function run(): Promise<void> {
  try {
    const inputs = getActionInputs();

    core.info(`📂 Reading report context from ${inputs.reportContextPath}`);
    const context = await loadReportContext(inputs.reportContextPath, getGitDefaults());

    warnInconsistentSuites(context);

    const report = renderTestReport(context);
    core.info(`📊 Rendered report for ${context.testsuites.length} test suites`);

    await processReport(report, context, inputs);

  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(`❌ ${error.message}`);
    } else {
      core.setFailed('❌ Unknown error occurred');
    }
  }
}

void run();

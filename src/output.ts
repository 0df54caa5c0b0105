import * as core from '@actions/core';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { sendEmail } from './mail';
import { escapeText } from './report/format';
import { findInconsistentSuites } from './report/render';
import { buildMailOptions, buildReportSubject } from './validation';
import type { ActionInputs, MailResult } from './types';
import type { ReportContext } from './report/types';

/**
 * Writes the report next to the workspace so later steps can pick it up
 */
export async function writeReportFile(report: string, outputPath: string): Promise<string> {
  const resolved = path.resolve(outputPath);
  await mkdir(path.dirname(resolved), { recursive: true });
  await writeFile(resolved, report, 'utf-8');
  return resolved;
}

/**
 * Wraps the escaped report in a preformatted block for HTML mail clients
 */
export function buildHtmlBody(report: string): string {
  return `<html><body><pre>${escapeText(report)}</pre></body></html>`;
}

/**
 * Sends the report to the configured recipients
 */
export async function mailReport(
  report: string,
  context: ReportContext,
  inputs: ActionInputs
): Promise<MailResult> {
  const subject = inputs.mailSubject || buildReportSubject(context);
  core.info(`📧 Mailing report "${subject}"`);

  return sendEmail(
    inputs.mailTo,
    subject,
    report,
    inputs.mailHtml ? buildHtmlBody(report) : undefined,
    buildMailOptions(inputs),
    {
      cc: inputs.mailCc,
      bcc: inputs.mailBcc,
      ...(inputs.mailInReplyTo ? { inReplyTo: inputs.mailInReplyTo } : {}),
    }
  );
}

/**
 * Handles a failed delivery
 */
export function handleMailFailure(result: MailResult): void {
  let errorMessage = 'Could not mail the test report';

  if (result.errors.length > 0) {
    errorMessage += '\n📋 SMTP errors:';
    result.errors.forEach((err, index) => {
      errorMessage += `\n  ${index + 1}. ${err.message} [${err.code}]`;
    });
  }

  core.setFailed(errorMessage);
}

/**
 * Logs one warning per suite whose total differs from its counts
 */
export function warnInconsistentSuites(context: ReportContext): void {
  for (const suite of findInconsistentSuites(context)) {
    core.warning(
      `Suite "${suite.name}" reports ${suite.total_tests} tests but ` +
      `${suite.total_pass} pass + ${suite.total_fail} fail + ${suite.total_skip} skip`
    );
  }
}

/**
 * Publishes the rendered report: outputs, optional file, job summary and mail
 */
export async function processReport(
  report: string,
  context: ReportContext,
  inputs: ActionInputs
): Promise<void> {
  core.setOutput('report', report);
  core.setOutput('suite-count', context.testsuites.length);

  if (inputs.outputPath) {
    const written = await writeReportFile(report, inputs.outputPath);
    core.setOutput('report-path', written);
    core.info(`📝 Report written to ${written}`);
  }

  if (inputs.jobSummary) {
    await core.summary
      .addHeading(escapeText(`🧪 Test results: ${context.tree}/${context.branch}`), 2)
      .addCodeBlock(escapeText(report))
      .write();
  }

  if (inputs.mailTo.length === 0) {
    core.debug('No mail-to recipients, skipping mail delivery');
    return;
  }

  const result = await mailReport(report, context, inputs);
  core.setOutput('mail-status', result.status);

  if (result.status === 'ERROR') {
    handleMailFailure(result);
  }
}

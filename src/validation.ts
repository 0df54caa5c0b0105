import * as core from '@actions/core';
import type { ActionInputs, MailOptions } from './types';
import type { ReportContext } from './report/types';

const DEFAULT_SMTP_PORT = 25;

/**
 * Reads and returns all action inputs
 */
export function getActionInputs(): ActionInputs {
  return {
    reportContextPath: core.getInput('report-context', { required: true }),
    outputPath: core.getInput('output-path', { required: false }),
    jobSummary: core.getBooleanInput('job-summary', { required: false }),
    mailTo: parseAddressList(core.getInput('mail-to', { required: false })),
    mailCc: parseAddressList(core.getInput('mail-cc', { required: false })),
    mailBcc: parseAddressList(core.getInput('mail-bcc', { required: false })),
    mailSubject: core.getInput('mail-subject', { required: false }),
    mailInReplyTo: core.getInput('mail-in-reply-to', { required: false }),
    mailHtml: core.getBooleanInput('mail-html', { required: false }),
    smtpHost: core.getInput('smtp-host', { required: false }),
    smtpPort: validateSmtpPort(core.getInput('smtp-port', { required: false })),
    smtpUser: core.getInput('smtp-user', { required: false }),
    smtpPassword: core.getInput('smtp-password', { required: false }),
    mailSender: core.getInput('mail-sender', { required: false }),
    mailSenderDesc: core.getInput('mail-sender-desc', { required: false }),
  };
}

/**
 * Splits a comma or newline separated address list
 */
export function parseAddressList(input: string): string[] {
  return input
    .split(/[,\n]/)
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
}

/**
 * Validates the SMTP port, falling back to 25 when none is given
 */
export function validateSmtpPort(input: string): number {
  const trimmed = input.trim();
  if (trimmed.length === 0) return DEFAULT_SMTP_PORT;

  const port = Number(trimmed);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid smtp-port: must be an integer between 1 and 65535, got "${input}"`);
  }
  return port;
}

/**
 * Builds SMTP options from the mail inputs
 */
export function buildMailOptions(inputs: ActionInputs): MailOptions {
  const options: MailOptions = {
    host: inputs.smtpHost,
    port: inputs.smtpPort,
    sender: inputs.mailSender,
  };

  if (inputs.smtpUser) options.user = inputs.smtpUser;
  if (inputs.smtpPassword) {
    core.setSecret(inputs.smtpPassword);
    options.password = inputs.smtpPassword;
  }
  if (inputs.mailSenderDesc) options.senderDesc = inputs.mailSenderDesc;

  return options;
}

/**
 * Builds the default mail subject, e.g.
 * `mainline/master v6.1: 2 failed, 10 passed across 3 suites`
 */
export function buildReportSubject(context: ReportContext): string {
  const totalPassed = context.testsuites.reduce((sum, s) => sum + s.total_pass, 0);
  const totalFailed = context.testsuites.reduce((sum, s) => sum + s.total_fail, 0);
  const totalSkipped = context.testsuites.reduce((sum, s) => sum + s.total_skip, 0);

  const parts: string[] = [];
  if (totalFailed > 0) parts.push(`${totalFailed} failed`);
  if (totalPassed > 0) parts.push(`${totalPassed} passed`);
  if (totalSkipped > 0) parts.push(`${totalSkipped} skipped`);

  const suiteCount = context.testsuites.length;
  const suiteWord = suiteCount === 1 ? 'suite' : 'suites';
  const summary =
    parts.length > 0
      ? `${parts.join(', ')} across ${suiteCount} ${suiteWord}`
      : 'No tests ran';

  return `${context.tree}/${context.branch} ${context.kernel}: ${summary}`;
}

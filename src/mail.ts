import * as core from '@actions/core';
import * as nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type { MailError, MailExtras, MailOptions, MailResult } from './types';

// ============================================================================
// SMTP error classification
// ============================================================================

interface SmtpError extends Error {
  code: string;
  responseCode?: number;
  response?: string;
}

const CONNECTION_CODES = ['EAUTH', 'ECONNECTION', 'ESOCKET', 'ETIMEDOUT', 'EDNS', 'ETLS'];
const REFUSED_CODES = ['EENVELOPE'];
const SERVER_CODES = ['EMESSAGE', 'EPROTOCOL'];

/** Reply code used when the server sent none */
const DEFAULT_ERROR_CODE = 500;

function isSmtpError(error: unknown): error is SmtpError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function smtpFailureMessage(code: string): string {
  if (CONNECTION_CODES.includes(code)) return 'SMTP conn/auth error';
  if (REFUSED_CODES.includes(code)) return 'Error sending email: recipients or sender refused';
  if (SERVER_CODES.includes(code)) return 'SMTP server error';
  return `Generic SMTP error: ${code}`;
}

/**
 * Logs a failed send and turns it into an error entry.
 */
export function describeMailFailure(error: unknown): MailError {
  if (isSmtpError(error)) {
    core.error(smtpFailureMessage(error.code));
    return {
      code: typeof error.responseCode === 'number' ? error.responseCode : DEFAULT_ERROR_CODE,
      message: typeof error.response === 'string' ? error.response : error.message,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  core.error(`Unexpected SMTP error: ${message}`);
  return { code: DEFAULT_ERROR_CODE, message };
}

// ============================================================================
// Message building
// ============================================================================

export function formatSender(options: MailOptions): string {
  return options.senderDesc ? `${options.senderDesc} <${options.sender}>` : options.sender;
}

/**
 * Builds the nodemailer message. With both bodies set the message is sent as
 * multipart/alternative. Bcc recipients get the mail but no header.
 */
export function buildMessage(
  toAddrs: string[],
  subject: string,
  txtBody: string | undefined,
  htmlBody: string | undefined,
  options: MailOptions,
  extras: MailExtras
): Mail.Options {
  const message: Mail.Options = {
    from: formatSender(options),
    to: toAddrs.join(', '),
    subject,
  };

  if (txtBody) message.text = txtBody;
  if (htmlBody) message.html = htmlBody;
  if (extras.headers) message.headers = extras.headers;

  if (extras.inReplyTo) {
    message.inReplyTo = extras.inReplyTo;
    message.references = extras.inReplyTo;
  }

  if (extras.cc && extras.cc.length > 0) message.cc = extras.cc.join(', ');
  if (extras.bcc && extras.bcc.length > 0) message.bcc = extras.bcc;

  return message;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Sends an email over SMTP.
 *
 * Port 465 connects with implicit TLS; any other port stays in plain text.
 * Login only happens when both user and password are configured.
 *
 * @returns The delivery status and the errors collected on the way. Failures
 * are logged and returned, never thrown.
 */
export async function sendEmail(
  toAddrs: string[],
  subject: string,
  txtBody: string | undefined,
  htmlBody: string | undefined,
  options: MailOptions,
  extras: MailExtras = {}
): Promise<MailResult> {
  const errors: MailError[] = [];

  if (!options.sender || !options.host) {
    core.error('Cannot send emails: no SMTP host and/or sender specified');
    return { status: 'ERROR', errors };
  }

  if (!txtBody && !htmlBody) {
    core.error('Cannot send emails: no text or HTML body');
    return { status: 'ERROR', errors };
  }

  const transporter = nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: options.port === 465,
    // plain SMTP stays plain, even when the server offers STARTTLS
    ignoreTLS: options.port !== 465,
    ...(options.user && options.password
      ? { auth: { user: options.user, pass: options.password } }
      : {}),
  });

  try {
    await transporter.sendMail(buildMessage(toAddrs, subject, txtBody, htmlBody, options, extras));
    core.info(`📧 Report sent to ${toAddrs.join(', ')}`);
    return { status: 'SENT', errors };
  } catch (error) {
    errors.push(describeMailFailure(error));
    return { status: 'ERROR', errors };
  } finally {
    transporter.close();
  }
}

/**
 * Action input and mail delivery types
 */

export interface ActionInputs {
  reportContextPath: string;
  outputPath: string;
  jobSummary: boolean;
  mailTo: string[];
  mailCc: string[];
  mailBcc: string[];
  mailSubject: string;
  mailInReplyTo: string;
  mailHtml: boolean;
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPassword: string;
  mailSender: string;
  mailSenderDesc: string;
}

export interface MailOptions {
  host: string;
  port: number;
  user?: string;
  password?: string;
  sender: string;
  senderDesc?: string;
}

export interface MailExtras {
  headers?: Record<string, string>;
  cc?: string[];
  bcc?: string[];
  inReplyTo?: string;
}

export type MailStatus = 'SENT' | 'ERROR';

export interface MailError {
  code: number;
  message: string;
}

export interface MailResult {
  status: MailStatus;
  errors: MailError[];
}

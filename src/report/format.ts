import type { TestSuite } from './types';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;',
};

/**
 * `%-Ns`: left-justifies a value in `width` columns. Longer values are kept whole.
 */
export function padRight(value: string | number, width: number): string {
  return String(value).padEnd(width, ' ');
}

/**
 * `%Nd`: right-justifies a value in `width` columns. Longer values are kept whole.
 */
export function padLeft(value: string | number, width: number): string {
  return String(value).padStart(width, ' ');
}

/**
 * Escapes characters that are unsafe in HTML or mail clients that render it.
 */
export function escapeText(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

/**
 * Formats one line of the Summary table:
 * `name | board | total total: pass PASS fail FAIL skip SKIP`
 */
export function formatSummaryRow(suite: TestSuite): string {
  return (
    `${padRight(suite.name, 10)} | ${padRight(suite.board, 22)} | ` +
    `${padLeft(suite.total_tests, 3)} total: ` +
    `${padLeft(suite.total_pass, 3)} PASS ` +
    `${padLeft(suite.total_fail, 3)} FAIL ` +
    `${padLeft(suite.total_skip, 3)} SKIP`
  );
}

/**
 * Failure Summary - condense harness output for a correction prompt
 *
 * Keeps the lines that name a failure; without any, keeps the tail of the
 * output. The result never exceeds `maxChars`.
 */

const FAILURE_MARKERS = [
  'not ok',
  'FAILED',
  'ERROR',
  'Error',
  'Exception',
  'assert',
  'expected',
  'actual',
  'ERR_',
  'Cannot find',
  'is not defined',
  'is not a function',
  'Unexpected token',
];

const MAX_MARKED_LINES = 40;
const TAIL_LINES = 30;

export function summarizeFailureOutput(output: string, maxChars: number): string {
  const lines = output.split(/\r?\n/);
  const marked = lines.filter(line => FAILURE_MARKERS.some(marker => line.includes(marker)));

  const kept = marked.length > 0 ? marked.slice(0, MAX_MARKED_LINES) : lines.slice(-TAIL_LINES);
  return truncateText(kept.join('\n').trim(), maxChars);
}

export function truncateText(text: string, maxChars: number): string {
  if (maxChars <= 0) {
    return '';
  }
  if (text.length <= maxChars) {
    return text;
  }
  const marker = '\n...[truncated]';
  if (maxChars <= marker.length) {
    return text.slice(0, maxChars);
  }
  return `${text.slice(0, maxChars - marker.length)}${marker}`;
}

import { createHash } from 'crypto';
import { stripAnsi } from '@testmend/shared';

const ERROR_LINE = /error|exception|fail|assert|expected|not defined|cannot|timed out|✗|×/i;

/**
 * The line a failure is best identified by: the first line that looks like
 * an error, else the first non-blank line.
 */
export function firstErrorLine(text: string): string {
  const lines = stripAnsi(text)
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  return lines.find((l) => ERROR_LINE.test(l)) ?? lines[0] ?? '';
}

/**
 * Strips the parts of an error line that change between otherwise identical
 * failures: hex ids, file paths and numbers.
 */
export function normalizeErrorLine(line: string): string {
  return line
    .replace(/\b0x[0-9a-f]+\b/gi, '<hex>')
    .replace(/\b[0-9a-f]{8,}\b/gi, '<hex>')
    .replace(/(?:[A-Za-z]:)?[\\/]?(?:[\w.-]+[\\/])+[\w.-]+/g, '<path>')
    .replace(/\d+(?:\.\d+)?/g, '<n>')
    .replace(/\s+/g, ' ')
    .trim();
}

/** 12 hex chars of sha256 over the normalized first error line. */
export function failureSignature(text: string): string {
  return createHash('sha256')
    .update(normalizeErrorLine(firstErrorLine(text)))
    .digest('hex')
    .slice(0, 12);
}

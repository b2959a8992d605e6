import type { PatchApplyErrorDetail } from '@testmend/shared';

export interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Body lines with their ` `, `-` or `+` marker */
  lines: string[];
  /** 1-indexed line of the `@@` header inside the diff text */
  headerLine: number;
  /** The last added line carries a "No newline at end of file" marker */
  noNewlineAtEnd: boolean;
}

export interface ParsedDiff {
  /** Target named by the `+++` header, without its `b/` prefix */
  newPath?: string;
  /** `--- /dev/null`: the diff creates the file */
  createsFile: boolean;
  hunks: Hunk[];
  linesTouched: number;
}

export type ParseResult =
  | { ok: true; diff: ParsedDiff }
  | { ok: false; errors: PatchApplyErrorDetail[] };

export type HunkApplyResult =
  | { ok: true; result: string }
  | { ok: false; errors: PatchApplyErrorDetail[] };

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const GIT_EXTENDED_HEADER =
  /^(?:index |old mode|new mode|new file mode|deleted file mode|similarity index|rename (?:from|to) )/;

function invalid(message: string, line?: number, suggestion?: string): ParseResult {
  return { ok: false, errors: [{ kind: 'INVALID_PATCH', message, line, suggestion }] };
}

function stripPrefix(header: string): string {
  const raw = header.slice(4).split('\t')[0].trim();
  return raw.startsWith('a/') || raw.startsWith('b/') ? raw.slice(2) : raw;
}

/**
 * Parses a single-file unified diff. File headers are optional; a diff that
 * names more than one file is rejected.
 *
 * Stated hunk counts are only used to drop blank separator lines that trail
 * a hunk; the body itself decides what is removed and added.
 */
export function parseUnifiedDiff(diffText: string): ParseResult {
  const lines = diffText.replace(/\r\n/g, '\n').split('\n');
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  while (lines.length > 0 && lines[0] === '') lines.shift();

  if (lines.length === 0) {
    return invalid('Empty diff');
  }

  const diff: ParsedDiff = { createsFile: false, hunks: [], linesTouched: 0 };
  let fileHeaders = 0;
  let current: Hunk | undefined;

  const closeHunk = () => {
    if (!current) return;
    let oldSeen = current.lines.filter((l) => !l.startsWith('+')).length;
    while (
      current.lines.length > 0 &&
      current.lines[current.lines.length - 1] === ' ' &&
      oldSeen > current.oldCount
    ) {
      current.lines.pop();
      oldSeen--;
    }
    diff.hunks.push(current);
    current = undefined;
  };

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx];
    const lineNumber = idx + 1;

    if (!current && GIT_EXTENDED_HEADER.test(line)) {
      continue;
    }

    if (line.startsWith('diff --git')) {
      closeHunk();
      continue;
    }

    if (line.startsWith('--- ') && (!current || lines[idx + 1]?.startsWith('+++ '))) {
      closeHunk();
      diff.createsFile = line.slice(4).trim() === '/dev/null';
      continue;
    }

    if (line.startsWith('+++ ') && !current) {
      fileHeaders++;
      if (fileHeaders > 1) {
        return invalid(
          `Diff touches more than one file (second header at line ${lineNumber})`,
          lineNumber,
          'Send one diff per target file.',
        );
      }
      diff.newPath = stripPrefix(line);
      continue;
    }

    const header = HUNK_HEADER.exec(line);
    if (header) {
      closeHunk();
      current = {
        oldStart: Number(header[1]),
        oldCount: header[2] === undefined ? 1 : Number(header[2]),
        newStart: Number(header[3]),
        newCount: header[4] === undefined ? 1 : Number(header[4]),
        lines: [],
        headerLine: lineNumber,
        noNewlineAtEnd: false,
      };
      continue;
    }

    if (!current) {
      return invalid(
        `Unexpected content before the first hunk header (line ${lineNumber})`,
        lineNumber,
        'Start each hunk with an "@@ -a,b +c,d @@" header.',
      );
    }

    if (line.startsWith('\\')) {
      if (current.lines[current.lines.length - 1]?.startsWith('+')) {
        current.noNewlineAtEnd = true;
      }
      continue;
    }

    // Editors and models drop the single space of blank context lines.
    const body = line === '' ? ' ' : line;
    const marker = body[0];
    if (marker !== ' ' && marker !== '-' && marker !== '+') {
      return invalid(
        `Invalid hunk line at line ${lineNumber}: ${JSON.stringify(line)}`,
        lineNumber,
        'Hunk lines must start with a space, "-" or "+".',
      );
    }
    if (marker !== ' ') diff.linesTouched++;
    current.lines.push(body);
  }
  closeHunk();

  if (diff.hunks.length === 0) {
    return invalid('Diff contains no hunks', undefined, 'Include at least one "@@" hunk.');
  }

  return { ok: true, diff };
}

function splitLines(content: string): { lines: string[]; eol: boolean } {
  if (content === '') return { lines: [], eol: false };
  const lines = content.split('\n');
  const eol = lines[lines.length - 1] === '';
  if (eol) lines.pop();
  return { lines, eol };
}

function matchesAt(file: string[], expected: string[], at: number): boolean {
  if (at < 0 || at + expected.length > file.length) return false;
  for (let i = 0; i < expected.length; i++) {
    if (file[at + i].trimEnd() !== expected[i].trimEnd()) return false;
  }
  return true;
}

/**
 * Applies parsed hunks to `content` in memory. Each hunk's context and removed
 * lines must match at its stated offset, shifted by the drift of earlier hunks, within
 * `fuzz` lines of drift. Trailing whitespace is ignored when matching.
 * Any failing hunk fails the whole diff.
 */
export function applyHunks(content: string, hunks: Hunk[], fuzz: number): HunkApplyResult {
  const { lines: file, eol } = splitLines(content);
  const out: string[] = [];
  const errors: PatchApplyErrorDetail[] = [];
  let cursor = 0;
  let delta = 0;
  let noNewlineAtEnd = false;

  for (const hunk of hunks) {
    const expected = hunk.lines.filter((l) => !l.startsWith('+')).map((l) => l.slice(1));
    const stated = hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1;
    const base = stated + delta;

    let found: number | undefined;
    for (let drift = 0; drift <= fuzz && found === undefined; drift++) {
      for (const at of drift === 0 ? [base] : [base - drift, base + drift]) {
        if (at >= cursor && matchesAt(file, expected, at)) {
          found = at;
          break;
        }
      }
    }

    if (found === undefined) {
      errors.push({
        kind: 'HUNK_FAILED',
        line: base + 1,
        message: `Hunk at diff line ${hunk.headerLine} does not match the file near line ${base + 1}`,
        suggestion: 'Regenerate the diff against the current file content.',
      });
      continue;
    }

    out.push(...file.slice(cursor, found));
    let fileIdx = found;
    for (const line of hunk.lines) {
      if (line.startsWith('+')) {
        out.push(line.slice(1));
      } else if (line.startsWith('-')) {
        fileIdx++;
      } else {
        out.push(file[fileIdx]);
        fileIdx++;
      }
    }
    cursor = fileIdx;
    // Later hunks inherit the drift of this one.
    delta = found - stated;
    noNewlineAtEnd = hunk.noNewlineAtEnd && cursor === file.length;
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  out.push(...file.slice(cursor));
  if (out.length === 0) return { ok: true, result: '' };
  const trailing = noNewlineAtEnd ? false : file.length === 0 ? true : eol;
  return { ok: true, result: out.join('\n') + (trailing ? '\n' : '') };
}

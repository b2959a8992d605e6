export const stripAnsi = (str: string): string => {
  // CSI sequences: ESC [ params letter
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Keeps the last `maxChars` characters, marking the cut with a leading `…`.
 */
export function tail(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return '…' + text.slice(text.length - maxChars + 1);
}

/**
 * Counts every position where `needle` starts in `haystack`, overlapping
 * matches included.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at === -1) return count;
    count++;
    from = at + 1;
  }
}

import type { ParsedCommand } from './types';

/**
 * Splits a command line into tokens the way a POSIX shell would for plain
 * words, single and double quotes and backslash escapes. No expansion,
 * globbing or operators.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: "'" | '"' | null = null;
  let escape = false;
  let started = false;

  for (const char of input.trim()) {
    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      started = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      started = true;
    } else if (/\s/.test(char)) {
      if (started) {
        tokens.push(current);
        current = '';
        started = false;
      }
    } else {
      current += char;
      started = true;
    }
  }

  if (started) {
    tokens.push(current);
  }
  return tokens;
}

export function parseCommand(input: string): ParsedCommand {
  const tokens = tokenize(input);
  const env: Record<string, string> = {};

  let cmdIndex = 0;
  while (cmdIndex < tokens.length && /^[a-zA-Z_][a-zA-Z0-9_]*=/.test(tokens[cmdIndex])) {
    const token = tokens[cmdIndex];
    const eq = token.indexOf('=');
    env[token.slice(0, eq)] = token.slice(eq + 1);
    cmdIndex++;
  }

  if (cmdIndex >= tokens.length) {
    return { bin: '', args: [], env, raw: input };
  }

  return {
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}

export const SELECTOR_PLACEHOLDER = '{selector}';

/**
 * Parses a command template and substitutes the selector into every token.
 * The selector always lands inside a single argument; a token that is only
 * the placeholder is dropped when the selector is empty.
 */
export function buildCommand(template: string, selector: string): ParsedCommand {
  const parsed = parseCommand(template);
  const substitute = (token: string) => token.split(SELECTOR_PLACEHOLDER).join(selector);
  const args = parsed.args
    .filter((arg) => selector !== '' || arg !== SELECTOR_PLACEHOLDER)
    .map(substitute);
  return { ...parsed, bin: substitute(parsed.bin), args };
}

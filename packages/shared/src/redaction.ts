const REDACTION_PLACEHOLDER = '[REDACTED]';

interface SecretPattern {
  name: string;
  pattern: RegExp;
}

/**
 * Secrets that show up in captured test output: provider keys, CI tokens,
 * credential assignments and PEM blocks.
 */
const SECRET_PATTERNS: readonly SecretPattern[] = [
  { name: 'anthropic-key', pattern: /sk-ant-[a-zA-Z0-9-]{20,}/g },
  { name: 'openai-key', pattern: /sk-[a-zA-Z0-9]{20,}/g },
  { name: 'github-token', pattern: /gh[pousr]_[a-zA-Z0-9]{20,}/g },
  { name: 'bearer', pattern: /Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g },
  {
    name: 'assignment',
    pattern: /\b[A-Z0-9_]*(?:TOKEN|SECRET|API_KEY|PASSWORD)\s*=\s*['"]?[^\s'"]+['"]?/g,
  },
  {
    name: 'private-key',
    pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
  },
];

/** Object keys whose string values are dropped whole when logging. */
const SENSITIVE_KEY = /^(?:api[-_]?key|token|secret|password|authorization)$/i;

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const { pattern } of SECRET_PATTERNS) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(
  input: unknown,
  options: { byKey?: boolean } = {},
): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let total = 0;
    const items = input.map((item) => {
      const { redacted, redactionCount } = redactUnknown(item, options);
      total += redactionCount;
      return redacted;
    });
    return { redacted: items, redactionCount: total };
  }

  if (typeof input === 'object' && input !== null) {
    let total = 0;
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (options.byKey && typeof value === 'string' && value && SENSITIVE_KEY.test(key)) {
        out[key] = REDACTION_PLACEHOLDER;
        total += 1;
        continue;
      }
      const { redacted, redactionCount } = redactUnknown(value, options);
      total += redactionCount;
      out[key] = redacted;
    }
    return { redacted: out, redactionCount: total };
  }

  return { redacted: input, redactionCount: 0 };
}

export function redact(input: unknown): unknown {
  return redactUnknown(input).redacted;
}

/**
 * Redaction applied to anything written to a log, event stream or summary.
 * Also blanks values stored under credential-like keys.
 */
export function redactForLogs<T>(input: T): unknown {
  return redactUnknown(input, { byKey: true }).redacted;
}

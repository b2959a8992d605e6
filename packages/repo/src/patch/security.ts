import isBinaryPath from 'is-binary-path';
import { isWithin, normalizePath, type PatchApplyErrorDetail } from '@testmend/shared';

/**
 * Checks a patch target for traversal, absolute paths, null bytes and
 * encoded separators.
 *
 * @returns Error message if the path is unsafe, undefined if safe
 */
export function validatePathSecurity(filePath: string): string | undefined {
  if (filePath.trim() === '') {
    return 'Empty target path';
  }

  if (filePath.includes('\0') || filePath.includes('%00')) {
    return `Null byte injection detected in path: ${filePath}`;
  }

  // %2f = /, %5c = \
  if (/%(?:2f|5c)/i.test(filePath)) {
    return `Encoded path separator detected (potential traversal): ${filePath}`;
  }

  // Decode repeatedly to catch double encoding
  let decoded = filePath;
  for (let i = 0; i < 5; i++) {
    let next: string;
    try {
      next = decodeURIComponent(decoded);
    } catch {
      break;
    }
    if (next === decoded) break;
    decoded = next;
  }
  const normalized = normalizePath(decoded);

  if (normalized.split('/').some((segment) => segment === '..')) {
    return `Path traversal detected: ${filePath}`;
  }

  if (normalized.startsWith('/')) {
    return `Absolute path not allowed: ${filePath}`;
  }

  if (/^[a-zA-Z]:/.test(normalized)) {
    return `Absolute Windows path not allowed: ${filePath}`;
  }

  return undefined;
}

export interface TargetCheckOptions {
  allowBinary?: boolean;
}

/**
 * Full target check used before any read or write: path security, containment
 * in the source root and the binary-file policy.
 */
export function checkTarget(
  root: string,
  targetFile: string,
  options: TargetCheckOptions = {},
): PatchApplyErrorDetail | undefined {
  const unsafe = validatePathSecurity(targetFile);
  if (unsafe) {
    return { kind: 'UNSAFE_PATH', message: unsafe };
  }
  if (!isWithin(root, targetFile)) {
    return { kind: 'UNSAFE_PATH', message: `Path escapes the source root: ${targetFile}` };
  }
  if (!options.allowBinary && isBinaryPath(targetFile)) {
    return {
      kind: 'BINARY_FILE',
      message: `Binary file patch refused: ${targetFile}`,
      suggestion: 'Set patch.allowBinary to patch binary files.',
    };
  }
  return undefined;
}

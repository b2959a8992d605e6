import * as fs from 'fs/promises';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { UsageError } from '@testmend/shared';

/**
 * Reads a YAML or JSON document (JSON is valid YAML) and validates it.
 * Every problem is a `UsageError` naming the file.
 */
export async function readDocument<Out, In>(
  file: string,
  schema: z.ZodType<Out, z.ZodTypeDef, In>,
  what: string,
): Promise<Out> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new UsageError(`Could not read ${what} file: ${file}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new UsageError(`Could not parse ${what} file ${file}: ${error.reason}`);
    }
    throw error;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
      .join('\n');
    throw new UsageError(`Invalid ${what} file ${file}:\n${issues}`);
  }
  return result.data;
}

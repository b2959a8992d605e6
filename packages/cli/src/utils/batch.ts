import { z } from 'zod';
import { UsageError, type CaseSeed } from '@testmend/shared';
import { readDocument } from './documents';

const CaseSeedSchema = z
  .object({
    id: z.string().min(1),
    /** Defaults to the id */
    selector: z.string().min(1).optional(),
    priority: z.number().optional(),
    dependsOn: z.array(z.string()).optional(),
    resources: z.array(z.string()).optional(),
    testFile: z.string().min(1).optional(),
    testCode: z.string().optional(),
    targetFile: z.string().min(1).optional(),
    intent: z.string().optional(),
  })
  .strict();

const BatchSchema = z.preprocess(
  (doc) => (Array.isArray(doc) ? { cases: doc } : doc),
  z.object({ cases: z.array(CaseSeedSchema) }).strict(),
);

/** Loads a batch of case seeds: a list, or a mapping with a `cases` list. */
export async function loadBatch(file: string): Promise<CaseSeed[]> {
  const { cases: entries } = await readDocument(file, BatchSchema, 'batch');

  const seen = new Set<string>();
  return entries.map(({ selector, ...rest }) => {
    if (seen.has(rest.id)) {
      throw new UsageError(`Duplicate case id "${rest.id}" in ${file}`);
    }
    seen.add(rest.id);
    return { ...rest, selector: selector ?? rest.id };
  });
}

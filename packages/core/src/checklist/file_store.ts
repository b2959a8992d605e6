import * as fs from 'fs/promises';
import {
  StoreError,
  StoreUnavailableError,
  atomicWrite,
  type CaseSeed,
  type ExecutionRecord,
  type TestCase,
} from '@testmend/shared';
import {
  appendRecord,
  emptyDocument,
  listCases,
  putCase,
  seedDocument,
  serializeDocument,
  toTestCase,
} from './document';
import { ChecklistDocumentSchema, type ChecklistDocument } from './schema';
import type { ChecklistStore } from './types';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Checklist kept as one pretty-printed JSON document per run.
 *
 * Mutations go through a single write queue. Each one builds the next
 * document from the last committed one, writes it to a temp file and renames
 * it into place; the in-memory copy only changes after the rename succeeds.
 */
export class FileChecklistStore implements ChecklistStore {
  private doc?: ChecklistDocument;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly runId: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async load(): Promise<TestCase[]> {
    return this.enqueue(async () => listCases(await this.current()));
  }

  async get(caseId: string): Promise<TestCase | undefined> {
    return this.enqueue(async () => {
      const entry = (await this.current()).cases[caseId];
      return entry ? toTestCase(entry) : undefined;
    });
  }

  async history(caseId: string): Promise<ExecutionRecord[]> {
    return this.enqueue(async () => structuredClone((await this.current()).cases[caseId]?.history ?? []));
  }

  async save(testCase: TestCase): Promise<void> {
    await this.mutate((doc, now) => putCase(doc, testCase, now));
  }

  async appendExecutionRecord(caseId: string, record: ExecutionRecord): Promise<void> {
    await this.mutate((doc, now) => appendRecord(doc, caseId, record, now));
  }

  async seed(seeds: readonly CaseSeed[]): Promise<string[]> {
    let inserted: string[] = [];
    await this.mutate((doc, now) => {
      const result = seedDocument(doc, seeds, now);
      inserted = result.inserted;
      return result.doc;
    });
    return inserted;
  }

  private mutate(change: (doc: ChecklistDocument, now: string) => ChecklistDocument): Promise<void> {
    return this.enqueue(async () => {
      const next = change(await this.current(), this.clock().toISOString());
      const body = serializeDocument(next);
      try {
        await atomicWrite(this.filePath, body);
      } catch (error) {
        throw new StoreUnavailableError(`Cannot write checklist ${this.filePath}`, { cause: error });
      }
      this.doc = next;
    });
  }

  private async current(): Promise<ChecklistDocument> {
    if (!this.doc) {
      this.doc = await this.read();
    }
    return this.doc;
  }

  private async read(): Promise<ChecklistDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        return emptyDocument(this.runId, this.clock().toISOString());
      }
      throw new StoreUnavailableError(`Cannot read checklist ${this.filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StoreError(`Checklist ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = ChecklistDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new StoreError(`Checklist ${this.filePath} is corrupt:\n${issues}`);
    }
    return parsed.data;
  }

  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const next = this.queue.then(op, op);
    this.queue = next.catch(() => undefined);
    return next;
  }
}

import type { CaseSeed, ExecutionRecord, TestCase } from '@testmend/shared';

/**
 * Durable record of every case in a run.
 *
 * Every mutation replaces one whole record and is safe to replay: `seed`
 * skips ids already present, `save` overwrites, and `appendExecutionRecord`
 * replaces a record with the same attempt number.
 * A medium that cannot be read or written raises `StoreUnavailableError`.
 */
export interface ChecklistStore {
  /** All cases, in insertion order */
  load(): Promise<TestCase[]>;
  get(caseId: string): Promise<TestCase | undefined>;
  save(testCase: TestCase): Promise<void>;
  appendExecutionRecord(caseId: string, record: ExecutionRecord): Promise<void>;
  history(caseId: string): Promise<ExecutionRecord[]>;
  /** Inserts cases whose id is new; returns the ids inserted */
  seed(seeds: readonly CaseSeed[]): Promise<string[]>;
}

import {
  StoreUnavailableError,
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
  toTestCase,
} from './document';
import type { ChecklistDocument } from './schema';
import type { ChecklistStore } from './types';

export type StoreOperation = 'load' | 'get' | 'save' | 'append' | 'history' | 'seed';

export interface StoreFault {
  op: StoreOperation;
  /** Only fail for this case */
  caseId?: string;
  /** How many calls fail before the fault clears; unlimited when absent */
  times?: number;
}

/**
 * In-memory checklist with the same contract as the file store, for tests
 * and dry runs. Faults make chosen operations raise `StoreUnavailableError`.
 */
export class MemoryChecklistStore implements ChecklistStore {
  private doc: ChecklistDocument;
  private faults: StoreFault[] = [];
  /** Number of successful mutations, for assertions on commit order */
  writes = 0;

  constructor(
    runId = 'memory',
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.doc = emptyDocument(runId, this.clock().toISOString());
  }

  injectFault(fault: StoreFault): void {
    this.faults.push({ ...fault });
  }

  clearFaults(): void {
    this.faults = [];
  }

  async load(): Promise<TestCase[]> {
    this.check('load');
    return listCases(this.doc);
  }

  async get(caseId: string): Promise<TestCase | undefined> {
    this.check('get', caseId);
    const entry = this.doc.cases[caseId];
    return entry ? toTestCase(entry) : undefined;
  }

  async history(caseId: string): Promise<ExecutionRecord[]> {
    this.check('history', caseId);
    return structuredClone(this.doc.cases[caseId]?.history ?? []);
  }

  async save(testCase: TestCase): Promise<void> {
    this.check('save', testCase.id);
    this.commit(putCase(this.doc, testCase, this.now()));
  }

  async appendExecutionRecord(caseId: string, record: ExecutionRecord): Promise<void> {
    this.check('append', caseId);
    this.commit(appendRecord(this.doc, caseId, record, this.now()));
  }

  async seed(seeds: readonly CaseSeed[]): Promise<string[]> {
    this.check('seed');
    const result = seedDocument(this.doc, seeds, this.now());
    this.commit(result.doc);
    return result.inserted;
  }

  private commit(next: ChecklistDocument): void {
    this.doc = next;
    this.writes++;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private check(op: StoreOperation, caseId?: string): void {
    const index = this.faults.findIndex(
      (f) => f.op === op && (f.caseId === undefined || f.caseId === caseId),
    );
    if (index === -1) return;
    const fault = this.faults[index];
    if (fault.times !== undefined) {
      fault.times -= 1;
      if (fault.times <= 0) this.faults.splice(index, 1);
    }
    throw new StoreUnavailableError(
      `Injected ${op} failure${caseId ? ` for ${caseId}` : ''}`,
    );
  }
}

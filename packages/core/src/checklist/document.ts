import { StoreError, type CaseSeed, type ExecutionRecord, type TestCase } from '@testmend/shared';
import {
  CHECKLIST_SCHEMA_VERSION,
  ChecklistDocumentSchema,
  type ChecklistDocument,
  type ChecklistEntry,
} from './schema';

export function emptyDocument(runId: string, now: string): ChecklistDocument {
  return {
    schemaVersion: CHECKLIST_SCHEMA_VERSION,
    runId,
    createdAt: now,
    updatedAt: now,
    cases: {},
  };
}

export function caseFromSeed(seed: CaseSeed, insertionIndex: number, now: string): TestCase {
  return {
    id: seed.id,
    status: 'Pending',
    priority: seed.priority ?? 0,
    insertionIndex,
    retryCount: 0,
    selector: seed.selector,
    testFile: seed.testFile,
    testCode: seed.testCode,
    targetFile: seed.targetFile,
    intent: seed.intent,
    dependsOn: seed.dependsOn ?? [],
    resources: seed.resources ?? [],
    patchesApplied: [],
    patches: [],
    updatedAt: now,
  };
}

export function toTestCase(entry: ChecklistEntry): TestCase {
  const { history: _history, ...testCase } = entry;
  return structuredClone(testCase);
}

/** Cases in insertion order. */
export function listCases(doc: ChecklistDocument): TestCase[] {
  return Object.values(doc.cases)
    .sort((a, b) => a.insertionIndex - b.insertionIndex)
    .map(toTestCase);
}

/**
 * Inserts cases whose id is not yet in the document. Returns the new
 * document and the ids that were inserted.
 */
export function seedDocument(
  doc: ChecklistDocument,
  seeds: readonly CaseSeed[],
  now: string,
): { doc: ChecklistDocument; inserted: string[] } {
  const cases = { ...doc.cases };
  const inserted: string[] = [];
  let next = Object.keys(cases).length;
  for (const seed of seeds) {
    if (cases[seed.id]) continue;
    cases[seed.id] = { ...caseFromSeed(seed, next++, now), history: [] };
    inserted.push(seed.id);
  }
  return { doc: { ...doc, cases, updatedAt: now }, inserted };
}

/** Replaces one whole record, keeping its execution history. */
export function putCase(doc: ChecklistDocument, testCase: TestCase, now: string): ChecklistDocument {
  const history = doc.cases[testCase.id]?.history ?? [];
  return {
    ...doc,
    updatedAt: now,
    cases: { ...doc.cases, [testCase.id]: { ...structuredClone(testCase), history } },
  };
}

/**
 * Appends an execution record. A record for an attempt already present
 * replaces it, so replaying an append after a crash does not duplicate it.
 */
export function appendRecord(
  doc: ChecklistDocument,
  caseId: string,
  record: ExecutionRecord,
  now: string,
): ChecklistDocument {
  const entry = doc.cases[caseId];
  if (!entry) {
    throw new StoreError(`Unknown test case: ${caseId}`);
  }
  const history = entry.history.filter((r) => r.attempt !== record.attempt);
  history.push({ ...record });
  history.sort((a, b) => a.attempt - b.attempt);
  return {
    ...doc,
    updatedAt: now,
    cases: { ...doc.cases, [caseId]: { ...entry, history } },
  };
}

/**
 * Pretty-printed JSON with cases in insertion order and fields in a fixed
 * order, so successive versions diff cleanly.
 */
export function serializeDocument(doc: ChecklistDocument): string {
  const ordered = ChecklistDocumentSchema.parse(doc);
  const cases: Record<string, ChecklistEntry> = {};
  for (const entry of Object.values(ordered.cases).sort(
    (a, b) => a.insertionIndex - b.insertionIndex,
  )) {
    cases[entry.id] = entry;
  }
  return JSON.stringify({ ...ordered, cases }, null, 2) + '\n';
}

import { ENGINE_TERMINAL_STATUSES, type TestCase } from '@testmend/shared';

export interface SchedulerState {
  /** Cases a worker is processing now */
  running: ReadonlySet<string>;
  /** Resources held by running cases */
  busyResources: ReadonlySet<string>;
  /** Cases abandoned for the rest of the run */
  excluded: ReadonlySet<string>;
}

/** Priority descending, then insertion order. */
export function compareCases(a: TestCase, b: TestCase): number {
  return b.priority - a.priority || a.insertionIndex - b.insertionIndex;
}

export function dependenciesPassed(testCase: TestCase, byId: ReadonlyMap<string, TestCase>): boolean {
  return testCase.dependsOn.every((dep) => byId.get(dep)?.status === 'Passed');
}

/**
 * Cases a worker may pick up now, in scheduling order: not terminal for the
 * engine, not running or excluded, every dependency Passed, and no declared
 * resource held by a running case.
 */
export function eligibleCases(cases: readonly TestCase[], state: SchedulerState): TestCase[] {
  const byId = new Map(cases.map((c) => [c.id, c]));
  return cases
    .filter(
      (c) =>
        !ENGINE_TERMINAL_STATUSES.has(c.status) &&
        !state.running.has(c.id) &&
        !state.excluded.has(c.id) &&
        dependenciesPassed(c, byId) &&
        !c.resources.some((r) => state.busyResources.has(r)),
    )
    .sort(compareCases);
}

/**
 * Picks up to `capacity` cases to start together. Two picks never share a
 * resource; a lower-ranked case waits when a higher-ranked one claims it.
 */
export function selectBatch(
  cases: readonly TestCase[],
  state: SchedulerState,
  capacity: number,
): TestCase[] {
  const claimed = new Set(state.busyResources);
  const picked: TestCase[] = [];
  for (const candidate of eligibleCases(cases, state)) {
    if (picked.length >= capacity) break;
    if (candidate.resources.some((r) => claimed.has(r))) continue;
    candidate.resources.forEach((r) => claimed.add(r));
    picked.push(candidate);
  }
  return picked;
}

/**
 * Ids of unfinished cases that can never become eligible: a dependency is
 * unknown, ended in a terminal status other than Passed, or is itself
 * blocked. Escalated counts as ended. Cycles are blocked as well.
 */
export function blockedCases(cases: readonly TestCase[]): string[] {
  const byId = new Map(cases.map((c) => [c.id, c]));
  const open = cases.filter((c) => !ENGINE_TERMINAL_STATUSES.has(c.status) && c.dependsOn.length > 0);
  const blocked = new Set<string>();

  let changed = true;
  while (changed) {
    changed = false;
    for (const c of open) {
      if (blocked.has(c.id)) continue;
      const stuck = c.dependsOn.some((dep) => {
        const d = byId.get(dep);
        if (!d) return true;
        if (d.status === 'Passed') return false;
        return ENGINE_TERMINAL_STATUSES.has(d.status) || blocked.has(dep);
      });
      if (stuck) {
        blocked.add(c.id);
        changed = true;
      }
    }
  }

  // Whatever is left waiting only on other open cases forms a cycle
  for (const c of open) {
    if (blocked.has(c.id) || c.status !== 'Pending') continue;
    if (dependsOnItself(c.id, byId)) blocked.add(c.id);
  }

  return cases.filter((c) => blocked.has(c.id)).map((c) => c.id);
}

function dependsOnItself(id: string, byId: ReadonlyMap<string, TestCase>): boolean {
  const seen = new Set<string>();
  const stack = [...(byId.get(id)?.dependsOn ?? [])];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    if (next === id) return true;
    seen.add(next);
    const dep = byId.get(next);
    if (dep && dep.status !== 'Passed') stack.push(...dep.dependsOn);
  }
  return false;
}

import * as fs from 'fs/promises';
import { z } from 'zod';
import {
  DIAGNOSIS_CATEGORIES,
  PATCH_KINDS,
  ensureDir,
  readFileIfExists,
  type DiagnosisCategory,
  type HealEvent,
  type Logger,
  type PatchKind,
} from '@testmend/shared';

const KnowledgeEntrySchema = z.object({
  signature: z.string(),
  category: z.string().refine((c): c is DiagnosisCategory => DIAGNOSIS_CATEGORIES.some((k) => k === c)),
  outcome: z.enum(['healed', 'escalated']),
  patchKind: z
    .string()
    .refine((k): k is PatchKind => PATCH_KINDS.some((p) => p === k))
    .optional(),
  at: z.string(),
});

export type KnowledgeEntry = z.infer<typeof KnowledgeEntrySchema>;

interface SignatureStats {
  healed: number;
  escalated: number;
  total: number;
}

/**
 * Append-only record of how past failures ended, keyed by failure
 * signature. The classifier reads it as a confidence prior; only
 * {@link KnowledgeRecorder} writes to it.
 *
 * The prior is fixed by {@link load}: entries appended during a run reach
 * the file but only count from the next load.
 */
export class KnowledgeBase {
  private readonly stats = new Map<string, SignatureStats>();

  constructor(
    private readonly filePath: string,
    private readonly logger?: Logger,
  ) {}

  async load(): Promise<void> {
    const raw = await readFileIfExists(this.filePath);
    if (raw === null) return;

    let skipped = 0;
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      const entry = parseLine(line);
      if (entry) {
        this.count(entry);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      await this.logger?.warn(`Skipped ${skipped} unreadable knowledge entries in ${this.filePath}`);
    }
  }

  /** Confidence nudge in [-0.1, 0.1] for a signature seen before. */
  prior(signature: string): number {
    const stats = this.stats.get(signature);
    if (!stats || stats.total === 0) return 0;
    return (0.1 * (stats.healed - stats.escalated)) / stats.total;
  }

  async append(entry: KnowledgeEntry): Promise<void> {
    await ensureDir(this.filePath);
    await fs.appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf8');
  }

  private count(entry: KnowledgeEntry): void {
    const stats = this.stats.get(entry.signature) ?? { healed: 0, escalated: 0, total: 0 };
    stats[entry.outcome] += 1;
    stats.total += 1;
    this.stats.set(entry.signature, stats);
  }
}

function parseLine(line: string): KnowledgeEntry | undefined {
  try {
    const parsed = KnowledgeEntrySchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

interface Tracked {
  signature: string;
  category: DiagnosisCategory;
  patchKind?: PatchKind;
}

/**
 * Event listener that turns a case's diagnosis and final outcome into a
 * knowledge entry: `healed` when a diagnosed case later passes, `escalated`
 * when it is handed to a human.
 */
export class KnowledgeRecorder {
  private readonly tracked = new Map<string, Tracked>();

  constructor(
    private readonly knowledge: KnowledgeBase,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  readonly handle = async (event: HealEvent): Promise<void> => {
    switch (event.type) {
      case 'DiagnosisCompleted': {
        const { caseId, signature, category } = event.payload;
        this.tracked.set(caseId, { signature, category });
        return;
      }
      case 'PatchApplied': {
        const tracked = this.tracked.get(event.payload.caseId);
        if (tracked) tracked.patchKind = event.payload.kind;
        return;
      }
      case 'CaseTransitioned':
        if (event.payload.to === 'Passed') {
          await this.record(event.payload.caseId, 'healed');
        }
        return;
      case 'CaseEscalated':
        await this.record(event.payload.caseId, 'escalated');
        return;
      default:
        return;
    }
  };

  private async record(caseId: string, outcome: KnowledgeEntry['outcome']): Promise<void> {
    const tracked = this.tracked.get(caseId);
    if (!tracked) return;
    this.tracked.delete(caseId);
    await this.knowledge.append({
      signature: tracked.signature,
      category: tracked.category,
      outcome,
      patchKind: tracked.patchKind,
      at: this.clock().toISOString(),
    });
  }
}

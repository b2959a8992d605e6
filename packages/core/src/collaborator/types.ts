import type { Diagnosis, PatchKind, PatchPayload, TestCase } from '@testmend/shared';
import type { SemanticAnalyzer } from '../diagnosis/classifier';

export interface ProposeTestInput {
  testCase: TestCase;
  /** Source under test, when the case names one */
  targetContent?: string | null;
}

export interface DraftPatchInput {
  testCase: TestCase;
  diagnosis: Diagnosis;
  failureText: string;
  /** File the patch must target, relative to the source root */
  targetFile: string;
  targetContent: string | null;
  testContent?: string | null;
  /** Why the previous draft was rejected, when re-drafting */
  rejection?: string;
}

export interface PatchDraft {
  payload: PatchPayload;
  confidence?: number;
  rationale?: string;
}

/**
 * Test generation, semantic diagnosis and patch drafting. Output is
 * untrusted: drafts go through patch validation like any other patch.
 */
export interface Collaborator extends SemanticAnalyzer {
  /** Test code for a case declared without any, or null when none can be proposed */
  proposeTest(input: ProposeTestInput, signal?: AbortSignal): Promise<string | null>;
  /** A patch of the requested kind, or null when the collaborator has none */
  draftPatch(input: DraftPatchInput, kind: PatchKind, signal?: AbortSignal): Promise<PatchDraft | null>;
}

import type { ArtifactBucket } from '../classify';

export const STAGER_STATES = [
  'INIT',
  'DIRECTORIES_PREPARED',
  'CLASSIFIED_AND_COPIED',
  'DOCS_GENERATED',
  'PLAN_FINALIZED',
] as const;

export type StagerState = (typeof STAGER_STATES)[number];

export type PlanEntryKind = 'artifact' | 'site' | 'document' | 'release-notes';

export interface PlanEntry {
  kind: PlanEntryKind;
  /** Absent for generated documents */
  source?: string;
  destination: string;
  bucket?: ArtifactBucket;
}

/**
 * What a staging run put into the checkout, in the order it will be committed.
 */
export class StagingPlan {
  private currentState: StagerState = 'INIT';
  private readonly planEntries: PlanEntry[] = [];
  private readonly commitSet = new Set<string>();

  get state(): StagerState {
    return this.currentState;
  }

  get entries(): readonly PlanEntry[] {
    return this.planEntries;
  }

  /** Absolute destination paths, insertion-ordered, without duplicates */
  get filesToCommit(): string[] {
    return [...this.commitSet];
  }

  add(entry: PlanEntry): void {
    if (this.currentState === 'PLAN_FINALIZED') {
      throw new Error('Cannot add to a finalized staging plan');
    }
    this.planEntries.push(entry);
    this.commitSet.add(entry.destination);
  }

  /** Moves to the next state. States only advance one step at a time. */
  advance(to: StagerState): StagerState {
    const from = this.currentState;
    if (STAGER_STATES.indexOf(to) !== STAGER_STATES.indexOf(from) + 1) {
      throw new Error(`Invalid stager transition ${from} -> ${to}`);
    }
    this.currentState = to;
    return from;
  }
}

import type { Logger } from '@release-stager/shared';
import type { WorkingCopy } from '@release-stager/vcs';

export interface WorkflowContext {
  logger: Logger;
  /** Stamped on every event of the run */
  runId: string;
}

/** Returned when a business-rule gate is not met. Never thrown. */
export interface SkippedOutcome {
  status: 'skipped';
  reason: string;
}

export interface StagedOutcome {
  status: 'staged';
  dryRun: boolean;
  checkoutDirectory: string;
  /** Absolute paths in commit order */
  filesToCommit: string[];
  message: string;
  /** Set once the commit went through */
  revision?: string;
}

export interface PromotionOutcome {
  status: 'prepared';
  staging: WorkingCopy;
  release: WorkingCopy;
}

export type StageResult = SkippedOutcome | StagedOutcome;
export type PromotionResult = SkippedOutcome | PromotionOutcome;

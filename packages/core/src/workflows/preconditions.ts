import { eventBase, isDirectory } from '@release-stager/shared';
import type { ReleaseConfig } from '../config/resolve';
import type { SkippedOutcome, WorkflowContext } from './types';

export const NOT_DIST_MODULE =
  'This module is marked as a non distribution or assembly module, and release-stager will not run.';
export const STAGING_URL_UNSET = 'scm.stagingUrl is not set, release-stager will not run.';
export const NO_DISTRIBUTIONS = 'Current project contains no distributions. Not executing.';

export type PreconditionResult = { status: 'ready'; stagingUrl: string } | SkippedOutcome;

/**
 * Gates shared by the staging and promotion workflows. A failed gate is logged and
 * returned; nothing on disk or in the repository has been touched at that point.
 */
export async function checkPreconditions(
  config: ReleaseConfig,
  context: WorkflowContext,
): Promise<PreconditionResult> {
  const { logger } = context;

  const skip = async (reason: string): Promise<SkippedOutcome> => {
    await logger.log({ ...eventBase(context.runId), type: 'PreconditionSkipped', payload: { reason } });
    return { status: 'skipped', reason };
  };

  if (!config.distModule) {
    await logger.info(NOT_DIST_MODULE);
    return skip(NOT_DIST_MODULE);
  }
  if (!config.scm.stagingUrl) {
    await logger.warn(STAGING_URL_UNSET);
    return skip(STAGING_URL_UNSET);
  }
  if (!(await isDirectory(config.paths.workingDirectory))) {
    await logger.info(NO_DISTRIBUTIONS);
    return skip(NO_DISTRIBUTIONS);
  }
  return { status: 'ready', stagingUrl: config.scm.stagingUrl };
}

import { ArchiveError, eventBase, isDirectory, resetDirectory } from '@release-stager/shared';
import type { ReleaseConfig } from '../config/resolve';
import type { WorkflowContext } from '../workflows/types';
import { archiveSite, walkSite } from './archiver';

export interface SiteCompressionResult {
  outputFile: string;
  fileCount: number;
}

export const SITE_NOT_BUILT_MESSAGE =
  'The site build step was not run before this goal, or the site directory does not exist.';

/**
 * Compresses the generated site into `<workingDirectory>/site.zip` so the stager can commit it.
 */
export class SiteCompressionWorkflow {
  constructor(private readonly context: WorkflowContext) {}

  async run(config: ReleaseConfig): Promise<SiteCompressionResult> {
    const { logger, runId } = this.context;
    const { siteDirectory, workingDirectory, siteArchive } = config.paths;

    if (!(await isDirectory(siteDirectory))) {
      await logger.warn(`${SITE_NOT_BUILT_MESSAGE} (${siteDirectory})`);
      throw new ArchiveError(SITE_NOT_BUILT_MESSAGE, { details: { siteDirectory } });
    }
    if (!(await isDirectory(workingDirectory))) {
      await resetDirectory(workingDirectory);
    }

    const fileCount = await archiveSite(siteDirectory, siteArchive, walkSite(siteDirectory));
    await logger.trace(
      { ...eventBase(runId), type: 'SiteArchived', payload: { outputFile: siteArchive, fileCount } },
      `Compressed ${fileCount} site files into ${siteArchive}`,
    );
    return { outputFile: siteArchive, fileCount };
  }
}

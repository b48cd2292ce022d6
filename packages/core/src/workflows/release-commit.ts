import {
  ConfigError,
  VcsError,
  eventBase,
  isDirectory,
  resetDirectory,
} from '@release-stager/shared';
import type { ScmManager } from '@release-stager/vcs';
import type { ReleaseConfig } from '../config/resolve';
import { DistributionStager } from '../staging';
import { TemplateRenderer } from '../templates';
import { checkPreconditions } from './preconditions';
import type { StageResult, WorkflowContext } from './types';

export function stagingCommitMessage(artifactId: string, version: string): string {
  return `Staging release: ${artifactId}, version: ${version}`;
}

/**
 * Checks out the staging area, stages the distributions into it and commits them.
 * In dry-run mode the checkout and staging still happen; add and commit do not.
 */
export class ReleaseCommitWorkflow {
  constructor(
    private readonly context: WorkflowContext,
    private readonly scmManager: ScmManager,
  ) {}

  async run(config: ReleaseConfig): Promise<StageResult> {
    const { logger, runId } = this.context;
    const gate = await checkPreconditions(config, this.context);
    if (gate.status === 'skipped') {
      return gate;
    }
    const { stagingUrl } = gate;
    const { artifactId, version, url: siteUrl } = config.project;
    if (!artifactId || !version) {
      throw new ConfigError('project.artifactId and project.version are required to stage a release');
    }

    await logger.trace(
      {
        ...eventBase(runId),
        type: 'StagingStarted',
        payload: { artifactId, version, stagingUrl, dryRun: config.dryRun },
      },
      'Preparing to stage distributions',
    );

    const repository = this.scmManager.makeRepository(stagingUrl);
    const provider = this.scmManager.getProvider(repository, config.scm.credentials);
    const backend = async <T>(operation: () => Promise<T>): Promise<T> => {
      try {
        return await operation();
      } catch (error: unknown) {
        throw new VcsError(`Could not commit files to dist: ${stagingUrl}`, {
          cause: error,
          commandOutput: error instanceof VcsError ? error.commandOutput : undefined,
        });
      }
    };

    const checkoutDirectory = config.paths.checkoutDirectory;
    if (!(await isDirectory(checkoutDirectory))) {
      await resetDirectory(checkoutDirectory);
    }
    await logger.info(`Checking out dist from: ${stagingUrl}`);
    const workingCopy = await backend(() => provider.checkout(repository, checkoutDirectory));
    await logger.log({
      ...eventBase(runId),
      type: 'CheckoutCompleted',
      payload: { url: repository.url, directory: checkoutDirectory, revision: workingCopy.revision },
    });

    const stager = new DistributionStager(
      this.context,
      new TemplateRenderer({ directory: config.templatesDirectory }),
    );
    const plan = await stager.stage({
      workingDirectory: config.paths.workingDirectory,
      checkoutDirectory,
      siteArchive: config.paths.siteArchive,
      releaseNotes: config.paths.releaseNotes,
      artifactId,
      version,
      siteUrl,
    });
    const filesToCommit = plan.filesToCommit;
    const message = stagingCommitMessage(artifactId, version);
    const outcome = {
      status: 'staged' as const,
      dryRun: config.dryRun,
      checkoutDirectory,
      filesToCommit,
      message,
    };

    if (config.dryRun) {
      await logger.info(`Would have committed to: ${stagingUrl}`);
      await logger.info(message);
      await logger.log({
        ...eventBase(runId),
        type: 'CommitSkipped',
        payload: { url: stagingUrl, message, fileCount: filesToCommit.length },
      });
      return outcome;
    }

    const addResult = await backend(() => provider.add(workingCopy, filesToCommit, message));
    if (!addResult.success) {
      throw new VcsError(`Adding dist files failed: ${addResult.commandOutput}`, {
        commandOutput: addResult.commandOutput,
      });
    }
    await logger.log({
      ...eventBase(runId),
      type: 'FilesAdded',
      payload: { fileCount: filesToCommit.length },
    });
    await logger.info(message);

    const commitResult = await backend(() => provider.commit(workingCopy, filesToCommit, message));
    if (!commitResult.success) {
      // The added files stay scheduled in the working copy.
      throw new VcsError(`Committing dist files failed: ${commitResult.commandOutput}`, {
        commandOutput: commitResult.commandOutput,
      });
    }
    await logger.trace(
      {
        ...eventBase(runId),
        type: 'CommitCompleted',
        payload: { message, revision: commitResult.revision },
      },
      `Committed revision ${commitResult.revision ?? 'unknown'}`,
    );
    return { ...outcome, revision: commitResult.revision };
  }
}

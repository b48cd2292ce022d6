import {
  ConfigError,
  VcsError,
  eventBase,
  isDirectory,
  resetDirectory,
} from '@release-stager/shared';
import type { ScmManager, ScmProvider, ScmRepository, WorkingCopy } from '@release-stager/vcs';
import type { ReleaseConfig } from '../config/resolve';
import { checkPreconditions } from './preconditions';
import type { PromotionResult, WorkflowContext } from './types';

interface CheckoutTarget {
  repository: ScmRepository;
  provider: ScmProvider;
  directory: string;
}

/**
 * Checks out the staging and the release areas side by side, ready for artifacts
 * to be moved from one to the other. The move itself is left to the caller.
 */
export class PromotionWorkflow {
  constructor(
    private readonly context: WorkflowContext,
    private readonly scmManager: ScmManager,
  ) {}

  private target(url: string, directory: string, config: ReleaseConfig): CheckoutTarget {
    const repository = this.scmManager.makeRepository(url);
    const provider = this.scmManager.getProvider(repository, config.scm.credentials);
    return { repository, provider, directory };
  }

  async run(config: ReleaseConfig): Promise<PromotionResult> {
    const { logger, runId } = this.context;
    const gate = await checkPreconditions(config, this.context);
    if (gate.status === 'skipped') {
      return gate;
    }
    const { stagingUrl } = gate;
    const releaseUrl = config.scm.releaseUrl;
    if (!releaseUrl) {
      throw new ConfigError('scm.releaseUrl is required to promote a release');
    }

    await logger.info('Preparing to promote distributions from staging to release.');
    const staging = this.target(stagingUrl, config.paths.stagingCheckoutDirectory, config);
    const release = this.target(releaseUrl, config.paths.releaseCheckoutDirectory, config);

    for (const { directory } of [staging, release]) {
      if (!(await isDirectory(directory))) {
        await resetDirectory(directory);
      }
    }

    const checkout = async ({ repository, provider, directory }: CheckoutTarget): Promise<WorkingCopy> => {
      await logger.info(`Checking out dist from: ${repository.scmUrl}`);
      try {
        const workingCopy = await provider.checkout(repository, directory);
        await logger.log({
          ...eventBase(runId),
          type: 'CheckoutCompleted',
          payload: { url: repository.url, directory, revision: workingCopy.revision },
        });
        return workingCopy;
      } catch (error: unknown) {
        throw new VcsError(`Could not promote files from: ${stagingUrl}`, {
          cause: error,
          commandOutput: error instanceof VcsError ? error.commandOutput : undefined,
        });
      }
    };

    const stagingCopy = await checkout(staging);
    const releaseCopy = await checkout(release);
    await logger.trace(
      {
        ...eventBase(runId),
        type: 'PromotionPrepared',
        payload: { stagingDirectory: stagingCopy.directory, releaseDirectory: releaseCopy.directory },
      },
      `Checked out staging into ${stagingCopy.directory} and release into ${releaseCopy.directory}`,
    );
    return { status: 'prepared', staging: stagingCopy, release: releaseCopy };
  }
}

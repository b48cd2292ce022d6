import { Command } from 'commander';
import { PromotionWorkflow } from '@release-stager/core';
import { CliDependencies, createCommandContext } from '../context';

export interface PromoteOptions {
  distModule?: boolean;
  stagingUrl?: string;
  releaseUrl?: string;
  username?: string;
  passwordEnv?: string;
}

export function registerPromoteCommand(program: Command, deps: CliDependencies = {}) {
  program
    .command('promote')
    .description('Check out the staging and release areas side by side')
    .option('--dist-module', 'Mark this module as a distribution module')
    .option('--staging-url <scmUrl>', 'Staging location')
    .option('--release-url <scmUrl>', 'Release location')
    .option('--username <name>', 'SCM user name')
    .option('--password-env <name>', 'Environment variable holding the SCM password')
    .action(async (options: PromoteOptions) => {
      const context = createCommandContext(program, deps);
      const config = context.loadConfig({
        distModule: options.distModule,
        scm: {
          stagingUrl: options.stagingUrl,
          releaseUrl: options.releaseUrl,
          username: options.username,
          password_env: options.passwordEnv,
        },
      });
      const workflow = new PromotionWorkflow(
        { logger: context.logger, runId: context.runId },
        context.createScmManager(config),
      );

      const result = await workflow.run(config);
      if (result.status === 'skipped') {
        context.renderer.render({ command: 'promote', ...result });
        return;
      }
      context.renderer.render({
        command: 'promote',
        status: result.status,
        stagingDirectory: result.staging.directory,
        releaseDirectory: result.release.directory,
      });
    });
}

import { Command } from 'commander';
import { ReleaseCommitWorkflow } from '@release-stager/core';
import type { ConfigInput } from '@release-stager/shared';
import { CliDependencies, createCommandContext } from '../context';

export interface StageOptions {
  distModule?: boolean;
  dryRun?: boolean;
  stagingUrl?: string;
  artifactId?: string;
  projectVersion?: string;
  siteUrl?: string;
  username?: string;
  passwordEnv?: string;
  workingDirectory?: string;
  checkoutDirectory?: string;
  releaseNotes?: string;
  templates?: string;
}

export function stageFlags(options: StageOptions): ConfigInput {
  return {
    distModule: options.distModule,
    dryRun: options.dryRun,
    project: {
      artifactId: options.artifactId,
      version: options.projectVersion,
      url: options.siteUrl,
    },
    scm: {
      stagingUrl: options.stagingUrl,
      username: options.username,
      password_env: options.passwordEnv,
    },
    paths: {
      workingDirectory: options.workingDirectory,
      checkoutDirectory: options.checkoutDirectory,
      releaseNotes: options.releaseNotes,
    },
    templates: { directory: options.templates },
  };
}

export function registerStageCommand(program: Command, deps: CliDependencies = {}) {
  program
    .command('stage')
    .description('Stage release distributions into the SCM dist area and commit them')
    .option('--dist-module', 'Mark this module as a distribution module')
    .option('--dry-run', 'Check out and stage, but do not add or commit')
    .option('--staging-url <scmUrl>', 'Staging location, e.g. scm:svn:https://host/dist/dev/foo')
    .option('--artifact-id <id>', 'Artifact id used in the commit message and README')
    .option('--project-version <version>', 'Version used in the commit message and README')
    .option('--site-url <url>', 'Project site linked from README.html')
    .option('--username <name>', 'SCM user name')
    .option('--password-env <name>', 'Environment variable holding the SCM password')
    .option('--working-directory <dir>', 'Directory holding the built distributions')
    .option('--checkout-directory <dir>', 'Where the staging area is checked out')
    .option('--release-notes <file>', 'Release notes file copied to the checkout root')
    .option('--templates <dir>', 'Directory with HEADER.html/README.html overrides')
    .action(async (options: StageOptions) => {
      const context = createCommandContext(program, deps);
      const config = context.loadConfig(stageFlags(options));
      const workflow = new ReleaseCommitWorkflow(
        { logger: context.logger, runId: context.runId },
        context.createScmManager(config),
      );

      const result = await workflow.run(config);
      context.renderer.render({ command: 'stage', ...result });
    });
}

import { Command } from 'commander';
import chalk from 'chalk';
import { SiteCompressionWorkflow } from '@release-stager/core';
import { CliDependencies, createCommandContext } from '../context';

export interface CompressSiteOptions {
  siteDirectory?: string;
  workingDirectory?: string;
}

export function registerCompressSiteCommand(program: Command, deps: CliDependencies = {}) {
  program
    .command('compress-site')
    .description('Compress the generated site into site.zip in the working directory')
    .option('--site-directory <dir>', 'Directory holding the generated site')
    .option('--working-directory <dir>', 'Directory the archive is written to')
    .action(async (options: CompressSiteOptions) => {
      const context = createCommandContext(program, deps);
      const config = context.loadConfig({
        paths: {
          siteDirectory: options.siteDirectory,
          workingDirectory: options.workingDirectory,
        },
      });

      context.renderer.log(chalk.dim(`Compressing ${config.paths.siteDirectory}`));
      const result = await new SiteCompressionWorkflow({
        logger: context.logger,
        runId: context.runId,
      }).run(config);
      context.renderer.render({ command: 'compress-site', status: 'archived', ...result });
    });
}

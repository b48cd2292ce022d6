import { Command } from 'commander';
import path from 'path';
import fs from 'fs-extra';
import { atomicWrite } from '@release-stager/shared';
import { PROJECT_CONFIG_FILE } from '@release-stager/core';
import { CliDependencies, createCommandContext } from '../context';
import { ConsoleUI, UserInterface } from '../ui/console';

export const DEFAULT_CONFIG = `
# release-stager configuration

configVersion: 1

project:
  artifactId: my-project
  # Quote the version: an unquoted 1.0 is read as a number.
  version: "1.0"
  url: https://my-project.example.org

# Nothing is staged unless this is set.
distModule: false

# Check out and stage, but never add or commit.
dryRun: false

scm:
  stagingUrl: scm:svn:https://svn.example.org/repos/dist/dev/my-project
  releaseUrl: scm:svn:https://svn.example.org/repos/dist/release/my-project
  # username: jdoe
  # Read the password from the environment rather than storing it here.
  password_env: DIST_SVN_PASSWORD

paths:
  buildDirectory: target
  # workingDirectory defaults to <buildDirectory>/release-stager
  # siteDirectory defaults to <buildDirectory>/site
  releaseNotes: RELEASE-NOTES.txt

# templates:
#   directory: src/dist-templates
`;

export async function writeDefaultConfig(cwd: string, ui: UserInterface): Promise<string | undefined> {
  const configPath = path.join(cwd, PROJECT_CONFIG_FILE);
  if (await fs.pathExists(configPath)) {
    const overwrite = await ui.confirm(`${PROJECT_CONFIG_FILE} already exists. Overwrite it?`);
    if (!overwrite) {
      return undefined;
    }
  }
  await atomicWrite(configPath, DEFAULT_CONFIG.trimStart());
  return configPath;
}

export function registerInitCommand(program: Command, deps: CliDependencies = {}) {
  program
    .command('init')
    .description(`Create a default ${PROJECT_CONFIG_FILE} configuration file`)
    .action(async () => {
      const context = createCommandContext(program, deps);
      const ui = new ConsoleUI({
        yes: context.options.yes,
        nonInteractive: context.options.nonInteractive,
      });

      const configPath = await writeDefaultConfig(context.cwd, ui);
      if (!configPath) {
        context.renderer.render({ command: 'init', status: 'aborted' });
        return;
      }
      context.renderer.render({ command: 'init', status: 'created', configPath });
      context.renderer.log('\nNext steps:');
      context.renderer.log(`  1. Set project.artifactId, project.version and scm.stagingUrl.`);
      context.renderer.log(`  2. Export the variable named by scm.password_env.`);
      context.renderer.log(`  3. Run 'release-stager stage --dry-run --dist-module' to check the layout.`);
    });
}

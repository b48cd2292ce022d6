import path from 'path';
import { Command } from 'commander';
import { ConsoleLogger, JsonlLogger, Logger } from '@release-stager/shared';
import { ConfigLoader, ReleaseConfig, resolveReleaseConfig } from '@release-stager/core';
import type { ConfigInput } from '@release-stager/shared';
import {
  DefaultScmManagerOptions,
  ScmManager,
  createDefaultScmManager,
} from '@release-stager/vcs';
import { OutputRenderer } from './output/renderer';
import type { GlobalOptions } from './types';

export interface CliDependencies {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  createScmManager?: (options: DefaultScmManagerOptions) => ScmManager;
}

export interface CommandContext {
  options: GlobalOptions;
  logger: Logger;
  runId: string;
  renderer: OutputRenderer;
  cwd: string;
  loadConfig(flags: ConfigInput): ReleaseConfig;
  createScmManager(config: ReleaseConfig): ScmManager;
}

export function createCommandContext(program: Command, deps: CliDependencies = {}): CommandContext {
  const options = program.opts<GlobalOptions>();
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const runId = Date.now().toString();

  const consoleLogger = new ConsoleLogger({ verbose: options.verbose, quiet: options.json });
  const logger = options.logFile
    ? new JsonlLogger(path.resolve(cwd, options.logFile), consoleLogger)
    : consoleLogger;

  return {
    options,
    logger,
    runId,
    renderer: new OutputRenderer(!!options.json),
    cwd,
    loadConfig(flags: ConfigInput): ReleaseConfig {
      const config = ConfigLoader.load({ configPath: options.config, flags, cwd });
      return resolveReleaseConfig(config, { cwd, env });
    },
    createScmManager(config: ReleaseConfig): ScmManager {
      const factory = deps.createScmManager ?? createDefaultScmManager;
      return factory({ svnExecutable: config.scm.svnExecutable });
    },
  };
}

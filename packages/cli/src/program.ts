import { Command, CommanderError } from 'commander';
import { AppError, isUserError } from '@release-stager/shared';
import { version } from '../package.json';
import type { CliDependencies } from './context';
import { registerStageCommand } from './commands/stage';
import { registerCompressSiteCommand } from './commands/compress-site';
import { registerPromoteCommand } from './commands/promote';
import { registerInitCommand } from './commands/init';
import type { GlobalOptions } from './types';

export const name = '@release-stager/cli';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('release-stager')
    .description('Stage release distributions into a Subversion dist area')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured events to a JSONL file')
    .option('--yes', 'Automatically answer "yes" to all prompts')
    .option('--non-interactive', 'Disable interactive prompts (fail if prompt needed)')
    .exitOverride();

  registerStageCommand(program, deps);
  registerCompressSiteCommand(program, deps);
  registerPromoteCommand(program, deps);
  registerInitCommand(program, deps);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Runs the CLI and resolves to the process exit code:
 * 0 on success or skip, 2 for configuration and usage errors, 1 otherwise.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed help, the version or the usage problem
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts<GlobalOptions>());
    return isUserError(e) ? 2 : 1;
  }
}

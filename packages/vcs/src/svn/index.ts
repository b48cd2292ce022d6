import { spawn } from 'node:child_process';
import path from 'node:path';
import { VcsError, isWithin, redactSecrets, relative } from '@release-stager/shared';
import type {
  CommitResult,
  ScmCredentials,
  ScmProvider,
  ScmRepository,
  ScmResult,
  WorkingCopy,
} from '../types';

export interface SvnScmProviderOptions {
  /** Path or name of the svn client, defaults to `svn` */
  executable?: string;
  credentials?: ScmCredentials;
}

interface SvnCommandResult {
  exitCode: number | null;
  output: string;
}

const CHECKED_OUT_REVISION = /Checked out revision (\d+)\./;
const AT_REVISION = /At revision (\d+)\./;
const COMMITTED_REVISION = /Committed revision (\d+)\./;

/** Sorted, unique ancestor directories of working-copy relative paths, the root excluded. */
function parentDirectories(paths: readonly string[]): string[] {
  const directories = new Set<string>();
  for (const file of paths) {
    let parent = path.posix.dirname(file);
    while (parent !== '.' && parent !== '/' && !directories.has(parent)) {
      directories.add(parent);
      parent = path.posix.dirname(parent);
    }
  }
  return [...directories].sort();
}

/**
 * Subversion backend driving the `svn` command line client.
 */
export class SvnScmProvider implements ScmProvider {
  readonly type = 'svn';
  private readonly executable: string;
  private readonly credentials: ScmCredentials;

  constructor(options: SvnScmProviderOptions = {}) {
    this.executable = options.executable ?? 'svn';
    this.credentials = options.credentials ?? {};
  }

  private globalOptions(): string[] {
    const args = ['--non-interactive'];
    if (this.credentials.username) {
      args.push('--username', this.credentials.username);
    }
    if (this.credentials.password) {
      args.push('--password', this.credentials.password, '--no-auth-cache');
    }
    return args;
  }

  private async exec(args: string[], cwd?: string): Promise<SvnCommandResult> {
    const fullArgs = [...args, ...this.globalOptions()];
    return new Promise((resolve, reject) => {
      const child = spawn(this.executable, fullArgs, { cwd });
      let output = '';

      child.stdout?.on('data', (data) => {
        output += data.toString();
      });

      child.stderr?.on('data', (data) => {
        output += data.toString();
      });

      child.on('close', (code) => {
        resolve({ exitCode: code, output: this.redact(output.trim()) });
      });

      child.on('error', (err) => {
        reject(
          new VcsError(`Failed to start ${this.executable}: ${this.redact(err.message)}`, {
            cause: err,
          }),
        );
      });
    });
  }

  private redact(text: string): string {
    return redactSecrets(text, [this.credentials.password]);
  }

  private toWorkingCopyPaths(workingCopy: WorkingCopy, files: readonly string[]): string[] {
    return files.map((file) => {
      const absolute = path.resolve(workingCopy.directory, file);
      if (!isWithin(workingCopy.directory, absolute)) {
        throw new VcsError(`${file} is outside the working copy ${workingCopy.directory}`);
      }
      return relative(workingCopy.directory, absolute);
    });
  }

  async checkout(repository: ScmRepository, directory: string): Promise<WorkingCopy> {
    const result = await this.exec(['checkout', repository.url, directory]);
    if (result.exitCode !== 0) {
      throw new VcsError(`Checkout of ${repository.url} failed: ${result.output}`, {
        commandOutput: result.output,
        details: { url: repository.url, directory },
      });
    }
    const revision =
      CHECKED_OUT_REVISION.exec(result.output)?.[1] ?? AT_REVISION.exec(result.output)?.[1];
    return { directory, repository, revision };
  }

  /**
   * Schedules files for addition. Subversion records no message for `add`;
   * the message is only used by `commit`.
   */
  async add(workingCopy: WorkingCopy, files: readonly string[], _message: string): Promise<ScmResult> {
    const paths = this.toWorkingCopyPaths(workingCopy, files);
    const result = await this.exec(['add', '--parents', '--force', ...paths], workingCopy.directory);
    return { success: result.exitCode === 0, commandOutput: result.output };
  }

  /**
   * Commits the files together with every directory above them inside the working copy.
   * `add --parents` may have scheduled those directories, and Subversion rejects a commit that
   * names a child of an added directory without the directory itself. `--depth empty` keeps the
   * directories from pulling in unrelated children.
   */
  async commit(
    workingCopy: WorkingCopy,
    files: readonly string[],
    message: string,
  ): Promise<CommitResult> {
    const paths = this.toWorkingCopyPaths(workingCopy, files);
    const targets = [...parentDirectories(paths), ...paths];
    const result = await this.exec(
      ['commit', '-m', message, '--depth', 'empty', ...targets],
      workingCopy.directory,
    );
    return {
      success: result.exitCode === 0,
      commandOutput: result.output,
      revision: COMMITTED_REVISION.exec(result.output)?.[1],
    };
  }
}

import { VcsError } from '@release-stager/shared';
import type {
  CommitResult,
  ScmCredentials,
  ScmProvider,
  ScmRepository,
  ScmResult,
  WorkingCopy,
} from '../types';

export type FakeScmCall =
  | { operation: 'checkout'; url: string; directory: string }
  | { operation: 'add'; directory: string; files: string[]; message: string }
  | { operation: 'commit'; directory: string; files: string[]; message: string };

export interface FakeScmProviderOptions {
  type?: string;
  credentials?: ScmCredentials;
  checkoutRevision?: string;
  /** When set, `checkout` rejects with a VcsError carrying this message */
  checkoutError?: string;
  addResult?: ScmResult;
  commitResult?: CommitResult;
}

/**
 * In-process provider that records every call instead of touching a repository.
 */
export class FakeScmProvider implements ScmProvider {
  readonly type: string;
  readonly calls: FakeScmCall[] = [];
  readonly credentials: ScmCredentials;

  constructor(private readonly options: FakeScmProviderOptions = {}) {
    this.type = options.type ?? 'svn';
    this.credentials = options.credentials ?? {};
  }

  async checkout(repository: ScmRepository, directory: string): Promise<WorkingCopy> {
    this.calls.push({ operation: 'checkout', url: repository.url, directory });
    if (this.options.checkoutError) {
      throw new VcsError(this.options.checkoutError);
    }
    return { directory, repository, revision: this.options.checkoutRevision };
  }

  async add(workingCopy: WorkingCopy, files: readonly string[], message: string): Promise<ScmResult> {
    this.calls.push({ operation: 'add', directory: workingCopy.directory, files: [...files], message });
    return this.options.addResult ?? { success: true, commandOutput: '' };
  }

  async commit(
    workingCopy: WorkingCopy,
    files: readonly string[],
    message: string,
  ): Promise<CommitResult> {
    this.calls.push({
      operation: 'commit',
      directory: workingCopy.directory,
      files: [...files],
      message,
    });
    return this.options.commitResult ?? { success: true, commandOutput: '', revision: '1' };
  }

  operations(): Array<FakeScmCall['operation']> {
    return this.calls.map((call) => call.operation);
  }
}

/**
 * Credentials injected into a provider. Never stored on the repository handle.
 */
export interface ScmCredentials {
  username?: string;
  password?: string;
}

/**
 * A remote version-controlled location parsed from an SCM URL such as
 * `scm:svn:https://svn.example.org/repos/dist/dev/foo`.
 */
export interface ScmRepository {
  /** Provider type, e.g. `svn` */
  type: string;
  /** Provider-specific URL, e.g. `https://svn.example.org/repos/dist/dev/foo` */
  url: string;
  /** The SCM URL as configured */
  scmUrl: string;
}

/**
 * A checked-out local directory bound to the repository it came from.
 * Owned by the workflow that checked it out.
 */
export interface WorkingCopy {
  directory: string;
  repository: ScmRepository;
  /** Revision reported by the checkout, when the provider exposes one */
  revision?: string;
}

export interface ScmResult {
  success: boolean;
  /** Raw output of the underlying command, credentials redacted */
  commandOutput: string;
}

export interface CommitResult extends ScmResult {
  revision?: string;
}

/**
 * Capability-shaped contract of a version-control backend.
 *
 * `checkout` throws `VcsError` when it fails; `add` and `commit` report failure
 * through their result so callers can surface the backend's output verbatim.
 */
export interface ScmProvider {
  readonly type: string;
  checkout(repository: ScmRepository, directory: string): Promise<WorkingCopy>;
  add(workingCopy: WorkingCopy, files: readonly string[], message: string): Promise<ScmResult>;
  commit(workingCopy: WorkingCopy, files: readonly string[], message: string): Promise<CommitResult>;
}

export interface ScmProviderOptions {
  credentials?: ScmCredentials;
}

export type ScmProviderFactory = (options: ScmProviderOptions) => ScmProvider;

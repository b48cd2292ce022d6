import path from 'path';
import type { Config, ProjectConfig } from '@release-stager/shared';
import type { ScmCredentials } from '@release-stager/vcs';

export const SITE_ARCHIVE_NAME = 'site.zip';

export interface ResolvedPaths {
  buildDirectory: string;
  /** Build-output directory holding the candidate artifacts */
  workingDirectory: string;
  checkoutDirectory: string;
  stagingCheckoutDirectory: string;
  releaseCheckoutDirectory: string;
  siteDirectory: string;
  /** `<workingDirectory>/site.zip` */
  siteArchive: string;
  releaseNotes: string;
}

/**
 * Configuration with every path absolute and credentials looked up.
 * This is what the workflows consume.
 */
export interface ReleaseConfig {
  project: ProjectConfig;
  distModule: boolean;
  dryRun: boolean;
  scm: {
    stagingUrl?: string;
    releaseUrl?: string;
    svnExecutable: string;
    credentials: ScmCredentials;
  };
  paths: ResolvedPaths;
  templatesDirectory?: string;
}

export interface ResolveOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveReleaseConfig(config: Config, options: ResolveOptions = {}): ReleaseConfig {
  const cwd = options.cwd || process.cwd();
  const env = options.env || process.env;
  const resolve = (p: string, base = cwd) => path.resolve(base, p);

  const buildDirectory = resolve(config.paths.buildDirectory);
  const workingDirectory = config.paths.workingDirectory
    ? resolve(config.paths.workingDirectory)
    : path.join(buildDirectory, 'release-stager');

  const credentials: ScmCredentials = {};
  if (config.scm.username) {
    credentials.username = config.scm.username;
  }
  // Handle `password_env` resolution
  const password =
    config.scm.password ?? (config.scm.password_env ? env[config.scm.password_env] : undefined);
  if (password) {
    credentials.password = password;
  }

  return {
    project: config.project,
    distModule: config.distModule,
    dryRun: config.dryRun,
    scm: {
      stagingUrl: config.scm.stagingUrl,
      releaseUrl: config.scm.releaseUrl,
      svnExecutable: config.scm.svnExecutable,
      credentials,
    },
    paths: {
      buildDirectory,
      workingDirectory,
      checkoutDirectory: config.paths.checkoutDirectory
        ? resolve(config.paths.checkoutDirectory)
        : path.join(workingDirectory, 'scm'),
      stagingCheckoutDirectory: config.paths.stagingCheckoutDirectory
        ? resolve(config.paths.stagingCheckoutDirectory)
        : path.join(workingDirectory, 'dist-staging-scm'),
      releaseCheckoutDirectory: config.paths.releaseCheckoutDirectory
        ? resolve(config.paths.releaseCheckoutDirectory)
        : path.join(workingDirectory, 'dist-release-scm'),
      siteDirectory: config.paths.siteDirectory
        ? resolve(config.paths.siteDirectory)
        : path.join(buildDirectory, 'site'),
      siteArchive: path.join(workingDirectory, SITE_ARCHIVE_NAME),
      releaseNotes: resolve(config.paths.releaseNotes),
    },
    templatesDirectory: config.templates.directory ? resolve(config.templates.directory) : undefined,
  };
}

import { ConfigError } from '@release-stager/shared';
import type { ScmRepository } from './types';

const SCM_URL_PATTERN = /^scm:([a-z][a-z0-9-]*)[:|](.+)$/i;

/**
 * Parses `scm:<type>:<provider url>` (or `scm:<type>|<provider url>`) into a repository handle.
 */
export function parseScmUrl(scmUrl: string): ScmRepository {
  const trimmed = scmUrl.trim();
  const match = SCM_URL_PATTERN.exec(trimmed);
  if (!match) {
    throw new ConfigError(
      `Invalid SCM url "${scmUrl}". Expected the form scm:svn:https://host/path/to/dist.`,
    );
  }

  const [, type, url] = match;
  try {
    new URL(url);
  } catch (cause) {
    throw new ConfigError(`Invalid repository url "${url}" in SCM url "${scmUrl}".`, { cause });
  }

  return { type: type.toLowerCase(), url, scmUrl: trimmed };
}

import { ConfigError } from '@release-stager/shared';
import { parseScmUrl } from './scm-url';
import { SvnScmProvider } from './svn';
import type { ScmCredentials, ScmProvider, ScmProviderFactory, ScmRepository } from './types';

/**
 * Resolves SCM URLs to repository handles and hands out providers for them.
 * Providers are registered by type; `svn` is registered by `createDefaultScmManager`.
 */
export class ScmManager {
  private readonly factories = new Map<string, ScmProviderFactory>();

  registerProvider(type: string, factory: ScmProviderFactory): void {
    this.factories.set(type.toLowerCase(), factory);
  }

  supportedTypes(): string[] {
    return [...this.factories.keys()].sort();
  }

  makeRepository(scmUrl: string): ScmRepository {
    const repository = parseScmUrl(scmUrl);
    if (!this.factories.has(repository.type)) {
      throw new ConfigError(
        `Unsupported SCM provider "${repository.type}" in ${scmUrl}. Supported: ${this.supportedTypes().join(', ')}`,
      );
    }
    return repository;
  }

  getProvider(repository: ScmRepository, credentials: ScmCredentials = {}): ScmProvider {
    const factory = this.factories.get(repository.type);
    if (!factory) {
      throw new ConfigError(`No SCM provider registered for "${repository.type}"`);
    }
    return factory({ credentials });
  }
}

export interface DefaultScmManagerOptions {
  svnExecutable?: string;
}

export function createDefaultScmManager(options: DefaultScmManagerOptions = {}): ScmManager {
  const manager = new ScmManager();
  manager.registerProvider(
    'svn',
    ({ credentials }) => new SvnScmProvider({ executable: options.svnExecutable, credentials }),
  );
  return manager;
}

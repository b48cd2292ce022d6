import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { ConfigSchema } from '@release-stager/shared';
import { resolveReleaseConfig } from '../config/resolve';
import { MemoryLogger } from '../__fixtures__/memory-logger';
import { checkPreconditions, NOT_DIST_MODULE } from './preconditions';

describe('checkPreconditions', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'preconditions-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('returns the staging URL when every gate passes', async () => {
    await fs.ensureDir(path.join(tmpDir, 'target', 'release-stager'));
    const config = resolveReleaseConfig(
      ConfigSchema.parse({ distModule: true, scm: { stagingUrl: 'scm:svn:file:///var/svn/dist' } }),
      { cwd: tmpDir, env: {} },
    );

    const result = await checkPreconditions(config, { logger: new MemoryLogger(), runId: 'run-1' });

    expect(result).toEqual({ status: 'ready', stagingUrl: 'scm:svn:file:///var/svn/dist' });
  });

  it('checks the distribution flag before anything else', async () => {
    const logger = new MemoryLogger();
    const config = resolveReleaseConfig(ConfigSchema.parse({}), { cwd: tmpDir, env: {} });

    const result = await checkPreconditions(config, { logger, runId: 'run-1' });

    expect(result).toEqual({ status: 'skipped', reason: NOT_DIST_MODULE });
    expect(logger.events[0]).toMatchObject({
      type: 'PreconditionSkipped',
      runId: 'run-1',
      schemaVersion: 1,
      payload: { reason: NOT_DIST_MODULE },
    });
  });
});

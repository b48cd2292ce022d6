import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { MemoryLogger } from '../__fixtures__/memory-logger';
import { TemplateRenderer } from '../templates';
import { DistributionStager, StageRequest } from './stager';

describe('DistributionStager', () => {
  let tmpDir: string;
  let workingDirectory: string;
  let checkoutDirectory: string;
  let logger: MemoryLogger;
  let request: StageRequest;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stager-'));
    workingDirectory = path.join(tmpDir, 'target', 'release-stager');
    checkoutDirectory = path.join(workingDirectory, 'scm');
    logger = new MemoryLogger();

    await fs.outputFile(path.join(workingDirectory, 'foo-1.0-src.zip'), 'source archive');
    await fs.outputFile(path.join(workingDirectory, 'foo-1.0-bin.tar.gz'), 'binary archive');
    await fs.outputFile(path.join(workingDirectory, 'sha1.properties'), 'foo-1.0-src.zip=abc');
    await fs.outputFile(path.join(workingDirectory, 'site.zip'), 'site archive');
    await fs.outputFile(path.join(checkoutDirectory, '.svn', 'wc.db'), '');
    await fs.outputFile(path.join(tmpDir, 'RELEASE-NOTES.txt'), 'Release notes for foo 1.0');

    request = {
      workingDirectory,
      checkoutDirectory,
      siteArchive: path.join(workingDirectory, 'site.zip'),
      releaseNotes: path.join(tmpDir, 'RELEASE-NOTES.txt'),
      artifactId: 'foo',
      version: '1.0',
      siteUrl: 'https://foo.example.org',
    };
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('lays out the checkout and lists files to commit in order', async () => {
    const plan = await new DistributionStager({ logger, runId: 'run-1' }).stage(request);

    const co = (...parts: string[]) => path.join(checkoutDirectory, ...parts);
    expect(plan.filesToCommit).toEqual([
      co('binaries', 'foo-1.0-bin.tar.gz'),
      co('source', 'foo-1.0-src.zip'),
      co('site.zip'),
      co('HEADER.html'),
      co('README.html'),
      co('source', 'HEADER.html'),
      co('source', 'README.html'),
      co('binaries', 'HEADER.html'),
      co('binaries', 'README.html'),
      co('RELEASE-NOTES.txt'),
    ]);
    expect(plan.state).toBe('PLAN_FINALIZED');

    expect(await fs.readFile(co('source', 'foo-1.0-src.zip'), 'utf8')).toBe('source archive');
    expect(await fs.readFile(co('binaries', 'foo-1.0-bin.tar.gz'), 'utf8')).toBe('binary archive');
    expect(await fs.readFile(co('RELEASE-NOTES.txt'), 'utf8')).toBe('Release notes for foo 1.0');
    expect(await fs.pathExists(co('sha1.properties'))).toBe(false);

    const readme = await fs.readFile(co('README.html'), 'utf8');
    expect(readme).toContain('<h2>foo 1.0</h2>');
    expect(await fs.readFile(co('binaries', 'README.html'), 'utf8')).toBe(readme);
    expect(await fs.readFile(co('source', 'HEADER.html'), 'utf8')).toBe(
      await fs.readFile(co('HEADER.html'), 'utf8'),
    );
    expect(await fs.pathExists(co('.svn', 'wc.db'))).toBe(true);
  });

  it('records each state transition', async () => {
    await new DistributionStager({ logger, runId: 'run-1' }).stage(request);

    const transitions = logger.events.flatMap((e) =>
      e.type === 'StagerStateChanged' ? [`${e.payload.from}->${e.payload.to}`] : [],
    );
    expect(transitions).toEqual([
      'INIT->DIRECTORIES_PREPARED',
      'DIRECTORIES_PREPARED->CLASSIFIED_AND_COPIED',
      'CLASSIFIED_AND_COPIED->DOCS_GENERATED',
      'DOCS_GENERATED->PLAN_FINALIZED',
    ]);
  });

  it('classifies every candidate and skips bookkeeping files', async () => {
    await new DistributionStager({ logger, runId: 'run-1' }).stage(request);

    const classified = logger.events.flatMap((e) =>
      e.type === 'ArtifactClassified' ? [[path.basename(e.payload.file), e.payload.bucket]] : [],
    );
    expect(classified).toEqual([
      ['foo-1.0-bin.tar.gz', 'BINARY'],
      ['foo-1.0-src.zip', 'SOURCE'],
      ['sha1.properties', 'METADATA_EXCLUDED'],
    ]);
    expect(logger.messages('debug')).toEqual([
      'Not copying sha1.properties: SCM or checksum bookkeeping.',
    ]);
  });

  it('clears stale files from source and binaries', async () => {
    await fs.outputFile(path.join(checkoutDirectory, 'source', 'foo-0.9-src.zip'), 'old');

    await new DistributionStager({ logger, runId: 'run-1' }).stage(request);

    expect((await fs.readdir(path.join(checkoutDirectory, 'source'))).sort()).toEqual([
      'HEADER.html',
      'README.html',
      'foo-1.0-src.zip',
    ]);
  });

  it('warns and continues without a site archive', async () => {
    await fs.remove(request.siteArchive);

    const plan = await new DistributionStager({ logger, runId: 'run-1' }).stage(request);

    expect(plan.filesToCommit).not.toContain(path.join(checkoutDirectory, 'site.zip'));
    expect(plan.filesToCommit).toHaveLength(9);
    expect(logger.messages('warn')).toEqual([
      `No site archive at ${request.siteArchive}; run compress-site to include the site.`,
    ]);
  });

  it('uses templates from the override directory', async () => {
    const templates = path.join(tmpDir, 'templates');
    await fs.outputFile(path.join(templates, 'README.html'), '{{artifactId}}@{{version}}');

    await new DistributionStager(
      { logger, runId: 'run-1' },
      new TemplateRenderer({ directory: templates }),
    ).stage(request);

    expect(await fs.readFile(path.join(checkoutDirectory, 'source', 'README.html'), 'utf8')).toBe(
      'foo@1.0',
    );
  });

  it('stages release notes kept in the build output once, after the documents', async () => {
    const notes = path.join(workingDirectory, 'RELEASE-NOTES.txt');
    await fs.outputFile(notes, 'Notes from the build output');

    const plan = await new DistributionStager({ logger, runId: 'run-1' }).stage({
      ...request,
      releaseNotes: notes,
    });

    const co = (...parts: string[]) => path.join(checkoutDirectory, ...parts);
    expect(plan.filesToCommit).toEqual([
      co('binaries', 'foo-1.0-bin.tar.gz'),
      co('source', 'foo-1.0-src.zip'),
      co('site.zip'),
      co('HEADER.html'),
      co('README.html'),
      co('source', 'HEADER.html'),
      co('source', 'README.html'),
      co('binaries', 'HEADER.html'),
      co('binaries', 'README.html'),
      co('RELEASE-NOTES.txt'),
    ]);
    expect(plan.entries.filter((e) => e.destination === co('RELEASE-NOTES.txt'))).toEqual([
      { kind: 'release-notes', source: notes, destination: co('RELEASE-NOTES.txt') },
    ]);
    expect(
      (await fs.readdir(checkoutDirectory)).filter((name) => name === 'RELEASE-NOTES.txt'),
    ).toEqual(['RELEASE-NOTES.txt']);
    expect(await fs.readFile(co('RELEASE-NOTES.txt'), 'utf8')).toBe('Notes from the build output');
    const classified = logger.events.flatMap((e) =>
      e.type === 'ArtifactClassified' ? [path.basename(e.payload.file)] : [],
    );
    expect(classified).toEqual(['foo-1.0-bin.tar.gz', 'foo-1.0-src.zip', 'sha1.properties']);
  });

  it('fails with IoError when the release notes are missing', async () => {
    await fs.remove(request.releaseNotes);

    await expect(
      new DistributionStager({ logger, runId: 'run-1' }).stage(request),
    ).rejects.toMatchObject({ code: 'IoError' });
  });
});

import path from 'path';
import fs from 'fs-extra';
import {
  atomicWrite,
  copyFile,
  eventBase,
  isFile,
  resetDirectory,
} from '@release-stager/shared';
import { bucketDirectory, classifyFile } from '../classify';
import { TEMPLATE_FILES, TemplateId, TemplateRenderer } from '../templates';
import type { WorkflowContext } from '../workflows/types';
import { StagerState, StagingPlan } from './plan';

export const SOURCE_DIR = 'source';
export const BINARIES_DIR = 'binaries';

export interface StageRequest {
  /** Build-output directory holding the candidate artifacts */
  workingDirectory: string;
  /** Root of the checked-out distribution area */
  checkoutDirectory: string;
  /** Compressed site; copied to the checkout root when present */
  siteArchive: string;
  releaseNotes: string;
  artifactId: string;
  version: string;
  siteUrl?: string;
}

// The site archive and the release notes have their own copy steps, wherever they live.
function isSeparatelyStaged(file: string, request: StageRequest): boolean {
  const resolved = path.resolve(file);
  return (
    resolved === path.resolve(request.siteArchive) ||
    resolved === path.resolve(request.releaseNotes)
  );
}

/**
 * Lays out a checkout according to the distribution convention:
 * `*src*` files under `source/`, `*bin*` files under `binaries/`, everything else at the root,
 * plus HEADER.html and README.html in all three places.
 */
export class DistributionStager {
  constructor(
    private readonly context: WorkflowContext,
    private readonly renderer: TemplateRenderer = new TemplateRenderer(),
  ) {}

  async stage(request: StageRequest): Promise<StagingPlan> {
    const plan = new StagingPlan();
    const sourceRoot = path.join(request.checkoutDirectory, SOURCE_DIR);
    const binariesRoot = path.join(request.checkoutDirectory, BINARIES_DIR);

    await resetDirectory(binariesRoot);
    await resetDirectory(sourceRoot);
    await this.advance(plan, 'DIRECTORIES_PREPARED');

    await this.copyArtifacts(plan, request);
    await this.copySiteArchive(plan, request);
    const releaseNotes = await this.copyReleaseNotes(request);
    await this.advance(plan, 'CLASSIFIED_AND_COPIED');

    await this.generateDocuments(plan, request, [sourceRoot, binariesRoot]);
    await this.advance(plan, 'DOCS_GENERATED');

    plan.add({ kind: 'release-notes', source: request.releaseNotes, destination: releaseNotes });
    await this.advance(plan, 'PLAN_FINALIZED');
    return plan;
  }

  private async advance(plan: StagingPlan, to: StagerState): Promise<void> {
    const from = plan.advance(to);
    await this.context.logger.log({
      ...eventBase(this.context.runId),
      type: 'StagerStateChanged',
      payload: { from, to },
    });
  }

  private async listCandidates(request: StageRequest): Promise<string[]> {
    const dirents = await fs.readdir(request.workingDirectory, { withFileTypes: true });
    return dirents
      .filter((d) => d.isFile())
      .map((d) => path.join(request.workingDirectory, d.name))
      .filter((file) => !isSeparatelyStaged(file, request))
      .sort();
  }

  private async copyArtifacts(plan: StagingPlan, request: StageRequest): Promise<void> {
    const { logger, runId } = this.context;
    const artifacts = (await this.listCandidates(request)).map((file) => classifyFile(file));
    for (const { path: file, bucket } of artifacts) {
      const name = path.basename(file);
      await logger.log({ ...eventBase(runId), type: 'ArtifactClassified', payload: { file, bucket } });

      const directory = bucketDirectory(bucket);
      if (directory === undefined) {
        await logger.debug(`Not copying ${name}: SCM or checksum bookkeeping.`);
        continue;
      }
      const destination = path.join(request.checkoutDirectory, directory, name);
      await copyFile(file, destination);
      plan.add({ kind: 'artifact', source: file, destination, bucket });
    }
  }

  private async copySiteArchive(plan: StagingPlan, request: StageRequest): Promise<void> {
    if (!(await isFile(request.siteArchive))) {
      await this.context.logger.warn(
        `No site archive at ${request.siteArchive}; run compress-site to include the site.`,
      );
      return;
    }
    const destination = path.join(request.checkoutDirectory, path.basename(request.siteArchive));
    await copyFile(request.siteArchive, destination);
    plan.add({ kind: 'site', source: request.siteArchive, destination });
  }

  private async copyReleaseNotes(request: StageRequest): Promise<string> {
    const name = path.basename(request.releaseNotes);
    await this.context.logger.info(`Copying ${name} to ${request.checkoutDirectory}.`);
    const destination = path.join(request.checkoutDirectory, name);
    await copyFile(request.releaseNotes, destination);
    return destination;
  }

  private async generateDocuments(
    plan: StagingPlan,
    request: StageRequest,
    subdirectories: string[],
  ): Promise<void> {
    const variables: Record<TemplateId, Record<string, string>> = {
      HEADER: {},
      README: {
        artifactId: request.artifactId,
        version: request.version,
        siteUrl: request.siteUrl ?? '',
      },
    };
    const ids: TemplateId[] = ['HEADER', 'README'];

    const rendered: string[] = [];
    for (const id of ids) {
      const destination = path.join(request.checkoutDirectory, TEMPLATE_FILES[id]);
      await atomicWrite(destination, await this.renderer.render(id, variables[id]));
      plan.add({ kind: 'document', destination });
      rendered.push(destination);
    }

    for (const directory of subdirectories) {
      for (const document of rendered) {
        const destination = path.join(directory, path.basename(document));
        await copyFile(document, destination);
        plan.add({ kind: 'document', source: document, destination });
      }
    }
  }
}

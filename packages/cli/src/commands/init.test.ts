import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import { ConfigSchema } from '@release-stager/shared';
import { DEFAULT_CONFIG, writeDefaultConfig } from './init';
import type { UserInterface } from '../ui/console';

function answering(answer: boolean): UserInterface & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    async confirm(question: string) {
      questions.push(question);
      return answer;
    },
  };
}

describe('init', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'init-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  it('ships a default configuration that passes validation', () => {
    const parsed = ConfigSchema.parse(yaml.load(DEFAULT_CONFIG));
    expect(parsed.project).toEqual({
      artifactId: 'my-project',
      version: '1.0',
      url: 'https://my-project.example.org',
    });
    expect(parsed.distModule).toBe(false);
  });

  it('writes the file without asking when none exists', async () => {
    const ui = answering(false);

    const configPath = await writeDefaultConfig(tmpDir, ui);

    expect(configPath).toBe(path.join(tmpDir, '.release-stager.yaml'));
    expect(ui.questions).toEqual([]);
    expect(await fs.readFile(path.join(tmpDir, '.release-stager.yaml'), 'utf8')).toBe(
      DEFAULT_CONFIG.trimStart(),
    );
  });

  it('keeps an existing file when the user declines', async () => {
    await fs.writeFile(path.join(tmpDir, '.release-stager.yaml'), 'dryRun: true\n');
    const ui = answering(false);

    expect(await writeDefaultConfig(tmpDir, ui)).toBeUndefined();
    expect(ui.questions).toEqual(['.release-stager.yaml already exists. Overwrite it?']);
    expect(await fs.readFile(path.join(tmpDir, '.release-stager.yaml'), 'utf8')).toBe('dryRun: true\n');
  });

  it('overwrites an existing file when confirmed', async () => {
    await fs.writeFile(path.join(tmpDir, '.release-stager.yaml'), 'dryRun: true\n');

    await writeDefaultConfig(tmpDir, answering(true));

    expect(await fs.readFile(path.join(tmpDir, '.release-stager.yaml'), 'utf8')).toContain(
      'configVersion: 1',
    );
  });
});

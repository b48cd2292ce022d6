import pc from 'picocolors';

export interface OutputResult {
  command: 'stage' | 'compress-site' | 'promote' | 'init';
  status: 'staged' | 'skipped' | 'prepared' | 'archived' | 'created' | 'aborted';
  reason?: string;
  dryRun?: boolean;
  message?: string;
  revision?: string;
  checkoutDirectory?: string;
  filesToCommit?: string[];
  outputFile?: string;
  fileCount?: number;
  stagingDirectory?: string;
  releaseDirectory?: string;
  configPath?: string;
  [key: string]: unknown;
}

const MAX_LISTED_FILES = 20;

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      this.renderHuman(data);
    }
  }

  private renderHuman(data: OutputResult): void {
    switch (data.status) {
      case 'skipped':
        console.log(pc.yellow(`Skipped: ${data.reason ?? 'preconditions not met'}`));
        break;
      case 'staged':
        this.renderStaged(data);
        break;
      case 'prepared':
        console.log(`\n${pc.green('Promotion checkouts ready.')}`);
        if (data.stagingDirectory) console.log(`  Staging: ${data.stagingDirectory}`);
        if (data.releaseDirectory) console.log(`  Release: ${data.releaseDirectory}`);
        break;
      case 'archived':
        console.log(`\n${pc.green(`Site archived (${data.fileCount ?? 0} files).`)}`);
        if (data.outputFile) console.log(`  Archive: ${data.outputFile}`);
        break;
      case 'created':
        console.log(pc.green(`Created ${data.configPath ?? 'configuration'}`));
        break;
      case 'aborted':
        console.log(pc.gray('Aborted.'));
        break;
    }
  }

  private renderStaged(data: OutputResult): void {
    if (data.dryRun) {
      console.log(`\n${pc.cyan('Dry run: nothing was committed.')}`);
    } else {
      console.log(`\n${pc.green(`Committed revision ${data.revision ?? 'unknown'}.`)}`);
    }
    if (data.message) {
      console.log(`  ${pc.bold('Message:')} ${data.message}`);
    }
    if (data.checkoutDirectory) {
      console.log(`  ${pc.bold('Checkout:')} ${data.checkoutDirectory}`);
    }

    const files = data.filesToCommit ?? [];
    if (files.length > 0) {
      console.log(pc.bold(`\nFiles${data.dryRun ? ' that would be committed' : ''}:`));
      files.slice(0, MAX_LISTED_FILES).forEach((file) => console.log(`  - ${file}`));
      if (files.length > MAX_LISTED_FILES) {
        console.log(`  ... and ${files.length - MAX_LISTED_FILES} more.`);
      }
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}

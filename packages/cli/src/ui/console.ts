import inquirer from 'inquirer';
import { UsageError } from '@release-stager/shared';

export interface PromptOptions {
  /** Answer every question with yes */
  yes?: boolean;
  /** Fail instead of prompting */
  nonInteractive?: boolean;
  /** Defaults to process.stdin.isTTY */
  isTTY?: boolean;
}

export interface UserInterface {
  confirm(question: string, defaultNo?: boolean): Promise<boolean>;
}

export class ConsoleUI implements UserInterface {
  constructor(private readonly options: PromptOptions = {}) {}

  async confirm(question: string, defaultNo = true): Promise<boolean> {
    if (this.options.yes) {
      return true;
    }
    const isTTY = this.options.isTTY ?? process.stdin.isTTY;
    if (this.options.nonInteractive || !isTTY) {
      throw new UsageError(`${question} Confirmation required; pass --yes to proceed without a prompt.`);
    }
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: question,
        default: !defaultNo,
      },
    ]);
    return confirmed;
  }
}

import { confirm, isCancel, select } from '@clack/prompts';
import type { GuidanceBlock, Presenter } from '../doctor/types.js';
import { PromptCancelledError } from '../errors.js';
import {
  createPaint,
  formatDebug,
  formatError,
  formatGuidance,
  formatInfo,
  formatSection,
  formatStep,
  formatWarning,
  supportsColor,
  type Paint
} from './render.js';

export interface ConsolePresenterOptions {
  /** Ask questions; when false every question takes its default */
  interactive: boolean;
  /** Print reportDebug lines */
  verbose: boolean;
  color?: boolean;
  write?: (text: string) => void;
}

/**
 * Terminal presenter: console output plus clack prompts.
 */
export class ConsolePresenter implements Presenter {
  private readonly paint: Paint;
  private readonly write: (text: string) => void;

  constructor(private readonly options: ConsolePresenterOptions) {
    this.paint = createPaint(options.color ?? supportsColor());
    this.write = options.write ?? ((text) => console.log(text));
  }

  print(text: string): void {
    this.write(text);
  }

  reportStep(_description: string, succeeded: boolean, message: string): void {
    this.write(formatStep(this.paint, succeeded, message));
  }

  reportInfo(message: string): void {
    this.write(formatInfo(this.paint, message));
  }

  reportWarning(message: string): void {
    this.write(formatWarning(this.paint, message));
  }

  reportError(message: string): void {
    this.write(formatError(this.paint, message));
  }

  reportSection(title: string): void {
    this.write(formatSection(this.paint, title));
  }

  reportGuidance(block: GuidanceBlock): void {
    this.write(formatGuidance(this.paint, block));
  }

  reportDebug(message: string): void {
    if (this.options.verbose) {
      this.write(formatDebug(this.paint, message));
    }
  }

  async askChoice(prompt: string, choices: readonly string[], defaultChoice: string): Promise<string> {
    if (!this.options.interactive) {
      this.reportInfo(`${prompt} ${defaultChoice} (default)`);
      return defaultChoice;
    }
    const answer = await select({
      message: prompt,
      options: choices.map((choice) => ({ value: choice, label: choice })),
      initialValue: defaultChoice
    });
    if (isCancel(answer)) {
      throw new PromptCancelledError();
    }
    return answer;
  }

  async askYesNo(prompt: string, defaultAnswer: boolean): Promise<boolean> {
    if (!this.options.interactive) {
      this.reportInfo(`${prompt} ${defaultAnswer ? 'yes' : 'no'} (default)`);
      return defaultAnswer;
    }
    const answer = await confirm({ message: prompt, initialValue: defaultAnswer });
    if (isCancel(answer)) {
      throw new PromptCancelledError();
    }
    return answer;
  }
}

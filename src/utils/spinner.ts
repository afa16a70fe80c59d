import ora, { Ora } from 'ora';

export interface SpinnerOptions {
  text: string;
  color?: 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';
}

/**
 * A single ora spinner on stderr. Calls made while no spinner is running are
 * ignored, so callers need not track its state.
 */
export class SpinnerManager {
  private spinner: Ora | null = null;

  get active(): boolean {
    return this.spinner !== null;
  }

  start(options: SpinnerOptions): void {
    if (this.spinner) {
      this.stop();
    }

    this.spinner = ora({
      text: options.text,
      color: options.color ?? 'cyan',
      stream: process.stderr,
    }).start();
  }

  update(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    }
  }

  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

export const spinner = new SpinnerManager();

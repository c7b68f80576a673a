import ora, { Ora } from 'ora';
import { IProgressReporter } from '@profile-pulse/shared';

export class OraProgressReporter implements IProgressReporter {
  private spinner?: Ora;

  start(message: string): void {
    this.spinner?.stop();
    this.spinner = ora(message).start();
  }

  update(message: string, done?: number, total?: number): void {
    const text = done !== undefined && total ? `${message} ${Math.round((done / total) * 100)}%` : message;
    this.setText(text);
  }

  waiting(message: string, waitMs: number): void {
    this.setText(`${message} (waiting ${(waitMs / 1000).toFixed(1)}s)`);
  }

  succeed(message: string): void {
    this.finish(spinner => spinner.succeed(message));
  }

  fail(message: string): void {
    this.finish(spinner => spinner.fail(message));
  }

  info(message: string): void {
    this.finish(spinner => spinner.info(message));
  }

  warn(message: string): void {
    this.finish(spinner => spinner.warn(message));
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }

  private setText(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.start(text);
    }
  }

  private finish(action: (spinner: Ora) => void): void {
    action(this.spinner ?? ora());
    this.spinner = undefined;
  }
}

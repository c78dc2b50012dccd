import ora from 'ora'
import chalk from 'chalk'

/**
 * Spinner shown while a non-streamed request is pending.
 * Renders to stderr so stdout carries only results.
 */
export class Spinner {
  private spinner: ora.Ora

  constructor() {
    this.spinner = ora({
      color: 'cyan',
      spinner: 'dots',
      stream: process.stderr
    })
  }

  start(message: string): void {
    this.spinner.start(chalk.dim(message))
  }

  stop(): void {
    this.spinner.stop()
  }

  get isSpinning(): boolean {
    return this.spinner.isSpinning
  }

  /**
   * Run a task with the spinner active, stopping it however the task ends.
   */
  async wrap<T>(message: string, task: () => Promise<T>): Promise<T> {
    this.start(message)
    try {
      return await task()
    } finally {
      this.stop()
    }
  }
}

import { spawnSync } from 'node:child_process';
import type { Logger } from 'winston';
import { FormatError } from '../errors';
import { logger } from '../logger';
import type { FormatResult, Formatter } from './formatter';

/**
 * Formats by piping the input through an external process: stdin in,
 * stdout out. A non-zero exit fails with the process's stderr attached.
 */
export class ProcessFormatter implements Formatter {
  constructor(
    readonly command: string,
    readonly args: readonly string[] = [],
    private log: Logger = logger,
  ) {}

  format(input: string): FormatResult {
    this.log.debug(`running formatter: ${this.command} ${this.args.join(' ')}`);
    const result = spawnSync(this.command, [...this.args], { input, encoding: 'utf-8' });

    if (result.error) {
      this.log.warn(`formatter ${this.command} could not start: ${result.error.message}`);
      return { ok: false, error: new FormatError(`failed to start formatter ${this.command}`, result.error.message) };
    }
    if (result.status !== 0) {
      this.log.warn(`formatter ${this.command} exited with status ${result.status ?? result.signal}`);
      return { ok: false, error: new FormatError('failed to format', result.stderr) };
    }
    return { ok: true, text: result.stdout };
  }
}

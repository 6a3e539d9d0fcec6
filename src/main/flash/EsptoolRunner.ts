import { spawn } from 'child_process';
import { logger } from '../utils/logger';
import { LineSplitter } from './lineSplitter';
import type { ToolRunner } from './types';

export const TOOL_FAILURE_EXIT_CODE = 1;

/**
 * Runs esptool as a child process.
 *
 * stdout and stderr are forwarded line by line as they arrive. The promise
 * never rejects: a tool that cannot be started reports its error as output
 * and exits with status 1.
 */
export class EsptoolRunner implements ToolRunner {
  constructor(
    private command: string,
    private commandArgs: string[] = []
  ) {}

  run(args: string[], onLine: (line: string) => void): Promise<number> {
    const argv = [...this.commandArgs, ...args];
    logger.info(`Running: ${this.command} ${argv.join(' ')}`);

    return new Promise((resolve) => {
      const stdout = new LineSplitter();
      const stderr = new LineSplitter();
      let settled = false;

      const finish = (exitCode: number) => {
        if (settled) return;
        settled = true;
        for (const line of [...stdout.flush(), ...stderr.flush()]) onLine(line);
        resolve(exitCode);
      };

      const child = spawn(this.command, argv, {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        for (const line of stdout.push(chunk)) onLine(line);
      });
      child.stderr?.on('data', (chunk: string) => {
        for (const line of stderr.push(chunk)) onLine(line);
      });

      child.on('error', (error) => {
        logger.error(`Failed to run ${this.command}:`, error);
        onLine(`An error occurred while running esptool: ${error.message}`);
        finish(TOOL_FAILURE_EXIT_CODE);
      });

      child.on('close', (code, signal) => {
        if (signal) {
          logger.warn(`${this.command} terminated by ${signal}`);
        }
        finish(code ?? TOOL_FAILURE_EXIT_CODE);
      });
    });
  }
}

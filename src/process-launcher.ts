/**
 * @fileoverview Default ProcessLauncher built on child_process.spawn.
 *
 * Interactive launches (attach, create-and-attach, tail) inherit the
 * terminal; silent launches (create) discard dtach's own output, since the
 * command's output goes to the session log.
 *
 * @module process-launcher
 */

import { spawn } from 'node:child_process';
import type { LaunchOptions, ProcessLauncher } from './types.js';

export class SpawnLauncher implements ProcessLauncher {
  launch(args: string[], options: LaunchOptions): Promise<number | null> {
    const [program, ...rest] = args;
    if (!program) {
      return Promise.reject(new Error('Cannot launch an empty invocation'));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(program, rest, {
        cwd: options.cwd,
        stdio: options.interactive ? 'inherit' : 'ignore',
      });
      child.once('error', reject);
      child.once('exit', (code) => resolve(code));
    });
  }
}

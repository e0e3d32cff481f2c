/**
 * ProcessLauncher that records invocations instead of spawning anything.
 */

import type { LaunchOptions, ProcessLauncher } from '../../src/types.js';

export interface LaunchCall {
  args: string[];
  options: LaunchOptions;
}

export class FakeLauncher implements ProcessLauncher {
  readonly calls: LaunchCall[] = [];

  /** Runs on every launch; its return value is the exit code (default 0) */
  constructor(private behaviour: (args: string[], options: LaunchOptions) => number | null = () => 0) {}

  setBehaviour(behaviour: (args: string[], options: LaunchOptions) => number | null): void {
    this.behaviour = behaviour;
  }

  async launch(args: string[], options: LaunchOptions): Promise<number | null> {
    this.calls.push({ args, options });
    return this.behaviour(args, options);
  }
}

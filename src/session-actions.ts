/**
 * @fileoverview Origin → action record lookup.
 *
 * Callers that create sessions (the CLI, a compile runner, an editor
 * integration) register the callbacks that customise attach/view/re-run and
 * exit-status detection for their sessions. A session resolves its record
 * once, when it is created or loaded from disk.
 *
 * @module session-actions
 */

import type { SessionActions } from './types.js';

export class ActionRegistry {
  private actions: Map<string, SessionActions> = new Map();

  /** Register (or replace) the actions for an origin */
  register(origin: string, actions: SessionActions): void {
    this.actions.set(origin, { ...actions });
  }

  unregister(origin: string): boolean {
    return this.actions.delete(origin);
  }

  has(origin: string): boolean {
    return this.actions.has(origin);
  }

  /** A fresh copy of the origin's actions; empty when none are registered */
  resolve(origin: string): SessionActions {
    return { ...this.actions.get(origin) };
  }
}

/**
 * @fileoverview Session state transitions.
 *
 * States move forward only: `unknown → active → inactive`. The socket file is
 * the authority on liveness; it disappears when dtach exits. Two triggers
 * converge on the single `finalize()` routine:
 *
 * 1. The directory watcher seeing a socket deleted (exact timing).
 * 2. The reconciliation sweep finding an active session without a socket
 *    (after a restart, or when a watch event was missed; timing approximated
 *    from the log's modification time).
 *
 * `finalize()` guards on the current state, so whichever trigger arrives
 * second is a no-op.
 *
 * @module session-state-engine
 */

import { existsSync, statSync } from 'node:fs';
import type { Session, SessionStatus } from './types.js';
import { getErrorMessage } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import type { SessionRegistry } from './session-registry.js';
import type { SessionLifecycleLog } from './session-lifecycle-log.js';
import { localLogPath, localSocketPath, nowSeconds } from './session.js';
import { statusFromLog } from './session-output.js';
import { toLocalPath } from './utils/remote-path.js';

export interface FinalizeOptions {
  /** Take the end time from the log's mtime instead of now */
  approximate?: boolean;
}

export interface ReconcileResult {
  activated: string[];
  finished: string[];
  removed: string[];
  /** Remote sessions whose host is not reachable through a mount */
  skipped: string[];
}

export interface SessionStateEngineOptions {
  registry: SessionRegistry;
  config: Pick<TetherConfig, 'remoteMounts'>;
  /** Notification channel, fired after a session becomes inactive */
  notify?: (session: Session) => void;
  /** Called for every session the sweep confirms is still running */
  onActive?: (session: Session) => void;
  /** Called for every session the sweep removes */
  onRemoved?: (session: Session, reason: string) => void;
  lifecycleLog?: SessionLifecycleLog;
  /** Clock in seconds since epoch */
  now?: () => number;
}

export class SessionStateEngine {
  private readonly registry: SessionRegistry;
  private readonly remoteMounts: Record<string, string>;
  private readonly notify: (session: Session) => void;
  private readonly onActive?: (session: Session) => void;
  private readonly onRemoved?: (session: Session, reason: string) => void;
  private readonly lifecycleLog?: SessionLifecycleLog;
  private readonly now: () => number;

  constructor(options: SessionStateEngineOptions) {
    this.registry = options.registry;
    this.remoteMounts = options.config.remoteMounts;
    this.notify = options.notify ?? (() => {});
    this.onActive = options.onActive;
    this.onRemoved = options.onRemoved;
    this.lifecycleLog = options.lifecycleLog;
    this.now = options.now ?? nowSeconds;
  }

  /** `unknown → active` once dtach has been launched */
  markActive(session: Session): boolean {
    if (session.state !== 'unknown' || !this.registry.has(session.id)) return false;
    session.state = 'active';
    this.registry.update(session);
    return true;
  }

  /**
   * `active → inactive`. Records size, end time, duration and status,
   * persists, then notifies and fires the session's completion callback.
   *
   * @returns false (and changes nothing) unless the session was active and
   *   is still registered
   */
  finalize(session: Session, options: FinalizeOptions = {}): boolean {
    if (session.state !== 'active' || !this.registry.has(session.id)) return false;

    const logPath = localLogPath(session, this.remoteMounts);
    const logStat = this.statLog(logPath);

    const end = options.approximate && logStat ? logStat.mtimeMs / 1000 : this.now();
    session.size = logStat?.size ?? 0;
    session.time = {
      start: session.time.start,
      end,
      duration: Math.max(0, end - session.time.start),
    };
    session.status = this.resolveStatus(session, logPath);
    session.state = 'inactive';

    this.registry.update(session);
    this.lifecycleLog?.log({
      event: 'finished',
      sessionId: session.id,
      command: session.command,
      exitCode: session.status.exitCode,
      reason: session.status.outcome,
      ...(options.approximate ? { extra: { approximate: true } } : {}),
    });

    this.notify(session);
    if (session.action.callback) {
      try {
        session.action.callback(session);
      } catch (err) {
        console.error(`[StateEngine] Completion callback for ${session.id} failed: ${getErrorMessage(err)}`);
      }
    }
    return true;
  }

  /**
   * Reconciliation sweep over every known session. Each session is handled
   * on its own; a failure is logged and the sweep moves on.
   */
  reconcile(): ReconcileResult {
    const result: ReconcileResult = { activated: [], finished: [], removed: [], skipped: [] };

    for (const session of this.registry.getAll()) {
      if (session.state === 'inactive') continue;
      try {
        this.reconcileSession(session, result);
      } catch (err) {
        console.error(`[StateEngine] Could not reconcile session ${session.id}: ${getErrorMessage(err)}`);
      }
    }

    if (result.activated.length > 0) {
      this.registry.persist();
    }
    return result;
  }

  private reconcileSession(session: Session, result: ReconcileResult): void {
    if (!this.hostReachable(session)) {
      result.skipped.push(session.id);
      return;
    }

    const logPath = localLogPath(session, this.remoteMounts);
    const logExists = logPath !== null && existsSync(logPath);

    if (!logExists) {
      // The session directory was purged externally: data loss, not completion
      this.registry.remove(session);
      this.lifecycleLog?.log({
        event: 'stale_cleaned',
        sessionId: session.id,
        command: session.command,
        reason: `log file missing while ${session.state}`,
      });
      this.onRemoved?.(session, 'log file missing');
      result.removed.push(session.id);
      return;
    }

    if (session.state === 'unknown') {
      // Promoted without checking the socket in this pass; a session that has
      // already ended is finalized on the next sweep or by its watch event.
      session.state = 'active';
      this.registry.update(session, false);
      this.onActive?.(session);
      result.activated.push(session.id);
      return;
    }

    const socketPath = localSocketPath(session, this.remoteMounts);
    if (socketPath !== null && existsSync(socketPath)) {
      this.onActive?.(session);
      return;
    }

    if (this.finalize(session, { approximate: true })) {
      result.finished.push(session.id);
    }
  }

  /** Local sessions always; remote ones only through a mounted session directory */
  private hostReachable(session: Session): boolean {
    if (session.host.type === 'local') return true;
    const directory = toLocalPath(session.directory, this.remoteMounts);
    return directory !== null && existsSync(directory);
  }

  private statLog(path: string | null): { size: number; mtimeMs: number } | null {
    if (path === null) return null;
    try {
      const stat = statSync(path);
      return { size: stat.size, mtimeMs: stat.mtimeMs };
    } catch {
      return null;
    }
  }

  private resolveStatus(session: Session, logPath: string | null): SessionStatus {
    if (session.action.status) {
      try {
        return session.action.status(session);
      } catch (err) {
        console.error(`[StateEngine] Status action for ${session.id} failed: ${getErrorMessage(err)}`);
      }
    }
    return statusFromLog(logPath);
  }
}

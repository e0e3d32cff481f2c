/**
 * @fileoverview Session manager: the entry point for creating and managing sessions.
 *
 * Wires the registry, state engine and directory watcher together and runs
 * the user-level workflows on top of them (start, attach, view, re-run,
 * kill, delete, list).
 *
 * Invalid session references never throw out of a public operation: they are
 * reported through the `message` channel and the operation does nothing.
 *
 * Events emitted:
 * - `sessionCreated` (session: Session) - Record created and registered
 * - `sessionStarted` (session: Session) - dtach launched
 * - `sessionFinished` (session: Session) - Session became inactive
 * - `sessionRemoved` (data: { sessionId: string; reason: string }) - Removed from the registry
 * - `registryReloaded` (sessions: Session[]) - Registry file changed on disk
 *
 * @module session-manager
 */

import { EventEmitter } from 'node:events';
import { existsSync, mkdirSync } from 'node:fs';
import type {
  ProcessLauncher,
  Session,
  SessionAnnotator,
  SessionContext,
  SessionMode,
  SessionState,
  WatchFactory,
} from './types.js';
import { getErrorMessage } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import { InvalidSessionError } from './errors.js';
import { ActionRegistry } from './session-actions.js';
import {
  createSessionRecord,
  generateSessionId,
  isSession,
  nowSeconds,
  sessionSocketExists,
  sessionSocketPath,
} from './session.js';
import { buildDtachArgs, resolveAttachInvocation, withCurrentSession } from './session-command-builder.js';
import { SessionRegistry } from './session-registry.js';
import { SessionStateEngine, type ReconcileResult } from './session-state-engine.js';
import { SessionDirectoryWatcher } from './session-directory-watcher.js';
import { SessionLifecycleLog } from './session-lifecycle-log.js';
import { readSessionOutput } from './session-output.js';
import { sessionLabel } from './session-labels.js';
import { SpawnLauncher } from './process-launcher.js';
import { findSessionPid, killProcessTree, readProcessTable, type KillResult } from './process-tree.js';
import { hostPath, toLocalPath } from './utils/remote-path.js';

/** Modes that create a new dtach session */
export type CreateMode = Exclude<SessionMode, 'attach'>;

export interface SessionFilter {
  state?: SessionState;
  origin?: string;
  host?: string;
}

export interface SessionManagerOptions {
  config: TetherConfig;
  actions?: ActionRegistry;
  annotators?: readonly SessionAnnotator[];
  launcher?: ProcessLauncher;
  /** Completion notifications */
  notify?: (session: Session) => void;
  /** User-facing messages (invalid references, refused operations) */
  message?: (text: string) => void;
  /** Where viewed output is written */
  write?: (text: string) => void;
  /** null disables the audit log */
  lifecycleLog?: SessionLifecycleLog | null;
  watchFactory?: WatchFactory;
  /** Watch the registry file for other processes' writes (default: true) */
  watchRegistry?: boolean;
  /** Clock in seconds since epoch */
  now?: () => number;
}

function defaultNotify(session: Session): void {
  const label = sessionLabel(session, 60);
  switch (session.status.outcome) {
    case 'success':
      console.log(`[Tether] Session finished: ${label}`);
      break;
    case 'failure':
      console.log(`[Tether] Session failed (exit ${session.status.exitCode}): ${label}`);
      break;
    case 'unknown':
      console.log(`[Tether] Session ended: ${label}`);
      break;
  }
}

export class SessionManager extends EventEmitter {
  readonly config: TetherConfig;
  readonly actions: ActionRegistry;
  readonly registry: SessionRegistry;
  readonly engine: SessionStateEngine;
  readonly watcher: SessionDirectoryWatcher;
  private readonly annotators: readonly SessionAnnotator[];
  private readonly launcher: ProcessLauncher;
  private readonly notify: (session: Session) => void;
  private readonly message: (text: string) => void;
  private readonly write: (text: string) => void;
  private readonly lifecycleLog: SessionLifecycleLog | null;
  private readonly now?: () => number;
  private started = false;

  constructor(options: SessionManagerOptions) {
    super();
    this.config = options.config;
    this.actions = options.actions ?? new ActionRegistry();
    this.annotators = options.annotators ?? [];
    this.launcher = options.launcher ?? new SpawnLauncher();
    this.notify = options.notify ?? defaultNotify;
    this.message = options.message ?? ((text) => console.log(`[Tether] ${text}`));
    this.write = options.write ?? ((text) => { process.stdout.write(text); });
    this.lifecycleLog = options.lifecycleLog === undefined
      ? new SessionLifecycleLog(this.config.dbDirectory)
      : options.lifecycleLog;
    this.now = options.now;

    this.registry = new SessionRegistry({
      config: this.config,
      actions: this.actions,
      watch: options.watchRegistry ?? true,
      watchFactory: options.watchFactory,
    });
    this.engine = new SessionStateEngine({
      registry: this.registry,
      config: this.config,
      notify: (session) => {
        this.notify(session);
        this.emit('sessionFinished', session);
      },
      onActive: (session) => {
        this.watcher.ensureWatched(session.directory);
      },
      onRemoved: (session, reason) => {
        this.emit('sessionRemoved', { sessionId: session.id, reason });
      },
      lifecycleLog: this.lifecycleLog ?? undefined,
      now: options.now,
    });
    this.watcher = new SessionDirectoryWatcher({
      registry: this.registry,
      engine: this.engine,
      config: this.config,
      watchFactory: options.watchFactory,
    });

    this.registry.on('reloaded', (sessions: Session[]) => {
      this.watcher.syncWithRegistry();
      this.emit('registryReloaded', sessions);
    });
  }

  // ========== Lifecycle ==========

  /** Open the registry, reconcile every session and watch live directories */
  start(): ReconcileResult {
    if (!this.started) {
      this.started = true;
      this.registry.open();
      this.lifecycleLog?.trimIfNeeded().catch((err) => {
        console.error('[Tether] Failed to trim lifecycle log:', getErrorMessage(err));
      });
    }
    return this.engine.reconcile();
  }

  /** Close all watches. Pending lifecycle writes are flushed. */
  async stop(): Promise<void> {
    this.watcher.close();
    this.registry.close();
    this.started = false;
    await this.lifecycleLog?.flush();
  }

  // ========== Queries ==========

  /** Look a session up by id or unique id prefix */
  getSession(idOrPrefix: string): Session | undefined {
    const exact = this.registry.get(idOrPrefix);
    if (exact) return exact;
    if (!idOrPrefix) return undefined;
    const matches = this.registry.getAll().filter((s) => s.id.startsWith(idOrPrefix));
    return matches.length === 1 ? matches[0] : undefined;
  }

  /** Reconcile, then return sessions newest first */
  listSessions(filter: SessionFilter = {}): Session[] {
    this.engine.reconcile();
    return this.registry
      .getAll()
      .filter((s) => !filter.state || s.state === filter.state)
      .filter((s) => !filter.origin || s.origin === filter.origin)
      .filter((s) => !filter.host || s.host.name === filter.host)
      .sort((a, b) => b.time.start - a.time.start);
  }

  // ========== Creation ==========

  /**
   * Build a record, create its directory, register it and watch the
   * directory. The command is not started.
   */
  createSession(command: string, context: SessionContext): Session | null {
    if (!command.trim()) {
      this.message('Cannot create a session for an empty command');
      return null;
    }

    // Same command within the same millisecond: nudge the start time so ids stay unique
    let start = this.now ? this.now() : nowSeconds();
    while (this.registry.has(generateSessionId(command, start))) {
      start += 0.001;
    }

    const session = createSessionRecord(command, context, this.config, {
      actions: this.actions.resolve(context.origin),
      annotators: this.annotators,
      now: start,
    });

    const localDirectory = toLocalPath(session.directory, this.config.remoteMounts);
    if (localDirectory !== null && !existsSync(localDirectory)) {
      mkdirSync(localDirectory, { recursive: true, mode: 0o700 });
    }

    this.registry.insert(session);
    this.watcher.ensureWatched(session.directory);
    this.lifecycleLog?.log({
      event: 'created',
      sessionId: session.id,
      command: session.command,
      origin: session.origin,
    });
    this.emit('sessionCreated', session);
    return session;
  }

  /**
   * Create a session and launch dtach for it.
   * `create` returns once dtach has daemonized; `create-and-attach` returns
   * when the user detaches or the command ends.
   */
  async startSession(command: string, mode: CreateMode, context: SessionContext): Promise<Session | null> {
    const session = this.createSession(command, context);
    if (!session) return null;

    const args = buildDtachArgs(session, mode, this.config);
    this.engine.markActive(session);
    this.lifecycleLog?.log({ event: 'started', sessionId: session.id, extra: { mode } });
    this.emit('sessionStarted', session);

    let exitCode: number | null;
    try {
      exitCode = await withCurrentSession(session, () =>
        this.launcher.launch(args, {
          cwd: this.launchDirectory(session),
          interactive: mode === 'create-and-attach',
        }),
      );
    } catch (err) {
      this.launchFailed(session, getErrorMessage(err));
      return null;
    }

    if (mode === 'create' && exitCode !== 0) {
      this.launchFailed(session, `${this.config.dtachProgram} exited with code ${exitCode ?? 'null'}`);
      return null;
    }

    if (mode === 'create-and-attach' && !sessionSocketExists(session, this.config.remoteMounts)) {
      this.engine.finalize(session);
    }
    return session;
  }

  // ========== Interaction ==========

  /**
   * Attach to a running session. Falls back to tailing the log for
   * non-attachable sessions and to showing the output of finished ones.
   */
  async attachSession(idOrPrefix: string): Promise<boolean> {
    return this.guardAsync(async () => {
      const session = this.requireSession(idOrPrefix);
      if (session.action.attach) {
        await withCurrentSession(session, () => session.action.attach?.(session));
        return true;
      }

      const invocation = resolveAttachInvocation(session, this.config);
      if (invocation.kind === 'view') {
        return this.showOutput(session);
      }
      await withCurrentSession(session, () =>
        this.launcher.launch(invocation.args, { cwd: this.launchDirectory(session), interactive: true }),
      );
      if (session.state === 'active' && !sessionSocketExists(session, this.config.remoteMounts)) {
        this.engine.finalize(session);
      }
      return true;
    }, false);
  }

  /** Show a session's output (custom view action, or the log without sentinels) */
  async viewSession(idOrPrefix: string): Promise<boolean> {
    return this.guardAsync(async () => {
      const session = this.requireSession(idOrPrefix);
      if (session.action.view) {
        await withCurrentSession(session, () => session.action.view?.(session));
        return true;
      }
      return this.showOutput(session);
    }, false);
  }

  /** Output text of a session, or null when it cannot be read */
  getSessionOutput(idOrPrefix: string): string | null {
    return this.guard(() => readSessionOutput(this.requireSession(idOrPrefix), this.config), null);
  }

  /** Run the same command again as a brand-new session */
  async rerunSession(idOrPrefix: string, mode: CreateMode = 'create'): Promise<Session | null> {
    return this.guardAsync(async () => {
      const session = this.requireSession(idOrPrefix);
      if (session.action.run) {
        await session.action.run(session.command);
        return null;
      }
      return this.startSession(session.command, mode, {
        origin: session.origin,
        workingDirectory: session.workingDirectory,
      });
    }, null);
  }

  /**
   * Terminate a running session's process tree. Completion is still detected
   * through the socket disappearing.
   */
  killSession(idOrPrefix: string): KillResult | null {
    return this.guard(() => {
      const session = this.requireSession(idOrPrefix);
      if (session.state === 'inactive') {
        this.message(`Session ${session.id.slice(0, 8)} has already finished`);
        return null;
      }
      if (session.host.type === 'remote') {
        this.message(`Killing sessions on ${session.host.name} is only possible from that host`);
        return null;
      }

      const table = readProcessTable();
      const pid = findSessionPid(hostPath(sessionSocketPath(session)), table, this.config.dtachProgram);
      if (pid === null) {
        this.message(`No running process found for session ${session.id.slice(0, 8)}`);
        return null;
      }

      const result = killProcessTree(pid, table);
      this.lifecycleLog?.log({
        event: 'killed',
        sessionId: session.id,
        command: session.command,
        extra: { pid, signalled: result.signalled.length },
      });
      return result;
    }, null);
  }

  /** Remove a finished session and its log */
  deleteSession(idOrPrefix: string): boolean {
    return this.guard(() => {
      const session = this.requireSession(idOrPrefix);
      if (session.state === 'active') {
        this.message(`Session ${session.id.slice(0, 8)} is still running; kill it first`);
        return false;
      }
      this.registry.remove(session);
      this.lifecycleLog?.log({ event: 'deleted', sessionId: session.id, command: session.command });
      this.emit('sessionRemoved', { sessionId: session.id, reason: 'deleted' });
      return true;
    }, false);
  }

  /** Drop the registry entry of a value handed in by a collaborator */
  forgetSession(value: unknown): boolean {
    return this.guard(() => {
      if (!isSession(value)) {
        throw new InvalidSessionError('Not a session');
      }
      return this.deleteSession(value.id);
    }, false);
  }

  // ========== Internals ==========

  private requireSession(idOrPrefix: string): Session {
    const session = this.getSession(idOrPrefix);
    if (!session) {
      throw new InvalidSessionError(`No session matching "${idOrPrefix}"`);
    }
    return session;
  }

  private guard<T>(operation: () => T, fallback: T): T {
    try {
      return operation();
    } catch (err) {
      if (err instanceof InvalidSessionError) {
        this.message(err.message);
        return fallback;
      }
      throw err;
    }
  }

  private async guardAsync<T>(operation: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof InvalidSessionError) {
        this.message(err.message);
        return fallback;
      }
      throw err;
    }
  }

  private showOutput(session: Session): boolean {
    const output = readSessionOutput(session, this.config);
    if (output === null) {
      this.message(`Output of session ${session.id.slice(0, 8)} is not available`);
      return false;
    }
    this.write(output.endsWith('\n') || output === '' ? output : `${output}\n`);
    return true;
  }

  private launchDirectory(session: Session): string | undefined {
    if (session.host.type === 'remote') return undefined;
    return existsSync(session.workingDirectory) ? session.workingDirectory : undefined;
  }

  private launchFailed(session: Session, reason: string): void {
    console.error(`[Tether] Failed to start session ${session.id}: ${reason}`);
    this.registry.remove(session);
    this.lifecycleLog?.log({ event: 'launch_failed', sessionId: session.id, command: session.command, reason });
    this.emit('sessionRemoved', { sessionId: session.id, reason: 'launch failed' });
    this.message(`Could not start "${sessionLabel(session, 60)}": ${reason}`);
  }
}

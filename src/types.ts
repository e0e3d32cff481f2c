/**
 * @fileoverview Shared types for Tether sessions.
 *
 * A session is one shell command run inside dtach. The record is created
 * once, persisted in the session registry, and mutated only when the state
 * engine observes the command finishing.
 *
 * @module types
 */

export type { LifecycleEventType, LifecycleEntry } from './types/lifecycle.js';

// ========== Session ==========

/** unknown → active → inactive. `inactive` is terminal. */
export type SessionState = 'unknown' | 'active' | 'inactive';

export type SessionOutcome = 'unknown' | 'success' | 'failure';

/** Whether output is plain text or a terminal stream with escape sequences */
export type EnvMode = 'plain-text' | 'terminal-data';

export type HostType = 'local' | 'remote';

/** How dtach is invoked for a session */
export type SessionMode = 'create' | 'create-and-attach' | 'attach';

export const SESSION_MODES: readonly SessionMode[] = ['create', 'create-and-attach', 'attach'];

export interface SessionHost {
  name: string;
  type: HostType;
}

/** Seconds since epoch (start, end) and seconds (duration) */
export interface SessionTime {
  start: number;
  end: number;
  duration: number;
}

export interface SessionStatus {
  outcome: SessionOutcome;
  exitCode: number;
}

/**
 * Origin-specific behaviour. Resolved once when a session is created (and
 * again when it is loaded from disk, since functions are not persisted).
 */
export interface SessionActions {
  /** Replaces the default attach (dtach -a / tail) */
  attach?: (session: Session) => void | Promise<void>;
  /** Replaces the default output view */
  view?: (session: Session) => void | Promise<void>;
  /** Replaces the default re-run of the command */
  run?: (command: string) => void | Promise<void>;
  /** Replaces the log sentinel inspection */
  status?: (session: Session) => SessionStatus;
  /** Fired once after the session becomes inactive */
  callback?: (session: Session) => void;
}

export interface Session {
  id: string;
  command: string;
  /** Which caller created the session (e.g. "cli", "compile") */
  origin: string;
  workingDirectory: string;
  /** Directory holding `<id>.socket` and `<id>.log`, possibly `ssh://` prefixed */
  directory: string;
  attachable: boolean;
  envMode: EnvMode;
  host: SessionHost;
  metadata: Record<string, string>;
  action: SessionActions;
  time: SessionTime;
  status: SessionStatus;
  /** Log size in bytes, set when the session becomes inactive */
  size: number;
  state: SessionState;
}

/** What the registry file stores: everything but the callbacks */
export type PersistedSession = Omit<Session, 'action'>;

/** Caller-bound context captured when a session is created */
export interface SessionContext {
  origin: string;
  workingDirectory: string;
}

export interface AnnotationContext {
  command: string;
  workingDirectory: string;
  host: SessionHost;
}

/** Produces one metadata entry for a new session */
export interface SessionAnnotator {
  name: string;
  annotate: (context: AnnotationContext) => string;
}

// ========== Filesystem events ==========

export type DirectoryEventAction = 'created' | 'deleted' | 'changed' | 'attribute-changed' | 'renamed';

/** One observed change inside a watched session directory */
export interface DirectoryEvent {
  /** Session directory as stored on the session (may be remote-prefixed) */
  directory: string;
  action: DirectoryEventAction;
  /** Absolute local path of the file that changed */
  file: string;
}

/** Anything with a close(): Node's FSWatcher or a test fake */
export interface WatchHandle {
  close(): void;
}

export type WatchFactory = (
  directory: string,
  onEvent: (eventType: string, filename: string | null) => void,
  onError: (err: Error) => void,
) => WatchHandle;

// ========== Processes ==========

export interface ProcessInfo {
  pid: number;
  ppid: number;
  args: string;
}

/** Runs an external invocation and resolves with its exit code */
export interface ProcessLauncher {
  launch(args: string[], options: LaunchOptions): Promise<number | null>;
}

export interface LaunchOptions {
  cwd?: string;
  /** Inherit the terminal (attach) rather than run silently (create) */
  interactive: boolean;
}

// ========== Helpers ==========

/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

/**
 * @fileoverview Session record construction and path helpers.
 *
 * `createSessionRecord` is a pure constructor: it captures the command and
 * the caller's context and decides everything that is fixed for the
 * session's lifetime (id, attachability, env mode, host, metadata, actions).
 * Creating the session directory and registering the record are done by the
 * session manager right after construction.
 *
 * Every session owns exactly two files in its directory:
 * `<id>.socket` (dtach socket; exists while the command runs) and
 * `<id>.log` (combined stdout/stderr).
 *
 * @module session
 */

import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { hostname } from 'node:os';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import type {
  AnnotationContext,
  EnvMode,
  Session,
  SessionActions,
  SessionAnnotator,
  SessionContext,
  SessionHost,
} from './types.js';
import { getErrorMessage } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import { EXEC_TIMEOUT_MS } from './config/timing.js';
import { parseRemotePath, remotePrefix, toLocalPath } from './utils/remote-path.js';

/** Namespace for name-based session ids */
const SESSION_ID_NAMESPACE = '6f1c2a8e-4b7d-4f0a-9c3e-2d5b8a7e1f60';

export const SOCKET_SUFFIX = '.socket';
export const LOG_SUFFIX = '.log';

/**
 * Derive a session id from the command text and its start time.
 * Unique, not secret: a name-based uuid with the dashes removed so it can
 * double as a file name.
 */
export function generateSessionId(command: string, start: number): string {
  return uuidv5(`${command}\u0000${start}`, SESSION_ID_NAMESPACE).replace(/-/g, '');
}

/** Current time in seconds since epoch (fractional) */
export function nowSeconds(): number {
  return Date.now() / 1000;
}

// ========== Creation-time decisions ==========

export function isAttachableCommand(command: string, nonAttachablePatterns: readonly string[]): boolean {
  return !nonAttachablePatterns.some((pattern) => new RegExp(pattern).test(command));
}

export function resolveEnvMode(command: string, terminalDataPatterns: readonly string[]): EnvMode {
  return terminalDataPatterns.some((pattern) => new RegExp(pattern).test(command))
    ? 'terminal-data'
    : 'plain-text';
}

/** `ssh://host/...` working directories run remotely; anything else locally */
export function resolveHost(workingDirectory: string, localHostname: string = hostname()): SessionHost {
  const remote = parseRemotePath(workingDirectory);
  return remote ? { name: remote.host, type: 'remote' } : { name: localHostname, type: 'local' };
}

/** The session directory on the host the command runs on */
export function resolveSessionDirectory(workingDirectory: string, sessionDirectory: string): string {
  const remote = parseRemotePath(workingDirectory);
  return remote ? `${remotePrefix(remote)}${sessionDirectory}` : sessionDirectory;
}

/**
 * Run every annotator once, in order. An annotator that throws contributes
 * an empty value.
 */
export function annotateSession(
  annotators: readonly SessionAnnotator[],
  context: AnnotationContext,
): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const annotator of annotators) {
    try {
      metadata[annotator.name] = annotator.annotate(context);
    } catch (err) {
      console.warn(`[Session] Annotator "${annotator.name}" failed: ${getErrorMessage(err)}`);
      metadata[annotator.name] = '';
    }
  }
  return metadata;
}

/** Current git branch of a local working directory, empty elsewhere */
export const gitBranchAnnotator: SessionAnnotator = {
  name: 'git-branch',
  annotate: ({ workingDirectory, host }) => {
    if (host.type === 'remote' || !existsSync(workingDirectory)) return '';
    try {
      return execFileSync('git', ['rev-parse', '--abbrev-ref', 'HEAD'], {
        cwd: workingDirectory,
        encoding: 'utf-8',
        timeout: EXEC_TIMEOUT_MS,
        stdio: ['ignore', 'pipe', 'ignore'],
      }).trim();
    } catch {
      return '';
    }
  },
};

// ========== Construction ==========

export interface CreateSessionOptions {
  actions?: SessionActions;
  annotators?: readonly SessionAnnotator[];
  /** Seconds since epoch; defaults to now */
  now?: number;
  localHostname?: string;
}

export function createSessionRecord(
  command: string,
  context: SessionContext,
  config: Pick<TetherConfig, 'sessionDirectory' | 'nonAttachablePatterns' | 'terminalDataPatterns'>,
  options: CreateSessionOptions = {},
): Session {
  const start = options.now ?? nowSeconds();
  const host = resolveHost(context.workingDirectory, options.localHostname);
  return {
    id: generateSessionId(command, start),
    command,
    origin: context.origin,
    workingDirectory: context.workingDirectory,
    directory: resolveSessionDirectory(context.workingDirectory, config.sessionDirectory),
    attachable: isAttachableCommand(command, config.nonAttachablePatterns),
    envMode: resolveEnvMode(command, config.terminalDataPatterns),
    host,
    metadata: annotateSession(options.annotators ?? [], {
      command,
      workingDirectory: context.workingDirectory,
      host,
    }),
    action: { ...options.actions },
    time: { start, end: 0, duration: 0 },
    status: { outcome: 'unknown', exitCode: 0 },
    size: 0,
    state: 'unknown',
  };
}

// ========== Paths ==========

function sessionFile(session: Pick<Session, 'id' | 'directory'>, suffix: string): string {
  return `${session.directory.replace(/\/+$/, '')}/${session.id}${suffix}`;
}

/** Socket path as stored (remote-prefixed for remote sessions) */
export function sessionSocketPath(session: Pick<Session, 'id' | 'directory'>): string {
  return sessionFile(session, SOCKET_SUFFIX);
}

/** Log path as stored (remote-prefixed for remote sessions) */
export function sessionLogPath(session: Pick<Session, 'id' | 'directory'>): string {
  return sessionFile(session, LOG_SUFFIX);
}

/** Locally readable socket path, or null when the host is not mounted */
export function localSocketPath(
  session: Pick<Session, 'id' | 'directory'>,
  remoteMounts: Record<string, string>,
): string | null {
  return toLocalPath(sessionSocketPath(session), remoteMounts);
}

export function localLogPath(
  session: Pick<Session, 'id' | 'directory'>,
  remoteMounts: Record<string, string>,
): string | null {
  return toLocalPath(sessionLogPath(session), remoteMounts);
}

export function sessionSocketExists(
  session: Pick<Session, 'id' | 'directory'>,
  remoteMounts: Record<string, string>,
): boolean {
  const path = localSocketPath(session, remoteMounts);
  return path !== null && existsSync(path);
}

// ========== Validation ==========

export const SessionStatusSchema = z.object({
  outcome: z.enum(['unknown', 'success', 'failure']),
  exitCode: z.number().int(),
});

/** Everything the registry file stores for one session */
export const PersistedSessionSchema = z.object({
  id: z.string().min(1),
  command: z.string(),
  origin: z.string(),
  workingDirectory: z.string(),
  directory: z.string().min(1),
  attachable: z.boolean(),
  envMode: z.enum(['plain-text', 'terminal-data']),
  host: z.object({
    name: z.string(),
    type: z.enum(['local', 'remote']),
  }),
  metadata: z.record(z.string(), z.string()),
  time: z.object({
    start: z.number(),
    end: z.number(),
    duration: z.number(),
  }),
  status: SessionStatusSchema,
  size: z.number().nonnegative(),
  state: z.enum(['unknown', 'active', 'inactive']),
});

/** Structural check for values handed to public operations */
export function isSession(value: unknown): value is Session {
  if (!PersistedSessionSchema.safeParse(value).success) return false;
  return typeof value === 'object' && value !== null && 'action' in value
    && typeof value.action === 'object' && value.action !== null;
}

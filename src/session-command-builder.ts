/**
 * @fileoverview Pure functions building dtach invocations for a session.
 *
 * Create modes run the command inside a shell group whose combined output is
 * mirrored into the session log:
 *
 *   dtach -n <socket> -z <shell> -c "{ <reporter> <env-mode> '<cmd>'; } 2>&1 | tee <log>"
 *
 * Attachable sessions pipe through `tee` so a live viewer can tail the log;
 * non-attachable sessions redirect straight into it (`&> <log>`). Without an
 * environment reporter the group holds `<shell> -c '<cmd>'`.
 *
 * Remote sessions get the same invocation prefixed with `ssh <host> --`.
 *
 * @module session-command-builder
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Session, SessionMode } from './types.js';
import { SESSION_MODES } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import { AttachUnavailableError, UnknownModeError } from './errors.js';
import { sessionLogPath, sessionSocketExists, sessionSocketPath } from './session.js';
import { shellJoin, shellQuote, singleQuote } from './utils/shell-quote.js';
import { hostPath, parseRemotePath, sshPrefix } from './utils/remote-path.js';

export type CommandBuilderConfig = Pick<
  TetherConfig,
  'dtachProgram' | 'shellProgram' | 'envReporter' | 'showOutputOnAttach' | 'tailInterval' | 'remoteMounts'
>;

/** What the caller should do to "attach" to a session */
export type AttachInvocation =
  | { kind: 'attach'; args: string[] }
  | { kind: 'tail'; args: string[] }
  | { kind: 'view' };

// ========== Modes ==========

export function modeFlag(mode: SessionMode): string {
  switch (mode) {
    case 'create':
      return '-n';
    case 'create-and-attach':
      return '-c';
    case 'attach':
      return '-a';
    default:
      throw new UnknownModeError(String(mode));
  }
}

/** Validate a mode coming from outside the type system (CLI, config) */
export function parseSessionMode(value: string): SessionMode {
  const mode = SESSION_MODES.find((m) => m === value);
  if (!mode) throw new UnknownModeError(value);
  return mode;
}

// ========== Current session ==========

const currentSession = new AsyncLocalStorage<Session>();

/**
 * Run `fn` with `session` as the current session. Visible to everything
 * `fn` calls (including async continuations) and nothing else.
 */
export function withCurrentSession<T>(session: Session, fn: () => T): T {
  return currentSession.run(session, fn);
}

export function getCurrentSession(): Session | undefined {
  return currentSession.getStore();
}

// ========== Builders ==========

/** The shell text dtach runs for a create mode */
export function buildWrappedCommand(session: Session, config: Pick<CommandBuilderConfig, 'shellProgram' | 'envReporter'>): string {
  const log = shellQuote(hostPath(sessionLogPath(session)));
  const command = singleQuote(session.command);
  const inner = config.envReporter
    ? `${shellQuote(config.envReporter)} ${session.envMode} ${command}`
    : `${config.shellProgram} -c ${command}`;
  const redirect = session.attachable ? `2>&1 | tee ${log}` : `&> ${log}`;
  return `{ ${inner}; } ${redirect}`;
}

/** Interactive invocations (attach, create-and-attach, tail) get a remote terminal */
function withRemote(session: Session, args: string[], interactive: boolean): string[] {
  const remote = parseRemotePath(session.directory);
  return remote ? [...sshPrefix(remote, interactive), shellJoin(args)] : args;
}

/**
 * Argument vector (program first) for the given mode.
 * @throws AttachUnavailableError for `attach` on a non-attachable session whose socket is gone
 * @throws UnknownModeError for a mode outside the closed set
 */
export function buildDtachArgs(session: Session, mode: SessionMode, config: CommandBuilderConfig): string[] {
  const flag = modeFlag(mode);
  const socket = hostPath(sessionSocketPath(session));

  if (mode === 'attach') {
    if (!session.attachable && !sessionSocketExists(session, config.remoteMounts)) {
      throw new AttachUnavailableError(session.id);
    }
    return withRemote(session, [config.dtachProgram, flag, socket, '-r', 'none'], true);
  }

  return withRemote(session, [
    config.dtachProgram,
    flag,
    socket,
    '-z',
    config.shellProgram,
    '-c',
    buildWrappedCommand(session, config),
  ], mode === 'create-and-attach');
}

/** The same invocation as one shell string */
export function buildDtachCommand(session: Session, mode: SessionMode, config: CommandBuilderConfig): string {
  const command = shellJoin(buildDtachArgs(session, mode, config));
  if (mode === 'attach' && config.showOutputOnAttach) {
    return `cat ${shellQuote(hostPath(sessionLogPath(session)))}; ${command}`;
  }
  return command;
}

/** Follow a session's log from the beginning */
export function buildTailArgs(session: Session, config: Pick<CommandBuilderConfig, 'tailInterval'>): string[] {
  return withRemote(session, [
    'tail',
    '-F',
    '-n',
    '+1',
    '-s',
    String(config.tailInterval),
    hostPath(sessionLogPath(session)),
  ], true);
}

/**
 * Decide how to honour an attach request:
 * - attachable and running → dtach -a
 * - running but not attachable → tail the log
 * - finished → view the output
 */
export function resolveAttachInvocation(session: Session, config: CommandBuilderConfig): AttachInvocation {
  const running = sessionSocketExists(session, config.remoteMounts);
  if (running && session.attachable) {
    return { kind: 'attach', args: buildDtachArgs(session, 'attach', config) };
  }
  if (running) {
    return { kind: 'tail', args: buildTailArgs(session, config) };
  }
  return { kind: 'view' };
}

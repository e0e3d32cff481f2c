/**
 * @fileoverview Remote path handling.
 *
 * Remote working directories are written as `ssh://[user@]host[:port]/path`.
 * The session files of a remote host are reached locally through a network
 * mount of that host's root, configured per hostname in `remoteMounts`.
 *
 * @module utils/remote-path
 */

import { posix } from 'node:path';

const REMOTE_PATH_PATTERN = /^ssh:\/\/(?:([^@/]+)@)?([^/:]+)(?::(\d+))?(\/.*)?$/;

export interface RemotePath {
  user?: string;
  host: string;
  port?: number;
  /** Absolute path on the remote host */
  path: string;
}

export function parseRemotePath(value: string): RemotePath | null {
  const match = REMOTE_PATH_PATTERN.exec(value);
  if (!match) return null;
  const [, user, host, port, path] = match;
  return {
    ...(user ? { user } : {}),
    host,
    ...(port ? { port: parseInt(port, 10) } : {}),
    path: path || '/',
  };
}

export function isRemotePath(value: string): boolean {
  return REMOTE_PATH_PATTERN.test(value);
}

/** `ssh://user@host:22` for a parsed remote path */
export function remotePrefix(remote: Omit<RemotePath, 'path'>): string {
  const user = remote.user ? `${remote.user}@` : '';
  const port = remote.port !== undefined ? `:${remote.port}` : '';
  return `ssh://${user}${remote.host}${port}`;
}

/** The path as seen on its own host (prefix stripped) */
export function hostPath(value: string): string {
  return parseRemotePath(value)?.path ?? value;
}

/**
 * Map a possibly-remote path to one this process can open.
 * Returns null for a remote host without a configured mount.
 */
export function toLocalPath(value: string, remoteMounts: Record<string, string>): string | null {
  const remote = parseRemotePath(value);
  if (!remote) return value;
  const mount = remoteMounts[remote.host];
  if (!mount) return null;
  return posix.join(mount, remote.path);
}

/**
 * Leading argv that runs the rest of an invocation on the remote host.
 * `tty` forces a remote terminal, which dtach needs to attach.
 */
export function sshPrefix(remote: Omit<RemotePath, 'path'>, tty: boolean = false): string[] {
  const target = remote.user ? `${remote.user}@${remote.host}` : remote.host;
  return [
    'ssh',
    ...(tty ? ['-t'] : []),
    ...(remote.port !== undefined ? ['-p', String(remote.port)] : []),
    target,
    '--',
  ];
}

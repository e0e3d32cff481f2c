/**
 * @fileoverview Reading and formatting session output.
 *
 * The environment reporter appends one sentinel line after the command
 * finishes. Those lines tell the state engine the exit status and are
 * stripped before output is shown to a user.
 *
 * @module session-output
 */

import { closeSync, openSync, readFileSync, readSync, statSync } from 'node:fs';
import type { Session, SessionStatus } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import { LOG_TAIL_BYTES } from './config/timing.js';
import { localLogPath } from './session.js';

export const SUCCESS_SENTINEL = 'Tether session finished';
export const FAILURE_SENTINEL_PATTERN = /^Tether session exited abnormally with code (\d+)$/;

/** CSI / OSC escape sequences and stray carriage returns in terminal data */
const TERMINAL_NOISE_PATTERN = /\x1b\[[0-9;?]*[ -\/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)|\x1b[()][0-9A-Za-z]|\r/g;

export function isSentinelLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === SUCCESS_SENTINEL || FAILURE_SENTINEL_PATTERN.test(trimmed);
}

/** Status encoded by one log line */
export function parseStatusLine(line: string): SessionStatus {
  const trimmed = line.trim();
  if (trimmed === SUCCESS_SENTINEL) {
    return { outcome: 'success', exitCode: 0 };
  }
  const failure = FAILURE_SENTINEL_PATTERN.exec(trimmed);
  if (failure) {
    return { outcome: 'failure', exitCode: parseInt(failure[1], 10) };
  }
  return { outcome: 'unknown', exitCode: 0 };
}

/**
 * Read at most `maxBytes` from the end of a file.
 * Returns an empty string when the file cannot be read.
 */
export function readLogTail(path: string, maxBytes: number = LOG_TAIL_BYTES): string {
  let fd: number | null = null;
  try {
    const size = statSync(path).size;
    const length = Math.min(size, maxBytes);
    const buffer = Buffer.alloc(length);
    fd = openSync(path, 'r');
    readSync(fd, buffer, 0, length, size - length);
    return buffer.toString('utf-8');
  } catch {
    return '';
  } finally {
    if (fd !== null) closeSync(fd);
  }
}

/** Last non-empty line of a log, or '' */
export function lastLogLine(path: string): string {
  const lines = readLogTail(path).split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim()) return lines[i];
  }
  return '';
}

/**
 * Default exit-status policy: inspect the last line of the log for a
 * sentinel. A missing or unreadable log yields (unknown, 0).
 */
export function statusFromLog(path: string | null): SessionStatus {
  if (path === null) return { outcome: 'unknown', exitCode: 0 };
  return parseStatusLine(lastLogLine(path));
}

export function stripTerminalNoise(text: string): string {
  return text.replace(TERMINAL_NOISE_PATTERN, '');
}

/**
 * Remove sentinel lines, along with the blank line the reporter prints in
 * front of them.
 */
export function stripSentinels(text: string): string {
  const lines = text.split('\n');
  const kept: string[] = [];
  for (const line of lines) {
    if (isSentinelLine(line)) {
      if (kept.length > 0 && kept[kept.length - 1].trim() === '') kept.pop();
      continue;
    }
    kept.push(line);
  }
  return kept.join('\n');
}

/** User-facing output of a session; null when the log is unreachable */
export function readSessionOutput(session: Session, config: Pick<TetherConfig, 'remoteMounts'>): string | null {
  const path = localLogPath(session, config.remoteMounts);
  if (path === null) return null;
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return null;
  }
  const text = session.envMode === 'terminal-data' ? stripTerminalNoise(raw) : raw;
  return stripSentinels(text);
}

// ========== Formatting ==========

export function formatSessionSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}K`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)}M`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)}G`;
}

export function formatSessionDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${secs}s`;
  return `${secs}s`;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** `Oct 19 14:05` in local time */
export function formatTimestamp(seconds: number): string {
  const date = new Date(seconds * 1000);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

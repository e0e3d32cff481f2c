/**
 * @fileoverview Locating and killing a session's process tree.
 *
 * dtach daemonizes, so the session's processes are not our children. They
 * are found through `ps`: the dtach master is the process whose arguments
 * name the session socket, and everything below it is collected from the
 * parent/child links.
 *
 * Killing is best-effort. Descendants are signalled depth-first (a child's
 * children before the child), the root last. A process that has already
 * exited is skipped silently; the socket disappearing remains the authority
 * on completion either way.
 *
 * @module process-tree
 */

import { execFileSync } from 'node:child_process';
import { basename } from 'node:path';
import type { ProcessInfo } from './types.js';
import { getErrorMessage } from './types.js';
import { EXEC_TIMEOUT_MS } from './config/timing.js';
import { escapeRegExp } from './utils/shell-quote.js';
import { isErrnoException } from './utils/type-safety.js';

const PS_LINE_PATTERN = /^\s*(\d+)\s+(\d+)\s+(.*)$/;

/** Parse `ps -eo pid=,ppid=,args=` output */
export function parseProcessTable(output: string): ProcessInfo[] {
  const table: ProcessInfo[] = [];
  for (const line of output.split('\n')) {
    const match = PS_LINE_PATTERN.exec(line);
    if (!match) continue;
    table.push({
      pid: parseInt(match[1], 10),
      ppid: parseInt(match[2], 10),
      args: match[3].trim(),
    });
  }
  return table;
}

/** Snapshot of every process on this host */
export function readProcessTable(): ProcessInfo[] {
  try {
    const output = execFileSync('ps', ['-eo', 'pid=,ppid=,args='], {
      encoding: 'utf-8',
      timeout: EXEC_TIMEOUT_MS,
    });
    return parseProcessTable(output);
  } catch (err) {
    console.error(`[ProcessTree] Could not list processes: ${getErrorMessage(err)}`);
    return [];
  }
}

/**
 * PID of the dtach process that created `socketPath` (`dtach -n|-c <socket> ...`).
 */
export function findSessionPid(socketPath: string, table: readonly ProcessInfo[], dtachProgram = 'dtach'): number | null {
  const program = escapeRegExp(basename(dtachProgram));
  const pattern = new RegExp(`(^|/)${program}\\s+-[nc]\\s+${escapeRegExp(socketPath)}(\\s|$)`);
  const match = table.find((p) => pattern.test(p.args));
  return match ? match.pid : null;
}

/**
 * All descendants of `pid`, depth-first: every process appears after its
 * own descendants. `pid` itself is not included.
 */
export function collectDescendants(pid: number, table: readonly ProcessInfo[]): number[] {
  const children = new Map<number, number[]>();
  for (const proc of table) {
    const siblings = children.get(proc.ppid);
    if (siblings) {
      siblings.push(proc.pid);
    } else {
      children.set(proc.ppid, [proc.pid]);
    }
  }

  const ordered: number[] = [];
  const seen = new Set<number>([pid]);
  const visit = (parent: number) => {
    for (const child of children.get(parent) ?? []) {
      if (seen.has(child)) continue;
      seen.add(child);
      visit(child);
      ordered.push(child);
    }
  };
  visit(pid);
  return ordered;
}

export interface KillResult {
  /** PIDs the signal was delivered to */
  signalled: number[];
  /** PIDs that had already exited */
  missing: number[];
}

/**
 * Signal `pid` and all of its descendants, children first.
 */
export function killProcessTree(
  pid: number,
  table: readonly ProcessInfo[] = readProcessTable(),
  signal: NodeJS.Signals = 'SIGTERM',
): KillResult {
  const result: KillResult = { signalled: [], missing: [] };

  for (const target of [...collectDescendants(pid, table), pid]) {
    try {
      process.kill(target, signal);
      result.signalled.push(target);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ESRCH') {
        result.missing.push(target);
      } else {
        console.error(`[ProcessTree] Failed to signal ${target}: ${getErrorMessage(err)}`);
      }
    }
  }

  console.log(`[ProcessTree] Sent ${signal} to ${result.signalled.length} processes under ${pid}`);
  return result;
}

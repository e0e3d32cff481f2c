/**
 * @fileoverview Append-only JSONL audit log for session lifecycle events.
 *
 * Records every session creation, launch, completion, kill, deletion and
 * sweep cleanup to `<dbDirectory>/session-lifecycle.jsonl`. The registry only
 * keeps current state; this log keeps the history.
 *
 * @module session-lifecycle-log
 */

import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { LifecycleEventType, LifecycleEntry } from './types.js';
import { LIFECYCLE_EVENT_TYPES } from './types/lifecycle.js';
import { isErrnoException } from './utils/type-safety.js';
import {
  LIFECYCLE_LOG_MAX_LINES,
  LIFECYCLE_LOG_TRIM_TO,
  LIFECYCLE_QUERY_LIMIT,
} from './config/timing.js';

export const LIFECYCLE_LOG_FILE = 'session-lifecycle.jsonl';

const LifecycleEntrySchema = z.object({
  ts: z.number(),
  event: z.enum(LIFECYCLE_EVENT_TYPES),
  sessionId: z.string(),
  command: z.string().optional(),
  origin: z.string().optional(),
  reason: z.string().optional(),
  exitCode: z.number().nullable().optional(),
  extra: z.record(z.string(), z.unknown()).optional(),
});

function parseEntry(line: string): LifecycleEntry | null {
  try {
    const result = LifecycleEntrySchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export interface LifecycleQuery {
  sessionId?: string;
  event?: LifecycleEventType;
  since?: number;
  limit?: number;
}

export class SessionLifecycleLog {
  readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(dbDirectory: string) {
    this.filePath = join(dbDirectory, LIFECYCLE_LOG_FILE);
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  /**
   * Append a lifecycle event. Fire-and-forget: errors are logged, never thrown.
   */
  log(entry: Omit<LifecycleEntry, 'ts'> & { ts?: number }): void {
    const line = JSON.stringify({ ts: Date.now(), ...entry }) + '\n';
    // Chain writes to prevent interleaving
    this.writeQueue = this.writeQueue
      .then(() => appendFile(this.filePath, line, 'utf-8'))
      .catch((err) => {
        console.error('[LifecycleLog] Failed to write:', err);
      });
  }

  /** Resolves once every queued write has landed */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  /**
   * Query the log file with optional filters, newest first.
   */
  async query(opts?: LifecycleQuery): Promise<LifecycleEntry[]> {
    const limit = opts?.limit ?? LIFECYCLE_QUERY_LIMIT;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const lines = raw.trim().split('\n').filter(Boolean);
    const entries: LifecycleEntry[] = [];

    // Parse in reverse (newest first) for efficiency with limit
    for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
      const entry = parseEntry(lines[i]);
      if (!entry) continue; // Skip malformed lines

      if (opts?.sessionId && entry.sessionId !== opts.sessionId) continue;
      if (opts?.event && entry.event !== opts.event) continue;
      if (opts?.since && entry.ts < opts.since) continue;

      entries.push(entry);
    }

    return entries;
  }

  /**
   * Trim the log file if it exceeds the line cap. Called on manager start.
   */
  async trimIfNeeded(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return;
      throw err;
    }

    const lines = raw.trim().split('\n').filter(Boolean);
    if (lines.length <= LIFECYCLE_LOG_MAX_LINES) return;

    const trimmed = lines.slice(-LIFECYCLE_LOG_TRIM_TO);
    await writeFile(this.filePath, trimmed.join('\n') + '\n', 'utf-8');
    console.log(`[LifecycleLog] Trimmed from ${lines.length} to ${trimmed.length} entries`);
  }
}

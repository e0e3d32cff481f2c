/**
 * @fileoverview Durable registry of session records.
 *
 * The registry holds every known session in memory and mirrors it to a
 * single file, `<dbDirectory>/tether.db`, on each mutation:
 *
 * ```
 * # Tether Session Database Version: 0.6.1
 * { "<id>": { ...session without callbacks... }, ... }
 * ```
 *
 * A file written by another version loads as an empty registry (no
 * migration). Another process rewriting the file is picked up through a watch
 * on the database directory; the in-memory map is then replaced wholesale
 * (last writer wins). Mutations are refused until `open()` has loaded the
 * file, so a fresh instance never overwrites records it has not seen.
 *
 * Events emitted:
 * - `reloaded` (sessions: Session[]) - file changed on disk and was reloaded
 *
 * @module session-registry
 */

import { EventEmitter } from 'node:events';
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { PersistedSession, Session, WatchFactory, WatchHandle } from './types.js';
import { getErrorMessage } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import { InvalidSessionError, RegistryClosedError } from './errors.js';
import { ActionRegistry } from './session-actions.js';
import { PersistedSessionSchema, localLogPath } from './session.js';
import { nodeWatchFactory } from './utils/fs-watch.js';

export const DB_VERSION = '0.6.1';
export const DB_FILE_NAME = 'tether.db';
const DB_HEADER_MARKER = '#';
const DB_HEADER_PREFIX = `${DB_HEADER_MARKER} Tether Session Database Version: `;

const RegistryFileSchema = z.record(z.string(), PersistedSessionSchema);

export type ParseResult =
  | { ok: true; sessions: PersistedSession[] }
  | { ok: false; reason: 'version-mismatch'; version: string | null }
  | { ok: false; reason: 'malformed'; message: string };

function toPersisted(session: Session): PersistedSession {
  const { action: _action, ...persisted } = session;
  return persisted;
}

/** Header line plus pretty JSON, ordered by insertion */
export function serializeRegistry(sessions: Iterable<Session>, version: string = DB_VERSION): string {
  const records: Record<string, PersistedSession> = {};
  for (const session of sessions) {
    records[session.id] = toPersisted(session);
  }
  return `${DB_HEADER_PREFIX}${version}\n${JSON.stringify(records, null, 2)}\n`;
}

export function parseRegistry(content: string, version: string = DB_VERSION): ParseResult {
  const newline = content.indexOf('\n');
  const header = newline === -1 ? content : content.slice(0, newline);
  const fileVersion = header.startsWith(DB_HEADER_PREFIX) ? header.slice(DB_HEADER_PREFIX.length).trim() : null;
  if (fileVersion !== version) {
    return { ok: false, reason: 'version-mismatch', version: fileVersion };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content.slice(newline + 1));
  } catch (err) {
    return { ok: false, reason: 'malformed', message: getErrorMessage(err) };
  }
  const result = RegistryFileSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, reason: 'malformed', message: result.error.issues[0]?.message ?? 'invalid records' };
  }
  return { ok: true, sessions: Object.values(result.data) };
}

export interface SessionRegistryOptions {
  config: Pick<TetherConfig, 'dbDirectory' | 'remoteMounts'>;
  /** Re-attaches callbacks to records loaded from disk */
  actions?: ActionRegistry;
  /** Watch the database directory for writes by other processes (default: true) */
  watch?: boolean;
  watchFactory?: WatchFactory;
}

/**
 * In-memory session map mirrored to one file.
 *
 * @example
 * ```typescript
 * const registry = new SessionRegistry({ config });
 * registry.open();
 * registry.insert(session);          // persisted immediately
 * session.state = 'active';
 * registry.update(session);          // persisted
 * registry.close();
 * ```
 */
export class SessionRegistry extends EventEmitter {
  readonly filePath: string;
  private sessions: Map<string, Session> = new Map();
  private readonly config: SessionRegistryOptions['config'];
  private readonly actions: ActionRegistry;
  private readonly watchEnabled: boolean;
  private readonly watchFactory: WatchFactory;
  private watcher: WatchHandle | null = null;
  /** Content of our last write, to tell our own file events from foreign ones */
  private lastWritten: string | null = null;
  private opened = false;

  constructor(options: SessionRegistryOptions) {
    super();
    this.config = options.config;
    this.actions = options.actions ?? new ActionRegistry();
    this.watchEnabled = options.watch ?? true;
    this.watchFactory = options.watchFactory ?? nodeWatchFactory;
    this.filePath = join(this.config.dbDirectory, DB_FILE_NAME);
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /** Load the file (if usable) and start watching for foreign writes. Idempotent. */
  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.sessions = this.load();
    if (this.watchEnabled) {
      this.ensureDir();
      this.watcher = this.watchFactory(
        this.config.dbDirectory,
        (_eventType, filename) => this.handleFileEvent(filename),
        (err) => console.error('[SessionRegistry] Database watch failed:', err.message),
      );
    }
  }

  close(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    this.opened = false;
  }

  // ========== Queries ==========

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  getAll(): Session[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  // ========== Mutations ==========

  /** Add a new session and persist */
  insert(session: Session): void {
    this.assertOpen();
    if (this.sessions.has(session.id)) {
      throw new InvalidSessionError(`Session ${session.id} is already registered`);
    }
    this.sessions.set(session.id, session);
    this.persist();
  }

  /**
   * Store the session's current fields. Callers batching several updates
   * pass `persist = false` and call persist() once at the end.
   */
  update(session: Session, persist: boolean = true): void {
    this.assertOpen();
    if (!this.sessions.has(session.id)) {
      throw new InvalidSessionError(`Session ${session.id} is not registered`);
    }
    this.sessions.set(session.id, session);
    if (persist) this.persist();
  }

  /** Forget a session and delete its log file */
  remove(session: Pick<Session, 'id' | 'directory'>): boolean {
    this.assertOpen();
    const existed = this.sessions.delete(session.id);
    const logPath = localLogPath(session, this.config.remoteMounts);
    if (logPath !== null) {
      try {
        rmSync(logPath, { force: true });
      } catch (err) {
        console.warn(`[SessionRegistry] Could not delete ${logPath}: ${getErrorMessage(err)}`);
      }
    }
    this.persist();
    return existed;
  }

  /** Write the whole map to disk via temp file + rename */
  persist(): void {
    this.assertOpen();
    this.ensureDir();
    const content = serializeRegistry(this.sessions.values());
    const tempPath = `${this.filePath}.tmp`;
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, this.filePath);
    this.lastWritten = content;
  }

  /** Replace the in-memory map with the file's content */
  reload(): void {
    this.sessions = this.load();
    this.emit('reloaded', this.getAll());
  }

  // ========== Internals ==========

  private assertOpen(): void {
    if (!this.opened) throw new RegistryClosedError(this.filePath);
  }

  private ensureDir(): void {
    if (!existsSync(this.config.dbDirectory)) {
      mkdirSync(this.config.dbDirectory, { recursive: true });
    }
  }

  private hydrate(records: PersistedSession[]): Map<string, Session> {
    const sessions = new Map<string, Session>();
    for (const record of records) {
      sessions.set(record.id, { ...record, action: this.actions.resolve(record.origin) });
    }
    return sessions;
  }

  private load(): Map<string, Session> {
    let content: string;
    try {
      if (!existsSync(this.filePath)) return new Map();
      content = readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      console.error('[SessionRegistry] Failed to read database, starting empty:', getErrorMessage(err));
      return new Map();
    }

    const result = parseRegistry(content);
    if (!result.ok) {
      if (result.reason === 'version-mismatch') {
        console.warn(
          `[SessionRegistry] Database version ${result.version ?? '(none)'} does not match ${DB_VERSION}, starting empty`,
        );
      } else {
        console.warn(`[SessionRegistry] Database is malformed (${result.message}), starting empty`);
      }
      return new Map();
    }
    this.lastWritten = content;
    return this.hydrate(result.sessions);
  }

  private handleFileEvent(filename: string | null): void {
    if (filename !== null && filename !== DB_FILE_NAME) return;

    let content: string;
    try {
      content = readFileSync(this.filePath, 'utf-8');
    } catch {
      // Mid-replace or deleted; the next event carries the final state
      return;
    }
    if (content === this.lastWritten) return;

    const result = parseRegistry(content);
    if (!result.ok && result.reason === 'malformed') {
      console.warn(`[SessionRegistry] Ignoring partially written database: ${result.message}`);
      return;
    }

    console.log('[SessionRegistry] Database changed on disk, reloading');
    this.sessions = result.ok ? this.hydrate(result.sessions) : new Map();
    this.lastWritten = content;
    this.emit('reloaded', this.getAll());
  }
}

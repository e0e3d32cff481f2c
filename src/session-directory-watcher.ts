/**
 * @fileoverview One filesystem watch per session directory with live sessions.
 *
 * Raw watch callbacks are turned into DirectoryEvent structs and pushed onto
 * a queue that is drained one event at a time, so registry mutations never
 * interleave. A deleted `<id>.socket` finalizes session `<id>`; once no active
 * session remains in that directory its watch is closed.
 *
 * Node's fs.watch reports both creation and deletion as `rename`; a rename
 * whose path no longer exists is treated as a deletion.
 *
 * @module session-directory-watcher
 */

import { existsSync } from 'node:fs';
import { basename, join } from 'node:path';
import type { DirectoryEvent, DirectoryEventAction, WatchFactory, WatchHandle } from './types.js';
import { getErrorMessage } from './types.js';
import type { TetherConfig } from './config/session-config.js';
import type { SessionRegistry } from './session-registry.js';
import type { SessionStateEngine } from './session-state-engine.js';
import { SOCKET_SUFFIX } from './session.js';
import { nodeWatchFactory } from './utils/fs-watch.js';
import { toLocalPath } from './utils/remote-path.js';

export interface SessionDirectoryWatcherOptions {
  registry: SessionRegistry;
  engine: SessionStateEngine;
  config: Pick<TetherConfig, 'remoteMounts'>;
  watchFactory?: WatchFactory;
}

export class SessionDirectoryWatcher {
  private readonly registry: SessionRegistry;
  private readonly engine: SessionStateEngine;
  private readonly remoteMounts: Record<string, string>;
  private readonly watchFactory: WatchFactory;
  /** session directory (as stored on sessions) → watch */
  private watches: Map<string, WatchHandle> = new Map();
  private queue: DirectoryEvent[] = [];
  private draining = false;

  constructor(options: SessionDirectoryWatcherOptions) {
    this.registry = options.registry;
    this.engine = options.engine;
    this.remoteMounts = options.config.remoteMounts;
    this.watchFactory = options.watchFactory ?? nodeWatchFactory;
  }

  /**
   * Start watching a session directory unless it already is.
   * @returns false when the directory cannot be watched from here
   */
  ensureWatched(directory: string): boolean {
    if (this.watches.has(directory)) return true;

    const localDirectory = toLocalPath(directory, this.remoteMounts);
    if (localDirectory === null || !existsSync(localDirectory)) {
      return false;
    }

    try {
      const handle = this.watchFactory(
        localDirectory,
        (eventType, filename) => this.handleRawEvent(directory, localDirectory, eventType, filename),
        (err) => {
          console.error(`[DirectoryWatcher] Watch on ${directory} failed: ${err.message}`);
          this.unwatch(directory);
        },
      );
      this.watches.set(directory, handle);
      return true;
    } catch (err) {
      console.error(`[DirectoryWatcher] Could not watch ${directory}: ${getErrorMessage(err)}`);
      return false;
    }
  }

  unwatch(directory: string): boolean {
    const handle = this.watches.get(directory);
    if (!handle) return false;
    this.watches.delete(directory);
    handle.close();
    return true;
  }

  isWatching(directory: string): boolean {
    return this.watches.has(directory);
  }

  watchedDirectories(): string[] {
    return Array.from(this.watches.keys());
  }

  /**
   * Match the watch set to the registry after it was replaced: watch each
   * directory with an active session and close every other watch.
   */
  syncWithRegistry(): void {
    const live = new Set(
      this.registry
        .getAll()
        .filter((s) => s.state === 'active')
        .map((s) => s.directory),
    );
    for (const directory of this.watchedDirectories()) {
      if (!live.has(directory)) this.unwatch(directory);
    }
    for (const directory of live) {
      this.ensureWatched(directory);
    }
  }

  /** Close every watch and drop queued events */
  close(): void {
    for (const handle of this.watches.values()) {
      handle.close();
    }
    this.watches.clear();
    this.queue = [];
  }

  /** Queue an event; events are processed strictly one after another */
  enqueue(event: DirectoryEvent): void {
    this.queue.push(event);
    this.drain();
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let event = this.queue.shift();
      while (event) {
        try {
          this.handleEvent(event);
        } catch (err) {
          console.error(`[DirectoryWatcher] Failed to handle ${event.action} ${event.file}: ${getErrorMessage(err)}`);
        }
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private handleRawEvent(directory: string, localDirectory: string, eventType: string, filename: string | null): void {
    if (filename === null) return;
    const file = join(localDirectory, filename);
    let action: DirectoryEventAction;
    if (eventType === 'rename') {
      action = existsSync(file) ? 'created' : 'deleted';
    } else {
      action = 'changed';
    }
    this.enqueue({ directory, action, file });
  }

  private handleEvent(event: DirectoryEvent): void {
    if (event.action !== 'deleted' || !event.file.endsWith(SOCKET_SUFFIX)) return;

    const id = basename(event.file, SOCKET_SUFFIX);
    const session = this.registry.get(id);
    if (!session || session.directory !== event.directory) return;

    this.engine.finalize(session);

    const live = this.registry
      .getAll()
      .some((s) => s.directory === event.directory && s.state === 'active');
    if (!live) {
      this.unwatch(event.directory);
    }
  }
}

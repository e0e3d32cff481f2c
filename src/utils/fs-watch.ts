/**
 * @fileoverview Default WatchFactory backed by Node's fs.watch.
 *
 * Both the registry (database directory) and the directory watcher (session
 * directories) take a WatchFactory so tests can drive events by hand.
 *
 * @module utils/fs-watch
 */

import { watch } from 'node:fs';
import type { WatchFactory } from '../types.js';

export const nodeWatchFactory: WatchFactory = (directory, onEvent, onError) => {
  const watcher = watch(directory, { persistent: true }, (eventType, filename) => {
    onEvent(eventType, filename);
  });
  watcher.on('error', onError);
  return watcher;
};

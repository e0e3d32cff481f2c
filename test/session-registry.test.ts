/**
 * @fileoverview Tests for SessionRegistry persistence and reload
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DB_VERSION,
  SessionRegistry,
  parseRegistry,
  serializeRegistry,
  type SessionRegistryOptions,
} from '../src/session-registry.js';
import { ActionRegistry } from '../src/session-actions.js';
import { InvalidSessionError, RegistryClosedError } from '../src/errors.js';
import type { Session } from '../src/types.js';
import { createTestEnv, FakeWatchFactory, makeSession, writeLog, type TestEnv } from './mocks/index.js';

describe('registry file format', () => {
  let env: TestEnv;

  beforeEach(() => {
    env = createTestEnv();
  });

  afterEach(() => {
    env.cleanup();
  });

  it('writes the version header followed by the records', () => {
    const session = makeSession(env.config);
    const content = serializeRegistry([session]);
    const [header, ...rest] = content.split('\n');

    expect(header).toBe('# Tether Session Database Version: 0.6.1');
    const { action: _action, ...persisted } = session;
    expect(JSON.parse(rest.join('\n'))).toEqual({ [session.id]: persisted });
  });

  it('reports a foreign version', () => {
    expect(parseRegistry(serializeRegistry([], '0.0.1'))).toEqual({
      ok: false,
      reason: 'version-mismatch',
      version: '0.0.1',
    });
    expect(parseRegistry('{}')).toEqual({ ok: false, reason: 'version-mismatch', version: null });
  });

  it('reports a malformed body', () => {
    const result = parseRegistry(`# Tether Session Database Version: ${DB_VERSION}\n{"abc": `);
    expect(result.ok).toBe(false);
    expect(result.ok === false && result.reason).toBe('malformed');
  });

  it('rejects records with missing fields', () => {
    const content = `# Tether Session Database Version: ${DB_VERSION}\n${JSON.stringify({ abc: { id: 'abc' } })}`;
    expect(parseRegistry(content).ok).toBe(false);
  });
});

describe('SessionRegistry', () => {
  let env: TestEnv;
  let registry: SessionRegistry;

  function openRegistry(options: Partial<SessionRegistryOptions> = {}): SessionRegistry {
    const opened = new SessionRegistry({ config: env.config, watch: false, ...options });
    opened.open();
    return opened;
  }

  beforeEach(() => {
    env = createTestEnv();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    registry = openRegistry();
  });

  afterEach(() => {
    registry.close();
    vi.restoreAllMocks();
    env.cleanup();
  });

  it('starts empty without a database file', () => {
    expect(registry.getAll()).toEqual([]);
    expect(existsSync(registry.filePath)).toBe(false);
  });

  it('persists on insert and loads the same records back', () => {
    const running = makeSession(env.config, 'make', { state: 'active' });
    const failed = makeSession(env.config, 'npm test', {
      state: 'inactive',
      status: { outcome: 'failure', exitCode: 3 },
      size: 120,
      time: { start: 1_700_000_010, end: 1_700_000_070, duration: 60 },
      metadata: { 'git-branch': 'main' },
    });
    registry.insert(running);
    registry.insert(failed);

    const reloaded = openRegistry();
    expect(reloaded.getAll()).toEqual([running, failed]);
    expect(readFileSync(registry.filePath, 'utf-8').startsWith('# Tether Session Database Version: 0.6.1\n')).toBe(true);
  });

  it('re-attaches actions by origin when loading', () => {
    const callback = vi.fn();
    const actions = new ActionRegistry();
    actions.register('test', { callback });
    registry.insert(makeSession(env.config));

    const reloaded = openRegistry({ actions });
    expect(reloaded.getAll()[0].action.callback).toBe(callback);
  });

  it('loads a file of the current version', () => {
    const session = makeSession(env.config);
    writeFileSync(join(env.config.dbDirectory, 'tether.db'), serializeRegistry([session], '0.6.1'));
    expect(openRegistry().get(session.id)).toEqual(session);
  });

  it('loads a file of another version as empty', () => {
    const session = makeSession(env.config);
    writeFileSync(join(env.config.dbDirectory, 'tether.db'), serializeRegistry([session], '0.0.1'));
    expect(openRegistry().getAll()).toEqual([]);
  });

  it('loads a malformed file as empty', () => {
    registry.persist();
    writeFileSync(registry.filePath, `# Tether Session Database Version: ${DB_VERSION}\nnot json`);
    expect(openRegistry().size).toBe(0);
  });

  it('rejects duplicate inserts and updates of unknown sessions', () => {
    const session = makeSession(env.config);
    registry.insert(session);
    expect(() => registry.insert(session)).toThrow(InvalidSessionError);
    expect(() => registry.update(makeSession(env.config, 'other'))).toThrow(InvalidSessionError);
  });

  it('refuses writes before it has been opened', () => {
    const kept = [makeSession(env.config, 'make'), makeSession(env.config, 'npm test')];
    kept.forEach((session) => registry.insert(session));

    const unopened = new SessionRegistry({ config: env.config, watch: false });
    const extra = makeSession(env.config, 'cargo build');
    expect(() => unopened.insert(extra)).toThrow(RegistryClosedError);
    expect(() => unopened.update(kept[0])).toThrow(RegistryClosedError);
    expect(() => unopened.remove(kept[0])).toThrow(RegistryClosedError);
    expect(() => unopened.persist()).toThrow(RegistryClosedError);

    expect(openRegistry().getAll().map((s) => s.id)).toEqual(kept.map((s) => s.id));
  });

  it('refuses writes after it has been closed', () => {
    registry.close();
    expect(() => registry.insert(makeSession(env.config))).toThrow(RegistryClosedError);
  });

  it('defers writing when an update asks not to persist', () => {
    const session = makeSession(env.config);
    registry.insert(session);

    session.state = 'active';
    registry.update(session, false);
    expect(openRegistry().get(session.id)?.state).toBe('unknown');

    registry.persist();
    expect(openRegistry().get(session.id)?.state).toBe('active');
  });

  it('deletes the log file when removing a session', () => {
    const session = makeSession(env.config);
    registry.insert(session);
    const log = writeLog(session, env.config, 'output\n');

    expect(registry.remove(session)).toBe(true);
    expect(existsSync(log)).toBe(false);
    expect(registry.has(session.id)).toBe(false);
    expect(openRegistry().has(session.id)).toBe(false);
    expect(registry.remove(session)).toBe(false);
  });

  describe('reloading on foreign writes', () => {
    let watch: FakeWatchFactory;
    let watched: SessionRegistry;
    let first: Session;

    beforeEach(() => {
      watch = new FakeWatchFactory();
      watched = openRegistry({ watch: true, watchFactory: watch.factory });
      first = makeSession(env.config, 'make');
      watched.insert(first);
    });

    afterEach(() => {
      watched.close();
    });

    it('watches the database directory', () => {
      expect(watch.openOn(env.config.dbDirectory)).toHaveLength(1);
    });

    it('replaces the in-memory map with the file written by another process', () => {
      const reloaded = vi.fn();
      watched.on('reloaded', reloaded);
      const second = makeSession(env.config, 'npm test');
      writeFileSync(watched.filePath, serializeRegistry([second]));

      watch.emit(env.config.dbDirectory, 'rename', 'tether.db');

      expect(watched.getAll().map((s) => s.id)).toEqual([second.id]);
      expect(reloaded).toHaveBeenCalledTimes(1);
    });

    it('empties the map when another version rewrites the file', () => {
      writeFileSync(watched.filePath, serializeRegistry([first], '0.0.1'));
      watch.emit(env.config.dbDirectory, 'change', 'tether.db');
      expect(watched.size).toBe(0);
    });

    it('ignores its own writes', () => {
      const reloaded = vi.fn();
      watched.on('reloaded', reloaded);
      watch.emit(env.config.dbDirectory, 'rename', 'tether.db');
      expect(reloaded).not.toHaveBeenCalled();
    });

    it('ignores other files in the directory', () => {
      const reloaded = vi.fn();
      watched.on('reloaded', reloaded);
      writeFileSync(watched.filePath, serializeRegistry([]));
      watch.emit(env.config.dbDirectory, 'rename', 'session-lifecycle.jsonl');
      expect(reloaded).not.toHaveBeenCalled();
      expect(watched.has(first.id)).toBe(true);
    });

    it('ignores a partially written file', () => {
      writeFileSync(watched.filePath, `# Tether Session Database Version: ${DB_VERSION}\n{"abc": `);
      watch.emit(env.config.dbDirectory, 'change', 'tether.db');
      expect(watched.has(first.id)).toBe(true);
    });

    it('stops watching when closed', () => {
      watched.close();
      expect(watch.openOn(env.config.dbDirectory)).toHaveLength(0);
    });
  });
});

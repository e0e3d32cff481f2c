/**
 * @fileoverview Tests for SessionStateEngine transitions and the reconciliation sweep
 */

import type { Mock } from 'vitest';
import { existsSync, mkdirSync, rmSync, utimesSync } from 'node:fs';
import { join } from 'node:path';
import { SessionRegistry } from '../src/session-registry.js';
import { SessionStateEngine } from '../src/session-state-engine.js';
import type { Session } from '../src/types.js';
import { createTestEnv, makeSession, touchSocket, writeLog, TEST_START, type TestEnv } from './mocks/index.js';

const NOW = TEST_START + 100;

describe('SessionStateEngine', () => {
  let env: TestEnv;
  let registry: SessionRegistry;
  let engine: SessionStateEngine;
  let notify: Mock<(session: Session) => void>;
  let onActive: Mock<(session: Session) => void>;
  let onRemoved: Mock<(session: Session, reason: string) => void>;

  function register(command: string, overrides: Partial<Session> = {}): Session {
    const session = makeSession(env.config, command, overrides);
    registry.insert(session);
    return session;
  }

  function reopenedState(id: string): string | undefined {
    const fresh = new SessionRegistry({ config: env.config, watch: false });
    fresh.open();
    return fresh.get(id)?.state;
  }

  beforeEach(() => {
    env = createTestEnv();
    registry = new SessionRegistry({ config: env.config, watch: false });
    registry.open();
    notify = vi.fn<(session: Session) => void>();
    onActive = vi.fn<(session: Session) => void>();
    onRemoved = vi.fn<(session: Session, reason: string) => void>();
    engine = new SessionStateEngine({
      registry,
      config: env.config,
      notify,
      onActive,
      onRemoved,
      now: () => NOW,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    env.cleanup();
  });

  describe('markActive', () => {
    it('moves unknown sessions to active and persists', () => {
      const session = register('make');
      expect(engine.markActive(session)).toBe(true);
      expect(session.state).toBe('active');
      expect(reopenedState(session.id)).toBe('active');
    });

    it('does nothing for sessions past unknown', () => {
      const session = register('make', { state: 'inactive' });
      expect(engine.markActive(session)).toBe(false);
      expect(session.state).toBe('inactive');
    });

    it('leaves sessions that are not registered untouched', () => {
      const session = makeSession(env.config, 'make');
      expect(engine.markActive(session)).toBe(false);
      expect(session.state).toBe('unknown');
      expect(registry.size).toBe(0);
    });
  });

  describe('finalize', () => {
    it('records size, timing and status, then notifies once', () => {
      const session = register('sleep 1 && echo done');
      touchSocket(session, env.config);
      writeLog(session, env.config, 'done\n');
      engine.markActive(session);

      rmSync(join(env.config.sessionDirectory, `${session.id}.socket`));
      expect(engine.finalize(session)).toBe(true);

      expect(session.state).toBe('inactive');
      expect(session.size).toBe(5);
      expect(session.time).toEqual({ start: TEST_START, end: NOW, duration: 100 });
      expect(session.status).toEqual({ outcome: 'unknown', exitCode: 0 });
      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith(session);
      expect(reopenedState(session.id)).toBe('inactive');
    });

    it('is a no-op the second time', () => {
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, 'ok\n');
      engine.finalize(session);
      const time = { ...session.time };

      expect(engine.finalize(session)).toBe(false);
      expect(session.time).toEqual(time);
      expect(notify).toHaveBeenCalledTimes(1);
    });

    it('ignores sessions that never became active', () => {
      const session = register('make');
      expect(engine.finalize(session)).toBe(false);
      expect(session.state).toBe('unknown');
      expect(notify).not.toHaveBeenCalled();
    });

    it('leaves a session dropped from the registry untouched', () => {
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, 'Tether session finished\n');
      registry.remove(session);
      const before = { ...session, time: { ...session.time }, status: { ...session.status } };

      expect(engine.finalize(session)).toBe(false);
      expect(session).toEqual(before);
      expect(notify).not.toHaveBeenCalled();
    });

    it('reads success from the sentinel line', () => {
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, 'building\n\nTether session finished\n');
      engine.finalize(session);
      expect(session.status).toEqual({ outcome: 'success', exitCode: 0 });
    });

    it('reads the exit code from the failure sentinel', () => {
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, 'error: no rule\n\nTether session exited abnormally with code 2\n');
      engine.finalize(session);
      expect(session.status).toEqual({ outcome: 'failure', exitCode: 2 });
    });

    it('prefers the session status action over the log', () => {
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, 'Tether session finished\n');
      session.action.status = () => ({ outcome: 'failure', exitCode: 9 });
      engine.finalize(session);
      expect(session.status).toEqual({ outcome: 'failure', exitCode: 9 });
    });

    it('falls back to the log when the status action throws', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, 'Tether session finished\n');
      session.action.status = () => {
        throw new Error('parse failure');
      };
      engine.finalize(session);
      expect(session.status).toEqual({ outcome: 'success', exitCode: 0 });
    });

    it('runs the completion callback after notifying', () => {
      const calls: string[] = [];
      notify.mockImplementation(() => calls.push('notify'));
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, '');
      session.action.callback = (finished) => {
        calls.push(`callback:${finished.state}`);
      };

      engine.finalize(session);
      expect(calls).toEqual(['notify', 'callback:inactive']);
    });

    it('keeps the transition when the completion callback throws', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, '');
      session.action.callback = () => {
        throw new Error('callback broke');
      };

      expect(engine.finalize(session)).toBe(true);
      expect(session.state).toBe('inactive');
      expect(error).toHaveBeenCalledTimes(1);
    });

    it('takes the end time from the log mtime when approximating', () => {
      const session = register('make', { state: 'active' });
      const log = writeLog(session, env.config, 'x\n');
      utimesSync(log, TEST_START + 50, TEST_START + 50);

      engine.finalize(session, { approximate: true });
      expect(session.time).toEqual({ start: TEST_START, end: TEST_START + 50, duration: 50 });
    });

    it('never records a negative duration', () => {
      const session = register('make', { state: 'active', time: { start: NOW + 10, end: 0, duration: 0 } });
      writeLog(session, env.config, '');
      engine.finalize(session);
      expect(session.time.duration).toBe(0);
    });
  });

  describe('reconcile', () => {
    it('promotes unknown sessions that have a log', () => {
      const session = register('make');
      writeLog(session, env.config, '');

      const result = engine.reconcile();

      expect(result.activated).toEqual([session.id]);
      expect(session.state).toBe('active');
      expect(onActive).toHaveBeenCalledWith(session);
      expect(reopenedState(session.id)).toBe('active');
    });

    it('removes sessions whose log is gone without notifying', () => {
      const unknown = register('make');
      const active = register('npm test', { state: 'active' });

      const result = engine.reconcile();

      expect(result.removed).toEqual([unknown.id, active.id]);
      expect(registry.size).toBe(0);
      expect(notify).not.toHaveBeenCalled();
      expect(onRemoved).toHaveBeenCalledWith(active, 'log file missing');
    });

    it('finalizes active sessions whose socket is gone', () => {
      const session = register('make', { state: 'active' });
      const log = writeLog(session, env.config, 'Tether session finished\n');
      utimesSync(log, TEST_START + 30, TEST_START + 30);

      const result = engine.reconcile();

      expect(result.finished).toEqual([session.id]);
      expect(session.state).toBe('inactive');
      expect(session.time.end).toBe(TEST_START + 30);
      expect(session.status.outcome).toBe('success');
      expect(notify).toHaveBeenCalledTimes(1);
    });

    it('leaves running sessions active and reports them', () => {
      const session = register('make', { state: 'active' });
      writeLog(session, env.config, '');
      touchSocket(session, env.config);

      const result = engine.reconcile();

      expect(result).toEqual({ activated: [], finished: [], removed: [], skipped: [] });
      expect(session.state).toBe('active');
      expect(onActive).toHaveBeenCalledWith(session);
    });

    it('leaves inactive sessions alone', () => {
      const session = register('make', { state: 'inactive' });
      const result = engine.reconcile();
      expect(result.removed).toEqual([]);
      expect(registry.has(session.id)).toBe(true);
    });

    it('skips remote sessions whose host is not mounted', () => {
      const session = register('make', {
        state: 'active',
        directory: 'ssh://build01/tmp/tether',
        host: { name: 'build01', type: 'remote' },
      });

      const result = engine.reconcile();

      expect(result.skipped).toEqual([session.id]);
      expect(session.state).toBe('active');
      expect(registry.has(session.id)).toBe(true);
    });

    it('reads remote sessions through their mount', () => {
      const mount = join(env.root, 'mnt', 'build01');
      mkdirSync(join(mount, 'tmp', 'tether'), { recursive: true });
      env.config.remoteMounts = { build01: mount };
      engine = new SessionStateEngine({ registry, config: env.config, notify, now: () => NOW });
      const session = register('make', {
        state: 'active',
        directory: 'ssh://build01/tmp/tether',
        host: { name: 'build01', type: 'remote' },
      });
      writeLog(session, env.config, 'Tether session exited abnormally with code 1\n');

      const result = engine.reconcile();

      expect(result.finished).toEqual([session.id]);
      expect(session.status).toEqual({ outcome: 'failure', exitCode: 1 });
    });

    it('carries on after a session fails to reconcile', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const first = register('make');
      const second = register('npm test');
      writeLog(first, env.config, '');
      writeLog(second, env.config, '');
      vi.spyOn(registry, 'update').mockImplementationOnce(() => {
        throw new Error('disk full');
      });

      const result = engine.reconcile();

      expect(result.activated).toEqual([second.id]);
      expect(existsSync(registry.filePath)).toBe(true);
    });
  });
});

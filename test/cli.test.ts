/**
 * @fileoverview Tests for command-line argument handling
 *
 * SessionManager is replaced so that no dtach process is launched; the tests
 * check what the commands hand to it.
 */

import { CommanderError } from 'commander';
import type { Session, SessionContext } from '../src/types.js';
import { createTestEnv, makeSession, type TestEnv } from './mocks/index.js';

const { startSession } = vi.hoisted(() => ({
  startSession: vi.fn<(command: string, mode: string, context: SessionContext) => Promise<Session | null>>(),
}));

vi.mock('../src/session-manager.js', () => ({
  SessionManager: class {
    start() {
      return { activated: [], finished: [], removed: [], skipped: [] };
    }
    async stop() {}
    startSession = startSession;
  },
}));

import { parsePositiveInt, program } from '../src/cli.js';

describe('tether CLI', () => {
  let env: TestEnv;

  function run(...args: string[]): Promise<unknown> {
    return program.parseAsync(['node', 'tether', ...args]);
  }

  beforeAll(() => {
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
    }
  });

  beforeEach(() => {
    env = createTestEnv();
    startSession.mockResolvedValue(makeSession(env.config, 'make'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    startSession.mockReset();
    vi.restoreAllMocks();
    env.cleanup();
  });

  describe('run', () => {
    it('passes the wrapped command its own flags', async () => {
      await run('run', 'make', '-j4');
      expect(startSession).toHaveBeenCalledTimes(1);
      expect(startSession.mock.calls[0][0]).toBe('make -j4');
      expect(startSession.mock.calls[0][1]).toBe('create');
    });

    it('keeps option letters tether also uses when they follow the command', async () => {
      await run('run', '-C', env.root, 'ls', '-C');
      expect(startSession.mock.calls[0][0]).toBe('ls -C');
      expect(startSession.mock.calls[0][2]).toEqual({ origin: 'cli', workingDirectory: env.root });
    });
  });

  describe('start', () => {
    it('passes the wrapped command its own flags', async () => {
      await run('start', 'npm', 'test', '--', '--watch=false');
      expect(startSession.mock.calls[0][0]).toBe('npm test -- --watch=false');
      expect(startSession.mock.calls[0][1]).toBe('create-and-attach');
    });
  });

  describe('history', () => {
    it('rejects a limit that is not a number', async () => {
      const error = await run('history', '--limit', 'abc').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CommanderError);
      expect(error instanceof CommanderError && error.code).toBe('commander.invalidArgument');
    });
  });

  describe('parsePositiveInt', () => {
    it('accepts whole numbers from one up', () => {
      expect(parsePositiveInt('1')).toBe(1);
      expect(parsePositiveInt('25')).toBe(25);
    });

    it.each(['abc', '0', '-3', '2.5', ''])('rejects %j', (value) => {
      expect(() => parsePositiveInt(value)).toThrow('Expected a positive whole number.');
    });
  });
});

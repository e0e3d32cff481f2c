/**
 * @fileoverview Tether command-line interface.
 *
 * Every command builds a SessionManager from the loaded configuration,
 * reconciles, does its work and stops the manager again, except `watch`,
 * which stays up and reports sessions as they finish.
 *
 * @module cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import type { SessionState } from './types.js';
import { loadConfig } from './config/session-config.js';
import { SessionManager, type CreateMode } from './session-manager.js';
import { gitBranchAnnotator, sessionLogPath } from './session.js';
import { formatSessionRows, renderSessionTable } from './session-labels.js';
import { SessionLifecycleLog } from './session-lifecycle-log.js';
import { isRemotePath } from './utils/remote-path.js';

const CLI_ORIGIN = 'cli';
const SESSION_STATES: readonly SessionState[] = ['unknown', 'active', 'inactive'];

function createManager(): SessionManager {
  return new SessionManager({
    config: loadConfig(),
    annotators: [gitBranchAnnotator],
    // Short-lived commands do not need to follow other processes' writes
    watchRegistry: false,
  });
}

/** Run `fn` against a started manager and always stop it afterwards */
async function withManager<T>(fn: (manager: SessionManager) => Promise<T> | T): Promise<T> {
  const manager = createManager();
  manager.start();
  try {
    return await fn(manager);
  } finally {
    await manager.stop();
  }
}

function workingDirectory(directory: string | undefined): string {
  if (!directory) return process.cwd();
  return isRemotePath(directory) ? directory : resolve(directory);
}

function parseState(value: string): SessionState {
  const state = SESSION_STATES.find((s) => s === value);
  if (!state) {
    throw new Error(`Invalid state "${value}" (expected ${SESSION_STATES.join(', ')})`);
  }
  return state;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

async function startCommand(words: string[], mode: CreateMode, opts: { directory?: string; origin: string }) {
  await withManager(async (manager) => {
    const session = await manager.startSession(words.join(' '), mode, {
      origin: opts.origin,
      workingDirectory: workingDirectory(opts.directory),
    });
    if (!session) {
      process.exitCode = 1;
      return;
    }
    if (mode === 'create') {
      console.log(`${session.id.slice(0, 8)}  ${sessionLogPath(session)}`);
    }
  });
}

export const program = new Command();

program
  .name('tether')
  .description('Run shell commands in detachable dtach sessions')
  .version('0.6.1')
  // Options after the command's first word belong to that command (`tether run make -j4`)
  .enablePositionalOptions();

program
  .command('run')
  .passThroughOptions()
  .description('Start a command in the background')
  .argument('<command...>', 'command line to run')
  .option('-C, --directory <dir>', 'working directory (local path or ssh://host/path)')
  .option('--origin <name>', 'tag recorded on the session', CLI_ORIGIN)
  .action(async (words: string[], opts: { directory?: string; origin: string }) => {
    await startCommand(words, 'create', opts);
  });

program
  .command('start')
  .passThroughOptions()
  .description('Start a command and attach to it')
  .argument('<command...>', 'command line to run')
  .option('-C, --directory <dir>', 'working directory (local path or ssh://host/path)')
  .option('--origin <name>', 'tag recorded on the session', CLI_ORIGIN)
  .action(async (words: string[], opts: { directory?: string; origin: string }) => {
    await startCommand(words, 'create-and-attach', opts);
  });

program
  .command('list')
  .description('List sessions, newest first')
  .option('--state <state>', 'only sessions in this state', parseState)
  .option('--origin <name>', 'only sessions with this origin')
  .option('--host <name>', 'only sessions on this host')
  .option('--json', 'output as JSON')
  .action(async (opts: { state?: SessionState; origin?: string; host?: string; json?: boolean }) => {
    await withManager((manager) => {
      const sessions = manager.listSessions({ state: opts.state, origin: opts.origin, host: opts.host });
      if (opts.json) {
        console.log(JSON.stringify(sessions.map(({ action: _action, ...rest }) => rest), null, 2));
        return;
      }
      if (sessions.length === 0) {
        console.log('No sessions');
        return;
      }
      console.log(renderSessionTable(formatSessionRows(sessions, manager.config.maxCommandLength)));
    });
  });

program
  .command('attach')
  .description('Attach to a session (tails or shows output when attaching is not possible)')
  .argument('<id>', 'session id or unique prefix')
  .action(async (id: string) => {
    await withManager(async (manager) => {
      if (!(await manager.attachSession(id))) process.exitCode = 1;
    });
  });

program
  .command('view')
  .alias('output')
  .description('Print the output of a session')
  .argument('<id>', 'session id or unique prefix')
  .action(async (id: string) => {
    await withManager(async (manager) => {
      if (!(await manager.viewSession(id))) process.exitCode = 1;
    });
  });

program
  .command('rerun')
  .description('Run the command of a session again')
  .argument('<id>', 'session id or unique prefix')
  .option('-a, --attach', 'attach to the new session')
  .action(async (id: string, opts: { attach?: boolean }) => {
    await withManager(async (manager) => {
      const session = await manager.rerunSession(id, opts.attach ? 'create-and-attach' : 'create');
      if (session && !opts.attach) console.log(session.id.slice(0, 8));
    });
  });

program
  .command('kill')
  .description('Terminate the processes of a running session')
  .argument('<id>', 'session id or unique prefix')
  .action(async (id: string) => {
    await withManager((manager) => {
      if (!manager.killSession(id)) process.exitCode = 1;
    });
  });

program
  .command('delete')
  .description('Delete a finished session and its log')
  .argument('<ids...>', 'session ids or unique prefixes')
  .action(async (ids: string[]) => {
    await withManager((manager) => {
      for (const id of ids) {
        if (!manager.deleteSession(id)) process.exitCode = 1;
      }
    });
  });

program
  .command('history')
  .description('Show lifecycle events from the audit log')
  .option('--session <id>', 'only events of this session')
  .option('--limit <n>', 'maximum number of events', parsePositiveInt, 50)
  .action(async (opts: { session?: string; limit: number }) => {
    const log = new SessionLifecycleLog(loadConfig().dbDirectory);
    const entries = await log.query({ sessionId: opts.session, limit: opts.limit });
    for (const entry of entries) {
      const when = new Date(entry.ts).toISOString();
      const detail = entry.reason ?? entry.command ?? '';
      console.log(`${when}  ${entry.event.padEnd(13)}  ${entry.sessionId.slice(0, 8)}  ${detail}`);
    }
  });

program
  .command('watch')
  .description('Stay running and report sessions as they finish')
  .action(async () => {
    const manager = new SessionManager({ config: loadConfig(), annotators: [gitBranchAnnotator] });
    const result = manager.start();
    console.log(
      `[Tether] Watching ${manager.watcher.watchedDirectories().length} directories ` +
      `(${result.activated.length} activated, ${result.finished.length} finished, ${result.removed.length} removed)`,
    );
    await new Promise<void>((resolveStop) => {
      const shutdown = () => {
        manager.stop().then(resolveStop, (err: unknown) => {
          console.error('[Tether] Shutdown failed:', err);
          resolveStop();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
  });

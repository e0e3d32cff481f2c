/**
 * @fileoverview Tether configuration: defaults, config file, env overrides.
 *
 * Resolution order (later wins):
 * 1. Built-in defaults
 * 2. `~/.tether/config.json` (or `<TETHER_DIR>/config.json`), validated with zod
 * 3. Environment variables (TETHER_DIR, TETHER_SESSION_DIR, TETHER_DTACH, TETHER_SHELL)
 *
 * An invalid config file is reported and ignored; it never stops startup.
 *
 * @module config/session-config
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { getErrorMessage } from '../types.js';

export interface TetherConfig {
  /** Directory holding the registry file and the lifecycle log */
  dbDirectory: string;
  /** Directory holding `<id>.socket` and `<id>.log` on every host */
  sessionDirectory: string;
  dtachProgram: string;
  shellProgram: string;
  /** Script that runs the command and appends the exit sentinel; null disables it */
  envReporter: string | null;
  /** Commands matching any of these never support live re-attachment */
  nonAttachablePatterns: string[];
  /** Commands matching any of these produce terminal data rather than plain text */
  terminalDataPatterns: string[];
  /** Print the log so far before attaching */
  showOutputOnAttach: boolean;
  /** Seconds between tail polls when following a non-attachable session */
  tailInterval: number;
  /** Longest command shown in a session label */
  maxCommandLength: number;
  /** hostname → local mount point of that host's filesystem root */
  remoteMounts: Record<string, string>;
}

/** Bundled environment reporter, next to the package root */
export const DEFAULT_ENV_REPORTER = fileURLToPath(new URL('../../bin/tether-env', import.meta.url));

export const DEFAULT_NON_ATTACHABLE_PATTERNS = [
  '^ls(\\s|$)',
  '^cat\\s',
  '^grep\\s',
  '^rg\\s',
  '^find\\s',
  '^du\\s',
];

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): TetherConfig {
  return {
    dbDirectory: join(homedir(), '.tether'),
    sessionDirectory: join(tmpdir(), 'tether'),
    dtachProgram: 'dtach',
    shellProgram: env.SHELL || 'bash',
    envReporter: DEFAULT_ENV_REPORTER,
    nonAttachablePatterns: [...DEFAULT_NON_ATTACHABLE_PATTERNS],
    terminalDataPatterns: [],
    showOutputOnAttach: false,
    tailInterval: 2,
    maxCommandLength: 90,
    remoteMounts: {},
  };
}

const absolutePath = z.string().min(1).refine((p) => p.startsWith('/'), {
  message: 'must be an absolute path',
});

const regexSource = z.string().refine((source) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}, { message: 'must be a valid regular expression' });

/** Shape of `config.json`; every key optional, unknown keys rejected */
export const ConfigFileSchema = z.object({
  dbDirectory: absolutePath,
  sessionDirectory: absolutePath,
  dtachProgram: z.string().min(1),
  shellProgram: z.string().min(1),
  envReporter: z.string().min(1).nullable(),
  nonAttachablePatterns: z.array(regexSource),
  terminalDataPatterns: z.array(regexSource),
  showOutputOnAttach: z.boolean(),
  tailInterval: z.number().positive().max(3600),
  maxCommandLength: z.number().int().min(10).max(1000),
  remoteMounts: z.record(z.string().min(1), absolutePath),
}).partial().strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; defaults to `<dbDirectory>/config.json` */
  configFile?: string;
}

/**
 * Parse and validate config file content.
 * Returns null (with a warning) when the content is unusable.
 */
export function parseConfigFile(content: string, source: string): ConfigFile | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    console.warn(`[Config] Ignoring ${source}: invalid JSON (${getErrorMessage(err)})`);
    return null;
  }
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    console.warn(`[Config] Ignoring ${source}: ${issues}`);
    return null;
  }
  return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): TetherConfig {
  const env = options.env ?? process.env;
  const config = defaultConfig(env);

  if (env.TETHER_DIR) config.dbDirectory = env.TETHER_DIR;

  const configFile = options.configFile ?? join(config.dbDirectory, 'config.json');
  if (existsSync(configFile)) {
    try {
      const parsed = parseConfigFile(readFileSync(configFile, 'utf-8'), configFile);
      if (parsed) Object.assign(config, parsed);
    } catch (err) {
      console.warn(`[Config] Could not read ${configFile}: ${getErrorMessage(err)}`);
    }
  }

  if (env.TETHER_DIR) config.dbDirectory = env.TETHER_DIR;
  if (env.TETHER_SESSION_DIR) config.sessionDirectory = env.TETHER_SESSION_DIR;
  if (env.TETHER_DTACH) config.dtachProgram = env.TETHER_DTACH;
  if (env.TETHER_SHELL) config.shellProgram = env.TETHER_SHELL;

  return config;
}

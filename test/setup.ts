/**
 * @fileoverview Global test setup for Tether tests
 *
 * Points TETHER_DIR and TETHER_SESSION_DIR at a throwaway directory so that
 * no test (including anything calling loadConfig() without options) can read
 * or write the real ~/.tether registry or session directory.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll } from 'vitest';

const sandbox = mkdtempSync(join(tmpdir(), 'tether-suite-'));

process.env.TETHER_DIR = join(sandbox, 'db');
process.env.TETHER_SESSION_DIR = join(sandbox, 'sessions');

afterAll(() => {
  rmSync(sandbox, { recursive: true, force: true });
});

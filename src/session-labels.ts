/**
 * @fileoverview Display labels and list rows for sessions.
 *
 * @module session-labels
 */

import type { Session } from './types.js';
import { assertNever } from './utils/type-safety.js';
import { formatSessionDuration, formatSessionSize, formatTimestamp } from './session-output.js';

const DEFAULT_MAX_LENGTH = 90;

/** Single-line command text, truncated with an ellipsis */
export function sessionLabel(session: Pick<Session, 'command'>, maxLength: number = DEFAULT_MAX_LENGTH): string {
  const flat = session.command.replace(/\s*\n\s*/g, ' ').trim();
  if (flat.length <= maxLength) return flat;
  return `${flat.slice(0, Math.max(0, maxLength - 1))}…`;
}

/**
 * Labels for a list of sessions, made distinct. Sessions whose labels
 * collide get ` (1)`, ` (2)`, … in their original order; unique labels are
 * left alone.
 */
export function uniqueSessionLabels(
  sessions: readonly Pick<Session, 'command'>[],
  maxLength: number = DEFAULT_MAX_LENGTH,
): string[] {
  const labels = sessions.map((s) => sessionLabel(s, maxLength));

  const counts = new Map<string, number>();
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  const taken = new Set(labels.filter((label) => counts.get(label) === 1));
  const nextIndex = new Map<string, number>();

  return labels.map((label) => {
    if (counts.get(label) === 1) return label;
    let index = nextIndex.get(label) ?? 1;
    let candidate = `${label} (${index})`;
    while (taken.has(candidate)) {
      index++;
      candidate = `${label} (${index})`;
    }
    nextIndex.set(label, index + 1);
    taken.add(candidate);
    return candidate;
  });
}

/** One-character state marker for list output */
export function stateGlyph(session: Pick<Session, 'state' | 'status'>): string {
  switch (session.state) {
    case 'active':
      return '●';
    case 'unknown':
      return '?';
    case 'inactive':
      if (session.status.outcome === 'success') return '✓';
      if (session.status.outcome === 'failure') return '✗';
      return '-';
    default:
      return assertNever(session.state);
  }
}

export interface SessionRow {
  id: string;
  glyph: string;
  label: string;
  origin: string;
  directory: string;
  host: string;
  duration: string;
  size: string;
  started: string;
}

/** Columns for a session list, labels already deduplicated */
export function formatSessionRows(sessions: readonly Session[], maxLength?: number): SessionRow[] {
  const labels = uniqueSessionLabels(sessions, maxLength);
  return sessions.map((session, i) => ({
    id: session.id.slice(0, 8),
    glyph: session.state === 'inactive' && session.status.outcome === 'failure'
      ? `✗ ${session.status.exitCode}`
      : stateGlyph(session),
    label: labels[i],
    origin: session.origin,
    directory: session.workingDirectory,
    host: session.host.name,
    duration: session.state === 'inactive' ? formatSessionDuration(session.time.duration) : '',
    size: session.state === 'inactive' ? formatSessionSize(session.size) : '',
    started: formatTimestamp(session.time.start),
  }));
}

/** Render rows as aligned text columns */
export function renderSessionTable(rows: readonly SessionRow[]): string {
  const columns: (keyof SessionRow)[] = ['id', 'glyph', 'label', 'origin', 'duration', 'size', 'started', 'host', 'directory'];
  const widths = columns.map((column) => Math.max(0, ...rows.map((row) => row[column].length)));
  return rows
    .map((row) => columns.map((column, i) => row[column].padEnd(widths[i])).join('  ').trimEnd())
    .join('\n');
}

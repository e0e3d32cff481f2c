/**
 * @fileoverview POSIX shell quoting for invocations handed to sh/bash.
 *
 * @module utils/shell-quote
 */

/** Characters that never need quoting */
const SAFE_ARG_PATTERN = /^[A-Za-z0-9_\/.,:=@%+-]+$/;

/**
 * Wrap a string in single quotes, escaping embedded single quotes.
 * `it's` → `'it'\''s'`
 */
export function singleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Quote an argument only when the shell would otherwise split or expand it */
export function shellQuote(arg: string): string {
  if (arg === '') return "''";
  return SAFE_ARG_PATTERN.test(arg) ? arg : singleQuote(arg);
}

/** Join an argument vector into one shell command line */
export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(' ');
}

/** Escape a literal for use inside a RegExp */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

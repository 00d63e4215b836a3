/**
 * @fileoverview POSIX shell quoting for commands sent to remote shells.
 *
 * @module utils/shell-quote
 */

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quote one argument for /bin/sh */
export function shellQuote(arg: string): string {
  if (arg !== '' && SAFE_WORD.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Quote and join an argument vector into one command line */
export function shellJoin(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ');
}

/**
 * POSIX shell quoting for remote commands
 */

const SAFE = /^[A-Za-z0-9_@%+=:,./~-]+$/;

export function shellQuote(value: string): string {
  if (value === '') return "''";
  if (SAFE.test(value) && !value.startsWith('~')) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Quote a remote directory, keeping a leading `~/` unquoted so the remote shell expands it
 */
export function quoteRemotePath(path: string): string {
  if (path === '~') return '~';
  if (path.startsWith('~/')) return `~/${shellQuote(path.slice(2))}`;
  return shellQuote(path);
}

export function joinCommand(args: string[]): string {
  return args.map(shellQuote).join(' ');
}

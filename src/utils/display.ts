import chalk from 'chalk';

export function success(msg: string): void {
  console.log(chalk.green('✓') + ' ' + msg);
}

export function warn(msg: string): void {
  console.log(chalk.yellow('⚠') + ' ' + msg);
}

export function error(msg: string): void {
  console.error(chalk.red('✗') + ' ' + msg);
}

export function info(msg: string): void {
  console.log(chalk.blue('ℹ') + ' ' + msg);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

export function isDebugEnabled(): boolean {
  return process.env['WTUI_DEBUG'] === '1';
}

/**
 * Diagnostic line on stderr, only with WTUI_DEBUG=1.
 */
export function debug(msg: string): void {
  if (!isDebugEnabled()) return;
  console.error(chalk.dim(`[wtui] ${msg}`));
}

/**
 * Quote a command-line argument for display when it contains shell-sensitive characters.
 */
export function shellQuote(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Format a command line for display.
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(shellQuote).join(' ');
}

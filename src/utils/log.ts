/**
 * Diagnostics
 * Single-line messages on stderr, kept apart from the event stream on stdout
 */

const PREFIX = '[splitwatch]';

export function logWarning(message: string): void {
  process.stderr.write(`${PREFIX} warning: ${message}\n`);
}

export function logError(message: string): void {
  process.stderr.write(`${PREFIX} error: ${message}\n`);
}

export function logDebug(message: string): void {
  process.stderr.write(`${PREFIX} debug: ${message}\n`);
}

/**
 * Bridge CLI Utilities
 *
 * Output helpers shared by the bridge commands. Render functions return
 * strings and take an explicit color flag so they can be tested without a
 * terminal.
 *
 * @module packages/cli/commands/bridge/utils
 */

import { Chalk, type ChalkInstance } from 'chalk';

// =============================================================================
// Output Control
// =============================================================================

export interface OutputOptions {
  json?: boolean;
  color: boolean;
}

/**
 * Color is off for NO_COLOR, TERM=dumb and non-TTY output.
 */
export function shouldUseColor(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  if (process.env.TERM === 'dumb') return false;
  if (!process.stdout.isTTY) return false;
  return true;
}

export function createPalette(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? 1 : 0 });
}

/**
 * Aligned `label value` rows.
 */
export function formatRows(rows: ReadonlyArray<readonly [string, string]>, palette: ChalkInstance): string {
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, value]) => `${palette.dim(label.padEnd(width))}  ${value}`).join('\n');
}

// =============================================================================
// Error Handling
// =============================================================================

export function formatError(error: unknown, json: boolean): string {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  if (json) {
    return JSON.stringify({ success: false, error: { message, code: code ?? 'UNKNOWN' } }, null, 2);
  }
  return code ? `Error: ${message}\nCode: ${code}` : `Error: ${message}`;
}

/**
 * Print the error and exit with status 1.
 */
export function handleError(error: unknown, json = false): never {
  if (json) {
    console.log(formatError(error, true));
  } else {
    console.error(formatError(error, false));
  }
  process.exit(1);
}

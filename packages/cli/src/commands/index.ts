/**
 * CLI Commands Registry
 *
 * Registers all command groups with the main program.
 *
 * @module packages/cli/commands
 */

import type { Command } from 'commander';
import { registerBridgeCommands } from './bridge/index.js';

/**
 * Registers all commands with the program
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerBridgeCommands(program);
}

export { registerBridgeCommands };

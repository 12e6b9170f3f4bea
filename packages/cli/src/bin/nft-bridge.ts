#!/usr/bin/env node
/**
 * nft-bridge CLI
 *
 * Entry point for the `nft-bridge` command: payload inspection and
 * configuration checks for the L2 bridge endpoint.
 *
 * @module packages/cli/bin/nft-bridge
 */

import { Command } from 'commander';
import { registerCommands } from '../commands/index.js';
import { handleError } from '../commands/bridge/utils.js';

const program = new Command();

program
  .name('nft-bridge')
  .description('Inspect and build messages for the L2 NFT bridge')
  .version('0.1.0')
  .option('--no-color', 'Disable colored output');

registerCommands(program);

program.parseAsync().catch((error: unknown) => handleError(error));

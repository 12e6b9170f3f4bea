/**
 * Bridge Commands
 *
 * Registers `decode`, `encode`, `interface-id` and `config` on the program.
 *
 * @module packages/cli/commands/bridge
 */

import type { Command } from 'commander';
import type { EncodeInput } from './encode.js';
import { shouldUseColor, type OutputOptions } from './utils.js';

interface JsonFlag {
  json?: boolean;
}

function outputOptions(parent: Command, options: JsonFlag): OutputOptions {
  const globals = parent.optsWithGlobals<{ color?: boolean }>();
  return { json: options.json, color: globals.color !== false && shouldUseColor() };
}

export function registerBridgeCommands(program: Command): void {
  program
    .command('decode <payload>')
    .description('Decode a finalize payload sent between the bridges')
    .option('--json', 'Output as JSON')
    .action(async (payload: string, options: JsonFlag) => {
      const { decodeCommand } = await import('./decode.js');
      decodeCommand(payload, outputOptions(program, options));
    });

  program
    .command('encode <kind>')
    .description('Encode a finalize payload (kind: deposit or withdrawal)')
    .requiredOption('--l1-token <address>', 'L1 token address')
    .requiredOption('--l2-token <address>', 'L2 token address')
    .requiredOption('--from <address>', 'Sender on the originating domain')
    .requiredOption('--to <address>', 'Recipient on the destination domain')
    .requiredOption('--item-id <id>', 'Item id (decimal or 0x-prefixed)')
    .option('--data <hex>', 'Opaque data forwarded with the message', '0x')
    .option('--json', 'Output as JSON')
    .action(async (kind: string, options: EncodeInput & JsonFlag) => {
      const { encodeCommand } = await import('./encode.js');
      encodeCommand(kind, options, outputOptions(program, options));
    });

  program
    .command('interface-id [signatures...]')
    .description('Compute an ERC-165 interface id (default: the bridged-token interface)')
    .option('--json', 'Output as JSON')
    .action(async (signatures: string[], options: JsonFlag) => {
      const { interfaceIdCommand } = await import('./interface-id.js');
      interfaceIdCommand(signatures, outputOptions(program, options));
    });

  program
    .command('config')
    .description('Validate the bridge environment and print the resolved configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonFlag) => {
      const { configCommand } = await import('./config.js');
      configCommand(outputOptions(program, options));
    });
}

/**
 * `nft-bridge encode`
 *
 * Build a finalize payload and its hash from command-line fields.
 *
 * @module packages/cli/commands/bridge/encode
 */

import {
  encodeFinalizeDeposit,
  encodeFinalizeWithdrawal,
  hashMessage,
  parseBridgeMessage,
} from '../../../../adapters/bridge/message-codec.js';
import { createPalette, formatRows, handleError, type OutputOptions } from './utils.js';

export interface EncodeInput {
  l1Token: string;
  l2Token: string;
  from: string;
  to: string;
  itemId: string;
  data?: string;
}

/**
 * @returns Payload and its hash, one per line
 */
export function renderEncoded(kind: string, input: EncodeInput, options: OutputOptions): string {
  const message = parseBridgeMessage({ ...input, itemId: BigInt(input.itemId), data: input.data ?? '0x' });
  const payload =
    kind === 'deposit'
      ? encodeFinalizeDeposit(message)
      : kind === 'withdrawal'
        ? encodeFinalizeWithdrawal(message)
        : undefined;
  if (!payload) {
    throw new Error(`Unknown message kind "${kind}" (expected deposit or withdrawal)`);
  }

  const messageHash = hashMessage(payload);
  if (options.json) {
    return JSON.stringify({ kind, payload, messageHash }, null, 2);
  }
  return formatRows(
    [
      ['payload', payload],
      ['hash', messageHash],
    ],
    createPalette(options.color)
  );
}

export function encodeCommand(kind: string, input: EncodeInput, options: OutputOptions): void {
  try {
    console.log(renderEncoded(kind, input, options));
  } catch (error) {
    handleError(error, options.json);
  }
}

/**
 * `nft-bridge decode`
 *
 * Inspect a finalize payload exchanged by the two bridges.
 *
 * @module packages/cli/commands/bridge/decode
 */

import type { DecodedBridgeMessage } from '../../../../core/domain/bridge.js';
import { decodeBridgeMessage } from '../../../../adapters/bridge/message-codec.js';
import { createPalette, formatRows, handleError, type OutputOptions } from './utils.js';

const FUNCTION_NAMES = {
  deposit: 'finalizeNftDeposit',
  withdrawal: 'finalizeNftWithdrawal',
} as const;

export function renderDecoded(decoded: DecodedBridgeMessage, options: OutputOptions): string {
  const { message } = decoded;
  if (options.json) {
    return JSON.stringify(
      {
        kind: decoded.kind,
        function: FUNCTION_NAMES[decoded.kind],
        ...message,
        itemId: message.itemId.toString(),
      },
      null,
      2
    );
  }

  const palette = createPalette(options.color);
  return formatRows(
    [
      ['kind', palette.bold(decoded.kind)],
      ['function', FUNCTION_NAMES[decoded.kind]],
      ['l1Token', message.l1Token],
      ['l2Token', message.l2Token],
      ['from', message.from],
      ['to', message.to],
      ['itemId', message.itemId.toString()],
      ['data', message.data],
    ],
    palette
  );
}

export function decodeCommand(payload: string, options: OutputOptions): void {
  try {
    console.log(renderDecoded(decodeBridgeMessage(payload), options));
  } catch (error) {
    handleError(error, options.json);
  }
}

/**
 * Bridge Message Codec
 *
 * Wire format of the two finalize messages exchanged between the bridges.
 * Payloads are ABI-encoded calls on the receiving bridge, so the L1 side
 * can execute them directly:
 *
 *   finalizeNftWithdrawal(l1Token, l2Token, from, to, itemId, data)  L2 -> L1
 *   finalizeNftDeposit(l1Token, l2Token, from, to, itemId, data)     L1 -> L2
 *
 * @module adapters/bridge/message-codec
 */

import {
  decodeFunctionData,
  encodeFunctionData,
  getAddress,
  isAddress,
  isHex,
  keccak256,
  type Address,
  type Hex,
} from 'viem';
import { z } from 'zod';
import type { BridgeMessage, DecodedBridgeMessage } from '../../core/domain/bridge.js';
import { MessageDecodeError } from './errors.js';

// --------------------------------------------------------------------------
// ABI
// --------------------------------------------------------------------------

const FINALIZE_INPUTS = [
  { name: 'l1Token', type: 'address' },
  { name: 'l2Token', type: 'address' },
  { name: 'from', type: 'address' },
  { name: 'to', type: 'address' },
  { name: 'itemId', type: 'uint256' },
  { name: 'data', type: 'bytes' },
] as const;

export const BRIDGE_MESSAGE_ABI = [
  {
    name: 'finalizeNftWithdrawal',
    type: 'function',
    stateMutability: 'nonpayable',
    inputs: FINALIZE_INPUTS,
    outputs: [],
  },
  {
    name: 'finalizeNftDeposit',
    type: 'function',
    stateMutability: 'nonpayable',
    inputs: FINALIZE_INPUTS,
    outputs: [],
  },
] as const;

// --------------------------------------------------------------------------
// Schemas
// --------------------------------------------------------------------------

/** Any-case 20-byte hex address, normalized to its EIP-55 form */
export const AddressSchema = z
  .custom<Address>((value) => typeof value === 'string' && isAddress(value, { strict: false }), {
    message: 'Invalid address',
  })
  .transform((value) => getAddress(value));

export const HexSchema = z.custom<Hex>((value) => typeof value === 'string' && isHex(value), {
  message: 'Invalid hex string',
});

export const BridgeMessageSchema = z.object({
  l1Token: AddressSchema,
  l2Token: AddressSchema,
  from: AddressSchema,
  to: AddressSchema,
  itemId: z.bigint().nonnegative(),
  data: HexSchema,
});

/**
 * Validate a message handed over by a caller and normalize its addresses.
 *
 * @throws {MessageDecodeError} listing every offending field
 */
export function parseBridgeMessage(input: unknown): BridgeMessage {
  const result = BridgeMessageSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new MessageDecodeError(`Invalid bridge message: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

// --------------------------------------------------------------------------
// Encoding
// --------------------------------------------------------------------------

function toArgs(message: BridgeMessage) {
  return [
    message.l1Token,
    message.l2Token,
    message.from,
    message.to,
    message.itemId,
    message.data,
  ] as const;
}

/** Payload for the L1 bridge: release `itemId` to `message.to` */
export function encodeFinalizeWithdrawal(message: BridgeMessage): Hex {
  return encodeFunctionData({
    abi: BRIDGE_MESSAGE_ABI,
    functionName: 'finalizeNftWithdrawal',
    args: toArgs(message),
  });
}

/** Payload for this bridge: mint `itemId` to `message.to` */
export function encodeFinalizeDeposit(message: BridgeMessage): Hex {
  return encodeFunctionData({
    abi: BRIDGE_MESSAGE_ABI,
    functionName: 'finalizeNftDeposit',
    args: toArgs(message),
  });
}

/** Correlation id a relayer can use to track one payload */
export function hashMessage(payload: Hex): Hex {
  return keccak256(payload);
}

// --------------------------------------------------------------------------
// Decoding
// --------------------------------------------------------------------------

function decodeCall(payload: Hex) {
  try {
    return decodeFunctionData({ abi: BRIDGE_MESSAGE_ABI, data: payload });
  } catch (err) {
    throw new MessageDecodeError(
      'Payload is not a finalize message',
      { selector: payload.slice(0, 10) },
      { cause: err }
    );
  }
}

/**
 * Decode either finalize message.
 *
 * @throws {MessageDecodeError} if the payload is not one of the two calls
 */
export function decodeBridgeMessage(payload: string): DecodedBridgeMessage {
  if (!isHex(payload)) {
    throw new MessageDecodeError('Payload is not hex encoded');
  }

  const decoded = decodeCall(payload);
  const [l1Token, l2Token, from, to, itemId, data] = decoded.args;
  return {
    kind: decoded.functionName === 'finalizeNftDeposit' ? 'deposit' : 'withdrawal',
    message: { l1Token, l2Token, from, to, itemId, data },
  };
}

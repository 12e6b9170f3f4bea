/**
 * Bridge Domain Types
 *
 * Message shapes, observable events and call outcomes for the L2 side of
 * the NFT bridge. Every value here is transient: the endpoint builds it
 * inside one call and discards it afterwards.
 */

import type { Address, Hex } from 'viem';

export type { Address, Hex };

/** Which side of the bridge a domain sits on */
export type DomainName = 'l1' | 'l2';

// =============================================================================
// Requests & Messages
// =============================================================================

/**
 * Withdrawal as requested by a holder on L2.
 * `from` is always the caller; `to` is the L1 recipient.
 */
export interface WithdrawalRequest {
  localToken: Address;
  from: Address;
  to: Address;
  itemId: bigint;
  /** Passed to the messenger untouched */
  counterpartGasHint: number;
  data: Hex;
}

/**
 * Argument tuple shared by both finalize messages.
 * The L1 token always travels first, whichever way the message goes.
 */
export interface BridgeMessage {
  l1Token: Address;
  l2Token: Address;
  from: Address;
  to: Address;
  itemId: bigint;
  data: Hex;
}

/** Sent by the L1 bridge, accepted here */
export type FinalizeDepositMessage = BridgeMessage;

/** Sent from here to the L1 bridge (withdrawals and bounce-backs) */
export type FinalizeWithdrawalMessage = BridgeMessage;

export type BridgeMessageKind = 'deposit' | 'withdrawal';

export interface DecodedBridgeMessage {
  kind: BridgeMessageKind;
  message: BridgeMessage;
}

// =============================================================================
// Transport
// =============================================================================

/**
 * Call context attached by the messenger. `originSender` is the
 * transport-authenticated sender on the other domain, never read from the
 * payload.
 */
export interface InboundCall {
  originSender: Address;
}

/** An opaque payload handed over by the messenger */
export interface MessengerDelivery extends InboundCall {
  payload: Hex;
}

// =============================================================================
// Events
// =============================================================================

export type BridgeEventType = 'WithdrawalInitiated' | 'DepositFinalized' | 'DepositFailed';

export type BridgeEvent = BridgeMessage & { type: BridgeEventType };

// =============================================================================
// Outcomes
// =============================================================================

/**
 * Everything a relayer needs to resubmit a withdrawal message verbatim if
 * the transport drops it.
 */
export interface WithdrawalReceipt {
  request: WithdrawalRequest;
  message: FinalizeWithdrawalMessage;
  target: Address;
  payload: Hex;
  gasHint: number;
  messageHash: Hex;
}

export type BounceReason = 'unsupported-token' | 'counterpart-mismatch';

export type DepositOutcome =
  | {
      status: 'finalized';
      message: FinalizeDepositMessage;
    }
  | {
      status: 'bounced';
      reason: BounceReason;
      /** The reversing message, with `from` and `to` swapped */
      message: FinalizeWithdrawalMessage;
      messageHash: Hex;
    };

/**
 * L2 Bridge Endpoint Port
 *
 * Public entry points of the L2 side of the NFT bridge.
 */

import type {
  Address,
  DepositOutcome,
  FinalizeDepositMessage,
  Hex,
  InboundCall,
  MessengerDelivery,
  WithdrawalReceipt,
} from '../domain/bridge.js';
import type { IErc721Receiver } from './token-ledger.js';

export interface IL2NftBridge extends IErc721Receiver {
  /** Address of the L1 bridge, the only trusted origin for deposits */
  readonly counterpartBridge: Address;

  /**
   * Burn `itemId` held by `caller` and send it to `caller` on L1.
   */
  withdraw(
    caller: Address,
    localToken: Address,
    itemId: bigint,
    counterpartGasHint?: number,
    data?: Hex
  ): Promise<WithdrawalReceipt>;

  /**
   * Burn `itemId` held by `caller` and send it to `to` on L1.
   */
  withdrawTo(
    caller: Address,
    localToken: Address,
    to: Address,
    itemId: bigint,
    counterpartGasHint?: number,
    data?: Hex
  ): Promise<WithdrawalReceipt>;

  /**
   * Mint a deposit from L1, or bounce it back when the local token cannot
   * take it. Only the counterpart bridge may call this.
   */
  finalizeDeposit(call: InboundCall, message: FinalizeDepositMessage): Promise<DepositOutcome>;

  /**
   * Decode an opaque messenger payload and finalize the deposit it carries.
   */
  handleMessage(delivery: MessengerDelivery): Promise<DepositOutcome>;

  /**
   * ERC-721 receiver hook. Always accepts.
   */
  onERC721Received(operator: Address, from: Address, itemId: bigint, data: Hex): Hex;
}

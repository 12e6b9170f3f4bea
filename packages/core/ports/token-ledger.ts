/**
 * Token Ledger Port
 *
 * The bridge never owns items. It asks the token contract on its own domain
 * to burn or mint, and reads the contract's fixed pairing with its L1
 * counterpart. Token contracts come in two variants: `bridged` ones expose
 * the mint/burn/counterpart surface, `plain` ones only answer the ERC-165
 * probe.
 */

import type { Address, Hex } from '../domain/bridge.js';

// =============================================================================
// Token Contracts
// =============================================================================

/**
 * ERC-165 introspection. Every token the directory knows answers it.
 */
export interface IErc165 {
  readonly address: Address;

  /**
   * @param interfaceId - 4-byte interface identifier
   * @returns True if the contract claims to implement the interface
   */
  supportsInterface(interfaceId: Hex): Promise<boolean>;
}

/**
 * Mint/burn surface of a token that can travel over the bridge.
 */
export interface IBridgedToken extends IErc165 {
  /** L1 token this contract is paired with. Fixed per token. */
  counterpartToken(): Promise<Address>;

  /** Current holder, or null if the item does not exist here */
  ownerOf(itemId: bigint): Promise<Address | null>;

  /**
   * Create `itemId` for `to`.
   * @throws if the item already has an owner
   */
  mint(to: Address, itemId: bigint): Promise<void>;

  /**
   * Destroy `itemId`, which must belong to `owner`.
   * @throws if `owner` is not the current holder
   */
  burn(owner: Address, itemId: bigint): Promise<void>;
}

export interface BridgedTokenContract extends IBridgedToken {
  readonly variant: 'bridged';
}

export interface PlainTokenContract extends IErc165 {
  readonly variant: 'plain';
}

export type TokenContract = BridgedTokenContract | PlainTokenContract;

/**
 * Opt-in hook for contracts that accept items through safe transfers.
 */
export interface IErc721Receiver {
  /** @returns The receiver selector to accept; anything else rejects */
  onERC721Received(operator: Address, from: Address, itemId: bigint, data: Hex): Hex;
}

// =============================================================================
// Directory
// =============================================================================

/**
 * Resolves a token address on this domain to its contract handle.
 */
export interface ITokenDirectory {
  /** @returns The contract, or null if nothing is deployed at the address */
  lookup(address: Address): Promise<TokenContract | null>;
}

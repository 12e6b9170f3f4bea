/**
 * In-Memory NFT Ledgers
 *
 * Token contracts for local runs and tests. Ownership is a map from item
 * id to holder; every item has at most one holder.
 *
 * @module adapters/ledger/nft-ledger
 */

import { getAddress, isAddressEqual, zeroAddress } from 'viem';
import type { Logger } from 'pino';
import type { Address, Hex } from '../../core/domain/bridge.js';
import {
  BRIDGED_TOKEN_INTERFACE_ID,
  ERC165_INTERFACE_ID,
  ERC721_INTERFACE_ID,
  ERC721_RECEIVED_SELECTOR,
} from '../../core/domain/interface-ids.js';
import type {
  BridgedTokenContract,
  IErc165,
  IErc721Receiver,
  PlainTokenContract,
} from '../../core/ports/token-ledger.js';
import { LedgerError, LedgerErrorCode } from './errors.js';

// --------------------------------------------------------------------------
// Base Ledger
// --------------------------------------------------------------------------

abstract class InMemoryNftLedger implements IErc165 {
  readonly address: Address;
  protected readonly log: Logger;
  private readonly owners = new Map<bigint, Address>();
  private readonly interfaces: ReadonlySet<string>;

  protected constructor(address: Address, interfaces: readonly Hex[], logger: Logger, component: string) {
    this.address = getAddress(address);
    this.interfaces = new Set(interfaces.map((id) => id.toLowerCase()));
    this.log = logger.child({ component, token: this.address });
  }

  async supportsInterface(interfaceId: Hex): Promise<boolean> {
    return this.interfaces.has(interfaceId.toLowerCase());
  }

  async ownerOf(itemId: bigint): Promise<Address | null> {
    return this.owners.get(itemId) ?? null;
  }

  balanceOf(owner: Address): number {
    let count = 0;
    for (const holder of this.owners.values()) {
      if (isAddressEqual(holder, owner)) count++;
    }
    return count;
  }

  totalSupply(): number {
    return this.owners.size;
  }

  /**
   * Move an item between holders. When `receiver` is given it must accept
   * the item by returning the ERC-721 receiver selector.
   */
  async safeTransferFrom(
    from: Address,
    to: Address,
    itemId: bigint,
    receiver?: IErc721Receiver,
    data: Hex = '0x'
  ): Promise<void> {
    this.requireHolder(from, itemId);
    this.requireRecipient(to, itemId);

    if (receiver) {
      const selector = receiver.onERC721Received(from, from, itemId, data);
      if (selector.toLowerCase() !== ERC721_RECEIVED_SELECTOR) {
        throw new LedgerError(LedgerErrorCode.RECEIVER_REJECTED, `${to} rejected item ${itemId}`, {
          to,
          selector,
        });
      }
    }

    this.owners.set(itemId, getAddress(to));
    this.log.debug({ event: 'ledger.transfer', from, to, itemId: itemId.toString() }, 'Item transferred');
  }

  protected create(to: Address, itemId: bigint): void {
    this.requireRecipient(to, itemId);
    const holder = this.owners.get(itemId);
    if (holder) {
      throw new LedgerError(LedgerErrorCode.ALREADY_MINTED, `Item ${itemId} already exists`, {
        itemId: itemId.toString(),
        holder,
      });
    }
    this.owners.set(itemId, getAddress(to));
    this.log.debug({ event: 'ledger.mint', to, itemId: itemId.toString() }, 'Item minted');
  }

  protected destroy(owner: Address, itemId: bigint): void {
    this.requireHolder(owner, itemId);
    this.owners.delete(itemId);
    this.log.debug({ event: 'ledger.burn', owner, itemId: itemId.toString() }, 'Item burned');
  }

  private requireHolder(owner: Address, itemId: bigint): void {
    const holder = this.owners.get(itemId);
    if (!holder) {
      throw new LedgerError(LedgerErrorCode.NONEXISTENT_TOKEN, `Item ${itemId} does not exist`, {
        itemId: itemId.toString(),
      });
    }
    if (!isAddressEqual(holder, owner)) {
      throw new LedgerError(LedgerErrorCode.NOT_OWNER, `${owner} does not hold item ${itemId}`, {
        itemId: itemId.toString(),
        owner,
      });
    }
  }

  private requireRecipient(to: Address, itemId: bigint): void {
    if (isAddressEqual(to, zeroAddress)) {
      throw new LedgerError(LedgerErrorCode.INVALID_RECIPIENT, `Cannot assign item ${itemId} to the zero address`, {
        itemId: itemId.toString(),
      });
    }
  }
}

// --------------------------------------------------------------------------
// Bridged Token
// --------------------------------------------------------------------------

export interface StandardBridgedNftOptions {
  address: Address;
  /** L1 token this contract represents */
  counterpartToken: Address;
  logger: Logger;
  /** Interfaces answered by supportsInterface, default ERC-165 + bridged */
  advertisedInterfaces?: readonly Hex[];
}

/**
 * L2 representation of an L1 collection. Mint and burn are driven by the
 * bridge; the pairing with the L1 token never changes.
 */
export class StandardBridgedNft extends InMemoryNftLedger implements BridgedTokenContract {
  readonly variant = 'bridged' as const;
  private readonly pairedToken: Address;

  constructor(options: StandardBridgedNftOptions) {
    super(
      options.address,
      options.advertisedInterfaces ?? [ERC165_INTERFACE_ID, BRIDGED_TOKEN_INTERFACE_ID],
      options.logger,
      'StandardBridgedNft'
    );
    this.pairedToken = getAddress(options.counterpartToken);
  }

  async counterpartToken(): Promise<Address> {
    return this.pairedToken;
  }

  async mint(to: Address, itemId: bigint): Promise<void> {
    this.create(to, itemId);
  }

  async burn(owner: Address, itemId: bigint): Promise<void> {
    this.destroy(owner, itemId);
  }
}

// --------------------------------------------------------------------------
// Plain Token
// --------------------------------------------------------------------------

/**
 * Ordinary ERC-721 collection with no bridge surface.
 */
export class PlainNft extends InMemoryNftLedger implements PlainTokenContract {
  readonly variant = 'plain' as const;

  constructor(address: Address, logger: Logger) {
    super(address, [ERC165_INTERFACE_ID, ERC721_INTERFACE_ID], logger, 'PlainNft');
  }

  async mint(to: Address, itemId: bigint): Promise<void> {
    this.create(to, itemId);
  }
}

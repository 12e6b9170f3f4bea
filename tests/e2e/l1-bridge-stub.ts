/**
 * L1 Bridge Stub
 *
 * Minimal counterpart bridge for end-to-end tests. Deposits escrow the L1
 * item with the stub and send finalizeNftDeposit to L2; finalizeNftWithdrawal
 * messages from L2 release the escrowed item to their recipient.
 *
 * `createBridgeNetwork` wires the stub, the L2 endpoint and both ledgers to
 * one in-memory message channel.
 */

import { isAddressEqual } from 'viem';
import { pino, type Logger } from 'pino';
import type { Address, BridgeMessage, Hex, MessengerDelivery } from '../../packages/core/domain/bridge.js';
import type { ICrossDomainMessenger } from '../../packages/core/ports/cross-domain-messenger.js';
import { decodeBridgeMessage, encodeFinalizeDeposit } from '../../packages/adapters/bridge/message-codec.js';
import { BridgeEventLog } from '../../packages/adapters/bridge/event-log.js';
import { L2NftBridge } from '../../packages/adapters/bridge/l2-nft-bridge.js';
import { TestMetrics } from '../../packages/adapters/bridge/metrics.js';
import { InMemoryMessageChannel } from '../../packages/adapters/messenger/in-memory-messenger.js';
import { InMemoryTokenDirectory } from '../../packages/adapters/ledger/token-directory.js';
import { PlainNft, StandardBridgedNft } from '../../packages/adapters/ledger/nft-ledger.js';

// --------------------------------------------------------------------------
// Addresses
// --------------------------------------------------------------------------

export const ADDRESSES = {
  alice: '0x1000000000000000000000000000000000000001',
  bob: '0x2000000000000000000000000000000000000002',
  l2Token: '0x3000000000000000000000000000000000000003',
  l1Token: '0x4000000000000000000000000000000000000004',
  mismatchedL2Token: '0x5000000000000000000000000000000000000005',
  l1Bridge: '0x6000000000000000000000000000000000000006',
  l2Bridge: '0x7000000000000000000000000000000000000007',
  otherL1Token: '0x9000000000000000000000000000000000000009',
} as const satisfies Record<string, Address>;

// --------------------------------------------------------------------------
// Stub
// --------------------------------------------------------------------------

export class L1BridgeStub {
  readonly released: BridgeMessage[] = [];

  constructor(
    readonly address: Address,
    private readonly l2Bridge: Address,
    private readonly messenger: ICrossDomainMessenger,
    private readonly l1Token: PlainNft
  ) {}

  /**
   * Escrow `itemId` from `from` and ask L2 to mint it for `to`.
   */
  async depositTo(from: Address, l2Token: Address, to: Address, itemId: bigint, data: Hex = '0x'): Promise<void> {
    await this.l1Token.safeTransferFrom(from, this.address, itemId);
    const payload = encodeFinalizeDeposit({ l1Token: this.l1Token.address, l2Token, from, to, itemId, data });
    await this.messenger.sendMessage(this.l2Bridge, payload, 200_000);
  }

  async handleMessage(delivery: MessengerDelivery): Promise<BridgeMessage> {
    if (!isAddressEqual(delivery.originSender, this.l2Bridge)) {
      throw new Error(`L1 stub refuses messages from ${delivery.originSender}`);
    }
    const decoded = decodeBridgeMessage(delivery.payload);
    if (decoded.kind !== 'withdrawal') {
      throw new Error('L1 stub only finalizes withdrawals');
    }

    const { message } = decoded;
    await this.l1Token.safeTransferFrom(this.address, message.to, message.itemId);
    this.released.push(message);
    return message;
  }
}

// --------------------------------------------------------------------------
// Network
// --------------------------------------------------------------------------

export function createBridgeNetwork(logger: Logger = pino({ level: 'silent' })) {
  const channel = new InMemoryMessageChannel(logger);

  const l1Token = new PlainNft(ADDRESSES.l1Token, logger);
  const l2Token = new StandardBridgedNft({
    address: ADDRESSES.l2Token,
    counterpartToken: ADDRESSES.l1Token,
    logger,
  });
  const mismatchedL2Token = new StandardBridgedNft({
    address: ADDRESSES.mismatchedL2Token,
    counterpartToken: ADDRESSES.otherL1Token,
    logger,
  });
  const tokens = new InMemoryTokenDirectory().register(l2Token).register(mismatchedL2Token);
  const events = new BridgeEventLog(logger);
  const metrics = new TestMetrics();

  const l2Bridge = new L2NftBridge({
    messenger: channel.messengerFor('l2', ADDRESSES.l2Bridge),
    counterpartBridge: ADDRESSES.l1Bridge,
    tokens,
    events,
    logger,
    metrics,
  });
  const l1Bridge = new L1BridgeStub(
    ADDRESSES.l1Bridge,
    ADDRESSES.l2Bridge,
    channel.messengerFor('l1', ADDRESSES.l1Bridge),
    l1Token
  );

  channel.register('l2', ADDRESSES.l2Bridge, (delivery) => l2Bridge.handleMessage(delivery));
  channel.register('l1', ADDRESSES.l1Bridge, (delivery) => l1Bridge.handleMessage(delivery));

  return { channel, l1Token, l2Token, mismatchedL2Token, events, metrics, l1Bridge, l2Bridge };
}

export type BridgeNetwork = ReturnType<typeof createBridgeNetwork>;

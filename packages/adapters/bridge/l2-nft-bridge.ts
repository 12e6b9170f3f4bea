/**
 * L2NftBridge: L2 endpoint of the NFT bridge
 *
 * Withdrawal (L2 -> L1):
 *   1. Validates recipient and token
 *   2. Burns the item from the caller (ownership gate)
 *   3. Reads the token's fixed L1 pairing
 *   4. Sends finalizeNftWithdrawal to the L1 bridge
 *   5. Emits WithdrawalInitiated
 *
 * Deposit (L1 -> L2):
 *   1. Admits the call only from the counterpart bridge
 *   2. Classifies the local token (bridged interface advertised?)
 *   3. Cross-checks the token's L1 pairing against the message
 *   4. Mints, or bounces a reversing finalizeNftWithdrawal back to L1
 *
 * The endpoint holds no mutable state beyond its frozen configuration;
 * ownership lives in the token contracts. Calls are serialized so async
 * ports never interleave two operations.
 *
 * @module adapters/bridge/l2-nft-bridge
 */

import { getAddress, isAddress, isAddressEqual, isHex, zeroAddress } from 'viem';
import type { Logger } from 'pino';
import type { Registry } from 'prom-client';
import type {
  Address,
  DepositOutcome,
  FinalizeDepositMessage,
  FinalizeWithdrawalMessage,
  Hex,
  InboundCall,
  MessengerDelivery,
  WithdrawalReceipt,
  WithdrawalRequest,
} from '../../core/domain/bridge.js';
import { ERC721_RECEIVED_SELECTOR } from '../../core/domain/interface-ids.js';
import type { IL2NftBridge } from '../../core/ports/bridge-endpoint.js';
import type { IBridgeEventSink } from '../../core/ports/bridge-events.js';
import type { ICrossDomainMessenger } from '../../core/ports/cross-domain-messenger.js';
import type { BridgedTokenContract, ITokenDirectory } from '../../core/ports/token-ledger.js';
import { classifyToken, type LocalToken } from './capability.js';
import type { BridgeConfig } from './config.js';
import {
  AuthorizationError,
  BridgeError,
  BridgeErrorCode,
  CapabilityMismatchError,
  MessageDecodeError,
  TransportError,
  ValidationError,
} from './errors.js';
import {
  decodeBridgeMessage,
  encodeFinalizeWithdrawal,
  hashMessage,
  parseBridgeMessage,
} from './message-codec.js';
import { createBridgeLogger } from './logger.js';
import {
  NoopBridgeMetrics,
  PrometheusBridgeMetrics,
  type BridgeMetrics,
  type BridgeOperation,
} from './metrics.js';
import { VerifiedOrigin } from './origin.js';
import { SerialExecutor } from './serial-executor.js';

// =============================================================================
// Types
// =============================================================================

export interface L2NftBridgeOptions {
  messenger: ICrossDomainMessenger;
  /** L1 bridge address; immutable for the life of the endpoint */
  counterpartBridge: Address;
  tokens: ITokenDirectory;
  events: IBridgeEventSink;
  logger: Logger;
  metrics?: BridgeMetrics;
  /** Used when a withdrawal passes no gas hint, default 0 (transport default) */
  defaultGasHint?: number;
}

interface EndpointConfig {
  readonly counterpartBridge: Address;
  readonly defaultGasHint: number;
}

type DepositVerdict =
  | { accepted: true; token: BridgedTokenContract }
  | { accepted: false; mismatch: CapabilityMismatchError };

/** Gas hint for bounce-backs: let the transport pick */
const BOUNCE_GAS_HINT = 0;

// =============================================================================
// Helpers
// =============================================================================

function requireAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ValidationError(BridgeErrorCode.INVALID_ADDRESS, `${field} is not a valid address: ${value}`, {
      field,
      value,
    });
  }
  return getAddress(value);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// L2NftBridge
// =============================================================================

export class L2NftBridge implements IL2NftBridge {
  private readonly config: EndpointConfig;
  private readonly messenger: ICrossDomainMessenger;
  private readonly tokens: ITokenDirectory;
  private readonly events: IBridgeEventSink;
  private readonly metrics: BridgeMetrics;
  private readonly log: Logger;
  private readonly serial = new SerialExecutor();

  constructor(options: L2NftBridgeOptions) {
    const counterpartBridge = requireAddress(options.counterpartBridge, 'counterpartBridge');
    if (isAddressEqual(counterpartBridge, zeroAddress)) {
      throw new ValidationError(BridgeErrorCode.INVALID_ADDRESS, 'counterpartBridge cannot be the zero address');
    }

    this.config = Object.freeze({
      counterpartBridge,
      defaultGasHint: options.defaultGasHint ?? 0,
    });
    this.messenger = options.messenger;
    this.tokens = options.tokens;
    this.events = options.events;
    this.metrics = options.metrics ?? new NoopBridgeMetrics();
    this.log = options.logger.child({ component: 'L2NftBridge' });
  }

  get counterpartBridge(): Address {
    return this.config.counterpartBridge;
  }

  // ---------------------------------------------------------------------------
  // Withdrawal
  // ---------------------------------------------------------------------------

  withdraw(
    caller: Address,
    localToken: Address,
    itemId: bigint,
    counterpartGasHint: number = this.config.defaultGasHint,
    data: Hex = '0x'
  ): Promise<WithdrawalReceipt> {
    return this.serial.run(() =>
      this.initiateWithdrawal({ localToken, from: caller, to: caller, itemId, counterpartGasHint, data })
    );
  }

  withdrawTo(
    caller: Address,
    localToken: Address,
    to: Address,
    itemId: bigint,
    counterpartGasHint: number = this.config.defaultGasHint,
    data: Hex = '0x'
  ): Promise<WithdrawalReceipt> {
    return this.serial.run(() =>
      this.initiateWithdrawal({ localToken, from: caller, to, itemId, counterpartGasHint, data })
    );
  }

  private async initiateWithdrawal(request: WithdrawalRequest): Promise<WithdrawalReceipt> {
    const startedAt = Date.now();
    const from = requireAddress(request.from, 'from');
    const to = requireAddress(request.to, 'to');
    const localToken = requireAddress(request.localToken, 'localToken');
    const { itemId, counterpartGasHint, data } = request;

    if (isAddressEqual(to, zeroAddress)) {
      throw new ValidationError(
        BridgeErrorCode.INVALID_RECIPIENT,
        'Withdrawal recipient cannot be the zero address',
        { from, localToken, itemId: itemId.toString() }
      );
    }
    if (!isHex(data)) {
      throw new ValidationError(BridgeErrorCode.INVALID_DATA, 'Withdrawal data must be hex encoded', {
        from,
        localToken,
      });
    }

    const token = await this.resolveBurnableToken(localToken);

    // Burn first: the message must never exist while the item still does
    try {
      await token.burn(from, itemId);
    } catch (err) {
      this.log.warn(
        { event: 'bridge.withdrawal.burn_rejected', from, localToken, itemId: itemId.toString(), err },
        'Burn rejected; caller does not hold the item'
      );
      throw new AuthorizationError(
        BridgeErrorCode.NOT_OWNER,
        `${from} cannot withdraw item ${itemId} of ${localToken}`,
        { from, localToken, itemId: itemId.toString() },
        { cause: err }
      );
    }

    const { message, payload } = await this.dispatchWithdrawal(token, {
      localToken,
      from,
      to,
      itemId,
      counterpartGasHint,
      data,
    }).catch(async (err: unknown) => {
      await this.restoreBurnedItem(token, from, itemId, err);
      throw err;
    });

    this.events.emit({ type: 'WithdrawalInitiated', ...message });

    const messageHash = hashMessage(payload);
    this.metrics.recordWithdrawal(Date.now() - startedAt);
    this.log.info(
      {
        event: 'bridge.withdrawal.initiated',
        l1Token: message.l1Token,
        l2Token: message.l2Token,
        from,
        to,
        itemId: itemId.toString(),
        gasHint: counterpartGasHint,
        messageHash,
      },
      'Withdrawal initiated'
    );

    return {
      request: { localToken, from, to, itemId, counterpartGasHint, data },
      message,
      target: this.config.counterpartBridge,
      payload,
      gasHint: counterpartGasHint,
      messageHash,
    };
  }

  private async resolveBurnableToken(localToken: Address): Promise<BridgedTokenContract> {
    const contract = await this.tokens.lookup(localToken);
    if (!contract || contract.variant !== 'bridged') {
      throw new ValidationError(
        BridgeErrorCode.UNKNOWN_TOKEN,
        `No bridgeable token deployed at ${localToken}`,
        { localToken }
      );
    }
    return contract;
  }

  private async dispatchWithdrawal(
    token: BridgedTokenContract,
    request: WithdrawalRequest
  ): Promise<{ message: FinalizeWithdrawalMessage; payload: Hex }> {
    const l1Token = await token.counterpartToken();
    if (!isAddress(l1Token, { strict: false }) || isAddressEqual(l1Token, zeroAddress)) {
      throw new ValidationError(
        BridgeErrorCode.MISSING_COUNTERPART,
        `Token ${request.localToken} has no L1 counterpart recorded`,
        { localToken: request.localToken }
      );
    }

    const message: FinalizeWithdrawalMessage = {
      l1Token: getAddress(l1Token),
      l2Token: request.localToken,
      from: request.from,
      to: request.to,
      itemId: request.itemId,
      data: request.data,
    };
    const payload = encodeFinalizeWithdrawal(message);
    await this.send(payload, request.counterpartGasHint, 'withdrawal');
    return { message, payload };
  }

  /**
   * Undo a burn whose withdrawal could not be announced, so a failed call
   * leaves ownership exactly as it found it.
   */
  private async restoreBurnedItem(
    token: BridgedTokenContract,
    owner: Address,
    itemId: bigint,
    cause: unknown
  ): Promise<void> {
    try {
      await token.mint(owner, itemId);
    } catch (err) {
      this.log.error(
        {
          event: 'bridge.withdrawal.rollback_failed',
          token: token.address,
          owner,
          itemId: itemId.toString(),
          cause: describeError(cause),
          err,
        },
        'Could not restore burned item after failed withdrawal'
      );
      throw new BridgeError(
        BridgeErrorCode.ROLLBACK_FAILED,
        `Withdrawal failed (${describeError(cause)}) and item ${itemId} could not be restored to ${owner}`,
        { token: token.address, owner, itemId: itemId.toString() },
        { cause: err }
      );
    }

    this.log.warn(
      {
        event: 'bridge.withdrawal.rolled_back',
        token: token.address,
        owner,
        itemId: itemId.toString(),
        cause: describeError(cause),
      },
      'Withdrawal aborted after burn; item restored'
    );
  }

  // ---------------------------------------------------------------------------
  // Deposit finalization
  // ---------------------------------------------------------------------------

  finalizeDeposit(call: InboundCall, message: FinalizeDepositMessage): Promise<DepositOutcome> {
    return this.serial.run(async () => {
      const origin = this.admit(call);
      return this.processDeposit(origin, parseBridgeMessage(message));
    });
  }

  handleMessage(delivery: MessengerDelivery): Promise<DepositOutcome> {
    return this.serial.run(async () => {
      const origin = this.admit(delivery);
      const decoded = decodeBridgeMessage(delivery.payload);
      if (decoded.kind !== 'deposit') {
        throw new MessageDecodeError('Only finalize-deposit messages are accepted on L2', {
          kind: decoded.kind,
        });
      }
      return this.processDeposit(origin, decoded.message);
    });
  }

  /**
   * Admission gate for every privileged entry point. Runs before anything
   * else looks at the message.
   */
  private admit(call: InboundCall): VerifiedOrigin {
    try {
      return VerifiedOrigin.verify(call, this.config.counterpartBridge);
    } catch (err) {
      this.metrics.recordRejectedDelivery();
      this.log.warn(
        { event: 'bridge.deposit.rejected', originSender: call.originSender },
        'Rejected inbound call from untrusted origin'
      );
      throw err;
    }
  }

  private async processDeposit(
    origin: VerifiedOrigin,
    message: FinalizeDepositMessage
  ): Promise<DepositOutcome> {
    const startedAt = Date.now();
    const local = await classifyToken(this.tokens, message.l2Token, this.log);
    const verdict = await this.checkDeposit(local, message);

    if (!verdict.accepted) {
      return this.bounce(origin, message, verdict.mismatch, startedAt);
    }

    await verdict.token.mint(message.to, message.itemId);
    this.events.emit({ type: 'DepositFinalized', ...message });

    this.metrics.recordDepositFinalized(Date.now() - startedAt);
    this.log.info(
      {
        event: 'bridge.deposit.finalized',
        origin: origin.address,
        l1Token: message.l1Token,
        l2Token: message.l2Token,
        from: message.from,
        to: message.to,
        itemId: message.itemId.toString(),
      },
      'Deposit finalized'
    );

    return { status: 'finalized', message };
  }

  private async checkDeposit(local: LocalToken, message: FinalizeDepositMessage): Promise<DepositVerdict> {
    switch (local.kind) {
      case 'unsupported':
        return {
          accepted: false,
          mismatch: new CapabilityMismatchError(
            BridgeErrorCode.UNSUPPORTED_TOKEN,
            `Token ${local.address} does not support the bridged-token interface`,
            { token: local.address, reason: local.reason }
          ),
        };
      case 'bridged': {
        const recorded = await this.readPairing(local.token);
        if (!recorded) {
          return {
            accepted: false,
            mismatch: new CapabilityMismatchError(
              BridgeErrorCode.COUNTERPART_MISMATCH,
              `Token ${local.address} has no readable L1 pairing`,
              { token: local.address, claimed: message.l1Token }
            ),
          };
        }
        if (!isAddressEqual(recorded, message.l1Token)) {
          return {
            accepted: false,
            mismatch: new CapabilityMismatchError(
              BridgeErrorCode.COUNTERPART_MISMATCH,
              `Token ${local.address} is paired with ${recorded}, not ${message.l1Token}`,
              { token: local.address, recorded, claimed: message.l1Token }
            ),
          };
        }
        return { accepted: true, token: local.token };
      }
    }
  }

  /**
   * The token's recorded L1 token, or null when the read throws or does
   * not return an address.
   */
  private async readPairing(token: BridgedTokenContract): Promise<Address | null> {
    let recorded: string;
    try {
      recorded = await token.counterpartToken();
    } catch (err) {
      this.log.warn(
        { event: 'bridge.deposit.pairing_unreadable', token: token.address, err },
        'Counterpart token read failed; treating as mismatch'
      );
      return null;
    }
    if (!isAddress(recorded, { strict: false })) {
      this.log.warn(
        { event: 'bridge.deposit.pairing_unreadable', token: token.address, recorded },
        'Counterpart token is not an address; treating as mismatch'
      );
      return null;
    }
    return getAddress(recorded);
  }

  /**
   * Return the item to its sender on L1: same token pair, item and data,
   * with `from` and `to` swapped. Nothing is minted here.
   */
  private async bounce(
    origin: VerifiedOrigin,
    message: FinalizeDepositMessage,
    mismatch: CapabilityMismatchError,
    startedAt: number
  ): Promise<DepositOutcome> {
    const reversed: FinalizeWithdrawalMessage = { ...message, from: message.to, to: message.from };
    const payload = encodeFinalizeWithdrawal(reversed);
    await this.send(payload, BOUNCE_GAS_HINT, 'bounce');

    this.events.emit({ type: 'DepositFailed', ...message });

    const messageHash = hashMessage(payload);
    this.metrics.recordDepositBounced(mismatch.reason, Date.now() - startedAt);
    this.log.warn(
      {
        event: 'bridge.deposit.bounced',
        origin: origin.address,
        code: mismatch.code,
        reason: mismatch.reason,
        l1Token: message.l1Token,
        l2Token: message.l2Token,
        from: message.from,
        to: message.to,
        itemId: message.itemId.toString(),
        messageHash,
      },
      mismatch.message
    );

    return { status: 'bounced', reason: mismatch.reason, message: reversed, messageHash };
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private async send(payload: Hex, gasHint: number, operation: BridgeOperation): Promise<void> {
    const target = this.config.counterpartBridge;
    try {
      await this.messenger.sendMessage(target, payload, gasHint);
    } catch (err) {
      this.metrics.recordTransportFailure(operation);
      this.log.error(
        { event: 'bridge.transport.failed', operation, target, gasHint, err },
        'Messenger refused message'
      );
      throw new TransportError(
        `Messenger refused ${operation} message: ${describeError(err)}`,
        { operation, target, gasHint },
        { cause: err }
      );
    }
  }

  // ---------------------------------------------------------------------------
  // ERC-721 receiver
  // ---------------------------------------------------------------------------

  /**
   * Lets ledgers that require receiver opt-in transfer items to the
   * endpoint. Not an authorization check for anything.
   */
  onERC721Received(_operator: Address, _from: Address, _itemId: bigint, _data: Hex): Hex {
    return ERC721_RECEIVED_SELECTOR;
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface L2NftBridgeDeps
  extends Omit<L2NftBridgeOptions, 'counterpartBridge' | 'defaultGasHint' | 'logger' | 'metrics'> {
  /** Default: root logger at `config.logLevel` */
  logger?: Logger;
  /** Default: Prometheus metrics named with `config.metricsPrefix` */
  metrics?: BridgeMetrics;
  /** Registry for the default metrics, default a fresh one */
  registry?: Registry;
}

/**
 * Build an endpoint from loaded configuration.
 */
export function createL2NftBridge(config: BridgeConfig, deps: L2NftBridgeDeps): L2NftBridge {
  const { registry, logger, metrics, ...ports } = deps;
  return new L2NftBridge({
    ...ports,
    logger: logger ?? createBridgeLogger({ level: config.logLevel }),
    metrics: metrics ?? new PrometheusBridgeMetrics(registry, config.metricsPrefix),
    counterpartBridge: config.counterpartBridge,
    defaultGasHint: config.defaultGasHint,
  });
}

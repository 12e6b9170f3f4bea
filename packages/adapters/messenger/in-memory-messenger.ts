/**
 * In-Memory Cross-Domain Messenger
 *
 * Two-domain message channel for local runs and tests. Sending only
 * queues; nothing is delivered until a relay call, so tests decide when
 * (and in which order) messages arrive:
 *
 * ```typescript
 * const channel = new InMemoryMessageChannel(logger);
 * channel.register('l2', l2Bridge.address, (d) => bridge.handleMessage(d));
 * const l1Messenger = channel.messengerFor('l1', l1Bridge.address);
 * await l1Messenger.sendMessage(l2Bridge.address, payload, 0);
 * await channel.relayAll();
 * ```
 *
 * Delivery semantics:
 * - the receiver sees the sender's address as `originSender`
 * - a delivery whose handler throws is kept as `failed` and may be retried
 * - a delivered message is never delivered again
 *
 * @module adapters/messenger/in-memory-messenger
 */

import { getAddress } from 'viem';
import type { Logger } from 'pino';
import type { Address, DomainName, Hex } from '../../core/domain/bridge.js';
import type { ICrossDomainMessenger, MessageHandler } from '../../core/ports/cross-domain-messenger.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type DeliveryStatus = 'pending' | 'delivered' | 'failed';

export interface QueuedMessage {
  id: number;
  source: DomainName;
  destination: DomainName;
  sender: Address;
  target: Address;
  payload: Hex;
  gasHint: number;
  status: DeliveryStatus;
  attempts: number;
}

export type RelayResult =
  | { id: number; status: 'delivered'; result: unknown }
  | { id: number; status: 'failed'; error: unknown };

export class MessengerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MessengerError';
  }
}

function otherDomain(domain: DomainName): DomainName {
  return domain === 'l1' ? 'l2' : 'l1';
}

function handlerKey(domain: DomainName, address: Address): string {
  return `${domain}:${address.toLowerCase()}`;
}

// --------------------------------------------------------------------------
// Channel
// --------------------------------------------------------------------------

export class InMemoryMessageChannel {
  private readonly log: Logger;
  private readonly handlers = new Map<string, MessageHandler>();
  private readonly messages = new Map<number, QueuedMessage>();
  private readonly refusals: Error[] = [];
  private nextId = 1;

  constructor(logger: Logger) {
    this.log = logger.child({ component: 'InMemoryMessageChannel' });
  }

  /**
   * Receive messages addressed to `address` on `domain`.
   */
  register(domain: DomainName, address: Address, handler: MessageHandler): void {
    this.handlers.set(handlerKey(domain, address), handler);
  }

  /**
   * Messenger used by the contract at `sender` on `domain` to reach the
   * other domain.
   */
  messengerFor(domain: DomainName, sender: Address): ICrossDomainMessenger {
    const from = getAddress(sender);
    return {
      sendMessage: async (target, message, minGasLimit) => {
        this.enqueue(domain, from, target, message, minGasLimit);
      },
    };
  }

  /**
   * Make the next sendMessage call on any messenger throw `error`.
   */
  failNextSend(error: Error = new MessengerError('Messenger unavailable')): void {
    this.refusals.push(error);
  }

  // ------------------------------------------------------------------------
  // Inspection
  // ------------------------------------------------------------------------

  all(): QueuedMessage[] {
    return [...this.messages.values()].map((message) => ({ ...message }));
  }

  pending(destination?: DomainName): QueuedMessage[] {
    return this.all().filter(
      (message) => message.status === 'pending' && (!destination || message.destination === destination)
    );
  }

  failed(): QueuedMessage[] {
    return this.all().filter((message) => message.status === 'failed');
  }

  // ------------------------------------------------------------------------
  // Relaying
  // ------------------------------------------------------------------------

  /**
   * Deliver the oldest pending message.
   *
   * @returns null when nothing is pending
   */
  async relayNext(): Promise<RelayResult | null> {
    const [next] = this.pending();
    return next ? this.deliver(next.id) : null;
  }

  /**
   * Deliver a specific pending message, regardless of queue order.
   */
  async relay(id: number): Promise<RelayResult> {
    const message = this.require(id);
    if (message.status !== 'pending') {
      throw new MessengerError(`Message ${id} is ${message.status}, not pending`);
    }
    return this.deliver(id);
  }

  /**
   * Deliver pending messages until none are left, including messages the
   * deliveries themselves send.
   */
  async relayAll(): Promise<RelayResult[]> {
    const results: RelayResult[] = [];
    for (let result = await this.relayNext(); result; result = await this.relayNext()) {
      results.push(result);
    }
    return results;
  }

  /**
   * Redeliver a message whose previous delivery failed.
   */
  async retry(id: number): Promise<RelayResult> {
    const message = this.require(id);
    if (message.status !== 'failed') {
      throw new MessengerError(`Only failed messages can be retried; message ${id} is ${message.status}`);
    }
    return this.deliver(id);
  }

  // ------------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------------

  private enqueue(source: DomainName, sender: Address, target: Address, payload: Hex, gasHint: number): void {
    const refusal = this.refusals.shift();
    if (refusal) {
      throw refusal;
    }

    const id = this.nextId++;
    const message: QueuedMessage = {
      id,
      source,
      destination: otherDomain(source),
      sender,
      target: getAddress(target),
      payload,
      gasHint,
      status: 'pending',
      attempts: 0,
    };
    this.messages.set(id, message);
    this.log.debug(
      { event: 'messenger.queued', id, source, destination: message.destination, target: message.target, gasHint },
      'Message queued'
    );
  }

  private require(id: number): QueuedMessage {
    const message = this.messages.get(id);
    if (!message) {
      throw new MessengerError(`Unknown message ${id}`);
    }
    return message;
  }

  private async deliver(id: number): Promise<RelayResult> {
    const message = this.require(id);
    message.attempts++;

    const handler = this.handlers.get(handlerKey(message.destination, message.target));
    if (!handler) {
      message.status = 'failed';
      const error = new MessengerError(`No receiver at ${message.target} on ${message.destination}`);
      this.log.warn({ event: 'messenger.no_receiver', id, target: message.target }, error.message);
      return { id, status: 'failed', error };
    }

    try {
      const result = await handler({ originSender: message.sender, payload: message.payload });
      message.status = 'delivered';
      this.log.debug({ event: 'messenger.delivered', id, attempts: message.attempts }, 'Message delivered');
      return { id, status: 'delivered', result };
    } catch (error) {
      message.status = 'failed';
      this.log.warn(
        { event: 'messenger.delivery_failed', id, attempts: message.attempts, err: error },
        'Message delivery failed; it can be retried'
      );
      return { id, status: 'failed', error };
    }
  }
}

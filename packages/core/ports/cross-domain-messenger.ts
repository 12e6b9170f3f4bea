/**
 * Cross-Domain Messenger Port
 *
 * Authenticated, at-least-once channel between the two domains. Sending
 * never waits for the other side; delivery may be delayed and may be
 * reordered relative to unrelated messages.
 */

import type { Address, Hex, MessengerDelivery } from '../domain/bridge.js';

export interface ICrossDomainMessenger {
  /**
   * Queue `message` for `target` on the other domain.
   *
   * @param minGasLimit - Opaque hint for the transport; 0 means its default
   * @throws if the transport refuses the message
   */
  sendMessage(target: Address, message: Hex, minGasLimit: number): Promise<void>;
}

/**
 * Receiver side: the messenger calls this with the verified origin of the
 * sender on the other domain.
 */
export type MessageHandler = (delivery: MessengerDelivery) => Promise<unknown>;

/**
 * Messenger Adapter
 *
 * @module adapters/messenger
 */

export {
  InMemoryMessageChannel,
  MessengerError,
  type QueuedMessage,
  type RelayResult,
  type DeliveryStatus,
} from './in-memory-messenger.js';

/**
 * Bridge Adapter
 *
 * L2 endpoint of the NFT bridge plus the pieces it is built from.
 *
 * @module adapters/bridge
 */

export {
  L2NftBridge,
  createL2NftBridge,
  type L2NftBridgeDeps,
  type L2NftBridgeOptions,
} from './l2-nft-bridge.js';
export {
  BRIDGE_MESSAGE_ABI,
  AddressSchema,
  HexSchema,
  BridgeMessageSchema,
  parseBridgeMessage,
  encodeFinalizeWithdrawal,
  encodeFinalizeDeposit,
  decodeBridgeMessage,
  hashMessage,
} from './message-codec.js';
export {
  classifyToken,
  supportsInterfaceSafely,
  type LocalToken,
  type UnsupportedReason,
} from './capability.js';
export { VerifiedOrigin } from './origin.js';
export { SerialExecutor } from './serial-executor.js';
export { BridgeEventLog, type BridgeEventListener } from './event-log.js';
export {
  PrometheusBridgeMetrics,
  NoopBridgeMetrics,
  TestMetrics,
  type BridgeMetrics,
  type BridgeOperation,
} from './metrics.js';
export { createBridgeLogger, type BridgeLoggerOptions } from './logger.js';
export { loadBridgeConfig, validateBridgeConfig, type BridgeConfig } from './config.js';
export {
  BridgeErrorCode,
  BridgeError,
  AuthorizationError,
  CapabilityMismatchError,
  TransportError,
  ValidationError,
  MessageDecodeError,
  ConfigError,
  isBridgeError,
} from './errors.js';

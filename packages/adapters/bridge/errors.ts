/**
 * Bridge Error Hierarchy
 *
 * Every failure the endpoint raises extends BridgeError and carries a code
 * for programmatic handling. CapabilityMismatchError is the one class that
 * never leaves the endpoint: deposit finalization turns it into a
 * bounce-back.
 *
 * @module adapters/bridge/errors
 */

import type { BounceReason } from '../../core/domain/bridge.js';

// =============================================================================
// Error Codes
// =============================================================================

export enum BridgeErrorCode {
  /** Withdrawing caller does not hold the item */
  NOT_OWNER = 'BRIDGE_001',
  /** Inbound call did not come from the counterpart bridge */
  UNTRUSTED_ORIGIN = 'BRIDGE_002',
  /** Local token does not expose the bridged-token interface */
  UNSUPPORTED_TOKEN = 'BRIDGE_003',
  /** Local token is paired with a different L1 token */
  COUNTERPART_MISMATCH = 'BRIDGE_004',
  /** Messenger refused the message */
  TRANSPORT_FAILURE = 'BRIDGE_005',
  /** Not a 20-byte hex address */
  INVALID_ADDRESS = 'BRIDGE_006',
  /** Withdrawal recipient is the zero address */
  INVALID_RECIPIENT = 'BRIDGE_007',
  /** Nothing bridgeable deployed at the token address */
  UNKNOWN_TOKEN = 'BRIDGE_008',
  /** Token has no L1 pairing recorded */
  MISSING_COUNTERPART = 'BRIDGE_009',
  /** Payload is not a finalize-deposit call */
  MALFORMED_MESSAGE = 'BRIDGE_010',
  /** Environment configuration rejected */
  INVALID_CONFIG = 'BRIDGE_011',
  /** Burn could not be undone after a failed withdrawal */
  ROLLBACK_FAILED = 'BRIDGE_012',
  /** Withdrawal data is not hex encoded */
  INVALID_DATA = 'BRIDGE_013',
}

// =============================================================================
// Base Error Class
// =============================================================================

export class BridgeError extends Error {
  constructor(
    public readonly code: BridgeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

// =============================================================================
// Specific Errors
// =============================================================================

export class AuthorizationError extends BridgeError {
  constructor(
    code: BridgeErrorCode.NOT_OWNER | BridgeErrorCode.UNTRUSTED_ORIGIN,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(code, message, details, options);
    this.name = 'AuthorizationError';
  }
}

export class CapabilityMismatchError extends BridgeError {
  readonly reason: BounceReason;

  constructor(
    code: BridgeErrorCode.UNSUPPORTED_TOKEN | BridgeErrorCode.COUNTERPART_MISMATCH,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'CapabilityMismatchError';
    this.reason =
      code === BridgeErrorCode.UNSUPPORTED_TOKEN ? 'unsupported-token' : 'counterpart-mismatch';
  }
}

export class TransportError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(BridgeErrorCode.TRANSPORT_FAILURE, message, details, options);
    this.name = 'TransportError';
  }
}

export class ValidationError extends BridgeError {
  constructor(
    code:
      | BridgeErrorCode.INVALID_ADDRESS
      | BridgeErrorCode.INVALID_RECIPIENT
      | BridgeErrorCode.INVALID_DATA
      | BridgeErrorCode.UNKNOWN_TOKEN
      | BridgeErrorCode.MISSING_COUNTERPART,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

export class MessageDecodeError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(BridgeErrorCode.MALFORMED_MESSAGE, message, details, options);
    this.name = 'MessageDecodeError';
  }
}

export class ConfigError extends BridgeError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(BridgeErrorCode.INVALID_CONFIG, message, { issues });
    this.name = 'ConfigError';
  }
}

/**
 * Type guard for bridge errors
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

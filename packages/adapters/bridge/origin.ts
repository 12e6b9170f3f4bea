/**
 * Origin Guard
 *
 * The only way to obtain a VerifiedOrigin is to pass the messenger's
 * transport-level sender through `VerifiedOrigin.verify`. Anything carried
 * inside a payload is plain data and cannot be turned into one.
 *
 * @module adapters/bridge/origin
 */

import { getAddress, isAddress, isAddressEqual } from 'viem';
import type { Address, InboundCall } from '../../core/domain/bridge.js';
import { AuthorizationError, BridgeErrorCode } from './errors.js';

export class VerifiedOrigin {
  private constructor(readonly address: Address) {}

  /**
   * @throws {AuthorizationError} UNTRUSTED_ORIGIN unless the sender is `trusted`
   */
  static verify(call: InboundCall, trusted: Address): VerifiedOrigin {
    const sender = call.originSender;
    if (!isAddress(sender, { strict: false }) || !isAddressEqual(sender, trusted)) {
      throw new AuthorizationError(
        BridgeErrorCode.UNTRUSTED_ORIGIN,
        `Messages are only accepted from the counterpart bridge ${trusted}`,
        { originSender: sender, counterpartBridge: trusted }
      );
    }
    return new VerifiedOrigin(getAddress(sender));
  }
}

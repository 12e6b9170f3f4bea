import { describe, it, expect } from 'vitest';
import type { Address } from '../../../core/domain/bridge.js';
import { AuthorizationError, BridgeErrorCode } from '../errors.js';
import { VerifiedOrigin } from '../origin.js';
import { EVE, L1_BRIDGE } from './fixtures.js';

describe('VerifiedOrigin', () => {
  it('should admit the trusted sender', () => {
    expect(VerifiedOrigin.verify({ originSender: L1_BRIDGE }, L1_BRIDGE).address).toBe(L1_BRIDGE);
  });

  it('should ignore address casing', () => {
    const trusted: Address = '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd';
    expect(() => VerifiedOrigin.verify({ originSender: '0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD' }, trusted)).not.toThrow();
  });

  it('should refuse any other sender', () => {
    expect(() => VerifiedOrigin.verify({ originSender: EVE }, L1_BRIDGE)).toThrow(AuthorizationError);
    try {
      VerifiedOrigin.verify({ originSender: EVE }, L1_BRIDGE);
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({
        code: BridgeErrorCode.UNTRUSTED_ORIGIN,
        details: { originSender: EVE, counterpartBridge: L1_BRIDGE },
      });
    }
  });

  it('should refuse a sender that is not an address', () => {
    expect(() => VerifiedOrigin.verify({ originSender: '0x' }, L1_BRIDGE)).toThrow(AuthorizationError);
  });
});

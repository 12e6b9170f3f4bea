import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import type { BridgeEvent } from '../../../core/domain/bridge.js';
import { BridgeEventLog } from '../event-log.js';
import { ALICE, BOB, C, T } from './fixtures.js';

const event = (type: BridgeEvent['type'], itemId: bigint): BridgeEvent => ({
  type,
  l1Token: C,
  l2Token: T,
  from: ALICE,
  to: BOB,
  itemId,
  data: '0x',
});

describe('BridgeEventLog', () => {
  it('should keep events in emission order and filter by type', () => {
    const log = new BridgeEventLog(pino({ level: 'silent' }));
    log.emit(event('WithdrawalInitiated', 1n));
    log.emit(event('DepositFinalized', 2n));
    log.emit(event('WithdrawalInitiated', 3n));

    expect(log.all().map((e) => e.itemId)).toEqual([1n, 2n, 3n]);
    expect(log.ofType('WithdrawalInitiated').map((e) => e.itemId)).toEqual([1n, 3n]);
  });

  it('should notify subscribers until they unsubscribe', () => {
    const log = new BridgeEventLog(pino({ level: 'silent' }));
    const listener = vi.fn();
    const unsubscribe = log.subscribe(listener);

    log.emit(event('DepositFailed', 1n));
    unsubscribe();
    log.emit(event('DepositFailed', 2n));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(event('DepositFailed', 1n));
  });

  it('should isolate a failing listener', () => {
    const log = new BridgeEventLog(pino({ level: 'silent' }));
    const healthy = vi.fn();
    log.subscribe(() => {
      throw new Error('listener down');
    });
    log.subscribe(healthy);

    expect(() => log.emit(event('DepositFinalized', 1n))).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(1);
  });
});

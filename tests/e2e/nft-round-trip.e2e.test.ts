/**
 * NFT Round Trip: E2E
 *
 * L1 deposit -> L2 mint -> L2 withdrawal -> L1 release, and the bounce path
 * for a deposit naming a mispaired L2 token, all over one message channel.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { encodeFinalizeDeposit } from '../../packages/adapters/bridge/message-codec.js';
import { ADDRESSES, createBridgeNetwork, type BridgeNetwork } from './l1-bridge-stub.js';

const { alice, bob, l1Bridge, l2Token, mismatchedL2Token, l1Token, l2Bridge } = ADDRESSES;

describe('NFT bridge round trip', () => {
  let net: BridgeNetwork;

  beforeEach(async () => {
    net = createBridgeNetwork();
    await net.l1Token.mint(alice, 42n);
  });

  it('should move an item to L2 and back', async () => {
    await net.l1Bridge.depositTo(alice, l2Token, bob, 42n);
    expect(await net.l1Token.ownerOf(42n)).toBe(l1Bridge);

    const [deposit] = await net.channel.relayAll();
    expect(deposit).toMatchObject({ status: 'delivered', result: { status: 'finalized' } });
    expect(await net.l2Token.ownerOf(42n)).toBe(bob);

    const receipt = await net.l2Bridge.withdrawTo(bob, l2Token, alice, 42n, 100_000, '0x');
    expect(await net.l2Token.ownerOf(42n)).toBeNull();
    expect(net.channel.pending('l1')).toHaveLength(1);
    expect(net.channel.pending('l1')[0].payload).toBe(receipt.payload);

    const [release] = await net.channel.relayAll();
    expect(release.status).toBe('delivered');
    expect(await net.l1Token.ownerOf(42n)).toBe(alice);
    expect(net.l1Bridge.released).toEqual([
      { l1Token, l2Token, from: bob, to: alice, itemId: 42n, data: '0x' },
    ]);

    expect(net.events.all().map((event) => event.type)).toEqual(['DepositFinalized', 'WithdrawalInitiated']);
  });

  it('should return a deposit for a mispaired token to its sender', async () => {
    await net.l1Bridge.depositTo(alice, mismatchedL2Token, bob, 42n);

    const results = await net.channel.relayAll();

    expect(results.map((result) => result.status)).toEqual(['delivered', 'delivered']);
    expect(await net.mismatchedL2Token.ownerOf(42n)).toBeNull();
    expect(await net.l1Token.ownerOf(42n)).toBe(alice);
    expect(net.l1Bridge.released).toEqual([
      { l1Token, l2Token: mismatchedL2Token, from: bob, to: alice, itemId: 42n, data: '0x' },
    ]);
    expect(net.events.ofType('DepositFailed')).toHaveLength(1);
    expect(net.metrics.bounced.map((b) => b.reason)).toEqual(['counterpart-mismatch']);
  });

  it('should ignore a forged deposit sent by anyone but the L1 bridge', async () => {
    const forger = net.channel.messengerFor('l1', bob);
    const payload = encodeFinalizeDeposit({ l1Token, l2Token, from: bob, to: bob, itemId: 7n, data: '0x' });

    await forger.sendMessage(l2Bridge, payload, 0);
    const [result] = await net.channel.relayAll();

    expect(result.status).toBe('failed');
    expect(net.metrics.rejectedDeliveries).toBe(1);
    expect(net.l2Token.totalSupply()).toBe(0);
  });
});

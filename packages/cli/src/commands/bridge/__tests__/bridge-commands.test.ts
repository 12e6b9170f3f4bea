/**
 * Bridge CLI Command Tests
 *
 * Render functions are checked with color off; the program test drives
 * commander end to end with console output captured.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command } from 'commander';
import type { Address, BridgeMessage } from '../../../../../core/domain/bridge.js';
import { BRIDGED_TOKEN_INTERFACE_ID } from '../../../../../core/domain/interface-ids.js';
import { encodeFinalizeDeposit, hashMessage } from '../../../../../adapters/bridge/message-codec.js';
import { BridgeError, BridgeErrorCode } from '../../../../../adapters/bridge/errors.js';
import { registerCommands } from '../../index.js';
import { configCommand, renderConfig } from '../config.js';
import { renderDecoded } from '../decode.js';
import { renderEncoded } from '../encode.js';
import { renderInterfaceId } from '../interface-id.js';
import { formatError, formatRows, createPalette } from '../utils.js';

const ALICE: Address = '0x1000000000000000000000000000000000000001';
const BOB: Address = '0x2000000000000000000000000000000000000002';
const T: Address = '0x3000000000000000000000000000000000000003';
const C: Address = '0x4000000000000000000000000000000000000004';
const L1_BRIDGE: Address = '0x6000000000000000000000000000000000000006';

const message: BridgeMessage = { l1Token: C, l2Token: T, from: BOB, to: ALICE, itemId: 7n, data: '0x' };
const plain = { color: false };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatRows', () => {
  it('should align values after the longest label', () => {
    expect(formatRows([['a', '1'], ['abc', '2']], createPalette(false))).toBe('a    1\nabc  2');
  });
});

describe('renderDecoded', () => {
  it('should list every field of a deposit', () => {
    expect(renderDecoded({ kind: 'deposit', message }, plain).split('\n')).toEqual([
      'kind      deposit',
      'function  finalizeNftDeposit',
      `l1Token   ${C}`,
      `l2Token   ${T}`,
      `from      ${BOB}`,
      `to        ${ALICE}`,
      'itemId    7',
      'data      0x',
    ]);
  });

  it('should print item ids as strings in JSON', () => {
    const output = JSON.parse(renderDecoded({ kind: 'withdrawal', message }, { json: true, color: false }));
    expect(output).toEqual({
      kind: 'withdrawal',
      function: 'finalizeNftWithdrawal',
      l1Token: C,
      l2Token: T,
      from: BOB,
      to: ALICE,
      itemId: '7',
      data: '0x',
    });
  });
});

describe('renderEncoded', () => {
  const input = { l1Token: C, l2Token: T, from: BOB, to: ALICE, itemId: '7' };

  it('should encode a deposit payload and its hash', () => {
    const payload = encodeFinalizeDeposit(message);
    expect(JSON.parse(renderEncoded('deposit', input, { json: true, color: false }))).toEqual({
      kind: 'deposit',
      payload,
      messageHash: hashMessage(payload),
    });
  });

  it('should reject an unknown kind', () => {
    expect(() => renderEncoded('refund', input, plain)).toThrow('Unknown message kind "refund"');
  });
});

describe('renderInterfaceId', () => {
  it('should default to the bridged-token interface', () => {
    expect(renderInterfaceId([], plain).split('\n')).toEqual([
      BRIDGED_TOKEN_INTERFACE_ID,
      '  counterpartToken()',
      '  mint(address,uint256)',
      '  burn(address,uint256)',
    ]);
  });

  it('should compute the id of the given signatures', () => {
    expect(JSON.parse(renderInterfaceId(['supportsInterface(bytes4)'], { json: true, color: false }))).toEqual({
      interfaceId: '0x01ffc9a7',
      functions: ['supportsInterface(bytes4)'],
    });
  });
});

describe('config output', () => {
  it('should render the resolved configuration', () => {
    const config = { counterpartBridge: L1_BRIDGE, defaultGasHint: 200_000, logLevel: 'info' as const, metricsPrefix: 'nft_bridge' };
    expect(renderConfig(config, plain).split('\n')).toEqual([
      `counterpartBridge  ${L1_BRIDGE}`,
      'defaultGasHint     200000',
      'logLevel           info',
      'metricsPrefix      nft_bridge',
    ]);
  });

  it('should print the problems and exit with status 1 for an invalid environment', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => configCommand(plain, {})).toThrow('process.exit');
    expect(exit).toHaveBeenCalledWith(1);
    expect(stderr).toHaveBeenCalledWith(
      'Error: Invalid bridge configuration:\n  - BRIDGE_COUNTERPART_ADDRESS: Invalid address\nCode: BRIDGE_011'
    );
  });
});

describe('formatError', () => {
  it('should include the bridge error code', () => {
    const error = new BridgeError(BridgeErrorCode.TRANSPORT_FAILURE, 'Messenger refused');
    expect(formatError(error, false)).toBe('Error: Messenger refused\nCode: BRIDGE_005');
    expect(JSON.parse(formatError(error, true))).toEqual({
      success: false,
      error: { message: 'Messenger refused', code: 'BRIDGE_005' },
    });
  });

  it('should fall back to UNKNOWN for plain errors', () => {
    expect(JSON.parse(formatError(new Error('boom'), true)).error.code).toBe('UNKNOWN');
  });
});

describe('nft-bridge program', () => {
  it('should run interface-id through commander', async () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const program = new Command().name('nft-bridge').option('--no-color').exitOverride();
    registerCommands(program);

    await program.parseAsync(['interface-id', 'supportsInterface(bytes4)', '--json'], { from: 'user' });

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stdout.mock.calls[0][0]))).toEqual({
      interfaceId: '0x01ffc9a7',
      functions: ['supportsInterface(bytes4)'],
    });
  });
});

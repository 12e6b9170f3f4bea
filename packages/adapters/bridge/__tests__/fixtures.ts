/**
 * Shared wiring for bridge endpoint tests.
 */

import { pino } from 'pino';
import type { Address } from '../../../core/domain/bridge.js';
import { InMemoryMessageChannel } from '../../messenger/in-memory-messenger.js';
import { InMemoryTokenDirectory } from '../../ledger/token-directory.js';
import { PlainNft, StandardBridgedNft } from '../../ledger/nft-ledger.js';
import { BridgeEventLog } from '../event-log.js';
import { L2NftBridge } from '../l2-nft-bridge.js';
import { TestMetrics } from '../metrics.js';

export const ALICE: Address = '0x1000000000000000000000000000000000000001';
export const BOB: Address = '0x2000000000000000000000000000000000000002';
/** L2 token paired with C */
export const T: Address = '0x3000000000000000000000000000000000000003';
/** L1 token */
export const C: Address = '0x4000000000000000000000000000000000000004';
/** L2 token paired with some other L1 token */
export const T2: Address = '0x5000000000000000000000000000000000000005';
export const L1_BRIDGE: Address = '0x6000000000000000000000000000000000000006';
export const L2_BRIDGE: Address = '0x7000000000000000000000000000000000000007';
export const EVE: Address = '0x8000000000000000000000000000000000000008';
export const OTHER_L1: Address = '0x9000000000000000000000000000000000000009';
/** Plain ERC-721 with no bridge surface */
export const PLAIN: Address = '0x1100000000000000000000000000000000000011';

export function setupBridge(options: { defaultGasHint?: number } = {}) {
  const logger = pino({ level: 'silent' });
  const channel = new InMemoryMessageChannel(logger);
  const tokens = new InMemoryTokenDirectory();
  const events = new BridgeEventLog(logger);
  const metrics = new TestMetrics();

  const token = new StandardBridgedNft({ address: T, counterpartToken: C, logger });
  const mismatched = new StandardBridgedNft({ address: T2, counterpartToken: OTHER_L1, logger });
  const plain = new PlainNft(PLAIN, logger);
  tokens.register(token).register(mismatched).register(plain);

  const bridge = new L2NftBridge({
    messenger: channel.messengerFor('l2', L2_BRIDGE),
    counterpartBridge: L1_BRIDGE,
    tokens,
    events,
    logger,
    metrics,
    ...options,
  });

  return { logger, channel, tokens, events, metrics, token, mismatched, plain, bridge };
}

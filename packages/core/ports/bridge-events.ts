/**
 * Bridge Event Sink Port
 *
 * Observable events for off-chain indexers and relayers. The endpoint only
 * writes to the sink; nothing inside the bridge reads events back.
 */

import type { BridgeEvent } from '../domain/bridge.js';

export interface IBridgeEventSink {
  emit(event: BridgeEvent): void;
}

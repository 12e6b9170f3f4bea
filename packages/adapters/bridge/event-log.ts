/**
 * In-process event sink.
 *
 * Keeps every emitted event in order and fans them out to subscribers
 * (indexers, relayers, tests). Listener failures are logged and do not
 * affect the bridge call that emitted the event.
 *
 * @module adapters/bridge/event-log
 */

import type { Logger } from 'pino';
import type { BridgeEvent, BridgeEventType } from '../../core/domain/bridge.js';
import type { IBridgeEventSink } from '../../core/ports/bridge-events.js';

export type BridgeEventListener = (event: BridgeEvent) => void;

export class BridgeEventLog implements IBridgeEventSink {
  private readonly events: BridgeEvent[] = [];
  private readonly listeners = new Set<BridgeEventListener>();
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: 'BridgeEventLog' });
  }

  emit(event: BridgeEvent): void {
    this.events.push(event);
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error({ event: 'bridge.events.listener_failed', type: event.type, err }, 'Event listener threw');
      }
    }
  }

  /**
   * @returns Unsubscribe function
   */
  subscribe(listener: BridgeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  all(): readonly BridgeEvent[] {
    return [...this.events];
  }

  ofType(type: BridgeEventType): BridgeEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

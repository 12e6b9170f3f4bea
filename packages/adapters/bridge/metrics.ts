/**
 * Bridge Prometheus Metrics
 *
 * Counters and latency histogram for the bridge endpoint. Metrics live on a
 * registry owned by the bridge, which can be merged into an application
 * registry:
 *
 * ```typescript
 * import { Registry, register } from 'prom-client';
 * const metrics = new PrometheusBridgeMetrics();
 * const merged = Registry.merge([register, metrics.registry]);
 * ```
 *
 * @module adapters/bridge/metrics
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { BounceReason } from '../../core/domain/bridge.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type BridgeOperation = 'withdrawal' | 'deposit' | 'bounce';

/**
 * Metrics surface used by the endpoint. Keeps the endpoint independent of
 * prom-client.
 */
export interface BridgeMetrics {
  recordWithdrawal(latencyMs: number): void;
  recordDepositFinalized(latencyMs: number): void;
  recordDepositBounced(reason: BounceReason, latencyMs: number): void;
  recordRejectedDelivery(): void;
  recordTransportFailure(operation: BridgeOperation): void;
}

// --------------------------------------------------------------------------
// Prometheus Implementation
// --------------------------------------------------------------------------

export class PrometheusBridgeMetrics implements BridgeMetrics {
  readonly registry: Registry;

  private readonly withdrawalsTotal: Counter;
  private readonly depositsFinalizedTotal: Counter;
  private readonly depositsBouncedTotal: Counter<'reason'>;
  private readonly rejectedDeliveriesTotal: Counter;
  private readonly transportFailuresTotal: Counter<'operation'>;
  private readonly operationDuration: Histogram<'operation'>;

  constructor(registry: Registry = new Registry(), prefix = 'nft_bridge') {
    this.registry = registry;

    this.withdrawalsTotal = new Counter({
      name: `${prefix}_withdrawals_total`,
      help: 'Withdrawals initiated (item burned and message sent)',
      registers: [registry],
    });

    this.depositsFinalizedTotal = new Counter({
      name: `${prefix}_deposits_finalized_total`,
      help: 'Deposits finalized by minting on this domain',
      registers: [registry],
    });

    this.depositsBouncedTotal = new Counter({
      name: `${prefix}_deposits_bounced_total`,
      help: 'Deposits returned to the counterpart domain',
      labelNames: ['reason'] as const,
      registers: [registry],
    });

    this.rejectedDeliveriesTotal = new Counter({
      name: `${prefix}_rejected_deliveries_total`,
      help: 'Inbound calls refused because of an untrusted origin',
      registers: [registry],
    });

    this.transportFailuresTotal = new Counter({
      name: `${prefix}_transport_failures_total`,
      help: 'Messages the messenger refused to send',
      labelNames: ['operation'] as const,
      registers: [registry],
    });

    this.operationDuration = new Histogram({
      name: `${prefix}_operation_duration_seconds`,
      help: 'Bridge operation duration in seconds',
      labelNames: ['operation'] as const,
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers: [registry],
    });
  }

  recordWithdrawal(latencyMs: number): void {
    this.withdrawalsTotal.inc();
    this.operationDuration.observe({ operation: 'withdrawal' }, latencyMs / 1000);
  }

  recordDepositFinalized(latencyMs: number): void {
    this.depositsFinalizedTotal.inc();
    this.operationDuration.observe({ operation: 'deposit' }, latencyMs / 1000);
  }

  recordDepositBounced(reason: BounceReason, latencyMs: number): void {
    this.depositsBouncedTotal.inc({ reason });
    this.operationDuration.observe({ operation: 'bounce' }, latencyMs / 1000);
  }

  recordRejectedDelivery(): void {
    this.rejectedDeliveriesTotal.inc();
  }

  recordTransportFailure(operation: BridgeOperation): void {
    this.transportFailuresTotal.inc({ operation });
  }
}

// --------------------------------------------------------------------------
// No-op & Test Implementations
// --------------------------------------------------------------------------

export class NoopBridgeMetrics implements BridgeMetrics {
  recordWithdrawal(): void {}
  recordDepositFinalized(): void {}
  recordDepositBounced(): void {}
  recordRejectedDelivery(): void {}
  recordTransportFailure(): void {}
}

/**
 * Records every call for assertions
 */
export class TestMetrics implements BridgeMetrics {
  readonly withdrawals: number[] = [];
  readonly finalized: number[] = [];
  readonly bounced: Array<{ reason: BounceReason; latencyMs: number }> = [];
  readonly transportFailures: BridgeOperation[] = [];
  rejectedDeliveries = 0;

  recordWithdrawal(latencyMs: number): void {
    this.withdrawals.push(latencyMs);
  }

  recordDepositFinalized(latencyMs: number): void {
    this.finalized.push(latencyMs);
  }

  recordDepositBounced(reason: BounceReason, latencyMs: number): void {
    this.bounced.push({ reason, latencyMs });
  }

  recordRejectedDelivery(): void {
    this.rejectedDeliveries++;
  }

  recordTransportFailure(operation: BridgeOperation): void {
    this.transportFailures.push(operation);
  }
}

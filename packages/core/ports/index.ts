/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) for the bridge.
 * Ports define the boundaries between the bridge core and external adapters.
 */

// Cross-Domain Messenger Interface
export * from './cross-domain-messenger.js';

// Token Ledger Interface
export * from './token-ledger.js';

// Event Sink Interface
export * from './bridge-events.js';

// Bridge Endpoint Interface
export * from './bridge-endpoint.js';

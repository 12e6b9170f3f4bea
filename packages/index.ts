/**
 * L2 NFT bridge
 *
 * Library entry: domain types, ports and adapters.
 */

export * from './core/domain/index.js';
export * from './core/ports/index.js';
export * from './adapters/bridge/index.js';
export * from './adapters/messenger/index.js';
export * from './adapters/ledger/index.js';

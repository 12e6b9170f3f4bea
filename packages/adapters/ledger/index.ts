/**
 * Ledger Adapter
 *
 * In-memory token contracts and directory.
 *
 * @module adapters/ledger
 */

export { StandardBridgedNft, PlainNft, type StandardBridgedNftOptions } from './nft-ledger.js';
export { InMemoryTokenDirectory } from './token-directory.js';
export { LedgerError, LedgerErrorCode } from './errors.js';

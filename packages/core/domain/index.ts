/**
 * Core Domain Types
 *
 * Exports all domain types and protocol constants for the bridge.
 * Domain types represent bridge concepts independent of infrastructure.
 */

// Messages, events, outcomes
export * from './bridge.js';

// ERC-165 identifiers
export * from './interface-ids.js';

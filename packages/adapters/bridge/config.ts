/**
 * Bridge Endpoint Configuration
 *
 * Configuration loader for the bridge endpoint.
 * Reads environment variables and provides typed, validated configuration.
 *
 * @module adapters/bridge/config
 */

import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import type { Address } from '../../core/domain/bridge.js';
import { ConfigError } from './errors.js';
import { AddressSchema } from './message-codec.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface BridgeConfig {
  /** L1 bridge; the only origin trusted for deposits */
  counterpartBridge: Address;
  /** Gas hint used when a withdrawal does not pass one */
  defaultGasHint: number;
  /** pino log level */
  logLevel: LevelWithSilent;
  /** Prefix for every Prometheus metric name */
  metricsPrefix: string;
}

// --------------------------------------------------------------------------
// Environment Variables
// --------------------------------------------------------------------------

const ENV_VARS = {
  BRIDGE_COUNTERPART_ADDRESS: 'BRIDGE_COUNTERPART_ADDRESS',
  BRIDGE_DEFAULT_GAS_HINT: 'BRIDGE_DEFAULT_GAS_HINT',
  LOG_LEVEL: 'LOG_LEVEL',
  BRIDGE_METRICS_PREFIX: 'BRIDGE_METRICS_PREFIX',
} as const;

// --------------------------------------------------------------------------
// Default Values
// --------------------------------------------------------------------------

const DEFAULTS = {
  defaultGasHint: 200_000,
  logLevel: 'info',
  metricsPrefix: 'nft_bridge',
} as const;

// --------------------------------------------------------------------------
// Schema
// --------------------------------------------------------------------------

const BridgeEnvSchema = z.object({
  [ENV_VARS.BRIDGE_COUNTERPART_ADDRESS]: AddressSchema,
  [ENV_VARS.BRIDGE_DEFAULT_GAS_HINT]: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULTS.defaultGasHint),
  [ENV_VARS.LOG_LEVEL]: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default(DEFAULTS.logLevel),
  [ENV_VARS.BRIDGE_METRICS_PREFIX]: z
    .string()
    .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/, 'Must be a valid Prometheus metric name prefix')
    .default(DEFAULTS.metricsPrefix),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

// --------------------------------------------------------------------------
// Configuration Loader
// --------------------------------------------------------------------------

/**
 * Load bridge configuration from environment variables
 *
 * Environment variables:
 * - BRIDGE_COUNTERPART_ADDRESS: L1 bridge address (required)
 * - BRIDGE_DEFAULT_GAS_HINT: default gas hint for withdrawals, default: 200000
 * - LOG_LEVEL: pino level, default: info
 * - BRIDGE_METRICS_PREFIX: metric name prefix, default: nft_bridge
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadBridgeConfig(env: Record<string, string | undefined> = process.env): BridgeConfig {
  const result = BridgeEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid bridge configuration:\n  - ${issues.join('\n  - ')}`, issues);
  }

  const parsed = result.data;
  return {
    counterpartBridge: parsed.BRIDGE_COUNTERPART_ADDRESS,
    defaultGasHint: parsed.BRIDGE_DEFAULT_GAS_HINT,
    logLevel: parsed.LOG_LEVEL,
    metricsPrefix: parsed.BRIDGE_METRICS_PREFIX,
  };
}

/**
 * Validate the environment without throwing
 *
 * @returns Array of problems (empty if valid)
 */
export function validateBridgeConfig(env: Record<string, string | undefined> = process.env): string[] {
  const result = BridgeEnvSchema.safeParse(env);
  return result.success ? [] : formatIssues(result.error);
}

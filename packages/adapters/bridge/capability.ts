/**
 * Bridged-Token Capability Probe
 *
 * Decides whether a local token can take part in the bridge. The contract's
 * variant tells us which surface it exposes; the ERC-165 probe tells us
 * whether it actually claims the bridged-token interface. Both must agree.
 *
 * @module adapters/bridge/capability
 */

import type { Logger } from 'pino';
import type { Address, Hex } from '../../core/domain/bridge.js';
import { BRIDGED_TOKEN_INTERFACE_ID, ERC165_INTERFACE_ID } from '../../core/domain/interface-ids.js';
import type { BridgedTokenContract, IErc165, ITokenDirectory } from '../../core/ports/token-ledger.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type UnsupportedReason = 'not-deployed' | 'no-bridge-surface' | 'interface-not-advertised';

export type LocalToken =
  | { kind: 'bridged'; address: Address; token: BridgedTokenContract }
  | { kind: 'unsupported'; address: Address; reason: UnsupportedReason };

// --------------------------------------------------------------------------
// Probe
// --------------------------------------------------------------------------

/**
 * ERC-165 check in two steps: the contract must claim ERC-165 itself and
 * then the requested interface. A probe that throws counts as "no".
 */
export async function supportsInterfaceSafely(
  contract: IErc165,
  interfaceId: Hex,
  logger: Logger
): Promise<boolean> {
  try {
    if (!(await contract.supportsInterface(ERC165_INTERFACE_ID))) {
      return false;
    }
    return await contract.supportsInterface(interfaceId);
  } catch (err) {
    logger.debug(
      { event: 'bridge.capability.probe_failed', token: contract.address, interfaceId, err },
      'Interface probe threw; treating as unsupported'
    );
    return false;
  }
}

/**
 * Resolve and classify a local token address.
 */
export async function classifyToken(
  directory: ITokenDirectory,
  address: Address,
  logger: Logger
): Promise<LocalToken> {
  const contract = await directory.lookup(address);
  if (!contract) {
    return { kind: 'unsupported', address, reason: 'not-deployed' };
  }

  switch (contract.variant) {
    case 'plain':
      return { kind: 'unsupported', address, reason: 'no-bridge-surface' };
    case 'bridged': {
      const advertised = await supportsInterfaceSafely(contract, BRIDGED_TOKEN_INTERFACE_ID, logger);
      return advertised
        ? { kind: 'bridged', address, token: contract }
        : { kind: 'unsupported', address, reason: 'interface-not-advertised' };
    }
  }
}

/**
 * ERC-165 interface identifiers used by the bridge.
 */

import { hexToBigInt, numberToHex, toFunctionSelector, type Hex } from 'viem';

/**
 * XOR of the 4-byte selectors of every function in an interface.
 *
 * @example computeInterfaceId(['supportsInterface(bytes4)']) // '0x01ffc9a7'
 */
export function computeInterfaceId(signatures: readonly string[]): Hex {
  const id = signatures
    .map((signature) => hexToBigInt(toFunctionSelector(signature)))
    .reduce((acc, selector) => acc ^ selector, 0n);
  return numberToHex(id, { size: 4 });
}

/** Surface a token must expose to be bridged */
export const BRIDGED_TOKEN_FUNCTIONS = [
  'counterpartToken()',
  'mint(address,uint256)',
  'burn(address,uint256)',
] as const;

export const BRIDGED_TOKEN_INTERFACE_ID: Hex = computeInterfaceId(BRIDGED_TOKEN_FUNCTIONS);

export const ERC165_INTERFACE_ID: Hex = '0x01ffc9a7';

export const ERC721_INTERFACE_ID: Hex = '0x80ac58cd';

/** Return value of onERC721Received(address,address,uint256,bytes) */
export const ERC721_RECEIVED_SELECTOR: Hex = '0x150b7a02';

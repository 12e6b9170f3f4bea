import {
  BRIDGED_TOKEN_FUNCTIONS,
  BRIDGED_TOKEN_INTERFACE_ID,
  computeInterfaceId,
} from '../../../../core/domain/interface-ids.js';
import { createPalette, handleError, type OutputOptions } from './utils.js';

/**
 * ERC-165 id of the given function signatures, or of the bridged-token
 * interface when none are given.
 */
export function renderInterfaceId(signatures: readonly string[], options: OutputOptions): string {
  const functions = signatures.length > 0 ? signatures : BRIDGED_TOKEN_FUNCTIONS;
  const interfaceId = signatures.length > 0 ? computeInterfaceId(signatures) : BRIDGED_TOKEN_INTERFACE_ID;

  if (options.json) {
    return JSON.stringify({ interfaceId, functions }, null, 2);
  }
  const palette = createPalette(options.color);
  return [palette.bold(interfaceId), ...functions.map((signature) => `  ${signature}`)].join('\n');
}

export function interfaceIdCommand(signatures: string[], options: OutputOptions): void {
  try {
    console.log(renderInterfaceId(signatures, options));
  } catch (error) {
    handleError(error, options.json);
  }
}

/**
 * nft-bridge CLI
 *
 * @module packages/cli
 */

export { registerCommands, registerBridgeCommands } from './commands/index.js';
export { renderDecoded, decodeCommand } from './commands/bridge/decode.js';
export { renderEncoded, encodeCommand, type EncodeInput } from './commands/bridge/encode.js';
export { renderInterfaceId, interfaceIdCommand } from './commands/bridge/interface-id.js';
export { renderConfig, configCommand } from './commands/bridge/config.js';
export {
  shouldUseColor,
  createPalette,
  formatRows,
  formatError,
  handleError,
  type OutputOptions,
} from './commands/bridge/utils.js';

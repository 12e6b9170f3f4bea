import { loadBridgeConfig, type BridgeConfig } from '../../../../adapters/bridge/config.js';
import { createPalette, formatRows, handleError, type OutputOptions } from './utils.js';

export function renderConfig(config: BridgeConfig, options: OutputOptions): string {
  if (options.json) {
    return JSON.stringify(config, null, 2);
  }
  return formatRows(
    [
      ['counterpartBridge', config.counterpartBridge],
      ['defaultGasHint', String(config.defaultGasHint)],
      ['logLevel', config.logLevel],
      ['metricsPrefix', config.metricsPrefix],
    ],
    createPalette(options.color)
  );
}

/**
 * Validate the bridge environment and print the resolved configuration.
 */
export function configCommand(options: OutputOptions, env: Record<string, string | undefined> = process.env): void {
  try {
    console.log(renderConfig(loadBridgeConfig(env), options));
  } catch (error) {
    handleError(error, options.json);
  }
}

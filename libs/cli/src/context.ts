/**
 * Shared state resolved once per CLI run from global options
 */

import type { ScriptwardConfig } from '@scriptward/ipc';
import type { Logger } from '@scriptward/engine';
import { createConfig, loadConfigFile } from './config/loader.js';
import { createDebugLogger, defaultLogFile } from './utils/debug-log.js';

export interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

export interface CliContext {
  config: ScriptwardConfig;
  logger: Logger;
}

export type ContextProvider = () => CliContext;

export function createContext(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): CliContext {
  const file = options.config ? loadConfigFile(options.config) : {};
  const config = createConfig({ logLevel: options.logLevel }, { file, env });
  const logger = createDebugLogger({ level: config.logLevel, logFile: defaultLogFile(env) });

  logger.debug(`config: ${JSON.stringify(config)}`);
  return { config, logger };
}

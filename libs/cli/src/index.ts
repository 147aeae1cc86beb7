/**
 * Scriptward CLI Library
 *
 * Exports the program factory, configuration loading and command creators
 * for embedding the CLI.
 *
 * @packageDocumentation
 */

export { createProgram, VERSION } from './program.js';
export { createContext } from './context.js';
export type { CliContext, ContextProvider, GlobalOptions } from './context.js';
export { createConfig, loadConfigFile, readEnvConfig } from './config/loader.js';
export type { ConfigSource, CreateConfigOptions } from './config/loader.js';
export { createDebugLogger, defaultLogFile } from './utils/debug-log.js';
export type { DebugLoggerOptions } from './utils/debug-log.js';
export { readScript } from './utils/read-script.js';
export * from './commands/index.js';

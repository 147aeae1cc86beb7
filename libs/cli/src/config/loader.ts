/**
 * Configuration loader for the Scriptward CLI
 *
 * Layers, lowest first: schema defaults, config file, SCRIPTWARD_* environment
 * variables, command-line overrides. The merged result is validated once.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { ScriptwardConfigSchema } from '@scriptward/ipc';
import type { ScriptwardConfig } from '@scriptward/ipc';
import { ConfigError } from '@scriptward/engine';

/** Unvalidated configuration values keyed by config field */
export type ConfigSource = Record<string, unknown>;

const ENV_KEYS: Record<string, keyof ScriptwardConfig> = {
  SCRIPTWARD_LOG_LEVEL: 'logLevel',
  SCRIPTWARD_SCHEME: 'highlightScheme',
  SCRIPTWARD_MAX_SHEBANG_ARGS: 'maxShebangArgs',
  SCRIPTWARD_DEFAULT_INTERPRETER: 'defaultInterpreter',
  SCRIPTWARD_EXEC_TIMEOUT: 'execTimeoutMs',
  SCRIPTWARD_REQUIRE_VALIDATION: 'requireValidation',
};

const NUMERIC_KEYS = new Set<keyof ScriptwardConfig>(['maxShebangArgs', 'execTimeoutMs']);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function parseEnvValue(key: keyof ScriptwardConfig, raw: string): unknown {
  if (NUMERIC_KEYS.has(key)) {
    return raw.trim() === '' ? raw : Number(raw);
  }
  if (key === 'requireValidation') {
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
  }
  return raw;
}

function withoutUndefined(source: ConfigSource): ConfigSource {
  return Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));
}

/**
 * Read SCRIPTWARD_* variables into config fields
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigSource {
  const values: ConfigSource = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const raw = env[name];
    if (raw !== undefined) {
      values[key] = parseEnvValue(key, raw);
    }
  }
  return values;
}

export interface CreateConfigOptions {
  /** Values from a config file */
  file?: ConfigSource;
  env?: NodeJS.ProcessEnv;
}

/**
 * Create configuration from environment variables
 *
 * @throws ConfigError when the merged values do not match the schema
 */
export function createConfig(overrides: ConfigSource = {}, options: CreateConfigOptions = {}): ScriptwardConfig {
  const merged = {
    ...withoutUndefined(options.file ?? {}),
    ...readEnvConfig(options.env),
    ...withoutUndefined(overrides),
  };

  const result = ScriptwardConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load a JSON or YAML config file. Keys are checked against the schema;
 * defaults are left to {@link createConfig}.
 */
export function loadConfigFile(filePath: string): ConfigSource {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Cannot parse config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) return {};

  const result = ScriptwardConfigSchema.partial().strict().safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, formatIssues(result.error));
  }
  return result.data;
}

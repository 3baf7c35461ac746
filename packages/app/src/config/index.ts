/**
 * Configuration loading and management
 */

import { CommandError, CommandErrorCode } from '../commands/errors.js';
import { configSchema, envMapping, type Config } from './schema.js';

type EnvValue = string | number | boolean;

interface ConfigTree {
  [key: string]: EnvValue | ConfigTree;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {CommandError} CONFIG_ERROR listing every invalid setting
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const rawConfig: ConfigTree = {};

  // Load from environment variables
  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  // Parse and validate
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CommandError(
      CommandErrorCode.CONFIG_ERROR,
      `Configuration validation failed:\n${errors.join('\n')}`,
      { issues: errors }
    );
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(tree: ConfigTree, path: string, value: EnvValue): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = tree;
  for (const key of keys) {
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): EnvValue {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    verbose: config.app.verbose,
    provider: config.provider.type,
    policy: config.backtest.policy,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath !== undefined,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';

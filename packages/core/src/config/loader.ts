/**
 * Configuration Loader
 *
 * Builds the application configuration from, in increasing precedence:
 * - built-in defaults
 * - an optional JSON config file (`${VAR_NAME}` placeholders are substituted)
 * - environment variables (a `.env` file is loaded first)
 *
 * The result is validated with Zod and cached.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import dotenv from 'dotenv';
import { AppConfigSchema, type AppConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigurationError } from '../errors.js';
import { expandHome, isPlainObject } from '../utils/index.js';

// Load environment variables
dotenv.config();

// =============================================================================
// Environment Variable Helpers
// =============================================================================

/**
 * First non-empty value among the given variable names
 */
function getEnv(...names: string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

function getNumberEnv(name: string): number | undefined {
  const value = getEnv(name);
  return value === undefined ? undefined : Number(value);
}

/**
 * Substitute environment variables in a string
 * Supports ${VAR_NAME} syntax
 */
function substituteEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (placeholder: string, varName: string) => {
    // Keep the placeholder if env var not found
    return process.env[varName] ?? placeholder;
  });
}

/**
 * Deep substitute environment variables in a parsed JSON value
 */
export function deepSubstituteEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map(deepSubstituteEnvVars);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = deepSubstituteEnvVars(entry);
    }
    return result;
  }
  return value;
}

// =============================================================================
// Config File Loading
// =============================================================================

/**
 * Find the project root by looking for package.json
 */
function findProjectRoot(): string {
  let currentDir = process.cwd();

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(resolve(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Possible config file locations (in priority order)
 */
function getConfigPaths(): string[] {
  const explicit = getEnv('OUTLOOK_CONNECTOR_CONFIG');
  if (explicit) {
    return [resolve(expandHome(explicit))];
  }
  const projectRoot = findProjectRoot();
  return [
    resolve(projectRoot, '.outlook-connector.json'),
    resolve(projectRoot, 'outlook-connector.config.json'),
  ];
}

/**
 * Load config from the first JSON file that exists
 */
function loadConfigFile(): Record<string, unknown> {
  for (const configPath of getConfigPaths()) {
    if (!existsSync(configPath)) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Could not read config file ${configPath}`, {
        path: configPath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    const substituted = deepSubstituteEnvVars(parsed);
    if (!isPlainObject(substituted)) {
      throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`, {
        path: configPath,
      });
    }
    return substituted;
  }
  return {};
}

// =============================================================================
// Config from Environment Variables
// =============================================================================

/**
 * Drop keys whose value is undefined so they do not shadow lower layers
 */
function compact(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

function buildConfigFromEnv(): Record<string, unknown> {
  return {
    graph: compact({
      baseUrl: getEnv('GRAPH_BASE_URL'),
      requestTimeoutMs: getNumberEnv('GRAPH_TIMEOUT_MS'),
      timezone: getEnv('OUTLOOK_TIMEZONE'),
      mailFolder: getEnv('OUTLOOK_MAIL_FOLDER'),
    }),
    auth: compact({
      clientId: getEnv('CLIENT_ID', 'AZURE_CLIENT_ID'),
      clientSecret: getEnv('CLIENT_SECRET', 'AZURE_CLIENT_SECRET'),
      tenantId: getEnv('TENANT_ID', 'AZURE_TENANT_ID'),
      redirectUri: getEnv('REDIRECT_URI'),
      tokenFile: getEnv('OUTLOOK_TOKEN_FILE'),
    }),
    server: compact({
      maxContentChars: getNumberEnv('MCP_MAX_CONTENT_CHARS'),
    }),
  };
}

// =============================================================================
// Main Config Loading
// =============================================================================

let cachedConfig: AppConfig | null = null;

/**
 * Deep merge utility for combining config objects
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and validate the application configuration
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const merged = deepMerge(deepMerge(DEFAULT_CONFIG, loadConfigFile()), buildConfigFromEnv());

  const result = AppConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, {
      issues,
    });
  }

  cachedConfig = {
    ...result.data,
    auth: { ...result.data.auth, tokenFile: expandHome(result.data.auth.tokenFile) },
  };
  return cachedConfig;
}

/**
 * Get the current configuration, loading it on first use
 */
export function getConfig(): AppConfig {
  return cachedConfig ?? loadConfig();
}

/**
 * Clear the cached configuration
 * Useful for testing or reloading config
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

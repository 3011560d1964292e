import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../errors/custom-errors.js';

/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} and ${VAR_NAME:-fallback} syntax
 *
 * @param value - String that may contain placeholders
 * @param env - Environment to read from
 * @returns String with environment variables resolved
 * @throws ConfigError if a variable without fallback is not set
 */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_match, varName: string, fallback: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new ConfigError(`Environment variable "${varName}" is not set`);
  });
}

/**
 * Recursively resolve environment variables in a parsed YAML value
 */
export function resolveEnvRecursive(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvRecursive(item, env);
    }
    return result;
  }

  return value;
}

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return join(home, path.slice(2));
  }
  return path;
}

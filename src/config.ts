// Stack configuration, loaded from explicit options or environment variables

/**
 * Example usage:
 *
 * // CONCURRENTTAGGEDSTACK_DEBUG=true or TAGGEDSTACK_DEBUG=true
 * const stack = new ConcurrentTaggedStack<string>();
 *
 * // explicit options always win over the environment
 * const quiet = new ConcurrentTaggedStack<string>({debug: false});
 */

import Ajv, {type JSONSchemaType} from 'ajv';
import {InvalidArgumentError} from './errors.js';

export interface StackConfig {
  /** Log every mutating operation with console.debug */
  debug: boolean;
  /** Prepended to generated stack names */
  namePrefix: string;
}

export const DEFAULT_CONFIG_PREFIXES: readonly string[] = ['TAGGEDSTACK'];

const configSchema: JSONSchemaType<StackConfig> = {
  type: 'object',
  properties: {
    debug: {type: 'boolean', default: false},
    namePrefix: {type: 'string', default: ''},
  },
  required: ['debug', 'namePrefix'],
  additionalProperties: false,
};

// env values arrive as strings, hence coerceTypes
const ajv = new Ajv({coerceTypes: true, useDefaults: true, allErrors: true});
const validateConfig = ajv.compile(configSchema);

const configKeys: readonly (keyof StackConfig)[] = ['debug', 'namePrefix'];

/**
 * Look up one key, in order:
 * 1. explicit options
 * 2. environment variable named after the class, e.g. CONCURRENTTAGGEDSTACK_DEBUG
 * 3. environment variable for each config prefix, e.g. TAGGEDSTACK_DEBUG
 */
function getConfigValue(
  key: keyof StackConfig,
  className: string,
  options: Partial<StackConfig>,
  configPrefixes: readonly string[],
): unknown {
  if (Object.prototype.hasOwnProperty.call(options, key) && options[key] !== undefined) {
    return options[key];
  }

  const envKey = `${className.toUpperCase()}_${key.toUpperCase()}`;
  if (Object.prototype.hasOwnProperty.call(process.env, envKey)) {
    return process.env[envKey];
  }

  for (const prefix of configPrefixes) {
    if (prefix) {
      const prefixedEnvKey = `${prefix.toUpperCase()}_${key.toUpperCase()}`;
      if (Object.prototype.hasOwnProperty.call(process.env, prefixedEnvKey)) {
        return process.env[prefixedEnvKey];
      }
    }
  }

  // otherwise fall back to the schema default
  return undefined;
}

/**
 * Resolve the configuration of a stack class
 *
 * @param className Name of the class, used for class-specific env vars
 * @param options Explicit options, these take precedence
 * @param configPrefixes Shared env var prefixes, checked in order
 * @throws {InvalidArgumentError} If a resolved value does not fit the schema
 */
export function resolveConfig(
  className: string,
  options: Partial<StackConfig> = {},
  configPrefixes: readonly string[] = DEFAULT_CONFIG_PREFIXES,
): StackConfig {
  const candidate: Record<string, unknown> = {};
  for (const key of configKeys) {
    const value = getConfigValue(key, className, options, configPrefixes);
    if (value !== undefined) {
      candidate[key] = value;
    }
  }

  if (!validateConfig(candidate)) {
    const details = (validateConfig.errors ?? [])
      .map((error) => `${error.instancePath.replace(/^\//, '') || 'config'} ${error.message ?? 'is invalid'}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid ${className} configuration: ${details}`);
  }

  return {debug: candidate.debug, namePrefix: candidate.namePrefix};
}

/**
 * All keys that can be configured
 */
export function getConfigKeys(): readonly (keyof StackConfig)[] {
  return configKeys;
}

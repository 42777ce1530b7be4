/**
 * Environment Configuration Utilities
 */

/**
 * Read a value from the environment, falling back to the default when unset or unparsable
 */
export function getConfig<T>(
  key: string,
  defaultValue: T,
  parser: (value: string) => T,
  env: NodeJS.ProcessEnv = process.env
): T {
  const value = env[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch {
    return defaultValue;
  }
}

export function getStringConfig(key: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
  return getConfig(key, defaultValue, value => value, env);
}

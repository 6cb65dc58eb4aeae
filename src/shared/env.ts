/**
 * Safely extract a string value from an environment object
 *
 * @param env - Environment object with dynamic keys
 * @param key - The environment variable key to access
 * @returns The string value if present and non-empty, undefined otherwise
 */
export function getEnvString(
  env: Record<string, unknown>,
  key: string
): string | undefined {
  const value = env?.[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Read a positive integer from the environment
 *
 * Returns undefined when the key is absent; throws when present but not a
 * positive integer.
 */
export function getEnvPositiveInt(
  env: Record<string, unknown>,
  key: string
): number | undefined {
  const raw = getEnvString(env, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new TypeError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

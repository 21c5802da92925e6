/**
 * Environment lookups behind runtime and provider configuration
 *
 * Empty strings count as unset, so a blank `OPENAI_API_KEY=` line in .env
 * behaves like a missing one.
 */

export function getEnvWithDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

export function getEnvOptional(key: string): string | undefined {
  return process.env[key] || undefined;
}

export function hasEnv(key: string): boolean {
  return !!process.env[key];
}

/**
 * Numeric variable, or `defaultValue` when unset
 *
 * A set but non-numeric value ("12abc", "lots") comes back as NaN so that
 * schema validation reports it against the variable's name.
 */
export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return Number(value.trim());
}

import { ArgumentError } from './errors.js';

const TRUE_ENV_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_ENV_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function normalizeEnvValue(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Parse a boolean from an environment variable, returning `fallback` when absent
 * or when the value is not a recognized boolean literal.
 */
export function parseBooleanEnv(
  name: string,
  fallback: boolean,
  env: EnvSource = process.env
): boolean {
  const raw = env[name];
  if (raw === undefined) {
    return fallback;
  }

  const normalized = normalizeEnvValue(raw);
  if (TRUE_ENV_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_ENV_VALUES.has(normalized)) {
    return false;
  }

  return fallback;
}

export function assertFunction(
  value: unknown,
  paramName: string
): asserts value is (...args: never[]) => unknown {
  if (typeof value === 'function') {
    return;
  }
  throw new ArgumentError(
    paramName,
    `"${paramName}" must be a function (received ${value === null ? 'null' : typeof value})`
  );
}

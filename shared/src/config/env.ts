import dotenv from 'dotenv';

let loaded = false;

/**
 * Load `.env` into process.env once. Values already set in the environment win.
 */
export function loadEnv(path?: string): void {
  if (loaded) {
    return;
  }
  dotenv.config(path ? { path } : undefined);
  loaded = true;
}

export class ConfigurationError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}

export type Env = Record<string, string | undefined>;

function raw(name: string, env: Env): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function requireEnv(name: string, env: Env = process.env): string {
  const value = raw(name, env);
  if (value === undefined) {
    throw new ConfigurationError(name, `${name} environment variable is not set`);
  }
  return value;
}

export function envString(name: string, defaultValue: string, env: Env = process.env): string {
  return raw(name, env) ?? defaultValue;
}

export function envOptional(name: string, env: Env = process.env): string | undefined {
  return raw(name, env);
}

export function envInt(name: string, defaultValue: number, env: Env = process.env): number {
  const value = raw(name, env);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(name, `${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

export function envFloat(name: string, defaultValue: number, env: Env = process.env): number {
  const value = raw(name, env);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(name, `${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function envBool(name: string, defaultValue: boolean, env: Env = process.env): boolean {
  const value = raw(name, env);
  if (value === undefined) {
    return defaultValue;
  }
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(name, `${name} must be true or false, got "${value}"`);
  }
}

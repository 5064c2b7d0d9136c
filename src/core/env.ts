import type { Env } from "../types/env.ts";
import { env } from "std-env";
import { ConfigurationError } from "./errors.ts";

/**
 * Reads a configuration value from the environment.
 * Falls back to `defaultValue` when the variable is unset, and throws when neither exists.
 */
export function getEnv<K extends keyof Env>(key: K, defaultValue?: Env[K]): Env[K] {
  return env[key] ?? defaultValue ?? throwMissingKeyError(key);
}

const throwMissingKeyError = (key: string): never => {
  throw new ConfigurationError(`Missing environment variable: ${key}`);
};

/**
 * Sets an environment variable for the rest of the process.
 */
export function setEnv<K extends keyof Env>(key: K, value: Env[K]): boolean {
  env[key] = value;
  return true;
}

/**
 * Removes an environment variable, so that `getEnv` falls back to its default again.
 */
export function unsetEnv<K extends keyof Env>(key: K): void {
  delete env[key];
}

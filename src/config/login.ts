/**
 * Login module configuration.
 *
 * Values are read from environment variables:
 * - LOGIN_API_URL: base URL of the authentication API
 * - LOGIN_RESULT_DELAY_MS: delay before a login result is surfaced (defaults to 1000)
 */

import { ConfigError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

export const DEFAULT_API_URL = "http://localhost:8000/api";
export const DEFAULT_RESULT_DELAY_MS = 1000;

export interface LoginConfig {
  apiUrl: string;
  resultDelayMs: number;
}

type Env = Record<string, string | undefined>;

export const loadLoginConfig = (env: Env = process.env, logger: Logger = createLogger("login-config")): LoginConfig => {
  const apiUrl = env.LOGIN_API_URL;
  if (!apiUrl) {
    logger.warn("LOGIN_API_URL is not set, using localhost fallback");
  }

  return {
    apiUrl: apiUrl || DEFAULT_API_URL,
    resultDelayMs: parseDelay(env.LOGIN_RESULT_DELAY_MS),
  };
};

const parseDelay = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_RESULT_DELAY_MS;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`LOGIN_RESULT_DELAY_MS must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

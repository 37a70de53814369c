/**
 * Client configuration.
 *
 * Priority: explicit options > environment variables > defaults.
 */

import { ConfigurationError } from './errors';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from './constants';

export interface ClientConfig {
  host: string;
  token: string;
  timeout: number;
  userAgent: string;
}

export interface ClientConfigOptions {
  host?: string | null;
  token?: string | null;
  timeout?: number | null;
  userAgent?: string | null;
}

export function resolveClientConfig(
  options: ClientConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const host = (options.host || env.DATABRICKS_HOST || '').trim().replace(/\/+$/, '');
  if (!host) {
    throw new ConfigurationError(
      "host is required. Provide it either as a parameter (host='https://...') " +
        'or set the DATABRICKS_HOST environment variable.'
    );
  }

  const token = options.token || env.DATABRICKS_TOKEN || '';
  if (!token.trim()) {
    throw new ConfigurationError(
      "token is required. Provide it either as a parameter (token='...') " +
        'or set the DATABRICKS_TOKEN environment variable.'
    );
  }

  let timeout = options.timeout ?? DEFAULT_TIMEOUT;
  if (options.timeout == null && env.GENIE_TIMEOUT) {
    const parsed = parseFloat(env.GENIE_TIMEOUT);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new ConfigurationError(`GENIE_TIMEOUT must be a positive number of milliseconds, got '${env.GENIE_TIMEOUT}'`);
    }
    timeout = parsed;
  }

  return {
    host,
    token,
    timeout,
    userAgent: options.userAgent || env.GENIE_USER_AGENT || DEFAULT_USER_AGENT,
  };
}

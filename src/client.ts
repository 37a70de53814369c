/**
 * High-level client for the Genie Spaces REST API.
 */

import { z } from 'zod';
import {
  AuthenticationError,
  GenieSpacesError,
  NotFoundError,
  SpaceClientError,
  TransportError,
} from './errors';
import { SpacesAPI } from './resources/spaces';
import { API_BASE_PATH } from './constants';
import { RequesterProtocol, RequestOptions } from './client-types';
import { ClientConfigOptions, resolveClientConfig } from './config';
import { Logger, logger as defaultLogger } from './logger';

export interface GenieSpacesClientOptions extends ClientConfigOptions {
  logger?: Logger;
}

const ErrorPayloadSchema = z
  .object({
    error_code: z.string().optional(),
    error: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export class GenieSpacesClient implements RequesterProtocol {
  private _host: string;
  private _token: string;
  private _timeout: number;
  private _userAgent: string;
  private _logger: Logger;

  public spaces: SpacesAPI;

  constructor(options: GenieSpacesClientOptions = {}) {
    const config = resolveClientConfig(options);
    this._host = config.host;
    this._token = config.token;
    this._timeout = config.timeout;
    this._userAgent = config.userAgent;
    this._logger = options.logger ?? defaultLogger;

    this.spaces = new SpacesAPI(this, this._logger);
  }

  get host(): string {
    return this._host;
  }

  get timeout(): number {
    return this._timeout;
  }

  async request(method: string, path: string, options?: RequestOptions): Promise<unknown> {
    let url = `${this._host}${API_BASE_PATH}${path}`;
    if (options?.params && Object.keys(options.params).length > 0) {
      const searchParams = new URLSearchParams();
      for (const [key, value] of Object.entries(options.params)) {
        searchParams.append(key, String(value));
      }
      url = `${url}?${searchParams.toString()}`;
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this._token}`,
      Accept: 'application/json',
      'User-Agent': this._userAgent,
    };
    let body: string | undefined;
    if (options?.jsonData !== undefined) {
      body = JSON.stringify(options.jsonData);
      headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this._timeout);
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${this._timeout}ms`);
      }
      throw new TransportError(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }

    this._logger.debug(
      { method, path, status: response.status, durationMs: Date.now() - startedAt },
      'genie api request'
    );
    return this.handleResponse(response, method, path);
  }

  private async handleResponse(response: Response, method: string, path: string): Promise<unknown> {
    const contentType = response.headers.get('content-type') || '';
    const text = await response.text();

    let parsed: unknown = null;
    if (text && contentType.includes('application/json')) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = null;
      }
    }

    if (response.status < 400) {
      return parsed ?? text;
    }

    const payload = ErrorPayloadSchema.safeParse(parsed);
    const errorCode = payload.success ? payload.data.error_code ?? payload.data.error : undefined;
    const message =
      (payload.success ? payload.data.message ?? payload.data.error : undefined) ||
      text ||
      response.statusText;
    const options = {
      statusCode: response.status,
      message,
      errorCode,
      payload: parsed ?? text,
    };

    this._logger.warn({ method, path, status: response.status, errorCode }, message);

    let error: GenieSpacesError;
    if (response.status === 401 || response.status === 403) {
      error = new AuthenticationError(options);
    } else if (response.status === 404) {
      error = new NotFoundError(options);
    } else {
      error = new SpaceClientError(options);
    }
    throw error;
  }
}

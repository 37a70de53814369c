/**
 * Common typing helpers used by resource modules to avoid circular imports.
 */

export interface RequestOptions {
  params?: Record<string, string | number>;
  jsonData?: unknown;
}

export interface RequesterProtocol {
  request(method: string, path: string, options?: RequestOptions): Promise<unknown>;
}

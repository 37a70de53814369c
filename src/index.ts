/**
 * TypeScript SDK for the Genie Spaces import/export API.
 */

export { GenieSpacesClient } from './client';
export type { GenieSpacesClientOptions } from './client';
export type { RequesterProtocol, RequestOptions } from './client-types';
export { resolveClientConfig } from './config';
export type { ClientConfig, ClientConfigOptions } from './config';

export {
  SUPPORTED_VERSIONS,
  decodeSpaceExport,
  encodeSpaceExport,
  formatSpaceExport,
  parseSpaceExport,
  unwrapSerializedSpace,
  wrapSerializedSpace,
} from './codec';
export { readSpaceExportFile, writeSpaceExportFile } from './files';
export { summarizeSpaceExport, validateSpaceExport } from './validate';
export { SpaceHandle } from './space-handle';
export { createLogger, logger } from './logger';
export type { Logger } from './logger';

export {
  AuthenticationError,
  ConfigurationError,
  GenieSpacesError,
  MalformedExportError,
  NotFoundError,
  SchemaValidationError,
  SpaceClientError,
  TransportError,
  UnexpectedResponseError,
  ValidationError,
} from './errors';

export * from './models';
export * from './types';
export * from './resources/spaces';

import {
  AuthenticationError,
  ConfigurationError,
  MalformedExportError,
  NotFoundError,
  SchemaValidationError,
  SpaceClientError,
  TransportError,
  UnexpectedResponseError,
  ValidationError,
} from '../errors';
import * as output from './output';

/**
 * One-line description of a failure, naming its kind.
 */
export function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `Configuration Error: ${error.message}`;
  }
  if (error instanceof AuthenticationError) {
    return `Authentication Failed: ${error.message}`;
  }
  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }
  if (error instanceof SpaceClientError) {
    return `API Error (${error.statusCode}): ${error.message}`;
  }
  if (error instanceof SchemaValidationError) {
    return `Schema Error: ${error.message}`;
  }
  if (error instanceof MalformedExportError) {
    return `Malformed Export: ${error.message}`;
  }
  if (error instanceof ValidationError) {
    return `Validation Error: ${error.message}`;
  }
  if (error instanceof UnexpectedResponseError) {
    return `Unexpected Response: ${error.message}`;
  }
  if (error instanceof TransportError) {
    return `Connection Error: ${error.message}`;
  }
  return `Unexpected Error: ${error instanceof Error ? error.message : String(error)}`;
}

const HINTS: [new (...args: never[]) => Error, string][] = [
  [ConfigurationError, 'Set DATABRICKS_HOST and DATABRICKS_TOKEN, or pass --host and --token.'],
  [AuthenticationError, "Check your token and that you have 'Can Run' or higher permission on the space."],
  [NotFoundError, 'Verify the space ID exists and that you have access to it.'],
];

/**
 * Print the failure and exit with status 1. With `verbose`, also print the
 * remote payload and stack.
 */
export function handleError(error: unknown, verbose = false): never {
  output.error(describeError(error));
  const hint = HINTS.find(([type]) => error instanceof type);
  if (hint) {
    output.dim(hint[1]);
  }
  if (verbose) {
    const payload =
      error instanceof SpaceClientError || error instanceof UnexpectedResponseError ? error.payload : undefined;
    if (payload !== undefined) {
      output.dim(`Details: ${JSON.stringify(payload, null, 2)}`);
    }
    if (error instanceof Error && error.stack) {
      output.dim(error.stack);
    }
  }
  process.exit(1);
}

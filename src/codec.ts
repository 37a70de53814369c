/**
 * Conversion between SpaceExport models, their JSON documents and the
 * `serialized_space` string envelope used by the REST API.
 */

import { z } from 'zod';
import { MalformedExportError } from './errors';
import { CURRENT_VERSION, SpaceExport } from './models/space-export';
import { SpaceExportDocument, SpaceExportDocumentSchema } from './types/space-export';

export const SUPPORTED_VERSIONS: readonly number[] = [CURRENT_VERSION];

function issuePath(issue: z.ZodIssue): string {
  return issue.path.map(String).join('.');
}

/**
 * Encode a model into its canonical document. Keys follow the declared field
 * order and empty sections are left out.
 */
export function encodeSpaceExport(space: SpaceExport): SpaceExportDocument {
  return space.toJSON();
}

/**
 * Decode a parsed JSON document. Structural problems raise
 * MalformedExportError with the offending path; invalid values raise
 * SchemaValidationError from the model constructors.
 */
export function decodeSpaceExport(document: unknown): SpaceExport {
  const result = SpaceExportDocumentSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MalformedExportError(issue ? issuePath(issue) : '', issue?.message ?? 'invalid document');
  }
  const data = result.data;
  const version = data.version ?? CURRENT_VERSION;
  if (Number.isInteger(version) && version > 0 && !SUPPORTED_VERSIONS.includes(version)) {
    throw new MalformedExportError('version', `unsupported export version ${version}`);
  }
  return new SpaceExport({ ...data, version });
}

/**
 * Encode a document into the `serialized_space` string.
 */
export function wrapSerializedSpace(document: SpaceExportDocument): string {
  return JSON.stringify(document);
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedExportError(
      path,
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Parse a `serialized_space` string back into a plain document.
 */
export function unwrapSerializedSpace(serialized: string): SpaceExportDocument {
  const result = SpaceExportDocumentSchema.safeParse(parseJson(serialized, 'serialized_space'));
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = ['serialized_space', issue ? issuePath(issue) : ''].filter(Boolean).join('.');
    throw new MalformedExportError(path, issue?.message ?? 'invalid document');
  }
  return result.data;
}

/**
 * Render a model as JSON text, the form written to files and stdout.
 */
export function formatSpaceExport(space: SpaceExport, options?: { indent?: number }): string {
  return JSON.stringify(encodeSpaceExport(space), null, options?.indent ?? 2);
}

/**
 * Parse JSON text, such as a file's contents, into a model.
 */
export function parseSpaceExport(text: string): SpaceExport {
  return decodeSpaceExport(parseJson(text, ''));
}

/**
 * Building blocks shared by the space export models.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { SchemaValidationError } from '../errors';

export const ID_PATTERN = /^[0-9a-f]{32}$/;

export const IdSchema = z
  .string()
  .regex(ID_PATTERN, 'must be 32 lowercase hexadecimal characters');

export const IdentifierSchema = z
  .string()
  .refine(
    (value) => {
      const parts = value.split('.');
      return parts.length >= 2 && parts.every((part) => part.trim().length > 0);
    },
    { message: "must be a dotted name such as 'catalog.schema.table'" }
  );

export const NameSchema = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'must not be empty' });

/**
 * Generate a UUID without dashes for use as an ID.
 */
export function generateId(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * Run a zod schema against a constructor argument and raise
 * SchemaValidationError with the field path on failure.
 */
export function check<T>(schema: z.ZodType<T>, value: unknown, path: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SchemaValidationError(path, issue?.message ?? 'invalid value');
  }
  return result.data;
}

export function checkId(id: string | undefined, path: string): string {
  return id === undefined ? generateId() : check(IdSchema, id, path);
}

/**
 * Multi-line text stored one line per entry, so that version control diffs
 * stay readable. `fromText(t).toText() === t` for every string `t`.
 */
export class TextLines {
  readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    // a line carrying its own newlines is split further; joining is unaffected
    this.lines = Object.freeze(lines.flatMap((line) => line.split('\n')));
  }

  static fromText(text: string): TextLines {
    return new TextLines(text.split('\n'));
  }

  static from(value: TextLinesInput): TextLines {
    if (value instanceof TextLines) {
      return value;
    }
    if (typeof value === 'string') {
      return TextLines.fromText(value);
    }
    return new TextLines(value);
  }

  get length(): number {
    return this.lines.length;
  }

  toText(): string {
    return this.lines.join('\n');
  }

  equals(other: TextLines): boolean {
    return (
      this.lines.length === other.lines.length &&
      this.lines.every((line, i) => line === other.lines[i])
    );
  }

  toJSON(): string[] {
    return [...this.lines];
  }

  toString(): string {
    return this.toText();
  }
}

/**
 * Accepted wherever a text field is set: a single block of text, its lines,
 * or an existing TextLines value.
 */
export type TextLinesInput = TextLines | string | readonly string[];

export function optionalText(value: TextLinesInput | null | undefined): TextLines | undefined {
  return value === undefined || value === null ? undefined : TextLines.from(value);
}

/**
 * Free text handed to a factory: an empty string means "no text".
 */
export function textOrUndefined(text: string | null | undefined): TextLines | undefined {
  return text ? TextLines.fromText(text) : undefined;
}

/**
 * A space as returned by the REST API, with its configuration decoded on demand.
 */

import { decodeSpaceExport, unwrapSerializedSpace } from './codec';
import { MalformedExportError, UnexpectedResponseError } from './errors';
import { SpaceExport } from './models/space-export';
import { Space, SpaceSchema } from './types';

export class SpaceHandle {
  readonly spaceId: string;
  readonly title: string;
  readonly description?: string;
  readonly warehouseId?: string;
  readonly serializedSpace?: string;

  private _export?: SpaceExport;

  constructor(space: Space) {
    this.spaceId = space.space_id;
    this.title = space.title;
    this.description = space.description ?? undefined;
    this.warehouseId = space.warehouse_id ?? undefined;
    this.serializedSpace = space.serialized_space ?? undefined;
  }

  static fromResponse(data: unknown): SpaceHandle {
    const result = SpaceSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new UnexpectedResponseError(
        `unexpected space response: ${field}${issue?.message ?? 'invalid body'}`,
        data
      );
    }
    return new SpaceHandle(result.data);
  }

  get hasExport(): boolean {
    return this.serializedSpace !== undefined;
  }

  /**
   * The raw `serialized_space` string; throws when the response carried none.
   */
  requireSerializedSpace(): string {
    if (this.serializedSpace === undefined) {
      throw new MalformedExportError('serialized_space', `space ${this.spaceId} returned no serialized_space`);
    }
    return this.serializedSpace;
  }

  /**
   * Decode the configuration. The result is cached after the first call.
   */
  getExport(): SpaceExport {
    if (!this._export) {
      this._export = decodeSpaceExport(unwrapSerializedSpace(this.requireSerializedSpace()));
    }
    return this._export;
  }

  toJSON(): Space {
    return {
      space_id: this.spaceId,
      title: this.title,
      description: this.description ?? null,
      warehouse_id: this.warehouseId ?? null,
    };
  }
}

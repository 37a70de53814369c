/**
 * Top-level container for a serialized Genie Space.
 */

import { isDeepStrictEqual } from 'util';
import { z } from 'zod';
import { SpaceExportDocument } from '../types/space-export';
import { Benchmarks, BenchmarksInput } from './benchmarks';
import { check } from './common';
import { SpaceConfig, SpaceConfigInput } from './config';
import { DataSources, DataSourcesInput } from './data-sources';
import { Instructions, InstructionsInput } from './instructions';

export const CURRENT_VERSION = 1;

const VersionSchema = z.number().int('must be an integer').positive('must be a positive integer');

export interface SpaceExportInput {
  version?: number | null;
  config?: SpaceConfig | SpaceConfigInput | null;
  data_sources?: DataSources | DataSourcesInput | null;
  instructions?: Instructions | InstructionsInput | null;
  benchmarks?: Benchmarks | BenchmarksInput | null;
}

/**
 * A complete space configuration. Every section is always present in memory;
 * empty sections are left out of the encoded document.
 *
 * Instances are immutable. To change a configuration, build a new one from
 * the old one's fields:
 *
 * ```ts
 * const next = new SpaceExport({
 *   ...current,
 *   config: { sample_questions: [...current.config.sample_questions, SampleQuestion.fromText('Revenue?')] },
 * });
 * ```
 */
export class SpaceExport {
  readonly version: number;
  readonly config: SpaceConfig;
  readonly data_sources: DataSources;
  readonly instructions: Instructions;
  readonly benchmarks: Benchmarks;

  constructor(data: SpaceExportInput = {}) {
    this.version = check(VersionSchema, data.version ?? CURRENT_VERSION, 'SpaceExport.version');
    this.config = data.config instanceof SpaceConfig ? data.config : new SpaceConfig(data.config ?? {});
    this.data_sources =
      data.data_sources instanceof DataSources ? data.data_sources : new DataSources(data.data_sources ?? {});
    this.instructions =
      data.instructions instanceof Instructions ? data.instructions : new Instructions(data.instructions ?? {});
    this.benchmarks =
      data.benchmarks instanceof Benchmarks ? data.benchmarks : new Benchmarks(data.benchmarks ?? {});
  }

  toJSON(): SpaceExportDocument {
    const json: SpaceExportDocument = { version: this.version };
    if (!this.config.isEmpty) {
      json.config = this.config.toJSON();
    }
    if (!this.data_sources.isEmpty) {
      json.data_sources = this.data_sources.toJSON();
    }
    if (!this.instructions.isEmpty) {
      json.instructions = this.instructions.toJSON();
    }
    if (!this.benchmarks.isEmpty) {
      json.benchmarks = this.benchmarks.toJSON();
    }
    return json;
  }

  /**
   * Structural equality: two exports are equal when they encode identically.
   */
  equals(other: SpaceExport): boolean {
    return isDeepStrictEqual(this.toJSON(), other.toJSON());
  }
}

/**
 * Data sources: the catalog tables and metric views a space can query.
 */

import {
  ColumnConfigDocument,
  DataSourcesDocument,
  MetricViewDocument,
  TableDocument,
} from '../types/space-export';
import {
  check,
  IdentifierSchema,
  NameSchema,
  optionalText,
  TextLines,
  TextLinesInput,
  textOrUndefined,
} from './common';

export interface ColumnConfigInput {
  column_name: string;
  description?: TextLinesInput | null;
  synonyms?: readonly string[] | null;
  exclude?: boolean | null;
  get_example_values?: boolean | null;
  build_value_dictionary?: boolean | null;
}

/**
 * Configuration for a single column within a table.
 */
export class ColumnConfig {
  readonly column_name: string;
  readonly description?: TextLines;
  /** Distinct, in first-seen order. */
  readonly synonyms: readonly string[];
  readonly exclude?: boolean;
  readonly get_example_values?: boolean;
  readonly build_value_dictionary?: boolean;

  constructor(data: ColumnConfigInput) {
    this.column_name = check(NameSchema, data.column_name, 'ColumnConfig.column_name');
    this.description = optionalText(data.description);
    this.synonyms = Object.freeze([...new Set(data.synonyms ?? [])]);
    this.exclude = data.exclude ?? undefined;
    this.get_example_values = data.get_example_values ?? undefined;
    this.build_value_dictionary = data.build_value_dictionary ?? undefined;
  }

  /**
   * Flags left false are not recorded, which keeps exported files small.
   */
  static create(
    columnName: string,
    options?: {
      description?: string | null;
      synonyms?: readonly string[] | null;
      exclude?: boolean;
      getExampleValues?: boolean;
      buildValueDictionary?: boolean;
    }
  ): ColumnConfig {
    return new ColumnConfig({
      column_name: columnName,
      description: textOrUndefined(options?.description),
      synonyms: options?.synonyms,
      exclude: options?.exclude || undefined,
      get_example_values: options?.getExampleValues || undefined,
      build_value_dictionary: options?.buildValueDictionary || undefined,
    });
  }

  toJSON(): ColumnConfigDocument {
    const json: ColumnConfigDocument = { column_name: this.column_name };
    if (this.description) {
      json.description = this.description.toJSON();
    }
    if (this.synonyms.length > 0) {
      json.synonyms = [...this.synonyms];
    }
    if (this.exclude !== undefined) {
      json.exclude = this.exclude;
    }
    if (this.get_example_values !== undefined) {
      json.get_example_values = this.get_example_values;
    }
    if (this.build_value_dictionary !== undefined) {
      json.build_value_dictionary = this.build_value_dictionary;
    }
    return json;
  }
}

export interface TableInput {
  identifier: string;
  description?: TextLinesInput | null;
  column_configs?: readonly (ColumnConfig | ColumnConfigInput)[] | null;
}

/**
 * A catalog table, addressed by its three-level identifier.
 */
export class Table {
  readonly identifier: string;
  readonly description?: TextLines;
  readonly column_configs: readonly ColumnConfig[];

  constructor(data: TableInput) {
    this.identifier = check(IdentifierSchema, data.identifier, 'Table.identifier');
    this.description = optionalText(data.description);
    this.column_configs = Object.freeze(
      (data.column_configs ?? []).map((c) => (c instanceof ColumnConfig ? c : new ColumnConfig(c)))
    );
  }

  static create(
    identifier: string,
    options?: {
      description?: string | null;
      columnConfigs?: readonly ColumnConfig[] | null;
    }
  ): Table {
    return new Table({
      identifier,
      description: textOrUndefined(options?.description),
      column_configs: options?.columnConfigs,
    });
  }

  toJSON(): TableDocument {
    const json: TableDocument = { identifier: this.identifier };
    if (this.description) {
      json.description = this.description.toJSON();
    }
    if (this.column_configs.length > 0) {
      json.column_configs = this.column_configs.map((c) => c.toJSON());
    }
    return json;
  }
}

export interface MetricViewInput {
  identifier: string;
  description?: TextLinesInput | null;
}

export class MetricView {
  readonly identifier: string;
  readonly description?: TextLines;

  constructor(data: MetricViewInput) {
    this.identifier = check(IdentifierSchema, data.identifier, 'MetricView.identifier');
    this.description = optionalText(data.description);
  }

  static create(identifier: string, options?: { description?: string | null }): MetricView {
    return new MetricView({ identifier, description: textOrUndefined(options?.description) });
  }

  toJSON(): MetricViewDocument {
    const json: MetricViewDocument = { identifier: this.identifier };
    if (this.description) {
      json.description = this.description.toJSON();
    }
    return json;
  }
}

export interface DataSourcesInput {
  tables?: readonly (Table | TableInput)[] | null;
  metric_views?: readonly (MetricView | MetricViewInput)[] | null;
}

/**
 * Tables and metric views, in the order they were added to the space.
 */
export class DataSources {
  readonly tables: readonly Table[];
  readonly metric_views: readonly MetricView[];

  constructor(data: DataSourcesInput = {}) {
    this.tables = Object.freeze((data.tables ?? []).map((t) => (t instanceof Table ? t : new Table(t))));
    this.metric_views = Object.freeze(
      (data.metric_views ?? []).map((m) => (m instanceof MetricView ? m : new MetricView(m)))
    );
  }

  get isEmpty(): boolean {
    return this.tables.length === 0 && this.metric_views.length === 0;
  }

  toJSON(): DataSourcesDocument {
    const json: DataSourcesDocument = {};
    if (this.tables.length > 0) {
      json.tables = this.tables.map((t) => t.toJSON());
    }
    if (this.metric_views.length > 0) {
      json.metric_views = this.metric_views.map((m) => m.toJSON());
    }
    return json;
  }
}

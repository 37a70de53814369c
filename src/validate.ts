/**
 * Local validation of space export documents. Never touches the network.
 */

import { decodeSpaceExport, parseSpaceExport } from './codec';
import { SpaceExport } from './models/space-export';
import { SpaceSummary } from './types';

export function summarizeSpaceExport(space: SpaceExport): SpaceSummary {
  const { config, data_sources, instructions, benchmarks } = space;
  return {
    version: space.version,
    sample_questions: config.sample_questions.length,
    tables: data_sources.tables.length,
    column_configs: data_sources.tables.reduce((n, t) => n + t.column_configs.length, 0),
    metric_views: data_sources.metric_views.length,
    text_instructions: instructions.text_instructions.length,
    example_question_sqls: instructions.example_question_sqls.length,
    sql_functions: instructions.sql_functions.length,
    join_specs: instructions.join_specs.length,
    benchmark_questions: benchmarks.questions.length,
  };
}

/**
 * Decode `document` (parsed JSON, or JSON text) and summarize it. Throws the
 * decoder's MalformedExportError or SchemaValidationError when invalid.
 */
export function validateSpaceExport(document: unknown): SpaceSummary {
  const space = typeof document === 'string' ? parseSpaceExport(document) : decodeSpaceExport(document);
  return summarizeSpaceExport(space);
}

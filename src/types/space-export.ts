/**
 * Type definitions for the serialized space export document.
 *
 * These schemas describe the document's structure only. Value rules (id
 * format, answer format, identifiers) are enforced by the model constructors.
 */

import { z } from 'zod';

const LinesSchema = z.array(z.string());

export const SampleQuestionDocumentSchema = z.object({
  id: z.string().optional(),
  question: LinesSchema,
});

export type SampleQuestionDocument = z.infer<typeof SampleQuestionDocumentSchema>;

export const SpaceConfigDocumentSchema = z.object({
  sample_questions: z.array(SampleQuestionDocumentSchema).nullish(),
});

export type SpaceConfigDocument = z.infer<typeof SpaceConfigDocumentSchema>;

export const ColumnConfigDocumentSchema = z.object({
  column_name: z.string(),
  description: LinesSchema.nullish(),
  synonyms: z.array(z.string()).nullish(),
  exclude: z.boolean().nullish(),
  get_example_values: z.boolean().nullish(),
  build_value_dictionary: z.boolean().nullish(),
});

export type ColumnConfigDocument = z.infer<typeof ColumnConfigDocumentSchema>;

export const TableDocumentSchema = z.object({
  identifier: z.string(),
  description: LinesSchema.nullish(),
  column_configs: z.array(ColumnConfigDocumentSchema).nullish(),
});

export type TableDocument = z.infer<typeof TableDocumentSchema>;

export const MetricViewDocumentSchema = z.object({
  identifier: z.string(),
  description: LinesSchema.nullish(),
});

export type MetricViewDocument = z.infer<typeof MetricViewDocumentSchema>;

export const DataSourcesDocumentSchema = z.object({
  tables: z.array(TableDocumentSchema).nullish(),
  metric_views: z.array(MetricViewDocumentSchema).nullish(),
});

export type DataSourcesDocument = z.infer<typeof DataSourcesDocumentSchema>;

export const TextInstructionDocumentSchema = z.object({
  id: z.string().optional(),
  content: LinesSchema.nullish(),
});

export type TextInstructionDocument = z.infer<typeof TextInstructionDocumentSchema>;

export const ParameterDocumentSchema = z.object({
  name: z.string(),
  type_hint: z.string(),
  description: LinesSchema.nullish(),
});

export type ParameterDocument = z.infer<typeof ParameterDocumentSchema>;

export const ExampleQuestionSqlDocumentSchema = z.object({
  id: z.string().optional(),
  question: LinesSchema,
  sql: LinesSchema,
  parameters: z.array(ParameterDocumentSchema).nullish(),
  usage_guidance: LinesSchema.nullish(),
});

export type ExampleQuestionSqlDocument = z.infer<typeof ExampleQuestionSqlDocumentSchema>;

export const SqlFunctionDocumentSchema = z.object({
  id: z.string().optional(),
  identifier: z.string(),
});

export type SqlFunctionDocument = z.infer<typeof SqlFunctionDocumentSchema>;

export const TableRefDocumentSchema = z.object({
  identifier: z.string(),
  alias: z.string(),
});

export type TableRefDocument = z.infer<typeof TableRefDocumentSchema>;

export const JoinSpecDocumentSchema = z.object({
  id: z.string().optional(),
  left: TableRefDocumentSchema,
  right: TableRefDocumentSchema,
  sql: LinesSchema,
  comment: LinesSchema.nullish(),
});

export type JoinSpecDocument = z.infer<typeof JoinSpecDocumentSchema>;

export const InstructionsDocumentSchema = z.object({
  text_instructions: z.array(TextInstructionDocumentSchema).nullish(),
  example_question_sqls: z.array(ExampleQuestionSqlDocumentSchema).nullish(),
  sql_functions: z.array(SqlFunctionDocumentSchema).nullish(),
  join_specs: z.array(JoinSpecDocumentSchema).nullish(),
});

export type InstructionsDocument = z.infer<typeof InstructionsDocumentSchema>;

export const BenchmarkAnswerDocumentSchema = z.object({
  format: z.string().optional(),
  content: LinesSchema,
});

export type BenchmarkAnswerDocument = z.infer<typeof BenchmarkAnswerDocumentSchema>;

export const BenchmarkQuestionDocumentSchema = z.object({
  id: z.string().optional(),
  question: LinesSchema,
  answer: z.array(BenchmarkAnswerDocumentSchema),
});

export type BenchmarkQuestionDocument = z.infer<typeof BenchmarkQuestionDocumentSchema>;

export const BenchmarksDocumentSchema = z.object({
  questions: z.array(BenchmarkQuestionDocumentSchema).nullish(),
});

export type BenchmarksDocument = z.infer<typeof BenchmarksDocumentSchema>;

export const SpaceExportDocumentSchema = z.object({
  version: z.number().nullish(),
  config: SpaceConfigDocumentSchema.nullish(),
  data_sources: DataSourcesDocumentSchema.nullish(),
  instructions: InstructionsDocumentSchema.nullish(),
  benchmarks: BenchmarksDocumentSchema.nullish(),
});

export type SpaceExportDocument = z.infer<typeof SpaceExportDocumentSchema>;

/**
 * Type definitions for space resources returned by the REST API.
 */

import { z } from 'zod';

export const SpaceSchema = z.object({
  space_id: z.string(),
  title: z.string(),
  description: z.string().nullable().optional(),
  warehouse_id: z.string().nullable().optional(),
  serialized_space: z.string().nullable().optional(),
});

export type Space = z.infer<typeof SpaceSchema>;

/**
 * Counts of each kind of entry in a space export.
 */
export interface SpaceSummary {
  version: number;
  sample_questions: number;
  tables: number;
  column_configs: number;
  metric_views: number;
  text_instructions: number;
  example_question_sqls: number;
  sql_functions: number;
  join_specs: number;
  benchmark_questions: number;
}

import { Command } from 'commander';
import { readSpaceExportFile } from '../../files';
import { SpaceSummary } from '../../types';
import { summarizeSpaceExport } from '../../validate';
import { handleError } from '../errors';
import * as output from '../output';

const ROWS: [string, keyof SpaceSummary][] = [
  ['Sample Questions', 'sample_questions'],
  ['Tables', 'tables'],
  ['Column Configs', 'column_configs'],
  ['Metric Views', 'metric_views'],
  ['Text Instructions', 'text_instructions'],
  ['SQL Examples', 'example_question_sqls'],
  ['SQL Functions', 'sql_functions'],
  ['Join Specs', 'join_specs'],
  ['Benchmark Questions', 'benchmark_questions'],
];

/**
 * Validate a configuration file without contacting the API.
 * Throws on error - caller handles error display and exit
 */
export async function validateFile(file: string, options: { json?: boolean } = {}): Promise<SpaceSummary> {
  const summary = summarizeSpaceExport(await readSpaceExportFile(file));

  if (options.json) {
    output.data(JSON.stringify(summary, null, 2));
    return summary;
  }

  output.success(`Valid configuration file: ${file}`);
  output.header('Configuration Summary');
  output.tableHeader(['Component', 'Count'], [24, 6]);
  for (const [label, key] of ROWS) {
    output.tableRow([label, String(summary[key])], [24, 6]);
  }
  return summary;
}

export function registerValidateCommands(program: Command): void {
  program
    .command('validate')
    .description('Check a configuration file against the export schema (no network access)')
    .argument('<file>', 'Path to the JSON configuration file')
    .option('--json', 'Print the summary as JSON')
    .action(async (file: string, options: { json?: boolean }, command: Command) => {
      try {
        await validateFile(file, options);
      } catch (error) {
        handleError(error, command.optsWithGlobals<{ verbose?: boolean }>().verbose);
      }
    });
}

import { Command } from 'commander';
import { formatSpaceExport } from '../../codec';
import { SpacesAPI } from '../../resources/spaces';
import { summarizeSpaceExport } from '../../validate';
import { handleError } from '../errors';
import * as output from '../output';

export type GlobalOptions = {
  host?: string;
  token?: string;
  verbose?: boolean;
};

/**
 * Builds the spaces API for a command from the global flags.
 */
export type SpacesFactory = (options: GlobalOptions) => SpacesAPI;

/**
 * Export a space's configuration to a file, or to stdout.
 * Throws on error - caller handles error display and exit
 */
export async function exportSpace(
  spaces: SpacesAPI,
  spaceId: string,
  options: { output?: string; compact?: boolean }
): Promise<void> {
  const indent = options.compact ? 0 : 2;
  if (options.output) {
    const config = await spaces.exportToFile(spaceId, options.output, { indent });
    const summary = summarizeSpaceExport(config);
    output.success(`Exported space ${spaceId} to ${options.output}`);
    output.dim(`  ${summary.tables} tables, ${summary.sample_questions} sample questions`);
    return;
  }
  const space = await spaces.export(spaceId);
  output.data(formatSpaceExport(space.getExport(), { indent }));
}

export async function importSpace(
  spaces: SpacesAPI,
  file: string,
  options: { warehouse: string; path: string; title?: string; description?: string }
): Promise<void> {
  const created = await spaces.importFromFile(file, {
    warehouseId: options.warehouse,
    parentPath: options.path,
    title: options.title,
    description: options.description,
  });
  output.success('Space created successfully!');
  output.keyValue('Title', created.title);
  output.keyValue('Space ID', created.spaceId);
  output.keyValue('Warehouse', created.warehouseId ?? options.warehouse);
}

export async function updateSpace(
  spaces: SpacesAPI,
  spaceId: string,
  options: { file?: string; title?: string; description?: string; warehouse?: string }
): Promise<void> {
  const fields = {
    title: options.title,
    description: options.description,
    warehouseId: options.warehouse,
  };
  const updated = options.file
    ? await spaces.updateFromFile(spaceId, options.file, fields)
    : await spaces.update(spaceId, fields);
  output.success('Space updated successfully!');
  output.keyValue('Title', updated.title);
  output.keyValue('Space ID', updated.spaceId);
}

export async function cloneSpace(
  spaces: SpacesAPI,
  sourceSpaceId: string,
  options: { warehouse: string; path: string; title?: string; description?: string }
): Promise<void> {
  const cloned = await spaces.clone(sourceSpaceId, {
    warehouseId: options.warehouse,
    parentPath: options.path,
    title: options.title,
    description: options.description,
  });
  output.success('Space cloned successfully!');
  output.keyValue('Source', sourceSpaceId);
  output.keyValue('Title', cloned.title);
  output.keyValue('Space ID', cloned.spaceId);
}

/**
 * Print a space's metadata and a short view of its configuration.
 */
export async function showInfo(spaces: SpacesAPI, spaceId: string): Promise<void> {
  const space = await spaces.export(spaceId);
  const config = space.getExport();

  output.header('Space Information');
  output.keyValue('Title', space.title);
  output.keyValue('Space ID', space.spaceId);
  output.keyValue('Warehouse', space.warehouseId ?? 'N/A');
  output.keyValue('Description', space.description ?? 'N/A');

  const { tables, metric_views } = config.data_sources;
  if (tables.length > 0) {
    output.header('Tables');
    output.tableHeader(['Identifier', 'Columns Configured'], [48, 18]);
    for (const table of tables) {
      output.tableRow([table.identifier, String(table.column_configs.length)], [48, 18]);
    }
  }

  if (metric_views.length > 0) {
    output.header('Metric Views');
    for (const view of metric_views) {
      output.info(view.identifier);
    }
  }

  const questions = config.config.sample_questions;
  if (questions.length > 0) {
    output.header('Sample Questions');
    questions.forEach((q, i) => output.info(`  ${i + 1}. ${q.question.lines.join(' ')}`));
  }
}

/**
 * Register space commands with Commander
 */
export function registerSpaceCommands(program: Command, createSpaces: SpacesFactory): void {
  const run = async (command: Command, action: (spaces: SpacesAPI) => Promise<void>): Promise<void> => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    try {
      await action(createSpaces(globals));
    } catch (error) {
      handleError(error, globals.verbose);
    }
  };

  program
    .command('export')
    .description('Export a Genie Space configuration to JSON')
    .argument('<space-id>', 'ID of the space to export')
    .option('-o, --output <file>', 'Output file path (default: stdout)')
    .option('--compact', 'Write compact JSON instead of pretty-printed')
    .action((spaceId: string, options: { output?: string; compact?: boolean }, command: Command) =>
      run(command, (spaces) => exportSpace(spaces, spaceId, options))
    );

  program
    .command('import')
    .description('Create a new Genie Space from a JSON file')
    .argument('<file>', 'Path to the JSON configuration file')
    .requiredOption('-w, --warehouse <id>', 'SQL warehouse ID for the new space')
    .requiredOption('-p, --path <path>', 'Workspace folder for the new space')
    .option('--title <title>', 'Display title for the space')
    .option('-d, --description <text>', 'Description for the space')
    .action(
      (
        file: string,
        options: { warehouse: string; path: string; title?: string; description?: string },
        command: Command
      ) => run(command, (spaces) => importSpace(spaces, file, options))
    );

  program
    .command('update')
    .description('Update an existing Genie Space')
    .argument('<space-id>', 'ID of the space to update')
    .option('-f, --file <file>', 'Path to the JSON configuration file')
    .option('--title <title>', 'New display title')
    .option('-d, --description <text>', 'New description')
    .option('-w, --warehouse <id>', 'New SQL warehouse ID')
    .action(
      (
        spaceId: string,
        options: { file?: string; title?: string; description?: string; warehouse?: string },
        command: Command
      ) => run(command, (spaces) => updateSpace(spaces, spaceId, options))
    );

  program
    .command('clone')
    .description('Copy a Genie Space to a new location')
    .argument('<space-id>', 'ID of the space to clone')
    .requiredOption('-w, --warehouse <id>', 'SQL warehouse ID for the new space')
    .requiredOption('-p, --path <path>', 'Workspace folder for the new space')
    .option('--title <title>', 'Title for the new space (default: source title)')
    .option('-d, --description <text>', 'Description for the new space (default: source description)')
    .action(
      (
        spaceId: string,
        options: { warehouse: string; path: string; title?: string; description?: string },
        command: Command
      ) => run(command, (spaces) => cloneSpace(spaces, spaceId, options))
    );

  program
    .command('info')
    .description('Show a summary of a Genie Space')
    .argument('<space-id>', 'ID of the space')
    .action((spaceId: string, _options: unknown, command: Command) =>
      run(command, (spaces) => showInfo(spaces, spaceId))
    );
}

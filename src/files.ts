/**
 * Reading and writing space exports as UTF-8 JSON files.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { formatSpaceExport, parseSpaceExport } from './codec';
import { SpaceExport } from './models/space-export';

export async function readSpaceExportFile(path: string): Promise<SpaceExport> {
  const text = await readFile(path, 'utf-8');
  return parseSpaceExport(text);
}

/**
 * Write an export to `path`, creating parent directories as needed.
 */
export async function writeSpaceExportFile(
  path: string,
  space: SpaceExport,
  options?: { indent?: number }
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${formatSpaceExport(space, options)}\n`, 'utf-8');
}

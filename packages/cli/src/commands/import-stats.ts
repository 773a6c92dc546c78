/**
 * Import command: load a stats.json dump into a statistics database
 */

import * as fs from 'node:fs';

import { loadStatsDatabase } from '@tbx/database';

import { InputError, resolveAbsolutePath } from '../errors/cli-errors.js';
import type { Reporter } from '../progress/reporter.js';

export function runImportStats(jsonPath: string, dbPath: string, reporter: Reporter): string {
  if (!fs.existsSync(jsonPath)) {
    throw new InputError(
      `Statistics dump not found: ${resolveAbsolutePath(jsonPath)}`,
      'Check the file path and try again',
    );
  }
  const count = loadStatsDatabase(jsonPath, dbPath, (material) => reporter.debug(`imported ${material}`));
  return `Imported ${count} endgames into ${dbPath}`;
}

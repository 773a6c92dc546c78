/**
 * Fixture loading utilities for tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the absolute path to the fixtures directory
 */
function getFixturesRoot(): string {
  return path.join(__dirname, 'data');
}

/**
 * Get the absolute path to a fixture file
 */
export function getFixturePath(relativePath: string): string {
  return path.join(getFixturesRoot(), relativePath);
}

/**
 * Load a text fixture file
 */
export async function loadText(relativePath: string): Promise<string> {
  return fs.promises.readFile(getFixturePath(relativePath), 'utf-8');
}

/**
 * Load a JSON fixture file; callers validate the shape
 */
export async function loadJson(relativePath: string): Promise<unknown> {
  return JSON.parse(await loadText(relativePath));
}

/**
 * Small statistics dump covering KQvK, KRvK, KRvKN and KQvKR
 */
export const STATS_FIXTURE = 'stats-sample.json';

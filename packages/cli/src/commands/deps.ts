/**
 * Deps command: tables needed to probe an endgame
 */

import { tableDependencies } from '@tbx/core';

import type { TbxConfig } from '../config/schema.js';
import { formatDependencies } from '../progress/formatters.js';
import type { ColorFunctions } from '../progress/types.js';

import { parseMaterialArg, toJson } from './shared.js';

export function runDeps(input: string, config: TbxConfig, colors: ColorFunctions): string {
  const material = parseMaterialArg(input);
  const dependencies = tableDependencies(material);
  return config.output.format === 'json'
    ? toJson({ material, dependencies })
    : formatDependencies(material, dependencies, colors);
}

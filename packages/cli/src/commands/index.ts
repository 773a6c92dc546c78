/**
 * Command wiring: configuration, services and output around each run* function
 */

import type { CommandContext, CommandHandlers } from '../cli.js';
import { formatConfig, loadConfig, type Environment } from '../config/loader.js';
import type { TbxConfig } from '../config/schema.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { Reporter } from '../progress/reporter.js';
import { createServices, type ServiceOverrides, type Services } from '../services.js';

import { runDeps } from './deps.js';
import { runEndgames } from './endgames.js';
import { runImportStats } from './import-stats.js';
import { runProbe } from './probe.js';
import { runStats } from './stats.js';

export { runDeps, runEndgames, runImportStats, runProbe, runStats };
export { parseMaterialArg, requireStats } from './shared.js';

/**
 * Environment of the handlers
 */
export interface HandlerDeps {
  /** Environment variables (default: process.env) */
  env?: Environment;
  /** Backends replacing the configured ones */
  overrides?: ServiceOverrides;
  /** Output sink (default: stdout) */
  write?: (text: string) => void;
}

type Run = (config: TbxConfig, reporter: Reporter, services: () => Services) => Promise<string> | string;

/**
 * Command handlers for createProgram()
 */
export function createHandlers(deps: HandlerDeps = {}): CommandHandlers {
  const write = deps.write ?? ((text: string) => console.log(text));

  async function execute(context: CommandContext, run: Run): Promise<void> {
    const config = await loadConfig(context.options, deps.env);
    const reporter = new Reporter({
      color: config.output.color,
      verbose: context.options.verbose ?? false,
    });

    if (context.options.showConfig) {
      write(config.output.format === 'json' ? formatConfig(config) : formatConfigDisplay(config, reporter.colors));
      return;
    }

    const opened: { services: Services | null } = { services: null };
    const getServices = (): Services =>
      (opened.services ??= createServices(config, reporter, deps.overrides));
    try {
      write(await run(config, reporter, getServices));
    } finally {
      opened.services?.close();
    }
  }

  return {
    probe: (fen, context) =>
      execute(context, (config, reporter, services) => runProbe(fen, config, services(), reporter)),
    stats: (material, context) =>
      execute(context, (config, reporter, services) => runStats(material, config, services(), reporter.colors)),
    endgames: (pieces, context) =>
      execute(context, (config, reporter, services) => runEndgames(pieces, config, services(), reporter.colors)),
    deps: (material, context) => execute(context, (config, reporter) => runDeps(material, config, reporter.colors)),
    importStats: (jsonPath, dbPath, context) =>
      execute(context, (_config, reporter) => runImportStats(jsonPath, dbPath, reporter)),
  };
}

/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';

import type { CliOptions } from './config/schema.js';
import { ConfigValidationError, outputFormatSchema } from './config/validation.js';

export const VERSION = '0.1.0';

/**
 * Output format descriptions for help text
 */
const FORMAT_HELP = `Output format:
    text - Human readable [default]
    json - Machine readable, for scripts`;

/**
 * Everything a command action needs, resolved once per invocation
 */
export interface CommandContext {
  options: CliOptions;
}

/**
 * Command handlers; the bin entry wires the real ones
 */
export interface CommandHandlers {
  probe(fen: string, context: CommandContext): Promise<void>;
  stats(material: string, context: CommandContext): Promise<void>;
  endgames(pieces: number | undefined, context: CommandContext): Promise<void>;
  deps(material: string, context: CommandContext): Promise<void>;
  importStats(jsonPath: string, dbPath: string, context: CommandContext): Promise<void>;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Commander option values, as parsed by the options registered below
 */
const rawOptionsSchema = z.object({
  config: z.string().optional(),
  format: outputFormatSchema.optional(),
  color: z.boolean().optional(),
  verbose: z.boolean().optional(),
  showConfig: z.boolean().optional(),
  host: z.string().optional(),
  port: z.number().int().optional(),
  timeout: z.number().int().optional(),
  statsDb: z.string().optional(),
  statsJson: z.string().optional(),
});

/**
 * Parse CLI options from the merged global and command options
 *
 * @throws ConfigValidationError if a value does not have the expected type
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result = rawOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => ({
        path: `--${issue.path.join('.')}`,
        message: issue.message,
      })),
    );
  }
  const parsed = result.data;
  const cliOptions: CliOptions = {};

  if (parsed.config !== undefined) cliOptions.config = parsed.config;
  if (parsed.format !== undefined) cliOptions.format = parsed.format;
  // Commander stores --no-color as color: false
  if (parsed.color === false) cliOptions.noColor = true;
  if (parsed.verbose !== undefined) cliOptions.verbose = parsed.verbose;
  if (parsed.showConfig !== undefined) cliOptions.showConfig = parsed.showConfig;
  if (parsed.host !== undefined) cliOptions.host = parsed.host;
  if (parsed.port !== undefined) cliOptions.port = parsed.port;
  if (parsed.timeout !== undefined) cliOptions.timeout = parsed.timeout;
  if (parsed.statsDb !== undefined) cliOptions.statsDb = parsed.statsDb;
  if (parsed.statsJson !== undefined) cliOptions.statsJson = parsed.statsJson;

  return cliOptions;
}

function contextOf(command: Command): CommandContext {
  return { options: parseCliOptions(command.optsWithGlobals()) };
}

/**
 * Create and configure the CLI program
 */
export function createProgram(handlers: CommandHandlers): Command {
  const program = new Command()
    .name('tbx')
    .description('Endgame tablebase explorer - probe positions and browse endgame statistics')
    .version(VERSION)
    .option('-c, --config <file>', 'Path to config file')
    .option('-f, --format <format>', FORMAT_HELP)
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--verbose', 'Print diagnostics to stderr')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--stats-db <file>', 'Statistics database (see import-stats)')
    .option('--stats-json <file>', 'Statistics dump (stats.json)');

  program
    .command('probe')
    .description('Probe a position and classify its legal moves')
    .argument('<fen>', 'Position in FEN or EPD; underscores may replace spaces')
    .option('--host <host>', 'Probe service host')
    .option('--port <port>', 'Probe service port', parseInteger)
    .option('--timeout <ms>', 'Probe deadline in milliseconds', parseInteger)
    .action(async (fen: string, _options: unknown, command: Command) => {
      await handlers.probe(fen, contextOf(command));
    });

  program
    .command('stats')
    .description('Show result counts, longest phases and table files of an endgame')
    .argument('<material>', 'Material key in any side order, e.g. KNvKR')
    .action(async (material: string, _options: unknown, command: Command) => {
      await handlers.stats(material, contextOf(command));
    });

  program
    .command('endgames')
    .description('List endgames by piece count with their longest phases')
    .option('-p, --pieces <n>', 'Only endgames with this many pieces', parseInteger)
    .action(async (options: { pieces?: number }, command: Command) => {
      await handlers.endgames(options.pieces, contextOf(command));
    });

  program
    .command('deps')
    .description('List the tables required to probe an endgame')
    .argument('<material>', 'Material key in any side order')
    .action(async (material: string, _options: unknown, command: Command) => {
      await handlers.deps(material, contextOf(command));
    });

  program
    .command('import-stats')
    .description('Import a stats.json dump into a statistics database')
    .argument('<json>', 'Statistics dump')
    .argument('<db>', 'Database file to write')
    .action(async (jsonPath: string, dbPath: string, _options: unknown, command: Command) => {
      await handlers.importStats(jsonPath, dbPath, contextOf(command));
    });

  return program;
}

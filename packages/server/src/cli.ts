/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';
import { z } from 'zod';

import type { CliOptions } from './config/schema.js';
import { logLevelSchema } from './config/validation.js';
import { VERSION } from './version.js';

export { VERSION };

/**
 * Environment variable help text
 */
const ENV_HELP = `
Environment:
  PORT, HOST            listener address (default 0.0.0.0:5000)
  BEN_API_URL           analysis engine base URL
  ENGINE_TIMEOUT_MS     engine request timeout (default 120000)
  GEMINI_API_KEY        LLM API key (LLM_API_KEY takes precedence)
  LLM_BASE_URL          OpenAI-compatible API base URL (default: Gemini)
  LLM_MODEL             model name (default gemini-1.5-flash)
  LLM_TIMEOUT_MS        LLM request timeout
  LOG_LEVEL             debug | info | warn | error | silent`;

/**
 * Options shared by every command, as Commander reports them
 */
const commanderOptionsSchema = z.object({
  config: z.string().optional(),
  host: z.string().optional(),
  port: z.number().optional(),
  engineUrl: z.string().optional(),
  logLevel: logLevelSchema.optional(),
  color: z.boolean().optional(),
  report: z.boolean().optional(),
  showConfig: z.boolean().optional(),
});

export type CommandOptions = CliOptions & {
  /** Generate the LLM report (analyze only) */
  report: boolean;
};

/**
 * Parse CLI options from a command's options object
 */
export function parseCliOptions(options: Record<string, unknown>): CommandOptions {
  const parsed = commanderOptionsSchema.parse(options);
  return {
    config: parsed.config,
    host: parsed.host,
    port: parsed.port,
    engineUrl: parsed.engineUrl,
    logLevel: parsed.logLevel,
    // Commander.js uses 'color' (negated) when --no-color is used
    noColor: parsed.color === false,
    report: parsed.report !== false,
    showConfig: parsed.showConfig === true,
  };
}

function parsePort(value: string): number {
  return parseInt(value, 10);
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('bridge-analyst')
    .description('Bridge board analysis with an analysis engine and LLM reports')
    .version(VERSION)
    .addHelpText('after', ENV_HELP);

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('-H, --host <host>', 'Interface to bind')
    .option('-c, --config <file>', 'Path to config file')
    .option('--engine-url <url>', 'Analysis engine base URL')
    .option('--log-level <level>', 'debug | info | warn | error | silent')
    .option('--no-color', 'Disable colored output')
    .option('--show-config', 'Print resolved configuration and exit')
    .action(async (options: Record<string, unknown>) => {
      const { serveCommand } = await import('./commands/serve.js');
      await serveCommand(parseCliOptions(options));
    });

  program
    .command('parse')
    .description('Parse a PBN file and print the board record and warnings as JSON')
    .argument('<file>', 'PBN file')
    .action(async (file: string) => {
      const { parseCommand } = await import('./commands/parse.js');
      await parseCommand(file);
    });

  program
    .command('analyze')
    .description('Analyze a PBN file with the configured engine and LLM')
    .argument('<file>', 'PBN file')
    .option('-c, --config <file>', 'Path to config file')
    .option('--engine-url <url>', 'Analysis engine base URL')
    .option('--no-report', 'Skip the LLM report')
    .option('--no-color', 'Disable colored output')
    .option('--show-config', 'Print resolved configuration and exit')
    .action(async (file: string, options: Record<string, unknown>) => {
      const { analyzeCommand } = await import('./commands/analyze.js');
      await analyzeCommand(file, parseCliOptions(options));
    });

  return program;
}

/**
 * Command-line program: argument parsing, configuration and wiring of the
 * backtest command. `runCli` returns the exit code instead of exiting so the
 * whole flow runs in tests.
 */

import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import type { MarketDataProvider } from '@crossover/contracts';
import { createLogger, withRequestContext, type Logger } from '@crossover/logger';
import { BacktestCommand } from './commands/backtest.command.js';
import { CommandError, CommandErrorCode, EXIT_CODES, formatCommandError } from './commands/errors.js';
import type { BacktestCommandOptions } from './commands/types.js';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';
import { ACCOUNTING_MODES, PROVIDER_TYPES, SIGNAL_POLICIES } from './config/schema.js';
import { OUTPUT_FORMATS } from './formatters/backtest-formatter.js';
import { createProvider, type ProviderConfig } from './services/providers.js';

export const VERSION = '0.1.0';

export interface CliDependencies {
  /** Environment to load configuration from; defaults to process.env */
  env?: Record<string, string | undefined>;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
  /** Used instead of a logger built from the configuration */
  logger?: Logger;
  /** Called once the logger exists, before any work starts */
  onLogger?: (logger: Logger) => void;
  createProvider?: (config: ProviderConfig, logger: Logger) => MarketDataProvider;
  now?: () => Date;
}

interface Output {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

const numericOption = z.coerce.number().finite().optional();

/**
 * Flags as commander hands them over. Numbers arrive as strings.
 */
const cliOptionsSchema = z.object({
  tickers: z.string().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  policy: z.enum(SIGNAL_POLICIES).optional(),
  window: numericOption,
  short: numericOption,
  long: numericOption,
  threshold: numericOption,
  capital: numericOption,
  accounting: z.enum(ACCOUNTING_MODES).optional(),
  provider: z.enum(PROVIDER_TYPES).optional(),
  fixtures: z.string().optional(),
  format: z.enum(OUTPUT_FORMATS).default('text'),
  color: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

type CliOptions = z.infer<typeof cliOptionsSchema>;

function parseOptions(raw: unknown): CliOptions {
  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new CommandError(CommandErrorCode.INVALID_ARGS, `Invalid options:\n${issues.join('\n')}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Provider settings after command-line overrides. `--fixtures` alone
 * selects the fixture provider.
 */
function resolveProviderConfig(base: ProviderConfig, options: CliOptions): ProviderConfig {
  const type = options.provider ?? (options.fixtures !== undefined ? 'fixture' : base.type);
  return {
    ...base,
    type,
    ...(options.fixtures !== undefined ? { fixturePath: options.fixtures } : {}),
  };
}

function buildLogger(config: Config, verbose: boolean): Logger {
  return createLogger({
    level: verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    ...(config.logging.filePath !== undefined ? { filePath: config.logging.filePath } : {}),
  });
}

function toCommandOptions(options: CliOptions, verbose: boolean): BacktestCommandOptions {
  return {
    tickers: options.tickers,
    start: options.start,
    end: options.end,
    policy: options.policy,
    window: options.window,
    shortWindow: options.short,
    longWindow: options.long,
    threshold: options.threshold,
    initialInvestment: options.capital,
    accounting: options.accounting,
    format: options.format,
    color: options.color,
    verbose,
  };
}

async function runBacktest(
  tickers: string[],
  rawOptions: unknown,
  deps: CliDependencies,
  output: Output
): Promise<number> {
  let options: CliOptions;
  let config: Config;
  try {
    options = parseOptions(rawOptions);
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    output.writeErr(`${formatCommandError(error)}\n`);
    return error instanceof CommandError ? error.exitCode : EXIT_CODES.FAILURE;
  }

  const verbose = options.verbose || config.app.verbose;
  const logger = deps.logger ?? buildLogger(config, verbose);
  deps.onLogger?.(logger);

  const providerConfig = resolveProviderConfig(config.provider, options);
  logger.debug('Configuration loaded', {
    ...getConfigSummary(config),
    provider: providerConfig.type,
  });

  const provider = (deps.createProvider ?? createProvider)(providerConfig, logger);
  const command = new BacktestCommand({
    provider,
    logger,
    defaults: config.backtest,
    ...(deps.now ? { now: deps.now } : {}),
  });

  const result = await withRequestContext(
    () => command.execute(tickers, toCommandOptions(options, verbose)),
    undefined,
    { command: command.name }
  );

  logger.debug('Command finished', {
    command: command.name,
    exitCode: result.exitCode,
    duration_ms: result.duration,
    ...result.metadata,
  });

  if (result.output) {
    output.writeOut(`${result.output}\n`);
  }
  if (result.error) {
    output.writeErr(`${result.error.format(verbose)}\n`);
  }
  return result.exitCode;
}

/**
 * Build the commander program. The action stores its exit code through
 * `setExitCode`.
 */
export function createProgram(
  deps: CliDependencies,
  output: Output,
  setExitCode: (code: number) => void
): Command {
  const program = new Command();

  program
    .name('crossover')
    .description('Moving-average crossover signals and backtests over daily bars')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: output.writeOut, writeErr: output.writeErr });

  program
    .command('backtest')
    .alias('bt')
    .description('Backtest a signal policy for one or more tickers')
    .argument('[tickers...]', 'tickers to backtest; overrides --tickers')
    .option('-t, --tickers <list>', 'comma-separated tickers')
    .option('-s, --start <date>', 'first day of the range (YYYY-MM-DD)')
    .option('-e, --end <date>', 'last day of the range (YYYY-MM-DD)')
    .addOption(new Option('-p, --policy <policy>', 'signal policy').choices(SIGNAL_POLICIES))
    .option('-w, --window <days>', 'moving-average window of the level-count policy')
    .option('--short <days>', 'short moving-average window')
    .option('--long <days>', 'long moving-average window')
    .option('--threshold <ratio>', 'relative gap required by the threshold-gated policy')
    .option('-c, --capital <amount>', 'initial investment')
    .addOption(new Option('--accounting <mode>', 'portfolio accounting').choices(ACCOUNTING_MODES))
    .addOption(new Option('--provider <type>', 'market data provider').choices(PROVIDER_TYPES))
    .option('--fixtures <dir>', 'directory of fixture series; implies --provider fixture')
    .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--no-color', 'disable coloured output')
    .option('-v, --verbose', 'debug logging and stack traces', false)
    .action(async (tickers: string[], options: unknown) => {
      setExitCode(await runBacktest(tickers, options, deps, output));
    });

  return program;
}

/**
 * Parse `argv` (node, script, ...args) and run the selected command.
 *
 * @returns Process exit code: 0 on success, 1 when no data could be
 *   produced, 2 for usage and configuration errors
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const output: Output = {
    writeOut: deps.writeOut ?? ((text) => process.stdout.write(text)),
    writeErr: deps.writeErr ?? ((text) => process.stderr.write(text)),
  };

  let exitCode: number = EXIT_CODES.OK;
  const program = createProgram(deps, output, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.USAGE;
    }
    throw error;
  }

  return exitCode;
}

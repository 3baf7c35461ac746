/**
 * @crossover/app - command-line backtests over daily bars
 */

export { runCli, createProgram, VERSION } from './program.js';
export type { CliDependencies } from './program.js';

export { BacktestCommand } from './commands/backtest.command.js';
export type { BacktestCommandConfig } from './commands/backtest.command.js';
export {
  CommandError,
  CommandErrorCode,
  ERROR_MESSAGES,
  errorLogFields,
  EXIT_CODES,
  exitCodeFor,
  formatCommandError,
  wrapError,
} from './commands/errors.js';
export type { BacktestCommandOptions, Command, CommandOptions, CommandResult } from './commands/types.js';

export { loadConfig, getConfigSummary, parseEnvValue, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
export { SIGNAL_POLICIES, ACCOUNTING_MODES, PROVIDER_TYPES } from './config/schema.js';

export {
  BacktestFormatter,
  OUTPUT_FORMATS,
  formatMoney,
  formatPercent,
  describePolicy,
} from './formatters/backtest-formatter.js';
export type { OutputFormat, FormatterOptions } from './formatters/backtest-formatter.js';

export { createProvider } from './services/providers.js';
export type { ProviderConfig } from './services/providers.js';

export { resolveDateRange, shiftDays, toCalendarDate } from './utils/dates.js';
export type { DateRange } from './utils/dates.js';

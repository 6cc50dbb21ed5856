import { Command, Option } from 'commander';
import { setLogLevel } from '../common/logger';
import { DEFAULT_CONFIG_PATH, DEFAULT_NETWORK, NETWORKS } from '../config/ProjectConfig';
import { registerCombinedCommands } from './commands/combined';
import { registerConfigCommands } from './commands/config';
import { registerExamplesCommand } from './commands/examples';
import { registerInteractiveCommand } from './commands/interactive';
import { registerOptionsCommands } from './commands/options';
import { registerTwapCommands } from './commands/twap';
import { registerVolatilityCommands } from './commands/volatility';
import { CliContext, createDefaultContext, GlobalOptions } from './context';
import { printBanner } from './lib/output';

export const VERSION = '0.1.0';

export function createProgram(overrides: Partial<CliContext> = {}): Command {
  const context: CliContext = { ...createDefaultContext(), ...overrides };
  const program = new Command();

  // Global options go before the subcommand; several subcommands define their own --config

  program
    .name('vector-plus')
    .description('Vector Plus - Advanced Trading Strategies for Limit Order Execution')
    .version(VERSION)
    .enablePositionalOptions()
    .addOption(
      new Option('--network <name>', 'Network to use')
        .choices(NETWORKS)
        .env('VECTOR_PLUS_NETWORK')
        .default(DEFAULT_NETWORK)
    )
    .addOption(
      new Option('--config <path>', 'Configuration file path')
        .env('VECTOR_PLUS_CONFIG')
        .default(DEFAULT_CONFIG_PATH)
    )
    .option('-v, --verbose', 'Verbose output', false)
    .hook('preAction', (_thisCommand, actionCommand) => {
      if (actionCommand.optsWithGlobals<GlobalOptions>().verbose) {
        setLogLevel('debug');
      }
      printBanner();
    });

  registerVolatilityCommands(program, context);
  registerTwapCommands(program, context);
  registerOptionsCommands(program, context);
  registerCombinedCommands(program, context);
  registerConfigCommands(program);
  registerExamplesCommand(program);
  registerInteractiveCommand(program, context);

  return program;
}

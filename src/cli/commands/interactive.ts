/**
 * Interactive strategy builder
 *
 * Walks through the parameters of one strategy and prints the command
 * line that creates it. Nothing is written to disk.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { OptionType } from '../../strategies/options';
import { CliContext } from '../context';
import { COMMAND_NAME, renderCommand } from '../lib/output';
import { Prompter } from '../lib/prompter';

export const STRATEGY_MENU = [
  '🌊 Volatility-based execution',
  '🕒 TWAP execution',
  '📞 Options on execution rights',
  '🚀 Combined TWAP + Volatility',
  '⚙️  Configuration management',
  '❌ Exit'
] as const;

export const CONFIG_MENU = [
  'Initialize new configuration',
  'Show current configuration',
  'Back to main menu'
] as const;

type StrategyBuilder = (prompter: Prompter) => Promise<string[]>;

export async function buildVolatilityCommand(prompter: Prompter): Promise<string[]> {
  const baseline = await prompter.integer('Baseline volatility (basis points)', 300, 1);
  const current = await prompter.integer('Current volatility (basis points)', 350);
  const maxSize = await prompter.number('Maximum execution size (ETH)', 5.0);
  const minSize = await prompter.number('Minimum execution size (ETH)', 0.1);
  const conservative = await prompter.confirm('Enable conservative mode?', false);

  const parts = [
    `${COMMAND_NAME} volatility create-config`,
    `--baseline-volatility ${baseline}`,
    `--current-volatility ${current}`,
    `--max-execution-size ${maxSize}`,
    `--min-execution-size ${minSize}`
  ];
  if (conservative) {
    parts.push('--conservative-mode');
  }
  return parts;
}

export async function buildTwapCommand(prompter: Prompter): Promise<string[]> {
  const duration = await prompter.integer('Execution duration (minutes)', 120, 1);
  const intervals = await prompter.integer('Number of intervals', 12, 1);
  const randomize = await prompter.confirm('Enable randomization?', true);

  const parts = [
    `${COMMAND_NAME} twap create-config`,
    `--duration ${duration}`,
    `--intervals ${intervals}`
  ];
  if (randomize) {
    parts.push('--randomize');
  }
  return parts;
}

export async function buildOptionsCommand(prompter: Prompter): Promise<string[]> {
  const optionTypes = [OptionType.CALL, OptionType.PUT];
  const typeIndex = await prompter.select('Option type', ['Call Option', 'Put Option'], 0);
  const strikePrice = await prompter.number('Strike price (USDC)', 2100, true);
  const expiration = await prompter.integer('Expiration (hours)', 168, 1);
  const premium = await prompter.number('Premium (USDC)', 50);

  return [
    `${COMMAND_NAME} options create-${optionTypes[typeIndex]}`,
    `--strike-price ${strikePrice}`,
    `--expiration-hours ${expiration}`,
    `--premium ${premium}`
  ];
}

export async function buildCombinedCommand(prompter: Prompter): Promise<string[]> {
  const twapDuration = await prompter.integer('TWAP duration (minutes)', 180, 1);
  const twapIntervals = await prompter.integer('TWAP intervals', 18, 1);
  const volatilityThreshold = await prompter.integer('Volatility threshold (basis points)', 600, 1);

  return [
    `${COMMAND_NAME} combined create`,
    `--twap-duration ${twapDuration}`,
    `--twap-intervals ${twapIntervals}`,
    `--volatility-threshold ${volatilityThreshold}`
  ];
}

const BUILDERS: Array<{ title: string; done: string; build: StrategyBuilder }> = [
  { title: '🌊 Building Volatility Strategy', done: '✅ Volatility strategy configured!', build: buildVolatilityCommand },
  { title: '🕒 Building TWAP Strategy', done: '✅ TWAP strategy configured!', build: buildTwapCommand },
  { title: '📞 Building Options Strategy', done: '✅ Options strategy configured!', build: buildOptionsCommand },
  { title: '🚀 Building Combined Strategy', done: '✅ Combined strategy configured!', build: buildCombinedCommand }
];

async function manageConfiguration(prompter: Prompter): Promise<void> {
  console.log(chalk.blue.bold('⚙️  Configuration Management'));
  console.log('');

  const selection = await prompter.select('What would you like to do?', CONFIG_MENU, 0);
  if (selection === 0) {
    console.log(chalk.green(`🔧 Run: ${COMMAND_NAME} config init`));
  } else if (selection === 1) {
    console.log(chalk.green(`📋 Run: ${COMMAND_NAME} config show`));
  }
}

export async function runInteractiveMode(prompter: Prompter): Promise<void> {
  console.log(chalk.cyan.bold('🎯 Vector Plus Interactive Mode'));
  console.log('');

  const selection = await prompter.select('What would you like to create?', STRATEGY_MENU, 0);
  if (selection < BUILDERS.length) {
    const builder = BUILDERS[selection];
    console.log(chalk.blue.bold(builder.title));
    console.log('');
    const parts = await builder.build(prompter);
    console.log('');
    console.log(chalk.green(builder.done));
    for (const line of renderCommand(parts)) {
      console.log(line);
    }
    return;
  }

  if (selection === STRATEGY_MENU.length - 2) {
    await manageConfiguration(prompter);
    return;
  }

  console.log(chalk.green('👋 Goodbye!'));
}

export function registerInteractiveCommand(program: Command, context: CliContext): void {
  program
    .command('interactive')
    .description('Interactive strategy builder')
    .action(async () => {
      const prompter = context.createPrompter();
      try {
        await runInteractiveMode(prompter);
      } finally {
        prompter.close();
      }
    });
}

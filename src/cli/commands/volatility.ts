/**
 * Volatility CLI Commands
 *
 * create-config, validate and calculate for volatility-adaptive sizing.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { StrategyConfigError, StrategyConfigErrorCode } from '../../common/errors';
import { createLogger } from '../../common/logger';
import {
  AmountCap,
  buildVolatilityConfig,
  calculateAdjustment,
  loadVolatilityConfig,
  saveVolatilityConfig,
  VolatilityValidator
} from '../../strategies/volatility';
import { CliContext } from '../context';
import { COMMAND_NAME, detail, suggestion } from '../lib/output';
import { parseAmount, parseBasisPoints, parsePositiveAmount, parsePositiveInteger } from '../lib/parsers';

const logger = createLogger('CLI:Volatility');

const DEFAULT_VOLATILITY_CONFIG_PATH = 'volatility-config.json';

interface CreateConfigOptions {
  baselineVolatility: number;
  currentVolatility: number;
  maxExecutionSize: number;
  minExecutionSize: number;
  conservativeMode: boolean;
  output: string;
}

interface CalculateOptions {
  amount: number;
  config: string;
}

export function registerVolatilityCommands(program: Command, context: CliContext): void {
  const volatility = program
    .command('volatility')
    .description('Volatility-based execution strategies');

  volatility
    .command('create-config')
    .description('Generate volatility configuration file')
    .option('--baseline-volatility <bps>', 'Baseline volatility in basis points', parsePositiveInteger, 300)
    .option('--current-volatility <bps>', 'Current market volatility in basis points', parseBasisPoints, 350)
    .option('--max-execution-size <eth>', 'Maximum execution size in ETH', parseAmount, 5.0)
    .option('--min-execution-size <eth>', 'Minimum execution size in ETH', parseAmount, 0.1)
    .option('--conservative-mode', 'Enable conservative mode', false)
    .option('-o, --output <path>', 'Output file path', DEFAULT_VOLATILITY_CONFIG_PATH)
    .action(async (options: CreateConfigOptions) => {
      const config = buildVolatilityConfig(options, context.clock());
      await saveVolatilityConfig(options.output, config);
      logger.debug('Saved volatility config', { path: options.output });

      console.log(`${chalk.green('✅ Created volatility config:')} ${chalk.cyan(options.output)}`);
      console.log(`📊 Baseline volatility: ${chalk.yellow(String(options.baselineVolatility))}bps`);
      console.log(`📈 Current volatility: ${chalk.yellow(String(options.currentVolatility))}bps`);
      console.log(`💰 Max execution: ${chalk.yellow(String(options.maxExecutionSize))} ETH`);
      console.log(`💰 Min execution: ${chalk.yellow(String(options.minExecutionSize))} ETH`);
      console.log(`🔒 Conservative mode: ${options.conservativeMode ? chalk.green('ON') : chalk.red('OFF')}`);
      console.log('');
      console.log(chalk.bold('🚀 Next steps:'));
      console.log(suggestion(`${COMMAND_NAME} volatility validate ${options.output}`));
      console.log(suggestion(`${COMMAND_NAME} volatility calculate --amount 1.0 --config ${options.output}`));
    });

  volatility
    .command('validate')
    .description('Validate volatility configuration')
    .argument('<file>', 'Configuration file to validate')
    .action(async (file: string) => {
      console.log(`${chalk.cyan('🔍 Validating volatility config:')} ${chalk.yellow(file)}`);

      const spinner = ora(`Checking ${file}`).start();
      const config = await loadVolatilityConfig(file).finally(() => spinner.stop());
      const result = new VolatilityValidator().validate(config, context.clock());

      if (result.errors.length === 0 && result.warnings.length === 0) {
        console.log(chalk.green('✅ Volatility configuration is valid!'));
        console.log('📊 Configuration summary:');
        console.log(detail(`Baseline: ${config.baselineVolatility}bps`));
        console.log(detail(`Current: ${config.currentVolatility}bps`));
        console.log(detail(`Threshold: ${config.volatilityThreshold}bps`));
        console.log(detail(`Emergency: ${config.emergencyThreshold}bps`));
        return;
      }

      for (const warning of result.warnings) {
        console.log(chalk.yellow(`⚠️  ${warning}`));
      }
      for (const error of result.errors) {
        console.log(chalk.red(`❌ ${error}`));
      }

      if (!result.valid) {
        throw new StrategyConfigError(
          StrategyConfigErrorCode.VALIDATION_FAILURE,
          'Configuration validation failed',
          { file, errors: result.errors, warnings: result.warnings }
        );
      }
    });

  volatility
    .command('calculate')
    .description('Calculate volatility adjustment for given amount')
    .requiredOption('--amount <eth>', 'Base amount in ETH', parsePositiveAmount)
    .option('--config <path>', 'Volatility config file', DEFAULT_VOLATILITY_CONFIG_PATH)
    .action(async (options: CalculateOptions) => {
      const config = await loadVolatilityConfig(options.config);

      console.log(`${chalk.cyan('🧮 Calculating volatility adjustment for:')} ${chalk.yellow(String(options.amount))} ETH`);

      const result = calculateAdjustment(options.amount, config);
      logger.debug('Adjustment computed', { regime: result.regime, factor: result.adjustmentFactorPercent });

      console.log('📊 Volatility Analysis:');
      console.log(detail(`Baseline volatility: ${config.baselineVolatility}bps`));
      console.log(detail(`Current volatility: ${config.currentVolatility}bps`));
      console.log(detail(`Regime: ${result.regime}`));
      console.log(detail(`Adjustment factor: ${result.adjustmentFactorPercent}%`));
      console.log('');
      console.log('💰 Execution Amounts:');
      console.log(detail(`Original amount: ${result.originalAmount} ETH`));
      console.log(detail(`Adjusted amount: ${result.adjustedAmount} ETH`));
      console.log(detail(`Final amount: ${result.finalAmount} ETH`));
      console.log(detail(`Min allowed: ${result.minAllowed} ETH`));
      console.log(detail(`Max allowed: ${result.maxAllowed} ETH`));

      if (result.capped === AmountCap.AT_MAX) {
        console.log(chalk.yellow('⚠️  Amount capped at maximum limit'));
      } else if (result.capped === AmountCap.AT_MIN) {
        console.log(chalk.yellow('⚠️  Amount raised to minimum limit'));
      }
    });
}

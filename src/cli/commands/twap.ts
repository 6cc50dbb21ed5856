/**
 * TWAP CLI Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { buildTwapConfig, loadTwapConfig, saveTwapConfig, simulateTwap } from '../../strategies/twap';
import { CliContext } from '../context';
import { detail, formatOffset, renderTable } from '../lib/output';
import { parsePositiveAmount, parsePositiveInteger } from '../lib/parsers';

const DEFAULT_TWAP_CONFIG_PATH = 'twap-config.json';

interface CreateConfigOptions {
  duration: number;
  intervals: number;
  randomize: boolean;
  output: string;
}

interface SimulateOptions {
  config: string;
  orderSize: number;
}

export function registerTwapCommands(program: Command, context: CliContext): void {
  const twap = program
    .command('twap')
    .description('Time-Weighted Average Price execution');

  twap
    .command('create-config')
    .description('Generate TWAP configuration')
    .requiredOption('--duration <minutes>', 'Execution duration in minutes', parsePositiveInteger)
    .requiredOption('--intervals <count>', 'Number of intervals', parsePositiveInteger)
    .option('--randomize', 'Enable randomization', false)
    .option('-o, --output <path>', 'Output file', DEFAULT_TWAP_CONFIG_PATH)
    .action(async (options: CreateConfigOptions) => {
      console.log(chalk.cyan('🕒 Creating TWAP configuration...'));

      const config = buildTwapConfig({
        durationMinutes: options.duration,
        intervals: options.intervals,
        randomizeExecution: options.randomize
      }, context.clock());
      await saveTwapConfig(options.output, config);

      console.log(detail(`Duration: ${config.durationMinutes} minutes`));
      console.log(detail(`Intervals: ${config.intervals}`));
      console.log(detail(`Interval length: ${config.intervalSeconds} seconds`));
      console.log(detail(`Randomization: ${config.randomizeExecution ? 'enabled' : 'disabled'}`));
      console.log(`${chalk.green('✅ TWAP config created:')} ${options.output}`);
    });

  twap
    .command('simulate')
    .description('Simulate TWAP execution')
    .option('--config <path>', 'Configuration file', DEFAULT_TWAP_CONFIG_PATH)
    .requiredOption('--order-size <eth>', 'Order size in ETH', parsePositiveAmount)
    .action(async (options: SimulateOptions) => {
      const config = await loadTwapConfig(options.config);

      const spinner = ora('Simulating TWAP execution...').start();
      const simulation = simulateTwap(config, options.orderSize, context.random);
      spinner.succeed('Simulation complete');

      console.log(chalk.cyan('🎯 TWAP execution schedule'));
      console.log(detail(`Config: ${options.config}`));
      console.log(detail(`Order size: ${simulation.orderSize} ETH`));
      console.log(detail(`Slices: ${simulation.slices.length} every ${simulation.intervalSeconds} seconds`));
      console.log(detail(`Randomization: ${config.randomizeExecution ? 'enabled' : 'disabled'}`));

      const rows = simulation.slices.map(slice => [
        String(slice.index),
        formatOffset(slice.offsetSeconds),
        String(slice.amount)
      ]);
      rows.unshift(['Slice', 'Time', 'Amount (ETH)']);
      console.log(renderTable(rows));
    });
}

import { Command } from 'commander';
import chalk from 'chalk';
import { buildCombinedStrategy, saveCombinedStrategy } from '../../strategies/combined';
import { CliContext } from '../context';
import { detail } from '../lib/output';
import { parsePositiveInteger } from '../lib/parsers';

interface CreateCombinedOptions {
  twapDuration: number;
  twapIntervals: number;
  volatilityThreshold: number;
  output: string;
}

export function registerCombinedCommands(program: Command, context: CliContext): void {
  const combined = program
    .command('combined')
    .description('Combined TWAP + Volatility strategies');

  combined
    .command('create')
    .description('Create combined TWAP + Volatility strategy')
    .requiredOption('--twap-duration <minutes>', 'TWAP duration in minutes', parsePositiveInteger)
    .requiredOption('--twap-intervals <count>', 'TWAP intervals', parsePositiveInteger)
    .requiredOption('--volatility-threshold <bps>', 'Volatility threshold', parsePositiveInteger)
    .option('-o, --output <path>', 'Output file', 'combined-strategy.json')
    .action(async (options: CreateCombinedOptions) => {
      console.log(chalk.cyan('🚀 Creating combined strategy...'));

      const document = buildCombinedStrategy({
        twapDurationMinutes: options.twapDuration,
        twapIntervals: options.twapIntervals,
        volatilityThreshold: options.volatilityThreshold
      }, context.clock());
      await saveCombinedStrategy(options.output, document);

      console.log(detail(`TWAP duration: ${document.twap_duration_minutes} minutes`));
      console.log(detail(`TWAP intervals: ${document.twap_intervals}`));
      console.log(detail(`Volatility threshold: ${document.volatility_threshold}bps`));
      console.log(`${chalk.green('✅ Combined strategy created:')} ${options.output}`);
    });
}

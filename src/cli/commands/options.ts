/**
 * Options CLI Commands
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { buildOptionConfig, estimatePremium, OptionType, saveOptionConfig } from '../../strategies/options';
import { CliContext } from '../context';
import { detail } from '../lib/output';
import { parseAmount, parsePositiveAmount, parsePositiveInteger } from '../lib/parsers';

const DEFAULT_OPTION_CONFIG_PATH = 'option-config.json';

interface CreateOptionOptions {
  strikePrice: number;
  expirationHours: number;
  premium: number;
  output: string;
}

interface PremiumOptions {
  currentPrice: number;
  strikePrice: number;
  timeToExpiration: number;
  type: OptionType;
}

const OPTION_LABELS: Record<OptionType, string> = {
  [OptionType.CALL]: 'Call',
  [OptionType.PUT]: 'Put'
};

function registerCreateCommand(options: Command, optionType: OptionType, context: CliContext): void {
  const label = OPTION_LABELS[optionType];

  options
    .command(`create-${optionType}`)
    .description(`Create ${optionType} option configuration`)
    .requiredOption('--strike-price <usdc>', 'Strike price in USDC', parsePositiveAmount)
    .requiredOption('--expiration-hours <hours>', 'Expiration in hours', parsePositiveInteger)
    .requiredOption('--premium <usdc>', 'Premium in USDC', parseAmount)
    .option('-o, --output <path>', 'Output file', DEFAULT_OPTION_CONFIG_PATH)
    .action(async (opts: CreateOptionOptions) => {
      console.log(chalk.cyan(`📞 Creating ${optionType} option configuration...`));

      const document = buildOptionConfig({
        optionType,
        strikePrice: opts.strikePrice,
        expirationHours: opts.expirationHours,
        premium: opts.premium
      }, context.clock());
      await saveOptionConfig(opts.output, document);

      console.log(detail(`Strike price: $${document.strike_price}`));
      console.log(detail(`Expiration: ${document.expiration_hours} hours`));
      console.log(detail(`Premium: $${document.premium}`));
      console.log(`${chalk.green(`✅ ${label} option config created:`)} ${opts.output}`);
    });
}

export function registerOptionsCommands(program: Command, context: CliContext): void {
  const options = program
    .command('options')
    .description('Options on limit order execution rights');

  registerCreateCommand(options, OptionType.CALL, context);
  registerCreateCommand(options, OptionType.PUT, context);

  options
    .command('premium')
    .description('Calculate option premium')
    .requiredOption('--current-price <usdc>', 'Current price', parsePositiveAmount)
    .requiredOption('--strike-price <usdc>', 'Strike price', parsePositiveAmount)
    .requiredOption('--time-to-expiration <hours>', 'Time to expiration (hours)', parseAmount)
    .addOption(new Option('--type <type>', 'Option type').choices(Object.values(OptionType)).default(OptionType.CALL))
    .action((opts: PremiumOptions) => {
      console.log(chalk.cyan('💰 Calculating option premium...'));

      const estimate = estimatePremium({
        optionType: opts.type,
        currentPrice: opts.currentPrice,
        strikePrice: opts.strikePrice,
        hoursToExpiration: opts.timeToExpiration
      });

      console.log(detail(`Option type: ${opts.type}`));
      console.log(detail(`Current price: $${opts.currentPrice}`));
      console.log(detail(`Strike price: $${opts.strikePrice}`));
      console.log(detail(`Intrinsic value: $${estimate.intrinsicValue.toFixed(2)}`));
      console.log(detail(`Time value: $${estimate.timeValue.toFixed(2)}`));
      console.log(detail(`Estimated premium: $${estimate.premium.toFixed(2)}`));
    });
}

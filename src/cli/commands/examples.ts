import { Command } from 'commander';
import chalk from 'chalk';
import { COMMAND_NAME, suggestion } from '../lib/output';

const EXAMPLE_SECTIONS: Array<{ title: string; commands: string[] }> = [
  {
    title: '🌊 Volatility Strategy Examples:',
    commands: [
      'volatility create-config --current-volatility 500 --conservative-mode',
      'volatility validate volatility-config.json',
      'volatility calculate --amount 2.5 --config volatility-config.json'
    ]
  },
  {
    title: '🕒 TWAP Strategy Examples:',
    commands: [
      'twap create-config --duration 120 --intervals 12 --randomize',
      'twap simulate --order-size 10.0 --config twap-config.json'
    ]
  },
  {
    title: '📞 Options Strategy Examples:',
    commands: [
      'options create-call --strike-price 2100 --expiration-hours 168 --premium 50',
      'options create-put --strike-price 1900 --expiration-hours 72 --premium 35',
      'options premium --current-price 2000 --strike-price 2100 --time-to-expiration 24'
    ]
  },
  {
    title: '🚀 Combined Strategy Examples:',
    commands: [
      'combined create --twap-duration 180 --twap-intervals 18 --volatility-threshold 600'
    ]
  },
  {
    title: '⚙️  Configuration Examples:',
    commands: [
      'config init --force',
      'config show',
      '--network polygon --verbose volatility create-config'
    ]
  }
];

const TIPS = [
  'Use --verbose flag for detailed output',
  'All configs are saved as JSON files for easy editing',
  `Run '${COMMAND_NAME} interactive' for guided setup`
];

export function showExamples(): void {
  console.log(chalk.cyan.bold('📚 Vector Plus Examples'));
  console.log('');

  for (const section of EXAMPLE_SECTIONS) {
    console.log(chalk.yellow.bold(section.title));
    for (const command of section.commands) {
      console.log(suggestion(`${COMMAND_NAME} ${command}`));
    }
    console.log('');
  }

  console.log(chalk.green.bold('💡 Pro Tips:'));
  for (const tip of TIPS) {
    console.log(`  ${chalk.cyan('•')} ${tip}`);
  }
}

export function registerExamplesCommand(program: Command): void {
  program
    .command('examples')
    .description('Show examples and documentation')
    .action(() => showExamples());
}

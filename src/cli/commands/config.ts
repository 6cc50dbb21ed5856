/**
 * Configuration management commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { fileExists } from '../../common/jsonFile';
import { initProjectConfig, loadProjectConfig, ProjectConfig } from '../../config/ProjectConfig';
import { GlobalOptions } from '../context';
import { COMMAND_NAME, detail, renderTable } from '../lib/output';

type InitOptions = GlobalOptions & {
  force: boolean;
};

function defaultsTable(config: ProjectConfig): string {
  const rows: string[][] = [['Strategy', 'Setting', 'Value']];

  for (const [strategy, settings] of Object.entries(config.defaults)) {
    for (const [setting, value] of Object.entries(settings)) {
      rows.push([strategy, setting, String(value)]);
    }
  }

  return renderTable(rows);
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('init')
    .description('Initialize default configuration')
    .option('--force', 'Force overwrite existing config', false)
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<InitOptions>();

      console.log(chalk.cyan('⚙️  Initializing Vector Plus configuration...'));
      console.log(detail(`Network: ${options.network}`));
      console.log(detail(`Config file: ${options.config}`));

      await initProjectConfig(options.config, options.network, options.force);
      console.log(chalk.green('✅ Configuration initialized'));
    });

  config
    .command('show')
    .description('Show current configuration')
    .action(async (_options: unknown, command: Command) => {
      const options = command.optsWithGlobals<GlobalOptions>();

      console.log(chalk.cyan('📋 Vector Plus Configuration:'));
      console.log(detail(`Network: ${chalk.yellow(options.network)}`));
      console.log(detail(`Config file: ${chalk.yellow(options.config)}`));
      console.log(detail(`Verbose: ${chalk.yellow(String(options.verbose))}`));

      if (!await fileExists(options.config)) {
        console.log(detail(`No configuration file found (run: ${COMMAND_NAME} config init)`));
        return;
      }

      const saved = await loadProjectConfig(options.config);
      console.log(detail(`Saved network: ${chalk.yellow(saved.network)}`));
      console.log(detail(`RPC URL: ${chalk.yellow(saved.rpc_url ?? 'not set')}`));
      console.log('');
      console.log(defaultsTable(saved));
    });
}

import chalk from 'chalk';
import { getBorderCharacters, table } from 'table';

export const COMMAND_NAME = 'vector-plus';

export function printBanner(): void {
  console.log(chalk.blueBright('╔════════════════════════════════════════════════════════╗'));
  console.log(chalk.blueBright('║                    VECTOR PLUS                         ║'));
  console.log(chalk.blueBright('║            Advanced Trading Strategies CLI             ║'));
  console.log(chalk.blueBright('║               for Limit Order Execution                ║'));
  console.log(chalk.blueBright('╚════════════════════════════════════════════════════════╝'));
  console.log('');
}

/**
 * Indented detail line
 */
export function detail(text: string): string {
  return `  • ${text}`;
}

/**
 * Indented command suggestion
 */
export function suggestion(text: string): string {
  return `  ${chalk.blue('•')} ${text}`;
}

export function renderTable(rows: string[][]): string {
  return table(rows, { border: getBorderCharacters('norc') });
}

/**
 * Format seconds from the start of a schedule as +HH:MM:SS
 */
export function formatOffset(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  return `+${[hours, minutes, secs].map(part => String(part).padStart(2, '0')).join(':')}`;
}

/**
 * Render a command line with one argument per line, joined by trailing backslashes
 */
export function renderCommand(parts: string[]): string[] {
  return parts.map((part, index) => {
    const prefix = index === 0 ? '📁 Run: ' : '       ';
    const suffix = index < parts.length - 1 ? ' \\' : '';
    return `${prefix}${part}${suffix}`;
  });
}

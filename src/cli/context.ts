import { currentUnixTime } from '../strategies/volatility/VolatilityConfigBuilder';
import { Network } from '../config/ProjectConfig';
import { Prompter, ReadlinePrompter } from './lib/prompter';

/**
 * Collaborators the commands take from outside: clock, randomness and
 * the interactive prompter
 */
export interface CliContext {
  clock: () => number; // Unix seconds
  random: () => number;
  createPrompter: () => Prompter;
}

/**
 * Program options, given before the subcommand
 */
export type GlobalOptions = {
  network: Network;
  config: string;
  verbose: boolean;
};

export function createDefaultContext(): CliContext {
  return {
    clock: currentUnixTime,
    random: Math.random,
    createPrompter: () => new ReadlinePrompter()
  };
}

/**
 * Project configuration (vector-plus.json)
 *
 * Network selection, deployed contract addresses and the defaults each
 * strategy starts from.
 */
import projectConfigSchema from '../schemas/project-config.schema.json';
import { readJsonFile, writeJsonFile } from '../common/jsonFile';
import { createDocumentValidator } from '../common/schemaValidator';

export const NETWORKS = ['mainnet', 'polygon', 'arbitrum'] as const;
export type Network = typeof NETWORKS[number];

export const DEFAULT_NETWORK: Network = 'mainnet';
export const DEFAULT_CONFIG_PATH = 'vector-plus.json';

export interface ContractAddresses {
  volatility_calculator: string | null;
  twap_executor: string | null;
  options_calculator: string | null;
}

export interface VolatilityDefaults {
  baseline_volatility: number;
  max_execution_size: string;
  min_execution_size: string;
  conservative_mode: boolean;
}

export interface TwapDefaults {
  duration: number; // seconds
  intervals: number;
  randomize_execution: boolean;
  adaptive_intervals: boolean;
}

export interface OptionsDefaults {
  default_expiration_hours: number;
  implied_volatility: number; // bps
  risk_free_rate: number; // bps
}

export interface ProjectConfig {
  network: Network;
  rpc_url: string | null;
  contracts: ContractAddresses;
  defaults: {
    volatility: VolatilityDefaults;
    twap: TwapDefaults;
    options: OptionsDefaults;
  };
}

const validateDocument = createDocumentValidator<ProjectConfig>(projectConfigSchema, 'project config');

export function createDefaultProjectConfig(network: Network = DEFAULT_NETWORK): ProjectConfig {
  return {
    network,
    rpc_url: null,
    contracts: {
      volatility_calculator: null,
      twap_executor: null,
      options_calculator: null
    },
    defaults: {
      volatility: {
        baseline_volatility: 300,
        max_execution_size: '5000000000000000000', // 5 ETH
        min_execution_size: '100000000000000000', // 0.1 ETH
        conservative_mode: false
      },
      twap: {
        duration: 7200, // 2 hours
        intervals: 12,
        randomize_execution: true,
        adaptive_intervals: true
      },
      options: {
        default_expiration_hours: 168, // 1 week
        implied_volatility: 8000, // 80%
        risk_free_rate: 300 // 3%
      }
    }
  };
}

export async function loadProjectConfig(path: string): Promise<ProjectConfig> {
  return validateDocument(await readJsonFile(path));
}

export async function initProjectConfig(path: string, network: Network, force: boolean): Promise<ProjectConfig> {
  const config = createDefaultProjectConfig(network);
  await writeJsonFile(path, config, { overwrite: force });
  return config;
}

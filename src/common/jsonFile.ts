import { promises as fs } from 'fs';
import { StrategyConfigError, StrategyConfigErrorCode } from './errors';
import { createLogger } from './logger';

const logger = createLogger('JsonFile');

export interface WriteJsonOptions {
  /** Refuse to replace an existing file */
  overwrite?: boolean;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON document
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    logger.debug(`Read failed for ${path}`, { error: error instanceof Error ? error.message : String(error) });
    throw new StrategyConfigError(StrategyConfigErrorCode.FILE_NOT_FOUND, `Could not read file: ${path}`, { path });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StrategyConfigError(StrategyConfigErrorCode.MALFORMED_INPUT, `Invalid JSON format: ${reason}`, { path });
  }
}

/**
 * Write a document as pretty-printed JSON
 */
export async function writeJsonFile(path: string, data: unknown, options: WriteJsonOptions = {}): Promise<void> {
  const overwrite = options.overwrite ?? true;

  if (!overwrite && await fileExists(path)) {
    throw new StrategyConfigError(
      StrategyConfigErrorCode.FILE_EXISTS,
      `File already exists: ${path} (use --force to overwrite)`,
      { path }
    );
  }

  await fs.writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  logger.debug(`Wrote ${path}`);
}

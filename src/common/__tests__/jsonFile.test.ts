import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StrategyConfigErrorCode } from '../errors';
import { fileExists, readJsonFile, writeJsonFile } from '../jsonFile';

describe('jsonFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vector-plus-json-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should write pretty-printed JSON with a trailing newline', async () => {
    const path = join(dir, 'doc.json');
    await writeJsonFile(path, { a: 1, b: [true] });

    expect(readFileSync(path, 'utf-8')).toBe('{\n  "a": 1,\n  "b": [\n    true\n  ]\n}\n');
  });

  test('should read back what it wrote', async () => {
    const path = join(dir, 'doc.json');
    await writeJsonFile(path, { name: 'test', size: '100' });

    await expect(readJsonFile(path)).resolves.toEqual({ name: 'test', size: '100' });
  });

  test('should refuse to overwrite when asked not to', async () => {
    const path = join(dir, 'doc.json');
    writeFileSync(path, '{}');

    await expect(writeJsonFile(path, { a: 1 }, { overwrite: false })).rejects.toMatchObject({
      code: StrategyConfigErrorCode.FILE_EXISTS
    });
    expect(readFileSync(path, 'utf-8')).toBe('{}');
  });

  test('should report a missing file', async () => {
    const path = join(dir, 'missing.json');

    await expect(readJsonFile(path)).rejects.toMatchObject({
      code: StrategyConfigErrorCode.FILE_NOT_FOUND,
      message: `Could not read file: ${path}`
    });
    await expect(fileExists(path)).resolves.toBe(false);
  });

  test('should report invalid JSON as malformed input', async () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');

    await expect(readJsonFile(path)).rejects.toMatchObject({
      code: StrategyConfigErrorCode.MALFORMED_INPUT
    });
    await expect(readJsonFile(path)).rejects.toThrow(/^Invalid JSON format: /);
  });
});

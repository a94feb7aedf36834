import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CONFIG_FILE_NAME, configExists, getConfigPath, loadConfig, loadConfigWithValidation } from './loader';

describe('config loader', () => {
  let dir: string;
  let previousPath: string | undefined;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cop-config-'));
    previousPath = process.env.COP_CONFIG_PATH;
    delete process.env.COP_CONFIG_PATH;
  });

  afterEach(() => {
    if (previousPath === undefined) {
      delete process.env.COP_CONFIG_PATH;
    } else {
      process.env.COP_CONFIG_PATH = previousPath;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  it('defaults to the file in the working directory', () => {
    expect(getConfigPath()).toBe(path.join(process.cwd(), CONFIG_FILE_NAME));
  });

  it('prefers COP_CONFIG_PATH', () => {
    const file = write('custom.json', '{"mode":"casual"}');
    process.env.COP_CONFIG_PATH = file;

    expect(getConfigPath()).toBe(file);
    expect(configExists()).toBe(true);
    expect(loadConfig().mode).toBe('casual');
  });

  it('falls back to defaults when the file is missing', () => {
    const missing = path.join(dir, 'missing.json');

    expect(configExists(missing)).toBe(false);
    expect(loadConfig(missing).mode).toBe('professional');
  });

  it('falls back to defaults when the file does not parse', () => {
    const file = write('broken.json', '{ "mode": ');

    expect(loadConfig(file).mode).toBe('professional');
  });

  it('falls back to defaults when a field is out of range', () => {
    const file = write('range.json', '{"mode":"casual","analysis":{"minFuelPercent":-1}}');

    expect(loadConfig(file).mode).toBe('professional');
  });

  it('keeps a parsed config that fails cross-field checks and reports why', () => {
    const file = write('inverted.json', '{"reasoning":{"baseDelayMs":10,"maxDelayMs":5}}');

    const { config, validation } = loadConfigWithValidation(file);

    expect(config.reasoning.baseDelayMs).toBe(10);
    expect(validation).toEqual({
      valid: false,
      errors: ['reasoning.maxDelayMs must be >= reasoning.baseDelayMs'],
    });
  });
});

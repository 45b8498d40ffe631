/**
 * Tests for ConfigLoader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigLoader, CONFIG_FILE_NAME } from '../../../src/config/config-loader.js';
import { DEFAULT_CONFIG, DEFAULT_SESSION_CONFIG } from '../../../src/config/config-schema.js';

describe('ConfigLoader', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), 'session-config-'));
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  function loader(env: NodeJS.ProcessEnv = {}): ConfigLoader {
    return new ConfigLoader({ configPath: configDir, loadEnvFile: false, env });
  }

  async function writeConfig(content: unknown): Promise<void> {
    await writeFile(join(configDir, CONFIG_FILE_NAME), JSON.stringify(content), 'utf-8');
  }

  it('uses the defaults when no config file exists', async () => {
    const config = await loader().load();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.session).not.toBe(DEFAULT_SESSION_CONFIG);
  });

  it('merges config file values over the defaults', async () => {
    await writeConfig({
      version: 1,
      session: { windowLength: 0.5, numTrainingSelections: 4, shamFeedback: true },
      targetFrameRate: 120,
      logging: { level: 'debug' },
    });

    const config = await loader().load();

    expect(config.session).toEqual({
      ...DEFAULT_SESSION_CONFIG,
      windowLength: 0.5,
      numTrainingSelections: 4,
      shamFeedback: true,
    });
    expect(config.targetFrameRate).toBe(120);
    expect(config.logging.level).toBe('debug');
  });

  it('accepts -1 as the default frame rate marker', async () => {
    await writeConfig({ targetFrameRate: -1 });

    const config = await loader().load();

    expect(config.targetFrameRate).toBe(-1);
  });

  it('does not modify the shared defaults', async () => {
    await writeConfig({ session: { groupTag: 'P300' } });

    await loader().load();

    expect(DEFAULT_SESSION_CONFIG.groupTag).toBe('BCI');
  });

  it('rejects invalid values', async () => {
    await writeConfig({ session: { windowLength: -1 } });

    await expect(loader().load()).rejects.toThrow(/^Invalid config file .*session\.json: session\.windowLength: /);
  });

  it('rejects unknown keys', async () => {
    await writeConfig({ sesion: {} });

    await expect(loader().load()).rejects.toThrow(/^Invalid config file /);
  });

  it('rejects malformed JSON', async () => {
    await writeFile(join(configDir, CONFIG_FILE_NAME), '{ "session": ', 'utf-8');

    await expect(loader().load()).rejects.toThrow(/^Failed to parse config file /);
  });

  it('rejects config files from a newer version', async () => {
    await writeConfig({ version: 2 });

    await expect(loader().load()).rejects.toThrow('Config file version (2) is newer than supported (1)');
  });

  it('applies environment overrides last', async () => {
    await writeConfig({ session: { groupTag: 'P300' }, logging: { level: 'warn' } });

    const config = await loader({
      LOG_LEVEL: 'trace',
      BCI_GROUP_TAG: 'SSVEP',
      DATA_PATH: join('var', 'session'),
    }).load();

    expect(config.logging.level).toBe('trace');
    expect(config.session.groupTag).toBe('SSVEP');
    expect(config.paths).toEqual({
      data: join('var', 'session'),
      config: join('var', 'session', 'config'),
      logs: join('var', 'session', 'logs'),
    });
    expect(config.logging.logDir).toBe(join('var', 'session', 'logs'));
  });

  it('reads the config file from DATA_PATH', async () => {
    await mkdir(join(configDir, 'config'));
    await writeFile(
      join(configDir, 'config', CONFIG_FILE_NAME),
      JSON.stringify({ session: { groupTag: 'P300' } }),
      'utf-8'
    );

    const config = await new ConfigLoader({ loadEnvFile: false, env: { DATA_PATH: configDir } }).load();

    expect(config.session.groupTag).toBe('P300');
    expect(config.paths.config).toBe(join(configDir, 'config'));
  });

  it('prefers an explicit config path over DATA_PATH', async () => {
    await writeConfig({ session: { groupTag: 'SSVEP' } });

    const config = await loader({ DATA_PATH: join(configDir, 'missing') }).load();

    expect(config.session.groupTag).toBe('SSVEP');
  });

  it('ignores unknown log levels from the environment', async () => {
    const config = await loader({ LOG_LEVEL: 'verbose' }).load();

    expect(config.logging.level).toBe('info');
  });

  it('keeps the raw config file for inspection', async () => {
    await writeConfig({ version: 1, targetFrameRate: 30 });
    const configLoader = loader();

    await configLoader.load();

    expect(configLoader.getLoadedConfigFile()).toEqual({ version: 1, targetFrameRate: 30 });
  });
});

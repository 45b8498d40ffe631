import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import type { MergedConfig, SessionConfigFile } from './config-schema.js';
import { CONFIG_FILE_VERSION, DEFAULT_CONFIG, sessionConfigFileSchema } from './config-schema.js';

/**
 * Config file name inside the config directory.
 */
export const CONFIG_FILE_NAME = 'session.json';

const LOG_LEVELS: readonly MergedConfig['logging']['level'][] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Config loader options.
 */
export interface ConfigLoaderOptions {
  /** Directory holding session.json (default: $DATA_PATH/config, else data/config) */
  configPath?: string | undefined;
  /** Load a .env file into process.env first (default: true) */
  loadEnvFile?: boolean | undefined;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file ($DATA_PATH/config/session.json, default data/config/session.json)
 * 3. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string | undefined;
  private readonly loadEnvFile: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: SessionConfigFile | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    this.configPath = options.configPath;
    this.loadEnvFile = options.loadEnvFile ?? true;
    this.env = options.env ?? process.env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(): Promise<MergedConfig> {
    if (this.loadEnvFile) {
      loadDotenv();
    }

    this.loadedConfig = await this.loadConfigFile();

    const config = this.deepClone(DEFAULT_CONFIG);

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    return config;
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): SessionConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Load and validate the config file.
   */
  private async loadConfigFile(): Promise<SessionConfigFile | null> {
    const filePath = join(this.resolveConfigDir(), CONFIG_FILE_NAME);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // File doesn't exist - that's OK, use defaults
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load config file: ${message}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse config file ${filePath}: ${message}`);
    }

    const parsed = sessionConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid config file ${filePath}: ${issues}`);
    }

    const config = parsed.data;
    if (config.version !== undefined && config.version > CONFIG_FILE_VERSION) {
      throw new Error(
        `Config file version (${String(config.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return config;
  }

  /**
   * Config directory, read after .env has been loaded.
   */
  private resolveConfigDir(): string {
    if (this.configPath !== undefined) {
      return this.configPath;
    }
    const dataPath = this.env['DATA_PATH'];
    return dataPath ? join(dataPath, 'config') : DEFAULT_CONFIG.paths.config;
  }

  /**
   * Merge config file values into the config object.
   */
  private mergeConfigFile(config: MergedConfig, file: SessionConfigFile): void {
    if (file.session) {
      for (const [key, value] of Object.entries(file.session)) {
        if (value !== undefined) {
          Object.assign(config.session, { [key]: value });
        }
      }
    }

    if (file.targetFrameRate !== undefined) {
      config.targetFrameRate = file.targetFrameRate;
    }

    if (file.logging) {
      if (file.logging.level) {
        config.logging.level = file.logging.level;
      }
      if (file.logging.pretty !== undefined) {
        config.logging.pretty = file.logging.pretty;
      }
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const logLevel = this.env['LOG_LEVEL'];
    const level = LOG_LEVELS.find((l) => l === logLevel);
    if (level) {
      config.logging.level = level;
    }

    const groupTag = this.env['BCI_GROUP_TAG'];
    if (groupTag) {
      config.session.groupTag = groupTag;
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.config = join(dataPath, 'config');
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }
  }

  /**
   * Deep clone an object.
   */
  private deepClone<T>(obj: T): T {
    return structuredClone(obj);
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(options?: ConfigLoaderOptions): ConfigLoader {
  return new ConfigLoader(options);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<MergedConfig> {
  return createConfigLoader(options).load();
}

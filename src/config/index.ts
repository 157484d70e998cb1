import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { type Config, ConfigSchema } from './schema.js';
import { ConfigError, errorMessage } from '../core/errors.js';

// Config file names
const LOCAL_CONFIG_FILENAME = '.commit-push.json';
const GLOBAL_CONFIG_DIR = join(homedir(), '.config', 'commit-push');
const GLOBAL_CONFIG_PATH = join(GLOBAL_CONFIG_DIR, 'config.json');

export interface ConfigLocations {
  cwd?: string;
  globalConfigPath?: string;
}

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string): ConfigObject {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(path, errorMessage(error), error);
  }

  if (!isConfigObject(parsed)) {
    throw new ConfigError(path, 'expected a JSON object');
  }
  return parsed;
}

function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const from = source[key];
    const into = target[key];
    result[key] = isConfigObject(from) && isConfigObject(into) ? deepMerge(into, from) : from;
  }

  return result;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: Config;
  private configPath: string;

  constructor(locations: ConfigLocations = {}) {
    const cwd = locations.cwd ?? process.cwd();
    const globalPath = locations.globalConfigPath ?? GLOBAL_CONFIG_PATH;
    const localPath = join(cwd, LOCAL_CONFIG_FILENAME);

    this.configPath = existsSync(localPath) ? localPath : globalPath;
    this.config = this.loadConfig(globalPath, localPath);
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(globalPath: string, localPath: string): Config {
    // Merge: defaults < global config < local config
    const merged = deepMerge(readConfigFile(globalPath), readConfigFile(localPath));

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(this.configPath, details, result.error);
    }
    return result.data;
  }

  get(): Config {
    return this.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  static getLocalConfigPath(cwd: string = process.cwd()): string {
    return join(cwd, LOCAL_CONFIG_FILENAME);
  }
}

// Export singleton getter
export const getConfig = (): Config => ConfigManager.getInstance().get();

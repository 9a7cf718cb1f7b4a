import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { Config, ConfigSchema } from './schema.js';
import { ConfigFileError } from '../core/errors.js';

// Config file names
const LOCAL_CONFIG_FILENAME = '.jira-rollup.json';
const GLOBAL_CONFIG_DIR = join(homedir(), '.config', 'jira-rollup');
const GLOBAL_CONFIG_PATH = join(GLOBAL_CONFIG_DIR, 'config.json');
const DEFAULT_DATA_DIR = join(homedir(), '.jira-rollup');

// Secrets interface (webhook URLs read from the environment)
export interface Secrets {
  slack?: {
    webhookUrl?: string;
  };
}

export interface ResolvedPaths {
  dataDir: string;
  dailyDir: string;
  weeklyDir: string;
  reportsDir: string;
  auditLog: string;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: Config;
  private secrets: Secrets;
  private configPath: string;

  private constructor() {
    this.secrets = this.loadSecrets();
    this.config = this.loadConfig();
    this.configPath = this.findConfigPath();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private findConfigPath(): string {
    // 1. Check local .jira-rollup.json
    const localConfig = join(process.cwd(), LOCAL_CONFIG_FILENAME);
    if (existsSync(localConfig)) {
      return localConfig;
    }

    // 2. Fall back to the global config path (may not exist)
    return GLOBAL_CONFIG_PATH;
  }

  private loadSecrets(): Secrets {
    const secrets: Secrets = {};

    // The webhook URL is read once, at start
    if (process.env.SLACK_WEBHOOK_URL) {
      secrets.slack = { webhookUrl: process.env.SLACK_WEBHOOK_URL };
    }

    return secrets;
  }

  private readJson(path: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (isPlainObject(parsed)) {
        return parsed;
      }
      throw new Error('expected a JSON object');
    } catch (err) {
      throw new ConfigFileError(path, err);
    }
  }

  private loadConfig(): Config {
    const globalConfig = this.readJson(GLOBAL_CONFIG_PATH);
    const localConfig = this.readJson(join(process.cwd(), LOCAL_CONFIG_FILENAME));

    // Merge: defaults < global config < local config
    const merged = this.deepMerge(globalConfig, localConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigFileError(this.findConfigPath(), result.error);
    }
    return result.data;
  }

  private deepMerge(
    target: Record<string, unknown>,
    source: Record<string, unknown>
  ): Record<string, unknown> {
    const result = { ...target };

    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = this.deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }

    return result;
  }

  get(): Config {
    return this.config;
  }

  getSecrets(): Secrets {
    return this.secrets;
  }

  /**
   * Resolve the data directories, honouring JIRA_ROLLUP_HOME over paths.dataDir
   */
  getPaths(): ResolvedPaths {
    const paths = this.config.paths;
    const dataDir = resolve(process.env.JIRA_ROLLUP_HOME || paths.dataDir || DEFAULT_DATA_DIR);

    return {
      dataDir,
      dailyDir: resolve(dataDir, paths.dailyDir ?? 'daily'),
      weeklyDir: resolve(dataDir, paths.weeklyDir ?? 'weekly'),
      reportsDir: resolve(dataDir, paths.reportsDir ?? 'quarterly'),
      auditLog: resolve(dataDir, paths.auditLog ?? join('logs', 'pr-to-issue.log')),
    };
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Export singleton getters
export const getConfig = () => ConfigManager.getInstance().get();
export const getSecrets = () => ConfigManager.getInstance().getSecrets();
export const getPaths = () => ConfigManager.getInstance().getPaths();
export const getConfigPath = () => ConfigManager.getInstance().getConfigPath();

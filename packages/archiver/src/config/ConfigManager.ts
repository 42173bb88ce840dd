import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { watch, FSWatcher } from 'chokidar';
import { AppConfig, AppConfigSchema, formatError, validateConfig } from '@streamvault/shared';
import { ModifiedFlag } from '../utils/ModifiedFlag';

// upper-case names only; lower-case ${name} belongs to output templates
const ENV_REFERENCE = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Replaces `${VAR}` and `${VAR:-default}` references in every string of a
 * parsed YAML document.
 */
export function expandEnvironmentVariables(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (_match, name: string, defaultValue: string | undefined) => {
      const envValue = env[name];
      return envValue || defaultValue || '';
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvironmentVariables(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, expandEnvironmentVariables(item, env)])
    );
  }
  return value;
}

export function parseConfig(content: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: unknown = parse(content) ?? {};
  return validateConfig(AppConfigSchema, expandEnvironmentVariables(raw, env));
}

export class ConfigManager {
  private config: AppConfig;
  private configFilePath: string;
  private watcher?: FSWatcher;
  private changeCallbacks: Set<(config: AppConfig) => void> = new Set();
  private modifiedFlags: Set<ModifiedFlag> = new Set();

  constructor(configPath: string, configFile: string = process.env.CONFIG_FILE || 'config.yaml') {
    this.configFilePath = join(configPath, configFile);
    console.log(`📋 Loading configuration from: ${this.configFilePath}`);
    this.config = this.loadConfig();
  }

  get filePath(): string {
    return this.configFilePath;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabasePath(): string {
    return join(this.config.dataDir, 'streamvault.db');
  }

  /**
   * A flag that is set every time the configuration is reloaded.
   */
  getModifiedFlag(): ModifiedFlag {
    const flag = new ModifiedFlag();
    this.modifiedFlags.add(flag);
    return flag;
  }

  onConfigChange(callback: (config: AppConfig) => void): void {
    this.changeCallbacks.add(callback);
  }

  offConfigChange(callback: (config: AppConfig) => void): void {
    this.changeCallbacks.delete(callback);
  }

  /**
   * Re-reads the file. The current configuration is kept when the new one
   * does not load.
   */
  reload(): boolean {
    try {
      this.config = this.loadConfig();
    } catch (error) {
      console.error('Failed to reload configuration:', formatError(error));
      return false;
    }
    this.notifyConfigChange();
    console.log('Configuration reloaded');
    return true;
  }

  startWatching(): void {
    if (this.watcher) {
      return;
    }
    this.watcher = watch(this.configFilePath, { ignoreInitial: true })
      .on('add', () => this.reload())
      .on('change', () => this.reload());

    console.log('Configuration file watching started');
  }

  async stopWatching(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
    }
    console.log('Configuration file watching stopped');
  }

  private loadConfig(): AppConfig {
    if (!existsSync(this.configFilePath)) {
      console.warn(`Configuration file not found: ${this.configFilePath}, using defaults`);
      return validateConfig(AppConfigSchema, {});
    }

    try {
      return parseConfig(readFileSync(this.configFilePath, 'utf8'));
    } catch (error) {
      throw new Error(`Failed to load configuration: ${formatError(error)}`);
    }
  }

  private notifyConfigChange(): void {
    this.changeCallbacks.forEach((callback) => {
      try {
        callback(this.config);
      } catch (error) {
        console.error('Error in config change callback:', formatError(error));
      }
    });
    this.modifiedFlags.forEach((flag) => flag.set());
  }
}

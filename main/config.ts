import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { LOG_LEVELS } from './logger';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const configSchema = z.object({
  versionsDir: z.string().min(1),
  storage: z.enum(['file', 'memory']),
  maxCompareLength: z.number().int().positive(),
  logLevel: logLevelSchema,
  logDir: z.string().min(1).nullable(),
});

const fileSchema = z.record(z.unknown());

export type EngineConfig = z.infer<typeof configSchema>;

export const defaultConfig: EngineConfig = {
  versionsDir: './cache/versions',
  storage: 'file',
  maxCompareLength: 10_000,
  logLevel: 'info',
  logDir: null,
};

export interface ConfigManagerOptions {
  /** JSON file merged over the defaults. Falls back to `REVDIFF_CONFIG`. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string | undefined;
  private config: EngineConfig;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = options.configPath ?? this.env.REVDIFF_CONFIG;
    this.config = this.load();
  }

  private load(): EngineConfig {
    if (this.configPath && existsSync(this.configPath)) {
      try {
        const data = readFileSync(this.configPath, 'utf-8');
        const parsed = fileSchema.parse(JSON.parse(data));

        // Merge with defaults to ensure all properties exist
        return configSchema.parse({ ...defaultConfig, ...parsed });
      } catch (error) {
        console.error('Failed to load config:', error);
        console.info('Using default configuration');
      }
    }

    return { ...defaultConfig };
  }

  get<K extends keyof EngineConfig>(key: K): EngineConfig[K] {
    return this.config[key];
  }

  set<K extends keyof EngineConfig>(key: K, value: EngineConfig[K]): void {
    this.config = configSchema.parse({ ...this.config, [key]: value });
  }

  getAll(): EngineConfig {
    return { ...this.config };
  }

  reset(): void {
    this.config = { ...defaultConfig };
  }

  // Environment-specific overrides
  applyEnvironmentOverrides(): void {
    if (this.env.NODE_ENV === 'development') {
      this.config.logLevel = 'debug';
    }

    if (this.env.REVDIFF_VERSIONS_DIR) {
      this.config.versionsDir = this.env.REVDIFF_VERSIONS_DIR;
    }

    const storage = this.env.REVDIFF_STORAGE;
    if (storage === 'file' || storage === 'memory') {
      this.config.storage = storage;
    }

    const maxLength = Number(this.env.REVDIFF_MAX_COMPARE_LENGTH);
    if (Number.isInteger(maxLength) && maxLength > 0) {
      this.config.maxCompareLength = maxLength;
    }

    const level = LOG_LEVELS.find((candidate) => candidate === this.env.REVDIFF_LOG_LEVEL);
    if (level) {
      this.config.logLevel = level;
    }

    if (this.env.REVDIFF_LOG_DIR) {
      this.config.logDir = this.env.REVDIFF_LOG_DIR;
    }
  }
}

export function loadConfig(options: ConfigManagerOptions = {}): EngineConfig {
  const manager = new ConfigManager(options);
  manager.applyEnvironmentOverrides();
  return manager.getAll();
}

import * as fs from 'fs';
import * as path from 'path';
import { AppConfig, ConfigLoaderOptions } from './ConfigInterface';
import { ConfigValidator } from './ConfigValidator';
import { ConfigurationError } from '../errors/AppError';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 环境变量 -> 配置路径
 */
const ENV_MAPPINGS: Record<string, string> = {
  APP_ENVIRONMENT: 'app.environment',
  APP_LOG_LEVEL: 'app.logLevel',
  LOG_FORMAT: 'logging.format',
  LOG_FILE_PATH: 'logging.filePath',
  FFMPEG_PATH: 'ffmpeg.path',
  FFPROBE_PATH: 'ffmpeg.probePath',
  FFMPEG_TIMEOUT: 'ffmpeg.timeout',
  THUMBNAIL_TEMP_PATH: 'storage.tempPath',
  THUMBNAIL_CONCURRENCY: 'thumbnails.concurrency',
};

/**
 * 配置加载器
 */
export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: AppConfig | null = null;
  private configPath: string;

  private constructor(options: ConfigLoaderOptions = {}) {
    this.configPath = options.configPath || this.findConfigPath();
  }

  static getInstance(options?: ConfigLoaderOptions): ConfigLoader {
    if (!this.instance) {
      this.instance = new ConfigLoader(options);
    }
    return this.instance;
  }

  /**
   * 向上查找包含config目录的项目根目录，找不到时返回当前目录
   */
  private getProjectRoot(): string {
    let currentDir = process.cwd();

    while (currentDir && currentDir !== path.dirname(currentDir)) {
      if (fs.existsSync(path.join(currentDir, 'config'))) {
        return currentDir;
      }
      currentDir = path.dirname(currentDir);
    }

    return process.cwd();
  }

  /**
   * 查找配置文件路径
   * 优先级: config/production.json（NODE_ENV=production） > config/default.json
   */
  private findConfigPath(): string {
    const env = process.env.NODE_ENV || 'development';
    const configDir = path.join(this.getProjectRoot(), 'config');

    if (env === 'production') {
      const productionPath = path.join(configDir, 'production.json');
      if (fs.existsSync(productionPath)) {
        return productionPath;
      }
    }

    return path.join(configDir, 'default.json');
  }

  private readJsonFile(filePath: string): unknown {
    try {
      return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read JSON file ${filePath}`,
        { filePath },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * 加载配置：文件 -> 环境变量覆盖 -> 验证
   */
  async load(options: ConfigLoaderOptions = {}): Promise<AppConfig> {
    const configPath = options.configPath || this.configPath;
    const validate = options.validate !== false;

    let config: RawConfig = {};

    if (fs.existsSync(configPath)) {
      const parsed = this.readJsonFile(configPath);
      if (!isRecord(parsed)) {
        throw new ConfigurationError(`Configuration file must contain a JSON object: ${configPath}`);
      }
      config = parsed;
    } else {
      console.warn(`Configuration file not found at ${configPath}, using defaults`);
    }

    config = this.applyEnvironmentVariables(config);

    const validationResult = ConfigValidator.validate(config);
    if (!validationResult.valid) {
      if (validate) {
        throw new ConfigurationError('Configuration validation failed', {
          configPath,
          errors: validationResult.errors
        });
      }
      console.warn('Configuration validation failed, using defaults', validationResult.errors);
      this.config = ConfigValidator.getDefaultConfig();
    } else {
      this.config = validationResult.config;
    }

    return this.config;
  }

  private applyEnvironmentVariables(config: RawConfig): RawConfig {
    const envConfig = this.cloneRecord(config);

    for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
      const value = process.env[envVar];
      if (value) {
        this.setNestedValue(envConfig, configPath, value);
      }
    }

    return envConfig;
  }

  private cloneRecord(source: RawConfig): RawConfig {
    const result: RawConfig = {};
    for (const [key, value] of Object.entries(source)) {
      result[key] = isRecord(value) ? this.cloneRecord(value) : value;
    }
    return result;
  }

  private setNestedValue(obj: RawConfig, dottedPath: string, value: string): void {
    const keys = dottedPath.split('.');
    let current = obj;

    for (let i = 0; i < keys.length - 1; i++) {
      const next = current[keys[i]];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: RawConfig = {};
        current[keys[i]] = created;
        current = created;
      }
    }

    current[keys[keys.length - 1]] = value;
  }

  getConfig(): AppConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.config;
  }

  async reload(): Promise<AppConfig> {
    this.config = null;
    return this.load();
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

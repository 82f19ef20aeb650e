import { AppConfig, ConfigLoaderOptions, FFmpegConfig, StorageConfig, ThumbnailConfig } from './ConfigInterface';
import { ConfigLoader } from './ConfigLoader';
import { ConfigurationError } from '../errors/AppError';

/**
 * 配置提供者
 * 提供全局配置访问
 */
export class ConfigProvider {
  private static config: AppConfig | null = null;
  private static loader: ConfigLoader | undefined;

  static async initialize(options?: ConfigLoaderOptions): Promise<AppConfig> {
    if (!this.loader) {
      this.loader = ConfigLoader.getInstance(options);
    }

    if (!this.config) {
      this.config = await this.loader.load(options);
    }

    return this.config;
  }

  static isInitialized(): boolean {
    return this.config !== null;
  }

  static getConfig(): AppConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not initialized. Call initialize() first.');
    }
    return this.config;
  }

  static async reload(): Promise<AppConfig> {
    if (!this.loader) {
      this.loader = ConfigLoader.getInstance();
    }

    this.config = await this.loader.reload();
    return this.config;
  }

  static getFFmpegConfig(): FFmpegConfig {
    return this.getConfig().ffmpeg;
  }

  static getThumbnailConfig(): ThumbnailConfig {
    return this.getConfig().thumbnails;
  }

  static getStorageConfig(): StorageConfig {
    return this.getConfig().storage;
  }

  /**
   * 缩略图临时目录，未配置时为空字符串
   */
  static getTempPath(): string {
    return this.getStorageConfig().tempPath;
  }

  static getLogLevel(): string {
    return this.getConfig().app.logLevel;
  }

  static isProduction(): boolean {
    return this.getConfig().app.environment === 'production';
  }
}

/**
 * 应用配置接口定义
 */

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'verbose';
export type Environment = 'development' | 'staging' | 'production' | 'test';

// 应用基础配置
export interface AppSection {
  name: string;
  version: string;
  environment: Environment;
  logLevel: LogLevelName;
}

// 日志配置
export interface LoggingConfig {
  format: 'text' | 'json';
  /** 设置后额外写入轮转日志文件 */
  filePath?: string;
  maxFileSize: number;
  maxFiles: number;
}

// FFmpeg配置
export interface FFmpegConfig {
  path: string;
  probePath: string;
  /** 单次命令超时（毫秒），0表示不限制 */
  timeout: number;
}

// 缩略图配置
export interface ThumbnailConfig {
  trimQuality: number;
  coverQuality: number;
  /** 同时运行的抽帧进程数 */
  concurrency: number;
}

// 存储配置
export interface StorageConfig {
  /** 为空时使用系统临时目录 */
  tempPath: string;
}

export interface AppConfig {
  app: AppSection;
  logging: LoggingConfig;
  ffmpeg: FFmpegConfig;
  thumbnails: ThumbnailConfig;
  storage: StorageConfig;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  type: 'required' | 'type' | 'range' | 'enum';
}

// 配置验证结果
export type ValidationResult =
  | { valid: true; errors: []; config: AppConfig }
  | { valid: false; errors: ConfigValidationIssue[]; config: null };

// 配置加载选项
export interface ConfigLoaderOptions {
  configPath?: string;
  validate?: boolean;
}

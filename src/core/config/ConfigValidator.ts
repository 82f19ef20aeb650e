import { AppConfig, ConfigValidationIssue, ValidationResult } from './ConfigInterface';

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

/**
 * 读取单个配置段，类型不符时记录错误并回退默认值
 */
class SectionReader {
  constructor(
    private readonly raw: RawSection,
    private readonly prefix: string,
    private readonly errors: ConfigValidationIssue[]
  ) {}

  private fail(key: string, message: string, type: ConfigValidationIssue['type']): void {
    this.errors.push({ path: `${this.prefix}.${key}`, message, type });
  }

  string(key: string, fallback: string): string {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') {
      this.fail(key, `${this.prefix}.${key} must be a string`, 'type');
      return fallback;
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    const value = this.raw[key];
    if (value === undefined || value === null || value === '') return undefined;
    if (typeof value !== 'string') {
      this.fail(key, `${this.prefix}.${key} must be a string`, 'type');
      return undefined;
    }
    return value;
  }

  /**
   * 数值字段，环境变量覆盖后是字符串，这里一并接受
   */
  number(key: string, fallback: number, rule: NumberRule = {}): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;

    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
      this.fail(key, `${this.prefix}.${key} must be a number`, 'type');
      return fallback;
    }
    if (rule.integer && !Number.isInteger(parsed)) {
      this.fail(key, `${this.prefix}.${key} must be an integer`, 'type');
      return fallback;
    }
    if ((rule.min !== undefined && parsed < rule.min) || (rule.max !== undefined && parsed > rule.max)) {
      this.fail(key, `${this.prefix}.${key} must be between ${rule.min ?? '-∞'} and ${rule.max ?? '∞'}`, 'range');
      return fallback;
    }
    return parsed;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    const match = allowed.find(item => item === value);
    if (match === undefined) {
      this.fail(key, `${this.prefix}.${key} must be one of: ${allowed.join(', ')}`, 'enum');
      return fallback;
    }
    return match;
  }
}

/**
 * 配置验证器
 */
export class ConfigValidator {
  /**
   * 验证配置，缺失的配置段和字段使用默认值
   */
  static validate(config: unknown): ValidationResult {
    const errors: ConfigValidationIssue[] = [];
    const defaults = this.getDefaultConfig();

    if (!isRecord(config)) {
      return {
        valid: false,
        errors: [{ path: '', message: 'Configuration must be an object', type: 'type' }],
        config: null
      };
    }

    const root: RawSection = config;
    const section = (name: keyof AppConfig): SectionReader => {
      const raw = root[name];
      if (raw !== undefined && !isRecord(raw)) {
        errors.push({ path: name, message: `${name} must be an object`, type: 'type' });
      }
      return new SectionReader(isRecord(raw) ? raw : {}, name, errors);
    };

    const app = section('app');
    const logging = section('logging');
    const ffmpeg = section('ffmpeg');
    const thumbnails = section('thumbnails');
    const storage = section('storage');

    const result: AppConfig = {
      app: {
        name: app.string('name', defaults.app.name),
        version: app.string('version', defaults.app.version),
        environment: app.oneOf('environment', ['development', 'staging', 'production', 'test'] as const, defaults.app.environment),
        logLevel: app.oneOf('logLevel', ['error', 'warn', 'info', 'debug', 'verbose'] as const, defaults.app.logLevel)
      },
      logging: {
        format: logging.oneOf('format', ['text', 'json'] as const, defaults.logging.format),
        filePath: logging.optionalString('filePath'),
        maxFileSize: logging.number('maxFileSize', defaults.logging.maxFileSize, { min: 1024, integer: true }),
        maxFiles: logging.number('maxFiles', defaults.logging.maxFiles, { min: 1, integer: true })
      },
      ffmpeg: {
        path: ffmpeg.string('path', defaults.ffmpeg.path),
        probePath: ffmpeg.string('probePath', defaults.ffmpeg.probePath),
        timeout: ffmpeg.number('timeout', defaults.ffmpeg.timeout, { min: 0, integer: true })
      },
      thumbnails: {
        trimQuality: thumbnails.number('trimQuality', defaults.thumbnails.trimQuality, { min: 0, max: 100, integer: true }),
        coverQuality: thumbnails.number('coverQuality', defaults.thumbnails.coverQuality, { min: 0, max: 100, integer: true }),
        concurrency: thumbnails.number('concurrency', defaults.thumbnails.concurrency, { min: 1, max: 16, integer: true })
      },
      storage: {
        tempPath: storage.string('tempPath', defaults.storage.tempPath)
      }
    };

    if (errors.length > 0) {
      return { valid: false, errors, config: null };
    }

    return { valid: true, errors: [], config: result };
  }

  /**
   * 获取默认配置
   */
  static getDefaultConfig(): AppConfig {
    return {
      app: {
        name: 'video-thumbnails',
        version: '0.1.0',
        environment: 'development',
        logLevel: 'info'
      },
      logging: {
        format: 'text',
        maxFileSize: 10 * 1024 * 1024,
        maxFiles: 5
      },
      ffmpeg: {
        path: 'ffmpeg',
        probePath: 'ffprobe',
        timeout: 60000
      },
      thumbnails: {
        trimQuality: 10,
        coverQuality: 10,
        concurrency: 1
      },
      storage: {
        tempPath: ''
      }
    };
  }
}

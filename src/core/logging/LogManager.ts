import { Logger } from './Logger';
import { ILogger, LogContext } from './LoggerInterface';

/**
 * 未初始化时使用的控制台日志器
 */
function createConsoleLogger(source: string): ILogger {
  const prefix = (level: string) => `[${level}] ${source}:`;
  return {
    info: (message: string, context?: LogContext) => console.log(prefix('INFO'), message, context ?? ''),
    error: (message: string, context?: LogContext, error?: Error) => console.error(prefix('ERROR'), message, context ?? '', error ?? ''),
    warn: (message: string, context?: LogContext) => console.warn(prefix('WARN'), message, context ?? ''),
    debug: (message: string, context?: LogContext) => console.debug(prefix('DEBUG'), message, context ?? ''),
    verbose: (message: string, context?: LogContext) => console.debug(prefix('VERBOSE'), message, context ?? ''),
    child: () => createConsoleLogger(source),
    flush: async () => {},
    close: async () => {}
  };
}

/**
 * 日志管理器
 * 提供全局日志器访问
 */
export class LogManager {
  private static defaultLogger: ILogger | null = null;
  private static loggers: Map<string, ILogger> = new Map();

  /**
   * 初始化默认日志器（会先初始化配置）
   */
  static async initialize(): Promise<void> {
    if (!this.defaultLogger) {
      const { ConfigProvider } = await import('../config/ConfigProvider');
      await ConfigProvider.initialize();

      this.defaultLogger = Logger.createDefault();
      this.loggers.set('default', this.defaultLogger);

      this.defaultLogger.debug('LogManager initialized');
    }
  }

  static isInitialized(): boolean {
    return this.defaultLogger !== null;
  }

  /**
   * 获取指定源的日志器
   */
  static getLoggerFor(source: string): ILogger {
    if (!this.defaultLogger) {
      return createConsoleLogger(source);
    }

    const existing = this.loggers.get(source);
    if (existing) {
      return existing;
    }

    const logger = this.defaultLogger.child({ source });
    this.loggers.set(source, logger);
    return logger;
  }

  static async flushAll(): Promise<void> {
    await Promise.all(Array.from(this.loggers.values()).map(logger => logger.flush()));
  }

  /**
   * 关闭所有日志器，之后getLogger回退到控制台
   */
  static async closeAll(): Promise<void> {
    const defaultLogger = this.defaultLogger;
    this.loggers.clear();
    this.defaultLogger = null;
    if (defaultLogger) {
      await defaultLogger.close();
    }
  }
}

export async function initializeLogging(): Promise<void> {
  await LogManager.initialize();
}

export function getLogger(source?: string): ILogger {
  return LogManager.getLoggerFor(source || 'default');
}

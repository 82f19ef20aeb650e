import { LogLevel, LogEntry, LoggerConfig, ILogger, LogContext, LogTransport, parseLogLevel } from './LoggerInterface';
import { DefaultLogFormatter, ColorConsoleFormatter, JsonLogFormatter } from './LogFormatter';
import { ConsoleTransport, RotatingFileTransport } from './LogTransport';
import { ConfigProvider } from '../config/ConfigProvider';

/**
 * 日志级别数值映射
 */
const LogLevelValue: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
  [LogLevel.VERBOSE]: 4
};

/**
 * 主日志器实现
 */
export class Logger implements ILogger {
  private config: Required<Omit<LoggerConfig, 'context'>>;
  private context: LogContext;
  private source?: string;

  constructor(config: LoggerConfig, source?: string) {
    this.config = {
      level: config.level,
      transports: config.transports || [],
      format: config.format || new DefaultLogFormatter(),
      enableSourceTracking: config.enableSourceTracking !== false
    };
    this.context = { ...config.context };
    this.source = source;
  }

  /**
   * 根据当前配置创建默认日志器
   */
  static createDefault(source?: string): Logger {
    const config = ConfigProvider.getConfig();
    const logging = config.logging;

    const formatter = logging.format === 'json' ? new JsonLogFormatter() : new ColorConsoleFormatter();
    const transports: LogTransport[] = [new ConsoleTransport(formatter)];

    if (logging.filePath) {
      transports.push(new RotatingFileTransport(
        logging.filePath,
        logging.maxFileSize,
        logging.maxFiles,
        logging.format === 'json' ? new JsonLogFormatter() : new DefaultLogFormatter()
      ));
    }

    return new Logger({
      level: parseLogLevel(config.app.logLevel),
      transports,
      enableSourceTracking: config.app.environment !== 'production'
    }, source);
  }

  private shouldLog(level: LogLevel): boolean {
    return LogLevelValue[level] <= LogLevelValue[this.config.level];
  }

  /**
   * 获取调用源（文件名:行号）
   */
  private getCallerSource(): string | undefined {
    if (!this.config.enableSourceTracking) {
      return this.source;
    }

    const stack = new Error().stack?.split('\n') || [];

    // 跳过Logger自身的栈帧
    for (let i = 3; i < stack.length; i++) {
      const line = stack[i].trim();
      if (!line.includes('Logger.') && !line.includes('node_modules')) {
        const match = line.match(/at\s+.+\s+\((.+):(\d+):(\d+)\)/);
        if (match) {
          const shortFileName = match[1].split(/[\\/]/).pop() || match[1];
          return `${shortFileName}:${match[2]}`;
        }
      }
    }

    return this.source;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context: { ...this.context, ...context },
      error,
      source: this.getCallerSource()
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        // 传输器失败不影响调用方
        console.error(`Log transport failed: ${transportError}`);
      }
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  verbose(message: string, context?: LogContext): void {
    this.log(LogLevel.VERBOSE, message, context);
  }

  /**
   * 创建子日志器，继承传输器并合并上下文
   */
  child(context: LogContext): ILogger {
    return new Logger({
      ...this.config,
      context: { ...this.context, ...context }
    }, this.source);
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(transport => transport.flush?.()));
  }

  async close(): Promise<void> {
    await Promise.all(this.config.transports.map(transport => transport.close?.()));
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

import { AppError, ExternalProcessError, TimeoutError, ValidationError } from './AppError';
import { getLogger } from '../logging/LogManager';
import { ILogger } from '../logging/LoggerInterface';

/**
 * 错误处理选项
 */
export interface ErrorHandlerOptions {
  logError?: boolean;
  rethrow?: boolean;
  /** 附加到日志的上下文 */
  context?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 错误处理器
 */
export class ErrorHandler {
  private static defaultOptions: ErrorHandlerOptions = {
    logError: true,
    rethrow: false
  };

  /**
   * 处理错误：规范化、记录，按需重新抛出
   */
  static handle(error: unknown, options: ErrorHandlerOptions = {}): AppError {
    const mergedOptions = { ...this.defaultOptions, ...options };
    const appError = this.normalizeError(error);

    if (mergedOptions.logError) {
      this.logError(appError, getLogger('ErrorHandler'), mergedOptions.context);
    }

    if (mergedOptions.rethrow) {
      throw appError;
    }

    return appError;
  }

  /**
   * 规范化错误为AppError
   */
  static normalizeError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (error instanceof Error) {
      return new AppError(
        error.message,
        'INTERNAL_ERROR',
        false,
        { originalError: error.name },
        error
      );
    }

    if (typeof error === 'string') {
      return new AppError(error, 'INTERNAL_ERROR', false);
    }

    if (isRecord(error)) {
      const message = error.message ?? error.error ?? 'Unknown error';
      const code = error.code ?? 'INTERNAL_ERROR';

      return new AppError(String(message), String(code), false, error);
    }

    return new AppError('Unknown error occurred', 'UNKNOWN_ERROR', false);
  }

  /**
   * 参数错误记为warn，其余（外部进程、文件系统、内部错误）记为error
   */
  private static logError(error: AppError, logger: ILogger, context?: Record<string, unknown>): void {
    const logContext = {
      ...context,
      code: error.code,
      isOperational: error.isOperational,
      details: error.details
    };

    if (error instanceof ValidationError) {
      logger.warn(`Invalid argument: ${error.message}`, logContext);
    } else if (error instanceof ExternalProcessError || error instanceof TimeoutError) {
      logger.error(`External process error: ${error.message}`, logContext, error);
    } else {
      logger.error(`Operation failed: ${error.message}`, logContext, error);
    }
  }
}

export type ErrorDetails = Record<string, unknown>;

/**
 * 应用错误基类
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: ErrorDetails;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: ErrorDetails,
    cause?: Error
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // 合并原因错误的堆栈
    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isOperational: this.isOperational,
      details: this.details,
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack
      } : undefined
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * 参数校验错误
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails, cause?: Error) {
    super(message, 'VALIDATION_ERROR', true, details, cause);
  }
}

/**
 * 配置错误
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: ErrorDetails, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', true, details, cause);
  }
}

/**
 * 超时错误
 */
export class TimeoutError extends AppError {
  constructor(message: string = 'Operation timeout', details?: ErrorDetails, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', true, details, cause);
  }
}

/**
 * 文件系统错误
 */
export class FileSystemError extends AppError {
  constructor(message: string, details?: ErrorDetails, cause?: Error) {
    super(message, 'FILE_SYSTEM_ERROR', true, details, cause);
  }
}

/**
 * 外部进程（ffmpeg/ffprobe）执行错误
 */
export class ExternalProcessError extends AppError {
  public readonly exitCode: number | null;
  public readonly output: string;

  constructor(message: string, exitCode: number | null, output: string = '', cause?: Error) {
    super(message, 'EXTERNAL_PROCESS_ERROR', true, { exitCode, output }, cause);
    this.exitCode = exitCode;
    this.output = output;
  }
}

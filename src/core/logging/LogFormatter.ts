import { LogEntry, LogFormatter as ILogFormatter, LogLevel } from './LoggerInterface';
import { AppError, ExternalProcessError } from '../errors/AppError';

/** cause链最多展开的层数 */
const MAX_CAUSE_DEPTH = 5;

export interface ErrorSummary {
  name: string;
  message: string;
  code?: string;
  exitCode?: number | null;
  output?: string;
  causes: Array<{ name: string; message: string }>;
  stack?: string;
}

function collectCauses(error: Error): Array<{ name: string; message: string }> {
  const causes: Array<{ name: string; message: string }> = [];
  let cause: unknown = error.cause;
  while (cause instanceof Error && causes.length < MAX_CAUSE_DEPTH) {
    causes.push({ name: cause.name, message: cause.message });
    cause = cause.cause;
  }
  return causes;
}

/**
 * 提取错误中与抽帧诊断相关的字段：错误码、ffmpeg退出码与输出、cause链
 */
export function summarizeError(error: Error): ErrorSummary {
  return {
    name: error.name,
    message: error.message,
    code: error instanceof AppError ? error.code : undefined,
    exitCode: error instanceof ExternalProcessError ? error.exitCode : undefined,
    output: error instanceof ExternalProcessError && error.output ? error.output : undefined,
    causes: collectCauses(error),
    stack: error.stack
  };
}

function headerOf(entry: LogEntry): string {
  const parts = [entry.timestamp.toISOString(), entry.level.toUpperCase().padEnd(7)];
  if (entry.source) {
    parts.push(`[${entry.source}]`);
  }
  parts.push(entry.message);

  let header = parts.join(' ');
  if (entry.context && Object.keys(entry.context).length > 0) {
    header += ` ${JSON.stringify(entry.context)}`;
  }
  return header;
}

function errorLines(error: Error): string[] {
  const summary = summarizeError(error);
  const lines = [`Error: ${summary.code ? `[${summary.code}] ` : ''}${summary.message}`];

  if (summary.exitCode !== undefined) {
    lines.push(`Exit code: ${summary.exitCode === null ? 'none' : summary.exitCode}`);
  }
  if (summary.output) {
    lines.push(`Output: ${summary.output.trim()}`);
  }
  for (const cause of summary.causes) {
    lines.push(`Caused by: ${cause.name}: ${cause.message}`);
  }
  if (summary.stack) {
    lines.push(`Stack: ${summary.stack}`);
  }

  return lines;
}

/**
 * 文本格式：时间 级别 [来源] 消息 {上下文}，错误信息逐行附在后面
 */
export class DefaultLogFormatter implements ILogFormatter {
  format(entry: LogEntry): string {
    const lines = [headerOf(entry)];
    if (entry.error) {
      lines.push(...errorLines(entry.error));
    }
    return lines.join('\n');
  }
}

/**
 * 每条日志一行JSON
 */
export class JsonLogFormatter implements ILogFormatter {
  format(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      source: entry.source,
      message: entry.message,
      context: entry.context,
      error: entry.error ? summarizeError(entry.error) : undefined
    });
  }
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.ERROR]: '\x1b[31m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.VERBOSE]: '\x1b[90m'
};

const RESET_COLOR = '\x1b[0m';

/**
 * 控制台彩色输出，按级别给整行着色
 */
export class ColorConsoleFormatter implements ILogFormatter {
  private plain = new DefaultLogFormatter();

  format(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    return this.plain
      .format(entry)
      .split('\n')
      .map(line => `${color}${line}${RESET_COLOR}`)
      .join('\n');
  }
}

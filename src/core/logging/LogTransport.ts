import * as fs from 'fs';
import * as path from 'path';
import { LogEntry, LogTransport as ILogTransport, LogFormatter } from './LoggerInterface';
import { DefaultLogFormatter } from './LogFormatter';

/**
 * 控制台传输器
 */
export class ConsoleTransport implements ILogTransport {
  private formatter: LogFormatter;

  constructor(formatter?: LogFormatter) {
    this.formatter = formatter || new DefaultLogFormatter();
  }

  write(entry: LogEntry): void {
    const formatted = this.formatter.format(entry);

    switch (entry.level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'debug':
      case 'verbose':
        console.debug(formatted);
        break;
      default:
        console.log(formatted);
    }
  }
}

/**
 * 轮转文件传输器
 * 单个文件超过maxSize后切换到 app.1.log、app.2.log ...，最多保留maxFiles个
 */
export class RotatingFileTransport implements ILogTransport {
  private basePath: string;
  private maxSize: number;
  private maxFiles: number;
  private currentSize = 0;
  private currentFileIndex = 0;
  private currentStream: fs.WriteStream | null = null;
  private formatter: LogFormatter;

  constructor(basePath: string, maxSize: number = 10 * 1024 * 1024, maxFiles: number = 5, formatter?: LogFormatter) {
    this.basePath = basePath;
    this.maxSize = maxSize;
    this.maxFiles = maxFiles;
    this.formatter = formatter || new DefaultLogFormatter();

    const dir = path.dirname(basePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.initializeCurrentFile();
  }

  private get baseName(): string {
    return path.basename(this.basePath, '.log');
  }

  private fileIndexOf(fileName: string): number {
    const match = fileName.match(new RegExp(`^${this.baseName}\\.(\\d+)\\.log$`));
    return match ? parseInt(match[1], 10) : 0;
  }

  private listLogFiles(): string[] {
    const dir = path.dirname(this.basePath);
    if (!fs.existsSync(dir)) {
      return [];
    }
    return fs.readdirSync(dir)
      .filter(file => file.startsWith(this.baseName) && file.endsWith('.log'));
  }

  private initializeCurrentFile(): void {
    const files = this.listLogFiles().sort((a, b) => this.fileIndexOf(a) - this.fileIndexOf(b));

    if (files.length > 0) {
      this.currentFileIndex = this.fileIndexOf(files[files.length - 1]);
    }

    this.openCurrentFile();

    if (this.currentSize >= this.maxSize) {
      this.currentFileIndex++;
      this.openCurrentFile();
    }
  }

  private openCurrentFile(): void {
    const filePath = this.getCurrentFilePath();

    if (this.currentStream) {
      this.currentStream.end();
    }

    this.currentStream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });

    try {
      this.currentSize = fs.statSync(filePath).size;
    } catch {
      this.currentSize = 0;
    }
  }

  private getCurrentFilePath(): string {
    if (this.currentFileIndex === 0) {
      return this.basePath;
    }
    return path.join(path.dirname(this.basePath), `${this.baseName}.${this.currentFileIndex}.log`);
  }

  private rotateIfNeeded(): void {
    if (this.currentSize >= this.maxSize) {
      this.currentFileIndex++;
      this.currentSize = 0;
      this.openCurrentFile();
      this.cleanupOldFiles();
    }
  }

  private cleanupOldFiles(): void {
    const dir = path.dirname(this.basePath);
    // 降序排序，保留最新的maxFiles个
    const files = this.listLogFiles().sort((a, b) => this.fileIndexOf(b) - this.fileIndexOf(a));

    for (let i = this.maxFiles; i < files.length; i++) {
      const filePath = path.join(dir, files[i]);
      try {
        fs.unlinkSync(filePath);
      } catch (error) {
        console.warn(`Failed to delete old log file: ${filePath}`, error);
      }
    }
  }

  write(entry: LogEntry): void {
    const line = this.formatter.format(entry) + '\n';

    this.rotateIfNeeded();

    if (this.currentStream) {
      this.currentStream.write(line, 'utf8');
      this.currentSize += Buffer.byteLength(line, 'utf8');
    }
  }

  async flush(): Promise<void> {
    const stream = this.currentStream;
    if (stream) {
      return new Promise((resolve) => {
        stream.write('', () => resolve());
      });
    }
  }

  async close(): Promise<void> {
    const stream = this.currentStream;
    if (stream) {
      return new Promise((resolve, reject) => {
        stream.end((error?: Error | null) => {
          if (error) {
            reject(error);
          } else {
            this.currentStream = null;
            resolve();
          }
        });
      });
    }
  }
}

/**
 * 基于ffmpeg的单帧提取
 * 每次调用在临时目录写出一张jpg，读取后立即删除
 */
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { getLogger } from '../../core/logging/LogManager';
import { ConfigProvider } from '../../core/config/ConfigProvider';
import { ErrorHandler } from '../../core/errors/ErrorHandler';
import { CommandRunner } from '../process/CommandRunner';
import { ICommandRunner } from '../process/ICommandRunner';
import { IFrameExtractor } from './IFrameExtractor';
import { ExtractionRequest } from './ThumbnailTypes';

const readFile = promisify(fs.readFile);
const unlink = promisify(fs.unlink);

export interface FrameExtractorSettings {
  ffmpegPath: string;
  timeoutMs: number;
}

/** ffmpeg -q:v 的取值上限 */
const MAX_NATIVE_QUALITY = 10;

/**
 * 把0-100的质量提示映射为ffmpeg的 -q:v 值：floor(q / 10) + 1，上限10
 */
export function toNativeQuality(qualityHint: number): number {
  const clamped = Math.min(100, Math.max(0, Number.isFinite(qualityHint) ? qualityHint : 0));
  return Math.min(MAX_NATIVE_QUALITY, Math.floor(clamped / 10) + 1);
}

let lastFileStamp = 0;

/**
 * 生成 thumbnail_<epochMillis>_<timeMs>.jpg，同一进程内epochMillis严格递增
 */
export function buildThumbnailFileName(timeMs: number, now: number = Date.now()): string {
  lastFileStamp = now > lastFileStamp ? now : lastFileStamp + 1;
  return `thumbnail_${lastFileStamp}_${timeMs}.jpg`;
}

/**
 * -ss 放在 -i 之前以使用输入端快速定位
 */
export function buildExtractionArgs(request: ExtractionRequest, outputPath: string): string[] {
  return [
    '-ss', String(request.timeMs / 1000),
    '-i', request.sourcePath,
    '-vframes', '1',
    '-q:v', String(toNativeQuality(request.quality)),
    '-an',
    '-y',
    outputPath
  ];
}

export class FFmpegFrameExtractor implements IFrameExtractor {
  private logger = getLogger('FFmpegFrameExtractor');
  private runner: ICommandRunner;
  private settings: FrameExtractorSettings;

  constructor(runner: ICommandRunner = new CommandRunner(), settings?: Partial<FrameExtractorSettings>) {
    this.runner = runner;
    this.settings = { ...this.loadSettings(), ...settings };
  }

  private loadSettings(): FrameExtractorSettings {
    const defaults: FrameExtractorSettings = {
      ffmpegPath: 'ffmpeg',
      timeoutMs: 60000
    };

    if (!ConfigProvider.isInitialized()) {
      return defaults;
    }

    const ffmpeg = ConfigProvider.getFFmpegConfig();
    return {
      ffmpegPath: ffmpeg.path || defaults.ffmpegPath,
      timeoutMs: ffmpeg.timeout
    };
  }

  getSettings(): FrameExtractorSettings {
    return { ...this.settings };
  }

  async extract(request: ExtractionRequest, scratchDir: string, signal?: AbortSignal): Promise<Buffer | null> {
    const outputPath = path.join(scratchDir, buildThumbnailFileName(request.timeMs));
    const args = buildExtractionArgs(request, outputPath);

    this.logger.debug('Executing ffmpeg thumbnail command', {
      command: `${this.settings.ffmpegPath} ${args.join(' ')}`
    });

    try {
      await this.runner.run(this.settings.ffmpegPath, args, {
        timeoutMs: this.settings.timeoutMs,
        signal
      });
    } catch (error) {
      const appError = ErrorHandler.normalizeError(error);
      if (signal?.aborted) {
        this.logger.debug(`ffmpeg thumbnail generation cancelled for time ${request.timeMs} ms`, {
          sourcePath: request.sourcePath
        });
      } else {
        this.logger.error(`ffmpeg thumbnail generation failed for time ${request.timeMs} ms`, {
          sourcePath: request.sourcePath,
          code: appError.code,
          details: appError.details
        }, appError);
      }
      // 失败时也可能留下不完整的输出
      await this.removeFile(outputPath);
      return null;
    }

    try {
      if (!fs.existsSync(outputPath)) {
        this.logger.warn('ffmpeg reported success but output file is missing', { outputPath, timeMs: request.timeMs });
        return null;
      }

      const bytes = await readFile(outputPath);
      this.logger.debug('Thumbnail extracted', { timeMs: request.timeMs, size: bytes.length });
      return bytes;
    } catch (error) {
      this.logger.error('Failed to read thumbnail output', {
        outputPath,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    } finally {
      await this.removeFile(outputPath);
    }
  }

  /**
   * 尽力删除临时文件，失败只记录日志
   */
  private async removeFile(filePath: string): Promise<void> {
    if (!fs.existsSync(filePath)) {
      return;
    }

    try {
      await unlink(filePath);
      this.logger.verbose('Temporary thumbnail removed', { filePath });
    } catch (error) {
      this.logger.warn('Failed to delete temporary thumbnail file', {
        filePath,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}

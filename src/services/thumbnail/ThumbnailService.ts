/**
 * 缩略图批量生成服务
 * 按时间点逐个抽帧，每次尝试后输出当前累计结果；单个时间点失败不会中断批次
 */
import { getLogger } from '../../core/logging/LogManager';
import { ConfigProvider } from '../../core/config/ConfigProvider';
import { ErrorHandler } from '../../core/errors/ErrorHandler';
import { ValidationError } from '../../core/errors/AppError';
import { IFrameExtractor } from './IFrameExtractor';
import { FFmpegFrameExtractor } from './FFmpegFrameExtractor';
import { resolveScratchDirectory } from './ScratchDirectory';
import { coverTimestampsFor, trimThumbnailTimestamps } from './ThumbnailScheduler';
import {
  BatchThumbnailOptions,
  CoverData,
  SingleCoverOptions,
  VideoEditorSource
} from './ThumbnailTypes';

export interface ThumbnailServiceSettings {
  concurrency: number;
  /** 为空时使用配置或系统临时目录 */
  tempPath?: string;
}

interface ExtractionOutcome {
  timeMs: number;
  data: Buffer | null;
}

export class ThumbnailService {
  private logger = getLogger('ThumbnailService');
  private extractor: IFrameExtractor;
  private settings: ThumbnailServiceSettings;

  constructor(extractor: IFrameExtractor = new FFmpegFrameExtractor(), settings?: Partial<ThumbnailServiceSettings>) {
    this.extractor = extractor;
    this.settings = { ...this.loadSettings(), ...settings };
  }

  private loadSettings(): ThumbnailServiceSettings {
    if (!ConfigProvider.isInitialized()) {
      return { concurrency: 1 };
    }
    return { concurrency: ConfigProvider.getThumbnailConfig().concurrency };
  }

  /**
   * 生成裁剪条缩略图
   * 参数错误时立即抛出ValidationError；之后每个时间点输出一次累计结果
   */
  generateTrimThumbnails(
    source: VideoEditorSource,
    options: BatchThumbnailOptions
  ): AsyncGenerator<Buffer[], void, undefined> {
    const timestamps = trimThumbnailTimestamps(source.videoDurationMs, options.quantity);
    const concurrency = this.resolveConcurrency(options.concurrency);
    return this.collectTrimThumbnails(source, timestamps, concurrency, options.signal);
  }

  /**
   * 生成封面候选缩略图，裁剪时只在裁剪区间内取点
   */
  generateCoverThumbnails(
    source: VideoEditorSource,
    options: BatchThumbnailOptions
  ): AsyncGenerator<CoverData[], void, undefined> {
    const timestamps = coverTimestampsFor(source, options.quantity);
    const concurrency = this.resolveConcurrency(options.concurrency);
    return this.collectCoverThumbnails(source, timestamps, concurrency, options.signal);
  }

  /**
   * 生成指定时间点的单张封面，失败时thumbData为null
   */
  async generateSingleCoverThumbnail(filePath: string, options: SingleCoverOptions = {}): Promise<CoverData> {
    const { timeMs = 0, quality = 10, signal } = options;

    const scratchDir = await this.prepareScratchDirectory(filePath);
    const thumbData = scratchDir === null
      ? null
      : await this.attempt(filePath, timeMs, quality, scratchDir, signal);

    if (!thumbData) {
      this.logger.warn(`generateSingleCoverThumbnail failed for time ${timeMs}`, { filePath });
    }

    return { thumbData, timeMs };
  }

  private async *collectTrimThumbnails(
    source: VideoEditorSource,
    timestamps: number[],
    concurrency: number,
    signal?: AbortSignal
  ): AsyncGenerator<Buffer[], void, undefined> {
    const thumbnails: Buffer[] = [];

    for await (const { timeMs, data } of this.extractInOrder(source.filePath, timestamps, source.trimThumbnailsQuality, concurrency, signal)) {
      if (data) {
        thumbnails.push(data);
      } else {
        this.logger.debug(`Trim thumbnail generation returned null for time ${timeMs}`);
      }
      yield [...thumbnails];
    }

    this.logger.info(`generateTrimThumbnails completed. Generated ${thumbnails.length} thumbnails.`, {
      requested: timestamps.length
    });
  }

  private async *collectCoverThumbnails(
    source: VideoEditorSource,
    timestamps: number[],
    concurrency: number,
    signal?: AbortSignal
  ): AsyncGenerator<CoverData[], void, undefined> {
    const covers: CoverData[] = [];

    for await (const { timeMs, data } of this.extractInOrder(source.filePath, timestamps, source.coverThumbnailsQuality, concurrency, signal)) {
      if (data) {
        covers.push({ thumbData: data, timeMs });
      } else {
        this.logger.debug(`Cover thumbnail generation returned null for time ${timeMs}`);
      }
      yield [...covers];
    }

    this.logger.info(`generateCoverThumbnails completed. Generated ${covers.length} covers.`, {
      requested: timestamps.length
    });
  }

  /**
   * 按时间点顺序输出抽帧结果
   * 最多concurrency个抽帧同时进行；调用方停止迭代或signal中止时，终止仍在运行的进程
   */
  private async *extractInOrder(
    sourcePath: string,
    timestamps: number[],
    quality: number,
    concurrency: number,
    signal?: AbortSignal
  ): AsyncGenerator<ExtractionOutcome, void, undefined> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const scratchDir = await this.prepareScratchDirectory(sourcePath);
    const pending: Array<Promise<Buffer | null>> = [];
    let nextIndex = 0;

    const launch = () => {
      const timeMs = timestamps[nextIndex++];
      pending.push(scratchDir === null
        ? Promise.resolve(null)
        : this.attempt(sourcePath, timeMs, quality, scratchDir, controller.signal));
    };

    try {
      while (nextIndex < timestamps.length && pending.length < concurrency) {
        launch();
      }

      for (let index = 0; index < timestamps.length; index++) {
        const current = pending.shift();
        if (!current || controller.signal.aborted) {
          break;
        }

        const data = await current;
        if (controller.signal.aborted) {
          break;
        }

        yield { timeMs: timestamps[index], data };

        // 调用方持有快照期间可能已中止
        if (controller.signal.aborted) {
          break;
        }
        if (nextIndex < timestamps.length) {
          launch();
        }
      }

      if (controller.signal.aborted) {
        this.logger.info('Thumbnail extraction cancelled', { sourcePath, requested: timestamps.length });
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      controller.abort();
    }
  }

  private async attempt(
    sourcePath: string,
    timeMs: number,
    quality: number,
    scratchDir: string,
    signal?: AbortSignal
  ): Promise<Buffer | null> {
    try {
      return await this.extractor.extract({ sourcePath, timeMs, quality }, scratchDir, signal);
    } catch (error) {
      ErrorHandler.handle(error, { context: { sourcePath, timeMs } });
      return null;
    }
  }

  /**
   * 临时目录不可用时返回null，本批次每个时间点都按失败处理
   */
  private async prepareScratchDirectory(sourcePath: string): Promise<string | null> {
    try {
      const dir = await resolveScratchDirectory(this.settings.tempPath);
      this.logger.debug(`Temporary directory for thumbnails: ${dir}`);
      return dir;
    } catch (error) {
      ErrorHandler.handle(error, { context: { sourcePath } });
      return null;
    }
  }

  private resolveConcurrency(requested?: number): number {
    const concurrency = requested ?? this.settings.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError('concurrency must be a positive integer', { concurrency });
    }
    return concurrency;
  }
}

import * as fs from 'fs';
import { ConfigProvider } from '../../core/config/ConfigProvider';
import { ValidationError } from '../../core/errors/AppError';
import { VideoEditorSource } from '../thumbnail/ThumbnailTypes';
import { IMediaProbe } from './IMediaProbe';
import { MediaProbe } from './MediaProbe';

export interface VideoEditorOptions {
  trimThumbnailsQuality?: number;
  coverThumbnailsQuality?: number;
}

export interface VideoEditorFileOptions extends VideoEditorOptions {
  probe?: IMediaProbe;
}

function assertQuality(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new ValidationError(`${name} must be an integer between 0 and 100`, { [name]: value });
  }
}

/**
 * 视频编辑器状态：源文件、时长、裁剪区间与缩略图质量
 */
export class VideoEditorController implements VideoEditorSource {
  readonly filePath: string;
  readonly videoDurationMs: number;
  readonly trimThumbnailsQuality: number;
  readonly coverThumbnailsQuality: number;

  private startMs = 0;
  private endMs: number;

  constructor(filePath: string, videoDurationMs: number, options: VideoEditorOptions = {}) {
    if (!filePath) {
      throw new ValidationError('filePath is required');
    }
    if (!Number.isFinite(videoDurationMs) || videoDurationMs <= 0) {
      throw new ValidationError('videoDurationMs must be a positive number', { videoDurationMs });
    }

    const defaults = ConfigProvider.isInitialized()
      ? ConfigProvider.getThumbnailConfig()
      : { trimQuality: 10, coverQuality: 10 };

    this.filePath = filePath;
    this.videoDurationMs = videoDurationMs;
    this.trimThumbnailsQuality = options.trimThumbnailsQuality ?? defaults.trimQuality;
    this.coverThumbnailsQuality = options.coverThumbnailsQuality ?? defaults.coverQuality;
    this.endMs = videoDurationMs;

    assertQuality('trimThumbnailsQuality', this.trimThumbnailsQuality);
    assertQuality('coverThumbnailsQuality', this.coverThumbnailsQuality);
  }

  /**
   * 通过ffprobe读取时长创建
   */
  static async fromFile(filePath: string, options: VideoEditorFileOptions = {}): Promise<VideoEditorController> {
    const { probe = new MediaProbe(), ...editorOptions } = options;

    if (!fs.existsSync(filePath)) {
      throw new ValidationError(`Video file does not exist: ${filePath}`, { filePath });
    }

    const durationMs = await probe.getDurationMs(filePath);
    if (durationMs === null || durationMs <= 0) {
      throw new ValidationError(`Unable to determine video duration: ${filePath}`, { filePath, durationMs });
    }

    return new VideoEditorController(filePath, durationMs, editorOptions);
  }

  get startTrimMs(): number {
    return this.startMs;
  }

  get endTrimMs(): number {
    return this.endMs;
  }

  get isTrimmed(): boolean {
    return this.startMs !== 0 || this.endMs !== this.videoDurationMs;
  }

  get trimmedDurationMs(): number {
    return this.endMs - this.startMs;
  }

  /**
   * 设置裁剪区间，要求 0 <= start < end <= duration
   */
  updateTrim(startMs: number, endMs: number): void {
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || startMs < 0 || endMs > this.videoDurationMs || startMs >= endMs) {
      throw new ValidationError('Trim range must satisfy 0 <= start < end <= duration', {
        startMs,
        endMs,
        videoDurationMs: this.videoDurationMs
      });
    }
    this.startMs = startMs;
    this.endMs = endMs;
  }

  resetTrim(): void {
    this.startMs = 0;
    this.endMs = this.videoDurationMs;
  }
}

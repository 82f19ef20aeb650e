import { ThumbnailService } from './ThumbnailService';
import { BatchThumbnailOptions, CoverData, SingleCoverOptions, VideoEditorSource } from './ThumbnailTypes';

let defaultService: ThumbnailService | null = null;

/**
 * 默认服务在首次使用时创建，此时读取已初始化的配置
 */
export function getThumbnailService(): ThumbnailService {
  if (!defaultService) {
    defaultService = new ThumbnailService();
  }
  return defaultService;
}

/**
 * 丢弃默认服务，下次使用时按最新配置重建
 */
export function resetThumbnailService(): void {
  defaultService = null;
}

export function generateTrimThumbnails(
  source: VideoEditorSource,
  options: BatchThumbnailOptions
): AsyncGenerator<Buffer[], void, undefined> {
  return getThumbnailService().generateTrimThumbnails(source, options);
}

export function generateCoverThumbnails(
  source: VideoEditorSource,
  options: BatchThumbnailOptions
): AsyncGenerator<CoverData[], void, undefined> {
  return getThumbnailService().generateCoverThumbnails(source, options);
}

export function generateSingleCoverThumbnail(filePath: string, options?: SingleCoverOptions): Promise<CoverData> {
  return getThumbnailService().generateSingleCoverThumbnail(filePath, options);
}

export { ThumbnailService } from './ThumbnailService';
export { FFmpegFrameExtractor, toNativeQuality, buildExtractionArgs, buildThumbnailFileName } from './FFmpegFrameExtractor';
export { trimThumbnailTimestamps, coverThumbnailTimestamps, coverTimestampsFor } from './ThumbnailScheduler';
export { resolveScratchDirectory } from './ScratchDirectory';
export type { IFrameExtractor } from './IFrameExtractor';
export type {
  BatchThumbnailOptions,
  CoverData,
  ExtractionRequest,
  SingleCoverOptions,
  VideoEditorSource
} from './ThumbnailTypes';

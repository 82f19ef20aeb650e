/**
 * 单次抽帧请求
 */
export interface ExtractionRequest {
  readonly sourcePath: string;
  /** 目标时间点（毫秒） */
  readonly timeMs: number;
  /** 质量提示 0-100 */
  readonly quality: number;
}

/**
 * 封面数据：图片与其时间点
 */
export interface CoverData {
  thumbData: Buffer | null;
  timeMs: number;
}

/**
 * 缩略图生成所需的编辑器状态
 */
export interface VideoEditorSource {
  readonly filePath: string;
  readonly videoDurationMs: number;
  readonly isTrimmed: boolean;
  readonly startTrimMs: number;
  readonly trimmedDurationMs: number;
  readonly trimThumbnailsQuality: number;
  readonly coverThumbnailsQuality: number;
}

export interface BatchThumbnailOptions {
  quantity: number;
  /** 预先启动的抽帧数，结果仍按顺序输出 */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface SingleCoverOptions {
  timeMs?: number;
  quality?: number;
  signal?: AbortSignal;
}

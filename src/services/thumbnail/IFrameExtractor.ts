import { ExtractionRequest } from './ThumbnailTypes';

/**
 * 单帧提取接口
 */
export interface IFrameExtractor {
  /**
   * 提取一帧压缩图片
   * @param request 源文件、时间点与质量
   * @param scratchDir 临时输出目录，调用结束前产生的文件会被删除
   * @returns 图片字节，失败返回null（不会抛出）
   */
  extract(request: ExtractionRequest, scratchDir: string, signal?: AbortSignal): Promise<Buffer | null>;
}

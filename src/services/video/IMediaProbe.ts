/**
 * 媒体信息探测接口
 */
export interface IMediaProbe {
  /**
   * 获取视频时长
   * @param videoPath 视频文件路径
   * @returns 时长（毫秒），失败返回null
   */
  getDurationMs(videoPath: string): Promise<number | null>;
}

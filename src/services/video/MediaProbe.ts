import * as path from 'path';
import { getLogger } from '../../core/logging/LogManager';
import { ConfigProvider } from '../../core/config/ConfigProvider';
import { ErrorHandler } from '../../core/errors/ErrorHandler';
import { CommandRunner } from '../process/CommandRunner';
import { ICommandRunner } from '../process/ICommandRunner';
import { IMediaProbe } from './IMediaProbe';

/** ffprobe只读容器头，给一个较短的超时 */
const PROBE_TIMEOUT_MS = 30000;

/**
 * 使用ffprobe读取视频时长
 */
export class MediaProbe implements IMediaProbe {
  private logger = getLogger('MediaProbe');
  private runner: ICommandRunner;
  private probePath: string;

  constructor(runner: ICommandRunner = new CommandRunner(), probePath?: string) {
    this.runner = runner;
    this.probePath = probePath
      || (ConfigProvider.isInitialized() ? ConfigProvider.getFFmpegConfig().probePath : '')
      || 'ffprobe';
  }

  async getDurationMs(videoPath: string): Promise<number | null> {
    try {
      const { stdout } = await this.runner.run(this.probePath, [
        '-v', 'error',
        '-show_entries', 'format=duration',
        '-of', 'default=noprint_wrappers=1:nokey=1',
        videoPath
      ], { timeoutMs: PROBE_TIMEOUT_MS });

      const seconds = parseFloat(stdout.trim());
      if (!Number.isFinite(seconds) || seconds < 0) {
        this.logger.error(`Unable to parse video duration: ${path.basename(videoPath)}`, { output: stdout.trim() });
        return null;
      }

      const durationMs = Math.round(seconds * 1000);
      this.logger.debug(`Video duration: ${seconds.toFixed(2)}s`, { videoPath, durationMs });
      return durationMs;
    } catch (error) {
      ErrorHandler.handle(error, { context: { videoPath } });
      return null;
    }
  }
}

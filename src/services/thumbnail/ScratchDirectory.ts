import * as fs from 'fs';
import * as os from 'os';
import { promisify } from 'util';
import { ConfigProvider } from '../../core/config/ConfigProvider';
import { FileSystemError } from '../../core/errors/AppError';

const mkdir = promisify(fs.mkdir);

/**
 * 解析本批次使用的临时目录
 * 优先使用传入路径，其次是配置storage.tempPath，最后是系统临时目录；目录不存在时创建
 */
export async function resolveScratchDirectory(preferred?: string): Promise<string> {
  const configured = ConfigProvider.isInitialized() ? ConfigProvider.getTempPath() : '';
  const dir = preferred || configured || os.tmpdir();

  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new FileSystemError(
      `Unable to prepare temporary directory: ${dir}`,
      { dir },
      error instanceof Error ? error : undefined
    );
  }

  return dir;
}

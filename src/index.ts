/**
 * 视频缩略图提取库入口
 */
export * from './services/thumbnail';
export { VideoEditorController } from './services/video/VideoEditorController';
export type { VideoEditorOptions, VideoEditorFileOptions } from './services/video/VideoEditorController';
export { MediaProbe } from './services/video/MediaProbe';
export type { IMediaProbe } from './services/video/IMediaProbe';
export { CommandRunner } from './services/process/CommandRunner';
export type { ICommandRunner, CommandOptions, CommandResult } from './services/process/ICommandRunner';
export { ConfigProvider } from './core/config/ConfigProvider';
export type { AppConfig } from './core/config/ConfigInterface';
export { LogManager, initializeLogging, getLogger } from './core/logging/LogManager';
export {
  AppError,
  ValidationError,
  ConfigurationError,
  TimeoutError,
  FileSystemError,
  ExternalProcessError
} from './core/errors/AppError';

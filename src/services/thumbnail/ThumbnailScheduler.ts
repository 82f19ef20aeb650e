import { ValidationError } from '../../core/errors/AppError';
import { VideoEditorSource } from './ThumbnailTypes';

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('quantity must be a positive integer', { quantity });
  }
}

function assertDuration(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative number`, { [name]: value });
  }
}

/**
 * 裁剪条缩略图时间点：round(duration / N * i)，i = 1..N
 * 不包含0，最后一个点落在duration上
 */
export function trimThumbnailTimestamps(durationMs: number, quantity: number): number[] {
  assertDuration('durationMs', durationMs);
  assertQuantity(quantity);

  const eachPart = durationMs / quantity;
  const timestamps: number[] = [];
  for (let i = 1; i <= quantity; i++) {
    timestamps.push(Math.round(eachPart * i));
  }
  return timestamps;
}

/**
 * 封面候选时间点：round(duration / N * i) + offset，i = 0..N-1
 */
export function coverThumbnailTimestamps(durationMs: number, quantity: number, offsetMs: number = 0): number[] {
  assertDuration('durationMs', durationMs);
  assertDuration('offsetMs', offsetMs);
  assertQuantity(quantity);

  const eachPart = durationMs / quantity;
  const timestamps: number[] = [];
  for (let i = 0; i < quantity; i++) {
    timestamps.push(Math.round(eachPart * i) + offsetMs);
  }
  return timestamps;
}

/**
 * 按编辑器状态计算封面时间点，裁剪时只在裁剪区间内取点
 */
export function coverTimestampsFor(source: VideoEditorSource, quantity: number): number[] {
  return source.isTrimmed
    ? coverThumbnailTimestamps(source.trimmedDurationMs, quantity, source.startTrimMs)
    : coverThumbnailTimestamps(source.videoDurationMs, quantity);
}

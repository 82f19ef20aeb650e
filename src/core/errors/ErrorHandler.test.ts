import { getLogger } from '../logging/LogManager';
import { AppError, ExternalProcessError, ValidationError } from './AppError';
import { ErrorHandler } from './ErrorHandler';

jest.mock('../logging/LogManager');

describe('ErrorHandler', () => {
  let mockLogger: {
    error: jest.Mock;
    warn: jest.Mock;
    info: jest.Mock;
    debug: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockLogger = {
      error: jest.fn(),
      warn: jest.fn(),
      info: jest.fn(),
      debug: jest.fn()
    };
    (getLogger as jest.Mock).mockReturnValue(mockLogger);
  });

  describe('normalizeError', () => {
    it('returns an AppError unchanged', () => {
      const error = new ValidationError('quantity must be a positive integer');

      expect(ErrorHandler.normalizeError(error)).toBe(error);
    });

    it('wraps a plain Error as a non-operational internal error', () => {
      const original = new TypeError('cannot read size');

      const normalized = ErrorHandler.normalizeError(original);

      expect(normalized.message).toBe('cannot read size');
      expect(normalized.code).toBe('INTERNAL_ERROR');
      expect(normalized.isOperational).toBe(false);
      expect(normalized.details).toEqual({ originalError: 'TypeError' });
      expect(normalized.cause).toBe(original);
    });

    it('accepts strings and error-like records', () => {
      expect(ErrorHandler.normalizeError('disk full').message).toBe('disk full');

      const fromRecord = ErrorHandler.normalizeError({ message: 'bad input', code: 'E_BAD' });
      expect(fromRecord.message).toBe('bad input');
      expect(fromRecord.code).toBe('E_BAD');
      expect(fromRecord.details).toEqual({ message: 'bad input', code: 'E_BAD' });
    });

    it('falls back to an unknown error', () => {
      expect(ErrorHandler.normalizeError(42).code).toBe('UNKNOWN_ERROR');
    });
  });

  describe('handle', () => {
    it('logs process failures with context and details', () => {
      const error = new ExternalProcessError('ffmpeg exited with code 1', 1, 'moov atom not found');

      const result = ErrorHandler.handle(error, { context: { timeMs: 5000 } });

      expect(result).toBe(error);
      expect(mockLogger.error).toHaveBeenCalledWith('External process error: ffmpeg exited with code 1', {
        timeMs: 5000,
        code: 'EXTERNAL_PROCESS_ERROR',
        isOperational: true,
        details: { exitCode: 1, output: 'moov atom not found' }
      }, error);
    });

    it('logs invalid arguments as warnings', () => {
      ErrorHandler.handle(new ValidationError('bad quantity'));

      expect(mockLogger.warn).toHaveBeenCalledWith('Invalid argument: bad quantity', expect.objectContaining({
        code: 'VALIDATION_ERROR',
        isOperational: true
      }));
      expect(mockLogger.error).not.toHaveBeenCalled();
    });

    it('logs other failures with the original cause', () => {
      const original = new Error('EACCES');

      ErrorHandler.handle(original, { context: { dir: '/tmp/thumbs' } });

      expect(mockLogger.error).toHaveBeenCalledWith('Operation failed: EACCES', {
        dir: '/tmp/thumbs',
        code: 'INTERNAL_ERROR',
        isOperational: false,
        details: { originalError: 'Error' }
      }, expect.objectContaining({ code: 'INTERNAL_ERROR', cause: original }));
    });

    it('rethrows the normalized error when asked', () => {
      const error = new AppError('fatal');

      expect(() => ErrorHandler.handle(error, { rethrow: true })).toThrow(error);
    });

    it('skips logging when disabled', () => {
      ErrorHandler.handle(new Error('quiet'), { logError: false });

      expect(mockLogger.error).not.toHaveBeenCalled();
      expect(getLogger).not.toHaveBeenCalled();
    });
  });
});

import { ConfigProvider } from './ConfigProvider';
import { ConfigLoader } from './ConfigLoader';
import { ConfigValidator } from './ConfigValidator';
import { AppConfig } from './ConfigInterface';

// 模拟加载器
jest.mock('./ConfigLoader');

describe('ConfigProvider', () => {
  const mockConfig: AppConfig = {
    ...ConfigValidator.getDefaultConfig(),
    ffmpeg: { path: '/opt/ffmpeg/bin/ffmpeg', probePath: '/opt/ffmpeg/bin/ffprobe', timeout: 30000 },
    thumbnails: { trimQuality: 20, coverQuality: 80, concurrency: 2 },
    storage: { tempPath: '/tmp/thumbs' }
  };

  const mockLoader = {
    load: jest.fn().mockResolvedValue(mockConfig),
    reload: jest.fn()
  };

  beforeAll(() => {
    (ConfigLoader.getInstance as jest.Mock).mockReturnValue(mockLoader);
  });

  // ConfigProvider为静态状态，以下用例按顺序执行
  it('throws before initialization', () => {
    expect(ConfigProvider.isInitialized()).toBe(false);
    expect(() => ConfigProvider.getConfig()).toThrow('Configuration not initialized');
  });

  it('loads the configuration once', async () => {
    const options = { configPath: '/etc/thumbnails/config.json' };

    const config = await ConfigProvider.initialize(options);
    await ConfigProvider.initialize(options);

    expect(config).toEqual(mockConfig);
    expect(ConfigProvider.isInitialized()).toBe(true);
    expect(ConfigLoader.getInstance).toHaveBeenCalledWith(options);
    expect(mockLoader.load).toHaveBeenCalledTimes(1);
  });

  it('exposes configuration sections', () => {
    expect(ConfigProvider.getFFmpegConfig()).toEqual(mockConfig.ffmpeg);
    expect(ConfigProvider.getThumbnailConfig()).toEqual({ trimQuality: 20, coverQuality: 80, concurrency: 2 });
    expect(ConfigProvider.getStorageConfig()).toEqual({ tempPath: '/tmp/thumbs' });
    expect(ConfigProvider.getTempPath()).toBe('/tmp/thumbs');
    expect(ConfigProvider.getLogLevel()).toBe('info');
    expect(ConfigProvider.isProduction()).toBe(false);
  });

  it('replaces the configuration on reload', async () => {
    const reloaded: AppConfig = { ...mockConfig, app: { ...mockConfig.app, environment: 'production' } };
    mockLoader.reload.mockResolvedValue(reloaded);

    await expect(ConfigProvider.reload()).resolves.toEqual(reloaded);
    expect(ConfigProvider.isProduction()).toBe(true);
  });
});

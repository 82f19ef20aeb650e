import { getLogger } from '../../core/logging/LogManager';
import { ExternalProcessError } from '../../core/errors/AppError';
import { CommandOptions, CommandResult, ICommandRunner } from '../process/ICommandRunner';
import { MediaProbe } from './MediaProbe';

jest.mock('../../core/logging/LogManager');

class StubRunner implements ICommandRunner {
  calls: Array<{ command: string; args: string[]; options?: CommandOptions }> = [];

  constructor(private result: () => Promise<CommandResult>) {}

  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    return this.result();
  }
}

describe('MediaProbe', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    (getLogger as jest.Mock).mockReturnValue({
      error: jest.fn(),
      warn: jest.fn(),
      info: jest.fn(),
      debug: jest.fn(),
      verbose: jest.fn()
    });
  });

  it('converts ffprobe seconds into milliseconds', async () => {
    const runner = new StubRunner(async () => ({ stdout: '12.345678\n', stderr: '', exitCode: 0 }));
    const probe = new MediaProbe(runner);

    await expect(probe.getDurationMs('/videos/clip.mp4')).resolves.toBe(12346);
    expect(runner.calls[0].command).toBe('ffprobe');
    expect(runner.calls[0].args).toEqual([
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      '/videos/clip.mp4'
    ]);
  });

  it('uses an explicit ffprobe path', async () => {
    const runner = new StubRunner(async () => ({ stdout: '1\n', stderr: '', exitCode: 0 }));
    const probe = new MediaProbe(runner, '/opt/ffmpeg/bin/ffprobe');

    await probe.getDurationMs('/videos/clip.mp4');

    expect(runner.calls[0].command).toBe('/opt/ffmpeg/bin/ffprobe');
  });

  it('returns null for unparseable output', async () => {
    const probe = new MediaProbe(new StubRunner(async () => ({ stdout: 'N/A\n', stderr: '', exitCode: 0 })));

    await expect(probe.getDurationMs('/videos/clip.mp4')).resolves.toBeNull();
  });

  it('returns null when ffprobe fails', async () => {
    const probe = new MediaProbe(new StubRunner(async () => {
      throw new ExternalProcessError('ffprobe exited with code 1', 1, 'No such file or directory');
    }));

    await expect(probe.getDurationMs('/videos/missing.mp4')).resolves.toBeNull();
  });
});

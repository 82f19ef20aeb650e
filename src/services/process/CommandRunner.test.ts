import { getLogger } from '../../core/logging/LogManager';
import { ExternalProcessError, TimeoutError } from '../../core/errors/AppError';
import { CommandRunner } from './CommandRunner';

jest.mock('../../core/logging/LogManager');

describe('CommandRunner', () => {
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

  it('rejects when the binary cannot be started', async () => {
    const runner = new CommandRunner();

    await expect(runner.run('/nonexistent/bin/ffmpeg-missing', ['-version'])).rejects.toBeInstanceOf(ExternalProcessError);
  });

  it('rejects without spawning when already aborted', async () => {
    const runner = new CommandRunner();
    const controller = new AbortController();
    controller.abort();

    await expect(runner.run('/nonexistent/bin/ffmpeg-missing', [], { signal: controller.signal }))
      .rejects.toThrow('/nonexistent/bin/ffmpeg-missing aborted before start');
  });

  describe('with a node child process', () => {
    const node = process.execPath;
    const runner = () => new CommandRunner();

    it('resolves with the collected output on exit code 0', async () => {
      const result = await runner().run(node, ['-e', 'process.stdout.write("frame ok"); process.stderr.write("warning")']);

      expect(result).toEqual({ stdout: 'frame ok', stderr: 'warning', exitCode: 0 });
    });

    it('rejects a non-zero exit with the exit code and a stderr excerpt', async () => {
      const pending = runner().run(node, ['-e', 'process.stderr.write("x".repeat(600)); process.exit(3)']);

      await expect(pending).rejects.toBeInstanceOf(ExternalProcessError);
      await expect(pending).rejects.toMatchObject({
        message: `${node} exited with code 3`,
        exitCode: 3,
        output: 'x'.repeat(500)
      });
    });

    it('kills the child and rejects on timeout', async () => {
      const startedAt = Date.now();

      await expect(runner().run(node, ['-e', 'setInterval(() => {}, 1000)'], { timeoutMs: 300 }))
        .rejects.toBeInstanceOf(TimeoutError);
      expect(Date.now() - startedAt).toBeLessThan(3000);
    });

    it('escalates to SIGKILL when the child ignores SIGTERM', async () => {
      const script = 'process.on("SIGTERM", () => {}); setInterval(() => {}, 1000)';

      await expect(runner().run(node, ['-e', script], { timeoutMs: 500, killGraceMs: 100 }))
        .rejects.toThrow(`${node} timed out after 500ms`);
    });

    it('kills the child and rejects when aborted mid-run', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 300);

      await expect(runner().run(node, ['-e', 'setInterval(() => {}, 1000)'], { signal: controller.signal }))
        .rejects.toThrow(`${node} aborted`);
    });
  });
});

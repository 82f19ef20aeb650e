import { spawn } from 'child_process';
import { getLogger } from '../../core/logging/LogManager';
import { AppError, ExternalProcessError, TimeoutError } from '../../core/errors/AppError';
import { CommandOptions, CommandResult, ICommandRunner } from './ICommandRunner';

/** 错误信息中保留的stderr长度 */
const OUTPUT_EXCERPT_LENGTH = 500;

const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * 基于child_process.spawn的命令执行器
 */
export class CommandRunner implements ICommandRunner {
  private logger = getLogger('CommandRunner');

  async run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const { timeoutMs = 0, signal, killGraceMs = DEFAULT_KILL_GRACE_MS } = options;

    if (signal?.aborted) {
      throw new ExternalProcessError(`${command} aborted before start`, null);
    }

    this.logger.debug('Executing command', {
      command: `${command} ${args.join(' ')}`,
      timeout: timeoutMs
    });

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeoutId: NodeJS.Timeout | null = null;
      let killTimer: NodeJS.Timeout | null = null;
      // 已决定的失败原因，等子进程退出后再reject
      let termination: AppError | null = null;

      const excerpt = () => stderr.substring(0, OUTPUT_EXCERPT_LENGTH);

      const finish = (action: () => void) => {
        if (settled) return;
        settled = true;
        if (timeoutId) clearTimeout(timeoutId);
        if (killTimer) clearTimeout(killTimer);
        signal?.removeEventListener('abort', onAbort);
        action();
      };

      const terminate = (reason: AppError) => {
        if (settled || termination) return;
        termination = reason;
        if (timeoutId) clearTimeout(timeoutId);

        this.logger.debug(`Terminating ${command}`, { reason: reason.message });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          this.logger.warn(`${command} did not exit after SIGTERM, sending SIGKILL`, { killGraceMs });
          child.kill('SIGKILL');
        }, killGraceMs);
      };

      const onAbort = () => {
        terminate(new ExternalProcessError(`${command} aborted`, null, excerpt()));
      };

      if (timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          terminate(new TimeoutError(`${command} timed out after ${timeoutMs}ms`, {
            command,
            stderr: excerpt()
          }));
        }, timeoutMs);
      }

      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null) => {
        const reason = termination;
        if (reason) {
          finish(() => reject(reason));
        } else if (code === 0) {
          finish(() => resolve({ stdout, stderr, exitCode: code }));
        } else {
          finish(() => reject(new ExternalProcessError(
            `${command} exited with code ${code}`,
            code,
            excerpt()
          )));
        }
      });

      child.on('error', (error: Error) => {
        finish(() => reject(new ExternalProcessError(
          `Failed to run ${command}: ${error.message}`,
          null,
          excerpt(),
          error
        )));
      });
    });
  }
}

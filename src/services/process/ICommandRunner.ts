/**
 * 外部命令执行结果
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** 超时时间（毫秒），0或不传表示不限制 */
  timeoutMs?: number;
  /** 中止后终止子进程 */
  signal?: AbortSignal;
  /** 发送SIGTERM后等待退出的时间，超过则SIGKILL，默认2000 */
  killGraceMs?: number;
}

/**
 * 外部命令执行接口
 */
export interface ICommandRunner {
  /**
   * 执行命令，退出码为0时resolve
   * 超时或中止时先终止子进程，待其退出后才reject
   * @param command 可执行文件路径
   * @param args 命令参数（不经过shell）
   * @throws ExternalProcessError 退出码非0、进程无法启动或被中止
   * @throws TimeoutError 超时
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

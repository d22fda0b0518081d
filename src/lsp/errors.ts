/**
 * 索引核心对外暴露的错误类型
 */

/**
 * wait() 在截止时间前未能等到作用域清空。
 */
export class WaitTimeoutError extends Error {
  constructor(
    readonly scope: string,
    readonly outstanding: number,
    readonly timeoutMs: number
  ) {
    super(`deadline exceeded after ${timeoutMs}ms while ${outstanding} jobs still outstanding in ${scope}`);
    this.name = 'WaitTimeoutError';
  }
}

/**
 * 调度器已经 dispose，不再接受任务或等待。
 */
export class SchedulerDisposedError extends Error {
  constructor() {
    super('Job scheduler has been disposed');
    this.name = 'SchedulerDisposedError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * LSP Health 模块
 * 提供索引状态查询与 work-done 进度报告
 */

import { createLogger } from '../utils/logger.js';
import { toError } from './errors.js';
import type { FileWatcherStatus } from './workspace/file-watcher.js';
import type { IndexStats, StateStore } from './workspace/state-store.js';

export const INDEX_STATUS_METHOD = 'iac/indexStatus';

/**
 * iac/indexStatus 的返回结构
 */
export interface IndexStatus extends IndexStats {
  roots: string[];
  idle: boolean;
  watcher?: FileWatcherStatus;
}

export interface IndexStatusConnection {
  onRequest(method: string, handler: () => IndexStatus): unknown;
}

/**
 * 与 vscode-languageserver 的 WorkDoneProgressServerReporter 兼容的最小接口
 */
export interface ProgressReporter {
  begin(title: string, percentage?: number, message?: string, cancellable?: boolean): void;
  report(message: string): void;
  done(): void;
}

export interface ProgressConnection {
  window: {
    createWorkDoneProgress(): Promise<ProgressReporter>;
  };
}

const logger = createLogger('health');

/**
 * 注册索引状态请求处理器
 * @param connection LSP 连接对象
 * @param store 工作区状态存储
 * @param getWatcherStatus 获取文件监控状态的函数（可选）
 */
export function registerIndexStatusHandlers(
  connection: IndexStatusConnection,
  store: StateStore,
  getWatcherStatus?: () => FileWatcherStatus
): void {
  connection.onRequest(INDEX_STATUS_METHOD, (): IndexStatus => {
    const stats = store.getStats();
    const result: IndexStatus = {
      ...stats,
      roots: [...store.roots],
      idle: store.outstanding() === 0,
    };

    // 仅在 watcher 存在时添加
    const watcher = getWatcherStatus?.();
    if (watcher) {
      result.watcher = watcher;
    }
    return result;
  });
}

function remaining(outstanding: number): string {
  return outstanding === 1 ? '1 job remaining' : `${outstanding} jobs remaining`;
}

/**
 * 有任务未完成时开始一个 work-done 进度，报告剩余任务数，全部完成后结束。
 * @returns 取消订阅函数；进行中的进度会被结束
 */
export function attachIndexingProgress(connection: ProgressConnection, store: StateStore): () => void {
  let reporter: ProgressReporter | undefined;
  let starting = false;
  let latest = 0;
  let detached = false;

  const finish = (): void => {
    reporter?.done();
    reporter = undefined;
  };

  const unsubscribe = store.onProgress(({ outstanding }) => {
    latest = outstanding;
    if (outstanding === 0) {
      finish();
      return;
    }
    if (reporter) {
      reporter.report(remaining(outstanding));
      return;
    }
    if (starting) return;

    starting = true;
    connection.window.createWorkDoneProgress().then(
      created => {
        starting = false;
        if (detached) return;
        reporter = created;
        created.begin('Indexing workspace', undefined, remaining(latest));
        if (latest === 0) finish();
      },
      (error: unknown) => {
        starting = false;
        logger.warn('Unable to create work done progress', { error: toError(error).message });
      }
    );
  });

  return () => {
    detached = true;
    unsubscribe();
    finish();
  };
}

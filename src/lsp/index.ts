/**
 * LSP Workspace 索引模块 - 统一导出
 * 提供遍历、任务调度、文档存储与工作区符号搜索
 */

// 导出类型定义
export type { DocumentRecord, IndexJobKind, SymbolEntry, SymbolInfo } from './workspace/types.js';

// 导出状态存储
export { StateStore } from './workspace/state-store.js';
export type { IndexProgress, IndexStats, StateStoreOptions } from './workspace/state-store.js';

// 导出文档存储
export { DocumentStore, createDocumentRecord } from './workspace/document-store.js';

// 导出遍历器
export { Walker, DEFAULT_IGNORED_DIRECTORIES, CONFIG_FILE_EXTENSIONS } from './workspace/walker.js';
export type { WalkerConfig, WalkError, WalkListener, WalkResult } from './workspace/walker.js';

// 导出符号搜索
export { FUZZY_WEIGHTS, fuzzyMatch, searchSymbols, formatWorkspaceSymbol } from './workspace/symbol-search.js';
export type { FuzzyMatch } from './workspace/symbol-search.js';

// 导出文件监控器
export { FileWatcher } from './workspace/file-watcher.js';
export type { FileChangeEvent, FileWatcherConfig, FileWatcherStatus } from './workspace/file-watcher.js';

// 导出任务调度器
export { JobScheduler, JobPriority, JobStatus, jobKey } from './task-queue.js';
export type {
  Job,
  JobFailure,
  JobSpec,
  JobSchedulerConfig,
  PrerequisiteFactory,
  QueueStats,
  SchedulerEvents,
  WaitOptions,
} from './task-queue.js';

// 导出错误类型
export { WaitTimeoutError, SchedulerDisposedError } from './errors.js';

// 导出协议适配
export { registerSymbolsHandlers } from './symbols.js';
export type { SymbolsConnection } from './symbols.js';
export { registerIndexStatusHandlers, attachIndexingProgress, INDEX_STATUS_METHOD } from './health.js';
export type { IndexStatus, IndexStatusConnection, ProgressConnection, ProgressReporter } from './health.js';

/**
 * LSP Workspace 文件监控器
 * 将客户端的文件变更通知（native）或服务器轮询结果（polling）转发给状态存储
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { EventEmitter } from 'node:events';
import { ConfigService } from '../../config/config-service.js';
import { createLogger } from '../../utils/logger.js';
import { toError } from '../errors.js';
import { isWithinPath } from '../utils.js';
import type { StateStore } from './state-store.js';
import { CONFIG_FILE_EXTENSIONS, DEFAULT_IGNORED_DIRECTORIES } from './walker.js';

/**
 * 文件监控配置
 */
export interface FileWatcherConfig {
  /**
   * 是否启用文件监控
   */
  enabled: boolean;
  /**
   * 监控模式：'native'（客户端提供）或 'polling'（服务器轮询）
   */
  mode: 'native' | 'polling';
  /**
   * Polling 模式下的轮询间隔（毫秒）
   */
  pollingInterval: number;
  /**
   * 排除的目录名
   */
  excludePatterns: string[];
}

/**
 * 文件变更事件
 */
export interface FileChangeEvent {
  uri: string;
  type: 'created' | 'changed' | 'deleted';
}

export interface FileWatcherStatus {
  enabled: boolean;
  mode: 'native' | 'polling';
  isRunning: boolean;
  trackedFiles: number;
}

/**
 * 文件元数据快照
 */
interface FileSnapshot {
  mtime: number;
  size: number;
}

// workspace/didChangeWatchedFiles 中的 FileChangeType
const NATIVE_CHANGE_TYPES: Record<number, FileChangeEvent['type']> = {
  1: 'created',
  2: 'changed',
  3: 'deleted',
};

function defaultConfig(): FileWatcherConfig {
  const settings = ConfigService.getInstance();
  return {
    enabled: true,
    mode: 'native',
    pollingInterval: settings.pollIntervalMs,
    excludePatterns: [...DEFAULT_IGNORED_DIRECTORIES, ...settings.extraIgnoreDirs],
  };
}

/**
 * FileWatcher 类：封装文件监控的所有状态和行为
 */
export class FileWatcher {
  private config: FileWatcherConfig;
  private readonly logger = createLogger('file-watcher');
  private pollingTimer: NodeJS.Timeout | null = null;
  private fileSnapshots: Map<string, FileSnapshot> = new Map();
  private workspaceFolders: string[] = [];
  private isRunning = false;
  private isScanning = false; // 单飞行锁：防止并发扫描
  // 启动后的第一次扫描只建立基线，不上报变更（根目录遍历已覆盖这些文件）
  private primed = false;

  /**
   * 事件发射器：用于测试观察和验证
   * 事件类型：
   * - 'scan:attempt': 尝试扫描（无论是否被锁阻止）
   * - 'scan:start': 实际开始扫描（获取到锁）
   * - 'scan:end': 扫描完成，参数为本次检测到的变更
   * - 'scan:rejected': 扫描被单飞行锁拒绝
   */
  private readonly events = new EventEmitter();

  constructor(
    private readonly store: StateStore,
    config: Partial<FileWatcherConfig> = {}
  ) {
    this.config = { ...defaultConfig(), ...config };
  }

  getEventEmitter(): EventEmitter {
    return this.events;
  }

  /**
   * 重新配置；运行中时以新配置重启
   */
  configure(config: Partial<FileWatcherConfig>): void {
    const wasRunning = this.isRunning;
    if (wasRunning) {
      this.stop();
    }

    this.config = { ...this.config, ...config };

    if (wasRunning && this.config.enabled) {
      this.start(this.workspaceFolders);
    }
  }

  /**
   * 启动文件监控
   * @param folders 工作区根目录（文件系统路径）
   */
  start(folders: string[]): void {
    if (this.isRunning || !this.config.enabled) {
      return;
    }

    this.workspaceFolders = [...folders];
    this.isRunning = true;
    this.primed = false;

    if (this.config.mode === 'polling') {
      this.startPolling();
    }
    // native 模式下，由客户端负责触发 handleNativeChanges
  }

  stop(): void {
    this.isRunning = false;
    this.stopPolling();
    this.fileSnapshots.clear();
  }

  getStatus(): FileWatcherStatus {
    return {
      enabled: this.config.enabled,
      mode: this.config.mode,
      isRunning: this.isRunning,
      trackedFiles: this.fileSnapshots.size,
    };
  }

  /**
   * 处理客户端提供的文件变更事件（native 模式）
   * @returns 被状态存储接受的变更数
   */
  handleNativeChanges(changes: ReadonlyArray<{ uri: string; type: number }>): number {
    const events: FileChangeEvent[] = [];
    for (const change of changes) {
      const type = NATIVE_CHANGE_TYPES[change.type];
      if (type) {
        events.push({ uri: change.uri, type });
      } else {
        this.logger.warn('Unknown file change type', { uri: change.uri, type: change.type });
      }
    }
    return this.processChanges(events);
  }

  /**
   * 执行一次轮询扫描并转发检测到的变更
   * @returns 检测到的变更；被单飞行锁拒绝时为空
   */
  async scan(): Promise<FileChangeEvent[]> {
    this.events.emit('scan:attempt');

    if (this.isScanning) {
      this.events.emit('scan:rejected');
      return [];
    }

    this.events.emit('scan:start');
    this.isScanning = true;
    const changes: FileChangeEvent[] = [];
    try {
      for (const folder of this.workspaceFolders) {
        changes.push(...(await this.detectChanges(folder)));
      }

      if (!this.primed) {
        this.primed = true;
        changes.length = 0;
      }
      this.processChanges(changes);
    } finally {
      this.isScanning = false;
      this.events.emit('scan:end', changes);
    }
    return changes;
  }

  private startPolling(): void {
    if (this.pollingTimer) {
      return;
    }

    // 立即执行一次扫描
    this.runScheduledScan();

    this.pollingTimer = setInterval(() => this.runScheduledScan(), this.config.pollingInterval);
    this.pollingTimer.unref();
  }

  private stopPolling(): void {
    if (this.pollingTimer) {
      clearInterval(this.pollingTimer);
      this.pollingTimer = null;
    }
  }

  private runScheduledScan(): void {
    this.scan().catch((error: unknown) => {
      this.logger.error('Polling scan failed', toError(error));
    });
  }

  /**
   * 检测目录下的文件变更
   */
  private async detectChanges(dir: string): Promise<FileChangeEvent[]> {
    const changes: FileChangeEvent[] = [];
    const currentFiles = new Set<string>();

    await this.scanDirectory(dir, currentFiles, changes);

    for (const path of [...this.fileSnapshots.keys()]) {
      if (isWithinPath(path, dir) && !currentFiles.has(path)) {
        changes.push({ uri: pathToFileURL(path).href, type: 'deleted' });
        this.fileSnapshots.delete(path);
      }
    }

    return changes;
  }

  private async scanDirectory(dir: string, currentFiles: Set<string>, changes: FileChangeEvent[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      this.logger.debug('Cannot read directory during scan', { dir, error: toError(error).message });
      return;
    }

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (this.config.excludePatterns.includes(entry.name)) continue;
        await this.scanDirectory(fullPath, currentFiles, changes);
      } else if (entry.isFile() && CONFIG_FILE_EXTENSIONS.some(ext => entry.name.endsWith(ext))) {
        let snapshot: FileSnapshot;
        try {
          const stats = await fs.stat(fullPath);
          snapshot = { mtime: stats.mtimeMs, size: stats.size };
        } catch (error) {
          // 读取目录与 stat 之间文件消失，按未出现处理
          this.logger.debug('Cannot stat file during scan', { path: fullPath, error: toError(error).message });
          continue;
        }

        currentFiles.add(fullPath);
        const previous = this.fileSnapshots.get(fullPath);
        if (!previous) {
          changes.push({ uri: pathToFileURL(fullPath).href, type: 'created' });
        } else if (previous.mtime !== snapshot.mtime || previous.size !== snapshot.size) {
          changes.push({ uri: pathToFileURL(fullPath).href, type: 'changed' });
        }
        this.fileSnapshots.set(fullPath, snapshot);
      }
    }
  }

  private processChanges(changes: readonly FileChangeEvent[]): number {
    let accepted = 0;
    for (const change of changes) {
      try {
        const handled =
          change.type === 'deleted'
            ? this.store.notifyFileDeleted(change.uri)
            : this.store.notifyFileChanged(change.uri);
        if (handled) accepted++;
      } catch (error) {
        this.logger.warn('Failed to forward file change', {
          uri: change.uri,
          type: change.type,
          error: toError(error).message,
        });
      }
    }
    return accepted;
  }
}

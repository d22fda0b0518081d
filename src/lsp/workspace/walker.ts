/**
 * LSP Workspace 遍历器
 * 递归扫描工作区目录，报告发现的配置文件；不可读的目录只记录，不中断遍历
 */

import { promises as fs, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ConfigService } from '../../config/config-service.js';
import { createLogger, logPerformance } from '../../utils/logger.js';
import { isNodeError, toError } from '../errors.js';
import { isWithinPath } from '../utils.js';

export const DEFAULT_IGNORED_DIRECTORIES: readonly string[] = [
  '.git',
  '.hg',
  '.svn',
  '.terraform',
  '.terragrunt-cache',
  'node_modules',
  '.idea',
  '.vscode',
];

export const CONFIG_FILE_EXTENSIONS: readonly string[] = ['.tf', '.tofu', '.tfvars'];

/**
 * 遍历器配置
 */
export interface WalkerConfig {
  /**
   * 跳过的目录名
   */
  ignoreDirectories: readonly string[];
  /**
   * 视为配置文件的扩展名
   */
  extensions: readonly string[];
  /**
   * 读取目录项
   */
  readDirectory: (dir: string) => Promise<Dirent[]>;
}

export interface WalkError {
  path: string;
  code: string;
  message: string;
}

export interface WalkResult {
  root: string;
  files: string[];
  errors: WalkError[];
}

export interface WalkListener {
  onFile?(path: string): void;
  onError?(error: WalkError): void;
}

export class Walker {
  private readonly config: WalkerConfig;
  private readonly logger = createLogger('walker');
  // 已遍历（或已认领）的根目录，用于模块间的环路保护
  private readonly claimed = new Set<string>();

  constructor(config: Partial<WalkerConfig> = {}) {
    this.config = {
      ignoreDirectories: [...DEFAULT_IGNORED_DIRECTORIES, ...ConfigService.getInstance().extraIgnoreDirs],
      extensions: CONFIG_FILE_EXTENSIONS,
      readDirectory: dir => fs.readdir(dir, { withFileTypes: true }),
      ...config,
    };
  }

  isConfigFile(name: string): boolean {
    return this.config.extensions.some(ext => name.endsWith(ext));
  }

  isIgnoredDirectory(name: string): boolean {
    return this.config.ignoreDirectories.includes(name);
  }

  /**
   * 认领一个待遍历的根目录；该目录或其祖先已被认领时返回 false。
   */
  claim(dir: string): boolean {
    if (this.hasWalked(dir)) return false;
    this.claimed.add(resolve(dir));
    return true;
  }

  hasWalked(dir: string): boolean {
    const normalized = resolve(dir);
    for (const root of this.claimed) {
      if (isWithinPath(normalized, root)) return true;
    }
    return false;
  }

  reset(): void {
    this.claimed.clear();
  }

  /**
   * 递归遍历 root，按名称排序报告配置文件。
   * @param root 根目录
   * @param listener 发现文件或遇到错误时的回调
   * @returns 发现的文件与收集到的错误
   */
  async walk(root: string, listener: WalkListener = {}): Promise<WalkResult> {
    const normalized = resolve(root);
    this.claimed.add(normalized);
    const result: WalkResult = { root: normalized, files: [], errors: [] };
    const started = performance.now();

    await this.walkDirectory(normalized, result, listener);

    logPerformance({
      component: 'walker',
      operation: 'walk',
      duration: performance.now() - started,
      metadata: { root: normalized, files: result.files.length, errors: result.errors.length },
    });
    return result;
  }

  private async walkDirectory(dir: string, result: WalkResult, listener: WalkListener): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await this.config.readDirectory(dir);
    } catch (error) {
      this.report(dir, error, result, listener);
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (this.isIgnoredDirectory(entry.name)) continue;
        await this.walkDirectory(fullPath, result, listener);
      } else if (this.isConfigFile(entry.name)) {
        if (entry.isSymbolicLink() && !(await this.isRegularFile(fullPath, result, listener))) {
          continue;
        }
        if (!entry.isFile() && !entry.isSymbolicLink()) continue;
        result.files.push(fullPath);
        listener.onFile?.(fullPath);
      }
    }
  }

  private async isRegularFile(path: string, result: WalkResult, listener: WalkListener): Promise<boolean> {
    try {
      return (await fs.stat(path)).isFile();
    } catch (error) {
      this.report(path, error, result, listener);
      return false;
    }
  }

  private report(path: string, error: unknown, result: WalkResult, listener: WalkListener): void {
    const err = toError(error);
    const walkError: WalkError = {
      path,
      code: isNodeError(error) ? error.code ?? 'UNKNOWN' : 'UNKNOWN',
      message: err.message,
    };
    result.errors.push(walkError);
    this.logger.warn('Skipping unreadable path', { path, code: walkError.code });
    listener.onError?.(walkError);
  }
}

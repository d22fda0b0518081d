/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：数值配置在读取时解析，非法值回退到默认值
 * - 可测试性：支持测试环境下重置配置
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * const scheduler = new JobScheduler({ maxConcurrent: config.maxWorkers });
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export const DEFAULT_MAX_WORKERS = 2;
export const DEFAULT_POLL_INTERVAL_MS = 3000;

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 任务调度器的并发 worker 数（IACLS_MAX_WORKERS，默认 2） */
  readonly maxWorkers: number;

  /** wait() 的默认超时毫秒数，0 表示不限（IACLS_WAIT_TIMEOUT_MS） */
  readonly waitTimeoutMs: number;

  /** 额外需要跳过的目录名（IACLS_IGNORE_DIRS，逗号分隔） */
  readonly extraIgnoreDirs: readonly string[];

  /** 轮询模式文件监控的间隔毫秒数（IACLS_POLL_INTERVAL_MS，默认 3000） */
  readonly pollIntervalMs: number;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.maxWorkers = this.parsePositiveInt(process.env.IACLS_MAX_WORKERS, DEFAULT_MAX_WORKERS);
    this.waitTimeoutMs = this.parseNonNegativeInt(process.env.IACLS_WAIT_TIMEOUT_MS, 0);
    this.extraIgnoreDirs = (process.env.IACLS_IGNORE_DIRS ?? '')
      .split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0);
    this.pollIntervalMs = this.parsePositiveInt(process.env.IACLS_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS);
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parsePositiveInt(raw: string | undefined, fallback: number): number {
    const value = this.parseNonNegativeInt(raw, fallback);
    return value > 0 ? value : fallback;
  }

  private parseNonNegativeInt(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isInteger(value) && value >= 0 ? value : fallback;
  }

  /**
   * 获取 ConfigService 单例实例。
   *
   * @returns ConfigService 实例
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}

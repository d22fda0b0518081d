/**
 * LSP 后台任务调度器
 * 管理索引任务（遍历、解析、解码），按身份去重、按依赖排序，并支持按作用域等待
 */

import { EventEmitter } from 'node:events';
import { resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { ConfigService } from '../config/config-service.js';
import { createLogger, logPerformance } from '../utils/logger.js';
import { SchedulerDisposedError, WaitTimeoutError, toError } from './errors.js';
import { isWithinPath } from './utils.js';

/**
 * 任务优先级
 */
export enum JobPriority {
  /**
   * 前台：编辑器中打开或刚编辑的文档
   */
  FOREGROUND = 0,
  /**
   * 后台：遍历发现的文件与磁盘变更
   */
  BACKGROUND = 1,
}

/**
 * 任务状态
 */
export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * 提交给调度器的任务描述
 */
export interface JobSpec<K extends string = string> {
  /**
   * 任务类型，与 target 一起构成幂等键
   */
  kind: K;
  /**
   * 任务目标（文档或目录的 URI）
   */
  target: string;
  priority: JobPriority;
  /**
   * 任务所属的作用域路径，用于 wait() 与进度统计
   */
  scopes: readonly string[];
  /**
   * 同一 target 上必须先完成的任务类型
   */
  dependsOn?: readonly K[];
  run: () => Promise<void>;
}

/**
 * 调度器内部的任务记录
 */
export interface Job<K extends string = string> {
  readonly id: string;
  readonly kind: K;
  readonly target: string;
  readonly seq: number;
  priority: JobPriority;
  dependsOn: readonly K[];
  run: () => Promise<void>;
  readonly scopes: Set<string>;
  status: JobStatus;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
  error?: Error;
}

/**
 * 记录在 target 上的失败
 */
export interface JobFailure {
  kind: string;
  error: Error;
  at: number;
}

export type PrerequisiteFactory<K extends string> = (
  kind: K,
  target: string,
  dependent: Job<K>
) => JobSpec<K> | undefined;

/**
 * 调度器配置
 */
export interface JobSchedulerConfig<K extends string = string> {
  /**
   * 最大并发任务数
   */
  maxConcurrent: number;
  /**
   * wait() 的默认超时（毫秒），0 表示不限
   */
  defaultWaitTimeoutMs: number;
  /**
   * 为缺失的前置任务构造任务描述
   */
  prerequisiteFactory?: PrerequisiteFactory<K>;
}

/**
 * 调度器统计信息
 */
export interface QueueStats {
  /**
   * 排队中（含等待在途任务结束的后续任务）
   */
  pending: number;
  running: number;
  completed: number;
  failed: number;
  /**
   * 被同身份任务合并的提交次数
   */
  coalesced: number;
  total: number;
}

export interface WaitOptions {
  /**
   * 覆盖默认超时；0 表示不限
   */
  timeoutMs?: number;
}

export interface SchedulerEvents<K extends string = string> {
  'job:queued': Job<K>;
  'job:started': Job<K>;
  'job:completed': Job<K>;
  'job:failed': { job: Job<K>; error: Error };
  idle: void;
}

interface Waiter {
  scope: string | undefined;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

const PRIORITIES = [JobPriority.FOREGROUND, JobPriority.BACKGROUND];

export function jobKey(kind: string, target: string): string {
  return `${kind}:${target}`;
}

export class JobScheduler<K extends string = string> {
  private readonly config: JobSchedulerConfig<K>;
  private readonly logger = createLogger('job-scheduler');
  private readonly events = new EventEmitter();

  // 优先级队列：每个优先级维护一个 FIFO 队列
  private readonly queues: Map<JobPriority, Job<K>[]> = new Map(PRIORITIES.map(p => [p, []]));
  private readonly queued = new Map<string, Job<K>>();
  private readonly running = new Map<string, Job<K>>();
  // 在途任务结束后才入队的同身份提交
  private readonly followUps = new Map<string, Job<K>>();

  // target → 各任务类型最近一次的结果
  private readonly outcomes = new Map<string, Map<K, JobStatus>>();
  private readonly failures = new Map<string, JobFailure>();
  // 在途任务执行期间被 forget 的 target，结束时不再记录结果
  private readonly forgotten = new Set<string>();
  private readonly scopeCounts = new Map<string, number>();
  private readonly waiters = new Set<Waiter>();

  private seq = 0;
  private completed = 0;
  private failed = 0;
  private coalesced = 0;
  private pumpScheduled = false;
  private disposed = false;

  constructor(config: Partial<JobSchedulerConfig<K>> = {}) {
    const settings = ConfigService.getInstance();
    this.config = {
      maxConcurrent: settings.maxWorkers,
      defaultWaitTimeoutMs: settings.waitTimeoutMs,
      ...config,
    };
  }

  on<E extends keyof SchedulerEvents<K>>(event: E, listener: (payload: SchedulerEvents<K>[E]) => void): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }

  /**
   * 提交任务。
   *
   * 同身份任务仍在排队时替换其执行体；正在执行时作为后续任务保存，
   * 在途任务结束后再入队。提交永远不会被丢弃。
   */
  submit(spec: JobSpec<K>): void {
    if (this.disposed) {
      throw new SchedulerDisposedError();
    }

    const id = jobKey(spec.kind, spec.target);
    const pending = this.queued.get(id) ?? this.followUps.get(id);
    if (pending) {
      this.coalesced++;
      this.merge(pending, spec);
      return;
    }

    const job = this.createJob(id, spec);
    if (this.running.has(id)) {
      this.followUps.set(id, job);
      return;
    }
    this.enqueue(job);
  }

  /**
   * 等待作用域（或全部任务）清空。
   *
   * 计数在提交时递增、完成时递减；运行中的任务派生的新任务在父任务
   * 完成之前就已计入，因此不会在两者之间观察到虚假的零点。
   */
  wait(scope?: string, options: WaitOptions = {}): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new SchedulerDisposedError());
    }

    const normalized = scope === undefined ? undefined : resolve(scope);
    if (!this.hasOutstanding(normalized)) {
      return Promise.resolve();
    }

    const timeoutMs = options.timeoutMs ?? this.config.defaultWaitTimeoutMs;
    return new Promise<void>((resolvePromise, rejectPromise) => {
      const waiter: Waiter = { scope: normalized, resolve: resolvePromise, reject: rejectPromise, timer: null };
      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this.waiters.delete(waiter);
          rejectPromise(new WaitTimeoutError(normalized ?? '*', this.outstanding(normalized), timeoutMs));
        }, timeoutMs);
      }
      this.waiters.add(waiter);
    });
  }

  /**
   * 统计作用域内尚未完成的任务数（不传作用域时统计全部）
   */
  outstanding(scope?: string): number {
    const normalized = scope === undefined ? undefined : resolve(scope);
    let count = 0;
    for (const job of this.allOutstandingJobs()) {
      if (normalized === undefined || [...job.scopes].some(s => isWithinPath(s, normalized))) {
        count++;
      }
    }
    return count;
  }

  getStats(): QueueStats {
    return {
      pending: this.queued.size + this.followUps.size,
      running: this.running.size,
      completed: this.completed,
      failed: this.failed,
      coalesced: this.coalesced,
      total: this.seq,
    };
  }

  getRunningJobs(): Array<{ id: string; kind: K; target: string; duration: number }> {
    const now = Date.now();
    return Array.from(this.running.values()).map(job => ({
      id: job.id,
      kind: job.kind,
      target: job.target,
      duration: now - (job.startedAt ?? now),
    }));
  }

  getFailure(target: string): JobFailure | undefined {
    return this.failures.get(target);
  }

  /**
   * 查询某个身份最近一次执行的结果
   */
  getOutcome(kind: K, target: string): JobStatus | undefined {
    return this.outcomes.get(target)?.get(kind);
  }

  /**
   * 同身份任务是否仍在排队（含等待在途任务结束的后续任务）
   */
  hasPending(kind: K, target: string): boolean {
    const id = jobKey(kind, target);
    return this.queued.has(id) || this.followUps.has(id);
  }

  /**
   * 丢弃 target 的完成与失败记录（文档被删除后调用）
   */
  forget(target: string): void {
    this.outcomes.delete(target);
    this.failures.delete(target);
    for (const job of this.running.values()) {
      if (job.target === target) this.forgotten.add(target);
    }
  }

  /**
   * 停止调度：丢弃排队任务并拒绝所有等待者；在途任务允许跑完
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const queue of this.queues.values()) queue.length = 0;
    this.queued.clear();
    this.followUps.clear();
    this.scopeCounts.clear();
    for (const waiter of this.waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(new SchedulerDisposedError());
    }
    this.waiters.clear();
  }

  private createJob(id: string, spec: JobSpec<K>): Job<K> {
    const job: Job<K> = {
      id,
      kind: spec.kind,
      target: spec.target,
      seq: ++this.seq,
      priority: spec.priority,
      dependsOn: spec.dependsOn ?? [],
      run: spec.run,
      scopes: new Set(),
      status: JobStatus.PENDING,
      createdAt: Date.now(),
    };
    this.addScopes(job, spec.scopes);
    return job;
  }

  private merge(job: Job<K>, spec: JobSpec<K>): void {
    job.run = spec.run;
    job.dependsOn = spec.dependsOn ?? [];
    this.addScopes(job, spec.scopes);

    if (spec.priority >= job.priority) return;
    const queue = this.queues.get(job.priority);
    const index = queue ? queue.indexOf(job) : -1;
    job.priority = spec.priority;
    if (queue && index !== -1) {
      queue.splice(index, 1);
      this.queues.get(job.priority)?.push(job);
      this.schedulePump();
    }
  }

  private enqueue(job: Job<K>): void {
    this.queued.set(job.id, job);
    this.queues.get(job.priority)?.push(job);
    this.emitSafely('job:queued', job);
    this.schedulePump();
  }

  // 微任务中调度，使同一轮事件循环内的重复提交得以合并
  private schedulePump(): void {
    if (this.pumpScheduled || this.disposed) return;
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (!this.disposed && this.running.size < this.config.maxConcurrent) {
      const job = this.takeReady();
      if (!job) return;
      void this.execute(job);
    }
  }

  /**
   * 按优先级取出第一个前置条件已满足的任务；
   * 缺失的前置任务会被补交，无法补交的任务直接失败。
   */
  private takeReady(): Job<K> | undefined {
    const missing: Array<{ job: Job<K>; kind: K }> = [];

    for (const priority of PRIORITIES) {
      const queue = this.queues.get(priority);
      if (!queue) continue;
      for (let i = 0; i < queue.length; i++) {
        const job = queue[i];
        if (!job) continue;
        const blockedBy = this.blockingPrerequisite(job);
        if (blockedBy === null) {
          queue.splice(i, 1);
          this.queued.delete(job.id);
          this.requestPrerequisites(missing);
          return job;
        }
        if (blockedBy.missing) missing.push({ job, kind: blockedBy.kind });
      }
    }

    this.requestPrerequisites(missing);
    return undefined;
  }

  private blockingPrerequisite(job: Job<K>): { kind: K; missing: boolean } | null {
    for (const kind of job.dependsOn) {
      const id = jobKey(kind, job.target);
      if (this.queued.has(id) || this.running.has(id) || this.followUps.has(id)) {
        return { kind, missing: false };
      }
      if (!this.outcomes.get(job.target)?.has(kind)) {
        return { kind, missing: true };
      }
    }
    return null;
  }

  private requestPrerequisites(missing: Array<{ job: Job<K>; kind: K }>): void {
    for (const { job, kind } of missing) {
      if (this.queued.has(jobKey(kind, job.target))) continue;
      const spec = this.config.prerequisiteFactory?.(kind, job.target, job);
      if (spec) {
        this.submit({ ...spec, scopes: [...spec.scopes, ...job.scopes] });
        continue;
      }
      this.removeQueued(job);
      this.finish(job, new Error(`Prerequisite ${kind} is unavailable for ${job.target}`));
    }
  }

  private removeQueued(job: Job<K>): void {
    const queue = this.queues.get(job.priority);
    const index = queue ? queue.indexOf(job) : -1;
    if (queue && index !== -1) queue.splice(index, 1);
    this.queued.delete(job.id);
  }

  private async execute(job: Job<K>): Promise<void> {
    job.status = JobStatus.RUNNING;
    job.startedAt = Date.now();
    this.running.set(job.id, job);
    this.emitSafely('job:started', job);

    const started = performance.now();
    let failure: Error | undefined;
    try {
      await job.run();
    } catch (error) {
      failure = toError(error);
    }

    logPerformance({
      component: 'job-scheduler',
      operation: job.kind,
      duration: performance.now() - started,
      metadata: { target: job.target, failed: failure !== undefined },
    });
    this.running.delete(job.id);
    this.finish(job, failure);
  }

  private finish(job: Job<K>, failure: Error | undefined): void {
    job.completedAt = Date.now();
    const record = !this.forgotten.delete(job.target);
    if (failure) {
      job.status = JobStatus.FAILED;
      job.error = failure;
      this.failed++;
      if (record) this.failures.set(job.target, { kind: job.kind, error: failure, at: job.completedAt });
      this.logger.error(`Job ${job.id} failed`, failure, { kind: job.kind, target: job.target });
      this.emitSafely('job:failed', { job, error: failure });
    } else {
      job.status = JobStatus.COMPLETED;
      this.completed++;
      this.failures.delete(job.target);
      this.emitSafely('job:completed', job);
    }
    if (record) {
      const byKind = this.outcomes.get(job.target) ?? new Map<K, JobStatus>();
      byKind.set(job.kind, job.status);
      this.outcomes.set(job.target, byKind);
    }

    if (!this.disposed) {
      const followUp = this.followUps.get(job.id);
      if (followUp) {
        this.followUps.delete(job.id);
        this.enqueue(followUp);
      }
    }

    this.releaseScopes(job);
    this.schedulePump();
  }

  // 监听器抛出的异常不能破坏调度器的计数
  private emitSafely<E extends keyof SchedulerEvents<K>>(event: E, payload: SchedulerEvents<K>[E]): void {
    try {
      this.events.emit(event, payload);
    } catch (error) {
      this.logger.error(`Listener for ${event} threw`, toError(error));
    }
  }

  private addScopes(job: Job<K>, scopes: Iterable<string>): void {
    for (const scope of scopes) {
      const normalized = resolve(scope);
      if (job.scopes.has(normalized)) continue;
      job.scopes.add(normalized);
      this.scopeCounts.set(normalized, (this.scopeCounts.get(normalized) ?? 0) + 1);
    }
  }

  private releaseScopes(job: Job<K>): void {
    if (this.disposed) return;
    for (const scope of job.scopes) {
      const count = (this.scopeCounts.get(scope) ?? 0) - 1;
      if (count > 0) {
        this.scopeCounts.set(scope, count);
      } else {
        this.scopeCounts.delete(scope);
      }
    }
    this.notifyWaiters();
  }

  private hasOutstanding(scope: string | undefined): boolean {
    if (scope === undefined) {
      return this.queued.size + this.running.size + this.followUps.size > 0;
    }
    for (const key of this.scopeCounts.keys()) {
      if (isWithinPath(key, scope)) return true;
    }
    return false;
  }

  private notifyWaiters(): void {
    for (const waiter of [...this.waiters]) {
      if (this.hasOutstanding(waiter.scope)) continue;
      if (waiter.timer) clearTimeout(waiter.timer);
      this.waiters.delete(waiter);
      waiter.resolve();
    }
    if (!this.hasOutstanding(undefined)) {
      this.emitSafely('idle', undefined);
    }
  }

  private *allOutstandingJobs(): Iterable<Job<K>> {
    yield* this.queued.values();
    yield* this.running.values();
    yield* this.followUps.values();
  }
}

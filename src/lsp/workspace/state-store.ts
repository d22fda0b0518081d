/**
 * LSP Workspace 状态存储
 * 串联遍历器、任务调度器与文档存储：发现文件、解析、解码，并对外提供符号快照
 */

import { promises as fs } from 'node:fs';
import { basename, dirname, relative, resolve } from 'node:path';
import { parse, decode, isLocalModuleSource, type ConfigParser, type SymbolDecoder } from '../../frontend/index.js';
import { DiagnosticSeverity } from '../../diagnostics/diagnostics.js';
import { createLogger } from '../../utils/logger.js';
import { isNodeError } from '../errors.js';
import {
  JobPriority,
  JobScheduler,
  type Job,
  type JobFailure,
  type JobSchedulerConfig,
  type JobSpec,
  type JobStatus,
  type QueueStats,
  type WaitOptions,
} from '../task-queue.js';
import { ensureUri, isWithinPath, uriToFsPath } from '../utils.js';
import { DocumentStore, createDocumentRecord } from './document-store.js';
import { searchSymbols } from './symbol-search.js';
import type { DocumentRecord, IndexJobKind, SymbolEntry, SymbolInfo } from './types.js';
import { Walker, type WalkerConfig } from './walker.js';

export interface StateStoreOptions {
  parser: ConfigParser;
  decoder: SymbolDecoder;
  /**
   * 读取已关闭文档的磁盘内容
   */
  readFile: (path: string) => Promise<string>;
  walker: Partial<WalkerConfig>;
  scheduler: Partial<Omit<JobSchedulerConfig<IndexJobKind>, 'prerequisiteFactory'>>;
}

export interface IndexStats {
  documents: number;
  openDocuments: number;
  symbols: number;
  failedDocuments: number;
  queue: QueueStats;
}

export interface IndexProgress {
  outstanding: number;
  stats: QueueStats;
}

// NotifyFileDeleted 等入口传入的既可能是路径也可能是 URI
function toPath(uriOrPath: string): string {
  const path = uriToFsPath(uriOrPath);
  if (path === null) {
    throw new Error(`Unsupported document location: ${uriOrPath}`);
  }
  return path;
}

// 合并入队的前台任务不携带遍历作用域，后续任务从文档记录中补回
function withWalkRoot(record: DocumentRecord, scopes: readonly string[]): readonly string[] {
  return record.walkRoot === undefined || scopes.includes(record.walkRoot) ? scopes : [record.walkRoot, ...scopes];
}

export class StateStore {
  private readonly logger = createLogger('state-store');
  private readonly store = new DocumentStore();
  private readonly walker: Walker;
  private readonly scheduler: JobScheduler<IndexJobKind>;
  private readonly parser: ConfigParser;
  private readonly decoder: SymbolDecoder;
  private readonly readFile: (path: string) => Promise<string>;
  private readonly workspaceRoots: string[] = [];

  constructor(options: Partial<StateStoreOptions> = {}) {
    this.parser = options.parser ?? parse;
    this.decoder = options.decoder ?? decode;
    this.readFile = options.readFile ?? (path => fs.readFile(path, 'utf8'));
    this.walker = new Walker(options.walker);
    this.scheduler = new JobScheduler<IndexJobKind>({
      ...options.scheduler,
      prerequisiteFactory: (kind, target, dependent) =>
        kind === 'parse' ? this.parseJob(target, dependent.priority, []) : undefined,
    });
    this.scheduler.on('job:failed', ({ job, error }) => this.recordFailure(job, error));
  }

  /**
   * 已注册的工作区根目录（按注册顺序）
   */
  get roots(): readonly string[] {
    return this.workspaceRoots;
  }

  /**
   * 以后台优先级遍历工作区根目录；同一目录只遍历一次。
   * @param root 根目录路径或 file:// URI
   * @returns 是否提交了新的遍历任务
   */
  walkWorkspace(root: string): boolean {
    const dir = toPath(root);
    if (!this.workspaceRoots.includes(dir)) {
      this.workspaceRoots.push(dir);
    }
    if (!this.walker.claim(dir)) {
      this.logger.debug('Directory already walked', { dir });
      return false;
    }
    this.submitWalk(dir, [dir]);
    return true;
  }

  /**
   * 安装编辑器缓冲区内容并以前台优先级重新索引。
   * 打开一个尚未打开的文档时，该文档移到规范顺序末尾。
   * @returns 版本号早于当前打开版本时忽略并返回 false
   */
  openOrUpdateDocument(uriOrPath: string, text: string, version: number): boolean {
    const uri = ensureUri(uriOrPath);
    const path = toPath(uri);
    const previous = this.store.get(uri);
    if (previous?.open && previous.version !== undefined && version < previous.version) {
      this.logger.warn('Ignoring stale document version', { uri, version, current: previous.version });
      return false;
    }
    if (previous && !previous.open) {
      this.store.touch(uri);
    }

    this.store.upsert(uri, prev => ({
      ...(prev ?? createDocumentRecord({ uri, path, relativePath: this.relativeTo(path) })),
      open: true,
      version,
      text,
      textRevision: (prev?.textRevision ?? 0) + 1,
    }));
    this.scheduler.submit(this.parseJob(uri, JobPriority.FOREGROUND, []));
    return true;
  }

  /**
   * 关闭文档：保留已索引的符号，之后以磁盘内容为准。
   * 打开期间收到过删除通知时，关闭后重新确认磁盘上的文件。
   */
  closeDocument(uriOrPath: string): boolean {
    const uri = ensureUri(uriOrPath);
    const previous = this.store.get(uri);
    const updated = this.store.update(uri, prev => ({ ...prev, open: false, version: undefined, deletedOnDisk: false }));
    if (updated === undefined) return false;
    if (previous?.deletedOnDisk) {
      this.submitRemovalCheck(updated);
    }
    return true;
  }

  /**
   * 磁盘上的文件被创建或修改。打开中的文档以缓冲区为准，忽略该通知。
   */
  notifyFileChanged(uriOrPath: string): boolean {
    const uri = ensureUri(uriOrPath);
    const path = toPath(uri);
    const previous = this.store.get(uri);
    if (previous?.open) {
      // 文件又出现在磁盘上，撤销待确认的删除
      if (previous.deletedOnDisk) {
        this.store.update(uri, prev => ({ ...prev, deletedOnDisk: false }));
      }
      return false;
    }
    if (!previous && !this.walker.isConfigFile(basename(path))) return false;

    const root = this.rootFor(path);
    if (!previous) {
      this.store.upsert(uri, () =>
        createDocumentRecord({ uri, path, relativePath: this.relativeTo(path), walkRoot: root })
      );
    }
    this.scheduler.submit(this.parseJob(uri, JobPriority.BACKGROUND, root ? [root] : []));
    return true;
  }

  /**
   * 磁盘上的文件（或目录）被删除。
   * 移除在解析任务观察到文件不存在时才生效，因此与同身份的在途任务保持顺序。
   * 打开中的文档先保留缓冲区内容，关闭时再确认。
   */
  notifyFileDeleted(uriOrPath: string): boolean {
    const uri = ensureUri(uriOrPath);
    const path = toPath(uri);
    const previous = this.store.get(uri);
    if (previous) {
      this.markDeleted(previous);
      return true;
    }

    // 目录删除：对其下所有文档逐一确认
    let matched = false;
    for (const record of this.store.snapshot()) {
      if (!isWithinPath(record.path, path)) continue;
      this.markDeleted(record);
      matched = true;
    }
    return matched;
  }

  getDocument(uriOrPath: string): DocumentRecord | undefined {
    return this.store.get(ensureUri(uriOrPath));
  }

  /**
   * 规范顺序的文档快照
   */
  documents(): readonly DocumentRecord[] {
    return this.store.snapshot();
  }

  /**
   * 所有已解码符号，按文档规范顺序、文档内按源码顺序
   */
  allSymbols(): SymbolEntry[] {
    const entries: SymbolEntry[] = [];
    for (const document of this.store.snapshot()) {
      for (const symbol of document.symbols ?? []) {
        entries.push({ symbol, document });
      }
    }
    return entries;
  }

  search(query: string): SymbolEntry[] {
    return searchSymbols(this.allSymbols(), query);
  }

  /**
   * 等待作用域内（不传时为全部）已提交的任务完成
   * @param scope 目录或文件的路径或 URI
   */
  wait(scope?: string, options?: WaitOptions): Promise<void> {
    return this.scheduler.wait(scope === undefined ? undefined : toPath(scope), options);
  }

  outstanding(scope?: string): number {
    return this.scheduler.outstanding(scope === undefined ? undefined : toPath(scope));
  }

  getJobOutcome(kind: IndexJobKind, uriOrPath: string): JobStatus | undefined {
    return this.scheduler.getOutcome(kind, ensureUri(uriOrPath));
  }

  getFailure(uriOrPath: string): JobFailure | undefined {
    return this.scheduler.getFailure(ensureUri(uriOrPath));
  }

  getStats(): IndexStats {
    const documents = this.store.snapshot();
    return {
      documents: documents.length,
      openDocuments: documents.filter(d => d.open).length,
      symbols: documents.reduce((sum, d) => sum + (d.symbols?.length ?? 0), 0),
      failedDocuments: documents.filter(d => d.indexError !== undefined).length,
      queue: this.scheduler.getStats(),
    };
  }

  /**
   * 订阅索引进度；任务入队、结束或全部完成时回调
   * @returns 取消订阅函数
   */
  onProgress(listener: (progress: IndexProgress) => void): () => void {
    const notify = (): void => {
      listener({ outstanding: this.scheduler.outstanding(), stats: this.scheduler.getStats() });
    };
    const subscriptions = [
      this.scheduler.on('job:queued', notify),
      this.scheduler.on('job:completed', notify),
      this.scheduler.on('job:failed', notify),
      this.scheduler.on('idle', notify),
    ];
    return () => {
      for (const unsubscribe of subscriptions) unsubscribe();
    };
  }

  dispose(): void {
    this.scheduler.dispose();
    this.walker.reset();
  }

  private submitWalk(dir: string, scopes: readonly string[]): void {
    this.scheduler.submit({
      kind: 'walk',
      target: ensureUri(dir),
      priority: JobPriority.BACKGROUND,
      scopes,
      run: async () => {
        const result = await this.walker.walk(dir, { onFile: file => this.discover(file, scopes) });
        this.logger.info('Walk finished', { dir, files: result.files.length, errors: result.errors.length });
      },
    });
  }

  private discover(path: string, scopes: readonly string[]): void {
    const uri = ensureUri(path);
    const previous = this.store.get(uri);
    // 编辑器中的缓冲区优先于磁盘内容
    if (previous?.open) return;

    const walkRoot = scopes[0];
    this.store.upsert(uri, prev => {
      const base = prev ?? createDocumentRecord({ uri, path, relativePath: this.relativeTo(path) });
      return { ...base, relativePath: this.relativeTo(path), walkRoot: base.walkRoot ?? walkRoot };
    });
    this.scheduler.submit(this.parseJob(uri, JobPriority.BACKGROUND, scopes));
  }

  private markDeleted(record: DocumentRecord): void {
    if (record.open) {
      this.store.update(record.uri, prev => ({ ...prev, deletedOnDisk: true }));
      return;
    }
    this.submitRemovalCheck(record);
  }

  private submitRemovalCheck(record: DocumentRecord): void {
    const root = record.walkRoot ?? this.rootFor(record.path);
    this.scheduler.submit(this.parseJob(record.uri, JobPriority.BACKGROUND, root ? [root] : []));
  }

  private parseJob(uri: string, priority: JobPriority, scopes: readonly string[]): JobSpec<IndexJobKind> {
    return {
      kind: 'parse',
      target: uri,
      priority,
      scopes: [...scopes, toPath(uri)],
      run: () => this.runParse(uri, priority, scopes),
    };
  }

  private decodeJob(uri: string, priority: JobPriority, scopes: readonly string[]): JobSpec<IndexJobKind> {
    return {
      kind: 'decode',
      target: uri,
      priority,
      scopes: [...scopes, toPath(uri)],
      dependsOn: ['parse'],
      run: async () => this.runDecode(uri, priority, scopes),
    };
  }

  private async runParse(uri: string, priority: JobPriority, scopes: readonly string[]): Promise<void> {
    const snapshot = this.store.get(uri);
    if (!snapshot) {
      // 排队中的 decode 会在结束时清理；否则现在就丢弃结果记录
      if (!this.scheduler.hasPending('decode', uri)) this.scheduler.forget(uri);
      return;
    }

    if (snapshot.open) {
      const { body, diagnostics } = this.parser(snapshot.text ?? '');
      this.store.update(uri, prev => ({
        ...prev,
        tree: body,
        treeRevision: snapshot.textRevision,
        parseDiagnostics: diagnostics,
      }));
      this.scheduler.submit(this.decodeJob(uri, priority, withWalkRoot(snapshot, scopes)));
      return;
    }

    let text: string;
    try {
      text = await this.readFile(snapshot.path);
    } catch (error) {
      if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        this.removeDocument(uri);
        return;
      }
      throw error;
    }

    const current = this.store.get(uri);
    // 读取期间文档被打开或移除：缓冲区内容优先，交给后续任务处理
    if (!current || current.open || current.textRevision !== snapshot.textRevision) {
      this.logger.debug('Discarding disk read superseded during parse', { uri });
      return;
    }

    const { body, diagnostics } = this.parser(text);
    const textRevision = current.textRevision + 1;
    this.store.update(uri, prev => ({
      ...prev,
      text,
      textRevision,
      tree: body,
      treeRevision: textRevision,
      parseDiagnostics: diagnostics,
    }));
    this.scheduler.submit(this.decodeJob(uri, priority, withWalkRoot(current, scopes)));
  }

  private runDecode(uri: string, priority: JobPriority, scopes: readonly string[]): void {
    const snapshot = this.store.get(uri);
    if (!snapshot) {
      // 文档已被移除：丢弃补交的 parse 与本任务的结果记录
      this.scheduler.forget(uri);
      return;
    }
    if (!snapshot.tree) return;

    const result = this.decoder(snapshot.tree);
    const diagnostics = [...snapshot.parseDiagnostics, ...result.diagnostics];
    // 存在语法错误的文档在修正前不贡献符号
    if (snapshot.parseDiagnostics.some(d => d.severity === DiagnosticSeverity.Error)) {
      this.store.update(uri, prev => ({
        ...prev,
        symbols: [],
        diagnostics,
        moduleSources: [],
        indexError: undefined,
      }));
      return;
    }

    const symbols: SymbolInfo[] = result.symbols.map(symbol => ({
      name: symbol.name,
      kind: symbol.kind,
      range: symbol.range,
      selectionRange: symbol.selectionRange,
      uri,
    }));
    this.store.update(uri, prev => ({
      ...prev,
      symbols,
      diagnostics,
      moduleSources: result.moduleSources.map(m => m.source),
      indexError: undefined,
    }));

    for (const { source } of result.moduleSources) {
      if (!isLocalModuleSource(source)) continue;
      const moduleDir = resolve(dirname(snapshot.path), source);
      if (!this.walker.claim(moduleDir)) continue;
      this.logger.debug('Walking local module', { source, moduleDir, from: uri });
      this.submitWalk(moduleDir, [...withWalkRoot(snapshot, scopes).filter(s => s !== moduleDir), moduleDir]);
    }
  }

  private removeDocument(uri: string): void {
    if (this.store.remove(uri)) {
      this.logger.info('Document removed', { uri });
    }
    this.scheduler.forget(uri);
  }

  private recordFailure(job: Job<IndexJobKind>, error: Error): void {
    if (job.kind === 'walk') return;
    this.store.update(job.target, prev => ({ ...prev, symbols: [], indexError: error.message }));
  }

  private rootFor(path: string): string | undefined {
    let best: string | undefined;
    for (const root of this.workspaceRoots) {
      if (isWithinPath(path, root) && (best === undefined || root.length > best.length)) {
        best = root;
      }
    }
    return best;
  }

  private relativeTo(path: string): string {
    const root = this.rootFor(path);
    return root === undefined ? path : relative(root, path);
  }
}

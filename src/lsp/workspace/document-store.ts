/**
 * LSP Workspace 文档存储
 * 按发现/打开顺序保存文档记录，提供规范顺序的快照
 */

import type { DocumentRecord } from './types.js';

export function createDocumentRecord(
  init: Pick<DocumentRecord, 'uri' | 'path' | 'relativePath'> & Partial<DocumentRecord>
): DocumentRecord {
  return {
    open: false,
    version: undefined,
    text: undefined,
    textRevision: 0,
    tree: undefined,
    treeRevision: 0,
    parseDiagnostics: [],
    symbols: undefined,
    diagnostics: [],
    moduleSources: [],
    ...init,
  };
}

export class DocumentStore {
  private readonly records = new Map<string, DocumentRecord>();
  // 规范顺序单独维护，不依赖 Map 的迭代顺序
  private readonly order: string[] = [];

  get size(): number {
    return this.records.size;
  }

  get(uri: string): DocumentRecord | undefined {
    return this.records.get(uri);
  }

  has(uri: string): boolean {
    return this.records.has(uri);
  }

  /**
   * 以整体替换的方式安装新记录。首次出现的 URI 追加到规范顺序末尾。
   * @param uri 文档 URI
   * @param update 基于旧记录计算新记录
   * @returns 安装后的记录
   */
  upsert(uri: string, update: (previous: DocumentRecord | undefined) => DocumentRecord): DocumentRecord {
    const previous = this.records.get(uri);
    const next = Object.freeze(update(previous));
    if (next.uri !== uri) {
      throw new Error(`Document record for ${next.uri} cannot be stored under ${uri}`);
    }
    if (!previous) {
      this.order.push(uri);
    }
    this.records.set(uri, next);
    return next;
  }

  /**
   * 仅更新已存在的记录；记录已被移除时返回 undefined
   */
  update(uri: string, update: (previous: DocumentRecord) => DocumentRecord): DocumentRecord | undefined {
    const previous = this.records.get(uri);
    if (!previous) return undefined;
    return this.upsert(uri, () => update(previous));
  }

  /**
   * 把已存在的文档移到规范顺序末尾（文档被重新打开时调用）
   */
  touch(uri: string): boolean {
    const index = this.order.indexOf(uri);
    if (index === -1) return false;
    this.order.splice(index, 1);
    this.order.push(uri);
    return true;
  }

  remove(uri: string): boolean {
    if (!this.records.delete(uri)) return false;
    const index = this.order.indexOf(uri);
    if (index !== -1) this.order.splice(index, 1);
    return true;
  }

  /**
   * 返回规范顺序的记录快照。记录不可变，调用方持有期间不会被改写。
   */
  snapshot(): readonly DocumentRecord[] {
    const out: DocumentRecord[] = [];
    for (const uri of this.order) {
      const record = this.records.get(uri);
      if (record) out.push(record);
    }
    return out;
  }

  clear(): void {
    this.records.clear();
    this.order.length = 0;
  }
}

/**
 * LSP Workspace 类型定义
 * 定义文档、符号与索引任务相关的数据结构
 */

import type { Range } from 'vscode-languageserver-types';
import type { Body } from '../../types.js';
import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import type { DecodedSymbolKind } from '../../frontend/decoder.js';

/**
 * 索引任务类型
 */
export type IndexJobKind = 'walk' | 'parse' | 'decode';

/**
 * 描述单个符号的索引信息。
 */
export interface SymbolInfo {
  /**
   * 展示名，例如 `provider "github"`。
   */
  readonly name: string;
  /**
   * 符号分类：块或顶层属性。
   */
  readonly kind: DecodedSymbolKind;
  /**
   * 声明的完整范围（零基、右开）。
   */
  readonly range: Range;
  /**
   * 块头或属性名的范围。
   */
  readonly selectionRange: Range;
  /**
   * 符号所属文档的 URI。
   */
  readonly uri: string;
}

/**
 * 文档记录。记录本身不可变，每次更新都会安装一个新对象。
 */
export interface DocumentRecord {
  /** 规范化的 file:// URI，即文档身份 */
  readonly uri: string;
  /** 绝对文件系统路径 */
  readonly path: string;
  /** 相对于发现或打开它的工作区根的路径 */
  readonly relativePath: string;
  readonly open: boolean;
  /** 打开期间单调递增；关闭或仅同步自磁盘时为 undefined */
  readonly version: number | undefined;
  /** 尚未从磁盘读取时为 undefined */
  readonly text: string | undefined;
  /** 每次安装新文本时递增 */
  readonly textRevision: number;
  readonly tree: Body | undefined;
  /** tree 解析自哪个 textRevision */
  readonly treeRevision: number;
  readonly parseDiagnostics: readonly Diagnostic[];
  readonly symbols: readonly SymbolInfo[] | undefined;
  readonly diagnostics: readonly Diagnostic[];
  /** 解码出的模块 source（原样） */
  readonly moduleSources: readonly string[];
  /** 最近一次任务失败的信息；成功后清除 */
  readonly indexError?: string;
  /** 打开期间磁盘上的文件被删除，关闭时需要重新确认 */
  readonly deletedOnDisk?: boolean;
  /** 由遍历发现时所属的根作用域 */
  readonly walkRoot?: string;
}

/**
 * 工作区符号查询结果
 */
export interface SymbolEntry {
  readonly symbol: SymbolInfo;
  readonly document: DocumentRecord;
}

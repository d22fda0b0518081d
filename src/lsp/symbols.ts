/**
 * LSP Symbols 模块
 * 提供工作区符号搜索
 */

import type { WorkspaceSymbol, WorkspaceSymbolParams } from 'vscode-languageserver/node.js';
import { formatWorkspaceSymbol } from './workspace/symbol-search.js';
import type { StateStore } from './workspace/state-store.js';

/**
 * registerSymbolsHandlers 需要的连接能力
 */
export interface SymbolsConnection {
  onWorkspaceSymbol(handler: (params: WorkspaceSymbolParams) => WorkspaceSymbol[]): unknown;
}

/**
 * 注册 Symbols 相关的 LSP 处理器
 * @param connection LSP 连接对象
 * @param store 工作区状态存储；查询不等待进行中的索引任务
 */
export function registerSymbolsHandlers(
  connection: SymbolsConnection,
  store: Pick<StateStore, 'search'>
): void {
  connection.onWorkspaceSymbol(({ query }): WorkspaceSymbol[] =>
    store.search(query ?? '').map(formatWorkspaceSymbol)
  );
}

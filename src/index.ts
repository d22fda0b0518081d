/**
 * @module iac-lsp-index
 *
 * 基础设施即代码配置文件（`.tf`、`.tofu`、`.tfvars`）语言服务器的索引核心。
 *
 * **索引管道**：
 * ```
 * walk → parse → decode → 文档存储 → workspace/symbol 查询
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { StateStore } from 'iac-lsp-index';
 *
 * const store = new StateStore();
 * store.walkWorkspace('/path/to/workspace');
 * await store.wait('/path/to/workspace');
 * console.log(store.search('prov').map(e => e.symbol.name));
 * ```
 */

// 前端：词法、语法与符号解码
export { lex, TokenKind, parse, decode, blockDisplayName, isLocalModuleSource } from './frontend/index.js';
export type {
  Token,
  LexResult,
  ParseResult,
  DecodedSymbol,
  DecodedSymbolKind,
  DecodeResult,
  ModuleSource,
  ConfigParser,
  SymbolDecoder,
} from './frontend/index.js';

// 语法树类型
export type { Attribute, Block, Body, BodyItem, Position, Span } from './types.js';

// 诊断
export {
  Diagnostics,
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticSeverity,
  formatDiagnostic,
} from './diagnostics/index.js';
export type { Diagnostic } from './diagnostics/index.js';

// 配置与日志
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, logPerformance } from './utils/logger.js';

// 索引核心
export * from './lsp/index.js';

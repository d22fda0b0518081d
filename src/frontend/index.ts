/**
 * @module frontend
 *
 * 配置文件前端：词法分析、块结构解析与符号解码。
 *
 * 索引管线只通过 `ConfigParser` / `SymbolDecoder` 两个函数类型使用本模块，
 * 可以整体替换为其他实现。
 */

import type { Body } from '../types.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type { DecodeResult } from './decoder.js';

export { lex, TokenKind } from './lexer.js';
export type { Token, LexResult } from './lexer.js';
export { parse } from './parser.js';
export type { ParseResult } from './parser.js';
export { decode, blockDisplayName, isLocalModuleSource } from './decoder.js';
export type { DecodedSymbol, DecodedSymbolKind, DecodeResult, ModuleSource } from './decoder.js';

/** `bytes → syntax tree, diagnostics` */
export type ConfigParser = (text: string) => { body: Body; diagnostics: Diagnostic[] };

/** `syntax tree → symbols, diagnostics` */
export type SymbolDecoder = (body: Body) => DecodeResult;

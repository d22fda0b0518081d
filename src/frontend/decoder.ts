/**
 * @module decoder
 *
 * 语义解码器：从已解析的 Body 中提取工作区符号与本地模块引用。
 */

import type { Block, Body, Span } from '../types.js';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';

export type DecodedSymbolKind = 'block' | 'attribute';

export interface DecodedSymbol {
  /** 展示名，例如 `provider "github"` */
  readonly name: string;
  readonly kind: DecodedSymbolKind;
  /** 整个声明的范围 */
  readonly range: Span;
  /** 块头（类型与标签）或属性名的范围 */
  readonly selectionRange: Span;
}

export interface ModuleSource {
  readonly source: string;
  readonly span: Span;
}

export interface DecodeResult {
  readonly symbols: DecodedSymbol[];
  readonly moduleSources: ModuleSource[];
  readonly diagnostics: Diagnostic[];
}

/**
 * 生成块的展示名：块类型后跟带引号的标签。
 */
export function blockDisplayName(block: Pick<Block, 'type' | 'labels'>): string {
  return [block.type, ...block.labels.map(label => `"${label}"`)].join(' ');
}

export function decode(body: Body): DecodeResult {
  const symbols: DecodedSymbol[] = [];
  const moduleSources: ModuleSource[] = [];
  const diagnostics: Diagnostic[] = [];
  const seenAttributes = new Set<string>();

  for (const item of body.items) {
    if (item.kind === 'Attribute') {
      if (seenAttributes.has(item.name)) {
        diagnostics.push(Diagnostics.duplicateAttribute(item.name, item.nameSpan).build());
      }
      seenAttributes.add(item.name);
      symbols.push({
        name: item.name,
        kind: 'attribute',
        range: item.span,
        selectionRange: item.nameSpan,
      });
      continue;
    }

    symbols.push({
      name: blockDisplayName(item),
      kind: 'block',
      range: item.span,
      selectionRange: item.headerSpan,
    });

    if (item.type === 'module') {
      const source = item.body.items.find(
        (child): child is Extract<typeof child, { kind: 'Attribute' }> =>
          child.kind === 'Attribute' && child.name === 'source'
      );
      if (!source) continue;
      if (source.literal === undefined) {
        diagnostics.push(Diagnostics.nonLiteralModuleSource(source.span).build());
        continue;
      }
      moduleSources.push({ source: source.literal, span: source.span });
    }
  }

  return { symbols, moduleSources, diagnostics };
}

/**
 * 本地模块来源以 `./` 或 `../` 开头；registry、git 等远程来源不会被遍历。
 */
export function isLocalModuleSource(source: string): boolean {
  return source.startsWith('./') || source.startsWith('../') || source === '.' || source === '..';
}

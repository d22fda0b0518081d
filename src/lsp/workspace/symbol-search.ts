/**
 * LSP Workspace 符号搜索
 * 对当前索引快照做模糊子序列匹配、打分与排序
 */

import { SymbolKind, type WorkspaceSymbol } from 'vscode-languageserver-types';
import type { SymbolEntry } from './types.js';

/**
 * 打分权重。
 *
 * - 每个匹配字符 +MATCH
 * - 紧跟上一个匹配字符 +CONTIGUOUS
 * - 位于名称开头 +START，位于分隔符之后 +WORD_BOUNDARY
 * - 减去首个匹配字符的下标，最多减 MAX_LEADING_PENALTY
 */
export const FUZZY_WEIGHTS = {
  MATCH: 1,
  CONTIGUOUS: 5,
  START: 8,
  WORD_BOUNDARY: 3,
  MAX_LEADING_PENALTY: 10,
} as const;

const SEPARATORS = new Set([' ', '"', '_', '-', '.', '/']);

export interface FuzzyMatch {
  score: number;
  positions: number[];
}

// 逐个 UTF-16 单元折叠大小写，保证下标与原名称一致；折叠后长度变化的字符保持原样
function foldCase(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const lower = ch.toLowerCase();
    out += lower.length === 1 ? lower : ch;
  }
  return out;
}

function scorePositions(name: string, positions: readonly number[]): number {
  let score = 0;
  let previous = -2;
  for (const pos of positions) {
    score += FUZZY_WEIGHTS.MATCH;
    if (pos === previous + 1) score += FUZZY_WEIGHTS.CONTIGUOUS;
    if (pos === 0) {
      score += FUZZY_WEIGHTS.START;
    } else if (SEPARATORS.has(name.charAt(pos - 1))) {
      score += FUZZY_WEIGHTS.WORD_BOUNDARY;
    }
    previous = pos;
  }
  const first = positions[0] ?? 0;
  return score - Math.min(first, FUZZY_WEIGHTS.MAX_LEADING_PENALTY);
}

/**
 * 大小写不敏感的子序列匹配。
 *
 * 对查询首字符在名称中的每个出现位置各做一次贪心匹配，取得分最高者
 * （同分取起点最早者）。不匹配时返回 null。
 */
export function fuzzyMatch(name: string, query: string): FuzzyMatch | null {
  if (query.length === 0) return { score: 0, positions: [] };

  const haystack = foldCase(name);
  const needle = foldCase(query);
  const head = needle.charAt(0);
  let best: FuzzyMatch | null = null;

  for (let start = haystack.indexOf(head); start !== -1; start = haystack.indexOf(head, start + 1)) {
    const positions = [start];
    let cursor = start + 1;
    for (let qi = 1; qi < needle.length; qi++) {
      const found = haystack.indexOf(needle.charAt(qi), cursor);
      if (found === -1) break;
      positions.push(found);
      cursor = found + 1;
    }
    if (positions.length !== needle.length) break;

    const score = scorePositions(name, positions);
    if (!best || score > best.score) {
      best = { score, positions };
    }
  }

  return best;
}

/**
 * 在规范顺序的符号列表上执行查询。
 * 空查询返回全部符号；否则按得分降序，同分保持规范顺序。
 */
export function searchSymbols(entries: readonly SymbolEntry[], query: string): SymbolEntry[] {
  if (query.length === 0) return [...entries];

  const scored: Array<{ entry: SymbolEntry; score: number; index: number }> = [];
  entries.forEach((entry, index) => {
    const match = fuzzyMatch(entry.symbol.name, query);
    if (match) scored.push({ entry, score: match.score, index });
  });

  scored.sort((a, b) => b.score - a.score || a.index - b.index);
  return scored.map(item => item.entry);
}

/**
 * 转换为 workspace/symbol 响应项
 */
export function formatWorkspaceSymbol(entry: SymbolEntry): WorkspaceSymbol {
  const { symbol } = entry;
  return {
    name: symbol.name,
    kind: symbol.kind === 'attribute' ? SymbolKind.Variable : SymbolKind.Class,
    location: { uri: symbol.uri, range: symbol.range },
  };
}

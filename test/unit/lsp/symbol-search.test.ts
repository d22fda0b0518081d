import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SymbolKind } from 'vscode-languageserver-types';
import {
  FUZZY_WEIGHTS,
  formatWorkspaceSymbol,
  fuzzyMatch,
  searchSymbols,
} from '../../../src/lsp/workspace/symbol-search.js';
import { createDocumentRecord } from '../../../src/lsp/workspace/document-store.js';
import type { SymbolEntry } from '../../../src/lsp/workspace/types.js';
import type { DecodedSymbolKind } from '../../../src/frontend/decoder.js';
import { range } from '../../helpers/test-utils.js';

function entry(name: string, kind: DecodedSymbolKind = 'block', file = 'main.tf'): SymbolEntry {
  const uri = `file:///ws/${file}`;
  return {
    symbol: { name, kind, range: range(0, 0, 0, name.length + 3), selectionRange: range(0, 0, 0, name.length), uri },
    document: createDocumentRecord({ uri, path: `/ws/${file}`, relativePath: file }),
  };
}

function names(entries: SymbolEntry[]): string[] {
  return entries.map(e => e.symbol.name);
}

describe('fuzzyMatch', () => {
  it('名称开头的连续匹配得分最高', () => {
    assert.deepEqual(fuzzyMatch('myblock "custom"', 'myb'), { score: 21, positions: [0, 1, 2] });
  });

  it('从首字符的每个出现位置取最佳对齐', () => {
    // c@5 得 3 分，c@9 位于引号之后得 7 分
    assert.deepEqual(fuzzyMatch('myblock "custom"', 'cus'), { score: 7, positions: [9, 10, 11] });
  });

  it('大小写不敏感', () => {
    assert.equal(fuzzyMatch('Provider', 'PRO')?.score, 21);
  });

  it('小写形式变长的字符不影响匹配位置', () => {
    // k@3 位于 "_" 之后：4 + 6 + 6 - 3
    assert.deepEqual(fuzzyMatch('İİ_key', 'key'), { score: 13, positions: [3, 4, 5] });
    assert.deepEqual(fuzzyMatch('İİ_key', 'İ'), { score: 9, positions: [0] });
  });

  it('不是子序列时返回 null', () => {
    assert.equal(fuzzyMatch('provider "github"', 'myb'), null);
    assert.equal(fuzzyMatch('provider "github"', 'hubg'), null);
  });

  it('首字符位置的扣分有上限', () => {
    const name = `${'a'.repeat(20)}z`;
    assert.equal(fuzzyMatch(name, 'z')?.score, FUZZY_WEIGHTS.MATCH - FUZZY_WEIGHTS.MAX_LEADING_PENALTY);
  });

  it('空查询匹配任何名称', () => {
    assert.deepEqual(fuzzyMatch('anything', ''), { score: 0, positions: [] });
  });
});

describe('searchSymbols', () => {
  const entries = [
    entry('provider "github"', 'block', 'first.tf'),
    entry('provider "google"', 'block', 'second.tf'),
    entry('myblock "custom"', 'block', 'blah/third.tf'),
  ];

  it('空查询按规范顺序返回全部符号的副本', () => {
    const result = searchSymbols(entries, '');

    assert.deepEqual(names(result), ['provider "github"', 'provider "google"', 'myblock "custom"']);
    assert.notEqual(result, entries);
  });

  it('子序列查询排除不匹配的符号', () => {
    assert.deepEqual(names(searchSymbols(entries, 'myb')), ['myblock "custom"']);
  });

  it('同分时保持规范顺序', () => {
    assert.deepEqual(names(searchSymbols(entries, 'g')), ['provider "github"', 'provider "google"']);
  });

  it('得分高的结果排在前面', () => {
    const ranked = searchSymbols([entry('data "x"'), entry('xylo')], 'x');
    assert.deepEqual(names(ranked), ['xylo', 'data "x"']);
  });

  it('没有匹配时返回空数组', () => {
    assert.deepEqual(searchSymbols(entries, 'zzz'), []);
  });
});

describe('formatWorkspaceSymbol', () => {
  it('块映射为 Class，属性映射为 Variable', () => {
    const block = formatWorkspaceSymbol(entry('provider "github"'));
    const attribute = formatWorkspaceSymbol(entry('region', 'attribute'));

    assert.deepEqual(block, {
      name: 'provider "github"',
      kind: SymbolKind.Class,
      location: { uri: 'file:///ws/main.tf', range: range(0, 0, 0, 20) },
    });
    assert.equal(block.kind, 5);
    assert.equal(attribute.kind, SymbolKind.Variable);
  });
});

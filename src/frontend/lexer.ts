/**
 * @module lexer
 *
 * 词法分析器：将配置文件文本转换为 Token 流。
 *
 * **功能**：
 * - 识别标识符、字符串、数字和结构性标点（花括号、方括号、等号等）
 * - 跳过 `#`、`//` 与 `/* *\/` 注释
 * - 将 heredoc（`<<EOF` / `<<-EOF`）整体作为一个 STRING token
 * - 字符串内的 `${...}` / `%{...}` 模板允许嵌套字符串
 *
 * 所有位置都是零基的 line/character，character 以 UTF-16 码元计。
 */

import type { Position } from '../types.js';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';

export enum TokenKind {
  EOF = 'EOF',
  NEWLINE = 'NEWLINE',
  IDENT = 'IDENT',
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',
  LBRACKET = 'LBRACKET',
  RBRACKET = 'RBRACKET',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  EQUALS = 'EQUALS',
  COMMA = 'COMMA',
  OTHER = 'OTHER',
}

export interface Token {
  readonly kind: TokenKind;
  /** STRING 为解码后的内容，其余为源文本 */
  readonly value: string;
  readonly start: Position;
  readonly end: Position;
  readonly offset: number;
  readonly endOffset: number;
  /** 字符串中含有 `${` 或 `%{` 模板 */
  readonly template?: boolean;
}

export interface LexResult {
  readonly tokens: Token[];
  readonly diagnostics: Diagnostic[];
}

const PUNCTUATION: Record<string, TokenKind> = {
  '{': TokenKind.LBRACE,
  '}': TokenKind.RBRACE,
  '[': TokenKind.LBRACKET,
  ']': TokenKind.RBRACKET,
  '(': TokenKind.LPAREN,
  ')': TokenKind.RPAREN,
  '=': TokenKind.EQUALS,
  ',': TokenKind.COMMA,
};

// `==`、`=>` 等运算符不能被当作属性赋值
const EQUALS_FOLLOWERS = new Set(['=', '>']);

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_-]/.test(ch);
}

function isDigit(ch: string): boolean {
  return /[0-9]/.test(ch);
}

class Cursor {
  offset = 0;
  line = 0;
  character = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.offset >= this.text.length;
  }

  peek(ahead = 0): string {
    return this.text.charAt(this.offset + ahead);
  }

  position(): Position {
    return { line: this.line, character: this.character };
  }

  advance(): string {
    const ch = this.text.charAt(this.offset);
    this.offset++;
    if (ch === '\n') {
      this.line++;
      this.character = 0;
    } else {
      this.character++;
    }
    return ch;
  }

  startsWith(s: string): boolean {
    return this.text.startsWith(s, this.offset);
  }
}

/**
 * 对输入文本做词法分析。
 *
 * 错误不会抛出，而是以诊断形式返回，token 流始终以 EOF 结尾。
 */
export function lex(text: string): LexResult {
  const cur = new Cursor(text);
  const tokens: Token[] = [];
  const diagnostics: Diagnostic[] = [];

  const push = (kind: TokenKind, value: string, start: Position, offset: number, extra?: { template?: boolean }): void => {
    const token: Token = { kind, value, start, end: cur.position(), offset, endOffset: cur.offset, ...extra };
    tokens.push(token);
  };

  while (!cur.done) {
    const ch = cur.peek();
    const start = cur.position();
    const offset = cur.offset;

    if (ch === '\n') {
      cur.advance();
      push(TokenKind.NEWLINE, '\n', start, offset);
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      cur.advance();
      continue;
    }
    if (ch === '#' || cur.startsWith('//')) {
      while (!cur.done && cur.peek() !== '\n') cur.advance();
      continue;
    }
    if (cur.startsWith('/*')) {
      cur.advance();
      cur.advance();
      while (!cur.done && !cur.startsWith('*/')) cur.advance();
      if (cur.done) {
        diagnostics.push(Diagnostics.unterminatedComment(start).build());
      } else {
        cur.advance();
        cur.advance();
      }
      continue;
    }
    if (cur.startsWith('<<') && /[-A-Za-z_]/.test(cur.peek(2))) {
      const heredoc = readHeredoc(cur, diagnostics);
      if (heredoc !== null) {
        push(TokenKind.STRING, heredoc, start, offset, { template: true });
        continue;
      }
    }
    if (ch === '"') {
      const { value, template } = readString(cur, diagnostics);
      push(TokenKind.STRING, value, start, offset, template ? { template } : undefined);
      continue;
    }
    if (isIdentStart(ch)) {
      while (!cur.done && isIdentPart(cur.peek())) cur.advance();
      push(TokenKind.IDENT, text.slice(offset, cur.offset), start, offset);
      continue;
    }
    if (isDigit(ch)) {
      while (!cur.done && /[0-9.eE]/.test(cur.peek())) cur.advance();
      push(TokenKind.NUMBER, text.slice(offset, cur.offset), start, offset);
      continue;
    }

    const punct = PUNCTUATION[ch];
    if (punct === TokenKind.EQUALS && EQUALS_FOLLOWERS.has(cur.peek(1))) {
      cur.advance();
      cur.advance();
      push(TokenKind.OTHER, text.slice(offset, cur.offset), start, offset);
      continue;
    }
    cur.advance();
    push(punct ?? TokenKind.OTHER, ch, start, offset);
  }

  tokens.push({
    kind: TokenKind.EOF,
    value: '',
    start: cur.position(),
    end: cur.position(),
    offset: cur.offset,
    endOffset: cur.offset,
  });
  return { tokens, diagnostics };
}

/**
 * 读取双引号字符串（光标位于开引号）。
 * 普通字符串不能跨行；模板插值内部允许换行与嵌套字符串。
 */
function readString(cur: Cursor, diagnostics: Diagnostic[]): { value: string; template: boolean } {
  const start = cur.position();
  cur.advance();
  let value = '';
  let template = false;

  while (!cur.done) {
    const ch = cur.peek();
    if (ch === '"') {
      cur.advance();
      return { value, template };
    }
    if (ch === '\n') break;
    if (ch === '\\') {
      cur.advance();
      value += unescape(cur.advance());
      continue;
    }
    if (cur.startsWith('$${') || cur.startsWith('%%{')) {
      value += cur.advance();
      cur.advance();
      value += cur.advance();
      continue;
    }
    if (cur.startsWith('${') || cur.startsWith('%{')) {
      template = true;
      const exprStart = cur.offset;
      skipTemplate(cur, diagnostics);
      value += cur.text.slice(exprStart, cur.offset);
      continue;
    }
    value += cur.advance();
  }

  diagnostics.push(Diagnostics.unterminatedString(start).build());
  return { value, template };
}

function skipTemplate(cur: Cursor, diagnostics: Diagnostic[]): void {
  cur.advance();
  cur.advance();
  let depth = 1;
  while (!cur.done && depth > 0) {
    const ch = cur.peek();
    if (ch === '"') {
      readString(cur, diagnostics);
      continue;
    }
    if (ch === '{') depth++;
    if (ch === '}') depth--;
    cur.advance();
  }
}

function unescape(ch: string): string {
  switch (ch) {
    case 'n': return '\n';
    case 't': return '\t';
    case 'r': return '\r';
    default: return ch;
  }
}

/**
 * 读取 heredoc；标记后不是换行时返回 null，调用方按普通符号继续处理。
 */
function readHeredoc(cur: Cursor, diagnostics: Diagnostic[]): string | null {
  const match = /^<<(-?)([A-Za-z_][A-Za-z0-9_]*)\r?\n/.exec(cur.text.slice(cur.offset));
  if (!match) return null;
  const marker = match[2] ?? '';
  const start = cur.position();
  for (let i = 0; i < match[0].length; i++) cur.advance();

  const lines: string[] = [];
  while (!cur.done) {
    let line = '';
    while (!cur.done && cur.peek() !== '\n') line += cur.advance();
    if (line.trim() === marker) {
      return lines.join('\n');
    }
    lines.push(line.replace(/\r$/, ''));
    if (!cur.done) cur.advance();
  }

  diagnostics.push(Diagnostics.unterminatedHeredoc(marker, start).build());
  return lines.join('\n');
}

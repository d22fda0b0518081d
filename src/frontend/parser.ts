/**
 * @module parser
 *
 * 块结构解析器：把 token 流组装成由块（block）和属性（attribute）组成的 Body。
 *
 * 只识别结构，不解析表达式：属性值保留原始文本，
 * 单个字符串字面量额外给出解码值（供模块 source 解析使用）。
 *
 * 遇到错误时记录诊断并跳到下一行继续，保证部分损坏的文件仍能产出已识别的块。
 */

import type { Attribute, Block, Body, BodyItem, Position, Span } from '../types.js';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import { lex, TokenKind, type Token } from './lexer.js';

export interface ParseResult {
  readonly body: Body;
  readonly diagnostics: Diagnostic[];
}

const OPENERS = new Set([TokenKind.LBRACE, TokenKind.LBRACKET, TokenKind.LPAREN]);
const CLOSERS = new Set([TokenKind.RBRACE, TokenKind.RBRACKET, TokenKind.RPAREN]);

class Parser {
  private pos = 0;
  readonly diagnostics: Diagnostic[] = [];

  constructor(
    private readonly text: string,
    private readonly tokens: readonly Token[]
  ) {}

  private peek(ahead = 0): Token {
    const index = Math.min(this.pos + ahead, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) throw new Error('Token stream is empty');
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== TokenKind.EOF) this.pos++;
    return token;
  }

  private skipNewlines(): void {
    while (this.peek().kind === TokenKind.NEWLINE) this.pos++;
  }

  parseBody(nested: boolean): Body {
    const items: BodyItem[] = [];

    for (;;) {
      this.skipNewlines();
      const token = this.peek();
      if (token.kind === TokenKind.EOF) break;
      if (token.kind === TokenKind.RBRACE) {
        if (nested) break;
        this.diagnostics.push(Diagnostics.unbalancedBrace(spanOf(token)).build());
        this.next();
        continue;
      }
      if (token.kind !== TokenKind.IDENT) {
        this.diagnostics.push(Diagnostics.expectedIdentifier(describe(token), spanOf(token)).build());
        this.recover();
        continue;
      }

      const item = this.parseItem();
      if (item) items.push(item);
    }

    return { items };
  }

  private parseItem(): BodyItem | null {
    const name = this.next();
    const following = this.peek();

    if (following.kind === TokenKind.EQUALS) {
      const equals = this.next();
      return this.parseAttribute(name, equals);
    }
    if (
      following.kind === TokenKind.STRING ||
      following.kind === TokenKind.IDENT ||
      following.kind === TokenKind.LBRACE
    ) {
      return this.parseBlock(name);
    }

    this.diagnostics.push(Diagnostics.expectedBlockOrAttribute(name.value, spanOf(name)).build());
    this.recover();
    return null;
  }

  private parseAttribute(name: Token, equals: Token): Attribute {
    const valueTokens: Token[] = [];
    let depth = 0;

    for (;;) {
      const token = this.peek();
      if (token.kind === TokenKind.EOF) break;
      if (depth === 0 && (token.kind === TokenKind.NEWLINE || token.kind === TokenKind.RBRACE)) break;
      if (OPENERS.has(token.kind)) depth++;
      if (CLOSERS.has(token.kind)) depth = Math.max(0, depth - 1);
      // Multi-line collections and calls span newlines.
      if (token.kind !== TokenKind.NEWLINE) valueTokens.push(token);
      this.next();
    }

    const first = valueTokens[0];
    const last = valueTokens[valueTokens.length - 1];
    if (!first) {
      this.diagnostics.push(Diagnostics.missingAttributeValue(name.value, spanOf(equals)).build());
    }
    const end = last ? last.end : name.end;
    const expr = first && last ? this.text.slice(first.offset, last.endOffset).trim() : '';
    const attribute: Attribute = {
      kind: 'Attribute',
      name: name.value,
      span: { start: name.start, end },
      nameSpan: spanOf(name),
      expr,
      ...(valueTokens.length === 1 && first?.kind === TokenKind.STRING && !first.template
        ? { literal: first.value }
        : {}),
    };
    return attribute;
  }

  private parseBlock(typeToken: Token): Block {
    const labels: string[] = [];
    let headerEnd: Position = typeToken.end;

    while (this.peek().kind === TokenKind.STRING || this.peek().kind === TokenKind.IDENT) {
      const label = this.next();
      labels.push(label.value);
      headerEnd = label.end;
    }

    const headerSpan: Span = { start: typeToken.start, end: headerEnd };
    const open = this.peek();
    if (open.kind !== TokenKind.LBRACE) {
      this.diagnostics.push(Diagnostics.unexpectedToken(describe(open), spanOf(open)).build());
      this.recover();
      return {
        kind: 'Block',
        type: typeToken.value,
        labels,
        span: headerSpan,
        headerSpan,
        body: { items: [] },
        closed: false,
      };
    }
    this.next();

    const body = this.parseBody(true);
    const close = this.peek();
    let closed = false;
    let end: Position;
    if (close.kind === TokenKind.RBRACE) {
      this.next();
      closed = true;
      end = close.end;
    } else {
      end = this.lastConsumedEnd(open.end);
      this.diagnostics.push(
        Diagnostics.unclosedBlock(typeToken.value, { start: typeToken.start, end }).build()
      );
    }

    return {
      kind: 'Block',
      type: typeToken.value,
      labels,
      span: { start: typeToken.start, end },
      headerSpan,
      body,
      closed,
    };
  }

  private lastConsumedEnd(fallback: Position): Position {
    for (let i = this.pos - 1; i >= 0; i--) {
      const token = this.tokens[i];
      if (token && token.kind !== TokenKind.NEWLINE) return token.end;
    }
    return fallback;
  }

  /** 跳到下一行（忽略嵌套括号中的换行） */
  private recover(): void {
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.kind === TokenKind.EOF) return;
      if (depth === 0 && token.kind === TokenKind.NEWLINE) return;
      if (OPENERS.has(token.kind)) depth++;
      if (CLOSERS.has(token.kind)) {
        // 外层块的右花括号留给调用方
        if (depth === 0 && token.kind === TokenKind.RBRACE) return;
        depth = Math.max(0, depth - 1);
      }
      this.next();
    }
  }
}

function spanOf(token: Token): Span {
  return { start: token.start, end: token.end };
}

function describe(token: Token): string {
  switch (token.kind) {
    case TokenKind.EOF:
      return 'end of file';
    case TokenKind.NEWLINE:
      return 'end of line';
    case TokenKind.STRING:
      return 'string literal';
    default:
      return `"${token.value}"`;
  }
}

/**
 * 解析配置文件文本。
 * @param text 文件内容
 * @returns 顶层 Body 与词法/语法诊断
 */
export function parse(text: string): ParseResult {
  const { tokens, diagnostics: lexDiagnostics } = lex(text);
  const parser = new Parser(text, tokens);
  const body = parser.parseBody(false);
  return { body, diagnostics: [...lexDiagnostics, ...parser.diagnostics] };
}

// Core syntax types for configuration files

/** Zero-based line/character position; `character` counts UTF-16 code units. */
export interface Position {
  readonly line: number;
  readonly character: number;
}

/** Half-open range: `end` points just past the last character. */
export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export interface Attribute {
  readonly kind: 'Attribute';
  readonly name: string;
  readonly span: Span;
  readonly nameSpan: Span;
  /** 值表达式的原始文本（已去除首尾空白） */
  readonly expr: string;
  /** 当值是单个字符串字面量时的解码结果 */
  readonly literal?: string;
}

export interface Block {
  readonly kind: 'Block';
  readonly type: string;
  readonly labels: readonly string[];
  readonly span: Span;
  /** 从块类型到最后一个标签的范围 */
  readonly headerSpan: Span;
  readonly body: Body;
  /** 缺少右花括号时为 false */
  readonly closed: boolean;
}

export type BodyItem = Attribute | Block;

export interface Body {
  readonly items: readonly BodyItem[];
}

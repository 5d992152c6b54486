/**
 * 词法 token 类型定义
 * token 流覆盖源码中的每一个字符（包括空白、注释与换行），
 * 所以拼接全部 token 的 src 即可还原源码。
 */

export type TokenKind =
  | "NAME"
  | "NUMBER"
  | "STRING"
  | "OP"
  | "COMMENT"
  | "NEWLINE"
  | "NL"
  | "INDENT"
  | "DEDENT"
  | "ENDMARKER"
  | "UNIMPORTANT_WS"
  | "ESCAPED_NL"
  // 改写时插入的合成 token，没有源码位置
  | "CODE";

/**
 * 源码位置：line 从 1 开始，col 从 0 开始（行内 UTF-16 偏移）
 */
export interface Offset {
  readonly line: number;
  readonly col: number;
}

export interface Token {
  kind: TokenKind;
  src: string;
  line?: number;
  col?: number;
}

/**
 * tokenizer 直接产出的 token 一定带位置
 */
export interface SourceToken extends Token {
  line: number;
  col: number;
}

/**
 * 以字符串作为 Map 键，用于连接语法树节点与 token
 */
export type OffsetKey = `${number}:${number}`;

export function offsetKey(offset: Offset): OffsetKey {
  return `${offset.line}:${offset.col}`;
}

/**
 * 获取 token 的起始位置；合成 token 返回 null
 */
export function tokenOffset(token: Token): Offset | null {
  if (token.line === undefined || token.col === undefined) {
    return null;
  }
  return { line: token.line, col: token.col };
}

/**
 * 计算 token 结束位置（不含），多行字符串需要按换行重新计数
 */
export function tokenEnd(token: SourceToken): Offset {
  const lines = token.src.split(/\r\n|\r|\n/);
  if (lines.length === 1) {
    return { line: token.line, col: token.col + token.src.length };
  }
  return {
    line: token.line + lines.length - 1,
    col: lines[lines.length - 1].length,
  };
}

/**
 * 把 token 序列还原为源码文本
 */
export function tokensToSrc(tokens: readonly Token[]): string {
  let out = "";
  for (const token of tokens) {
    out += token.src;
  }
  return out;
}

/**
 * token 流上的查找与编辑工具，供 fixer 的改写函数使用
 * 所有函数都只从给定下标向后扫描，调用方只需持有锚点下标。
 */

import type { SyntaxNode } from "./ast";
import type { Token, TokenKind } from "./tokens";

const LINE_PREFIX_KINDS = new Set<TokenKind>(["UNIMPORTANT_WS", "INDENT", "DEDENT"]);
const LINE_END_KINDS = new Set<TokenKind>(["NEWLINE", "NL"]);

function tokenAt(tokens: readonly Token[], i: number): Token {
  const token = tokens[i];
  if (token === undefined) {
    throw new RangeError(`token index ${i} out of range`);
  }
  return token;
}

/**
 * 从 i 开始向后查找第一个匹配的 token
 * @throws RangeError 找不到时
 */
export function find(
  tokens: readonly Token[],
  i: number,
  kind: TokenKind,
  src?: string
): number {
  for (let j = i; j < tokens.length; j++) {
    const token = tokens[j];
    if (token.kind === kind && (src === undefined || token.src === src)) {
      return j;
    }
  }
  throw new RangeError(`no ${kind} token${src === undefined ? "" : ` '${src}'`} after index ${i}`);
}

/**
 * 节点最后一个 token 的下标（节点结束位置之前的最后一个 token）
 */
export function findLastToken(
  tokens: readonly Token[],
  i: number,
  node: SyntaxNode
): number {
  const { end } = node;
  let j = i;
  while (j < tokens.length && (tokenAt(tokens, j).line ?? 0) < end.line) {
    j++;
  }
  while (j < tokens.length && (tokenAt(tokens, j).col ?? 0) < end.col) {
    j++;
  }
  return j - 1;
}

/**
 * [start, end] 范围的 token 是否独占一行（前有缩进，前后均为 NL）
 */
export function aloneOnLine(
  tokens: readonly Token[],
  start: number,
  end: number
): boolean {
  return (
    start >= 2 &&
    tokens[start - 1]?.kind === "UNIMPORTANT_WS" &&
    tokens[start - 2]?.kind === "NL" &&
    tokens[end + 1]?.kind === "NL"
  );
}

/**
 * 在 i 处插入一段合成代码
 */
export function insert(tokens: Token[], i: number, newSrc: string): void {
  tokens.splice(i, 0, { kind: "CODE", src: newSrc });
}

/**
 * 删除从 i 开始的语句节点
 *
 * 独占一行时连同缩进、行尾注释与换行整行删除；
 * 与其他语句共用一行时连同相邻的一个 `;` 删除。
 */
export function eraseNode(tokens: Token[], i: number, node: SyntaxNode): void {
  const last = findLastToken(tokens, i, node);

  let lineStart = i;
  while (lineStart > 0 && LINE_PREFIX_KINDS.has(tokenAt(tokens, lineStart - 1).kind)) {
    lineStart--;
  }
  const startsLine =
    lineStart === 0 || LINE_END_KINDS.has(tokenAt(tokens, lineStart - 1).kind);

  let after = last + 1;
  while (
    after < tokens.length &&
    (tokens[after].kind === "UNIMPORTANT_WS" || tokens[after].kind === "COMMENT")
  ) {
    after++;
  }
  const endsLine = after < tokens.length && LINE_END_KINDS.has(tokens[after].kind);

  if (startsLine && endsLine) {
    tokens.splice(lineStart, after + 1 - lineStart);
    return;
  }

  // `a; b` 中删除 a：连同其后的 `;` 与空白
  if (tokens[after]?.kind === "OP" && tokens[after].src === ";") {
    let end = after + 1;
    while (end < tokens.length && tokens[end].kind === "UNIMPORTANT_WS") {
      end++;
    }
    tokens.splice(i, end - i);
    return;
  }

  // `a; b` 中删除 b：连同其前的 `;` 与空白
  let before = i - 1;
  while (before >= 0 && tokens[before].kind === "UNIMPORTANT_WS") {
    before--;
  }
  if (tokens[before]?.kind === "OP" && tokens[before].src === ";") {
    tokens.splice(before, last + 1 - before);
    return;
  }

  tokens.splice(i, last + 1 - i);
}

/**
 * Text Patcher
 * 把遍历收集的改写函数应用到 token 列表上。
 * 从后向前处理，保证尚未处理的 token 下标不受前面改写的影响。
 */

import type { Token } from "../python/tokens";
import { offsetKey, tokenOffset } from "../python/tokens";
import type { TokenFunc } from "./registry";
import type { EditMap } from "./visitor";

/**
 * 把 `UNIMPORTANT_WS, DEDENT` 调整为 `DEDENT, UNIMPORTANT_WS`
 */
export function normalizeStructuralMarkers(tokens: Token[]): void {
  for (let i = 0; i < tokens.length - 1; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];
    if (token.kind === "UNIMPORTANT_WS" && next.kind === "DEDENT") {
      tokens[i] = next;
      tokens[i + 1] = token;
    }
  }
}

/**
 * 逆序应用改写
 *
 * 锚点按原始 token 顺序从后向前处理，每次按对象重新定位下标：
 * 改写函数删掉锚点之前的 token（例如整行删除时的缩进）不会让后续锚点错位，
 * 已被其他改写删除的锚点直接跳过。src 为空的 token 不作为锚点。
 */
export function applyTokenEdits(tokens: Token[], edits: EditMap): void {
  if (edits.size === 0) {
    return;
  }

  const anchors: Array<[Token, readonly TokenFunc[]]> = [];
  for (const token of tokens) {
    if (!token.src) continue;
    const offset = tokenOffset(token);
    const funcs = offset && edits.get(offsetKey(offset));
    if (funcs) {
      anchors.push([token, funcs]);
    }
  }

  let cursor = tokens.length - 1;
  for (let a = anchors.length - 1; a >= 0 && cursor >= 0; a--) {
    const [anchor, funcs] = anchors[a];
    const i = tokens.lastIndexOf(anchor, Math.min(cursor, tokens.length - 1));
    if (i === -1) {
      continue;
    }
    for (const func of funcs) {
      func(tokens, i);
    }
    cursor = i - 1;
  }
}

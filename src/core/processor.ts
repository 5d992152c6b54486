/**
 * 核心处理器
 * 解析 -> 遍历收集改写 -> 切分 token -> 逆序应用 -> 序列化
 * 任何阶段无法处理源码时原样返回输入。
 */

import type { Module } from "../python/ast";
import { PythonSyntaxError } from "../python/errors";
import { parse } from "../python/parser";
import type { Token } from "../python/tokens";
import { serialize, tokenize } from "../python/tokenizer";
import type { Settings } from "./config-normalizer";
import type { FixerRegistry } from "./registry";
import { applyTokenEdits, normalizeStructuralMarkers } from "./text-patcher";
import { visit } from "./visitor";

function tryParse(contents: string): Module | null {
  try {
    return parse(contents);
  } catch (error) {
    if (error instanceof PythonSyntaxError) {
      return null;
    }
    throw error;
  }
}

function tryTokenize(contents: string): Token[] | null {
  try {
    return tokenize(contents);
  } catch (error) {
    if (error instanceof PythonSyntaxError) {
      return null;
    }
    throw error;
  }
}

/**
 * 对一段源码应用全部生效的 fixer
 * fixer 回调与改写函数抛出的异常不做拦截
 */
export function applyFixers(
  contents: string,
  settings: Settings,
  filename: string,
  registry: FixerRegistry
): string {
  const tree = tryParse(contents);
  if (!tree) {
    return contents;
  }

  const edits = visit(tree, registry, settings, filename);
  if (edits.size === 0) {
    return contents;
  }

  const tokens = tryTokenize(contents);
  if (!tokens) {
    return contents;
  }

  normalizeStructuralMarkers(tokens);
  applyTokenEdits(tokens, edits);
  return serialize(tokens);
}

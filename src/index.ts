import { createSettings } from "./core/config-normalizer";
import type { RewriteOptions } from "./core/config-normalizer";
import { applyFixers } from "./core/processor";
import type { FixerRegistry } from "./core/registry";
import { createDefaultRegistry } from "./fixers";

// 导出核心模块
export * from "./core";
export { parse } from "./python/parser";
export { tokenize, serialize } from "./python/tokenizer";
export { ParseError, TokenizeError, PythonSyntaxError } from "./python/errors";
export type { Token, TokenKind, Offset } from "./python/tokens";
export type { SyntaxNode, NodeKind, Module } from "./python/ast";
export * from "./python/token-utils";

// 导出内置 fixer
export { createDefaultRegistry, registerDefaultFixers } from "./fixers";

// 导出文件处理
export { fixFile, processFiles, decodeUtf8, expandFilenames } from "./processFiles";
export type { FileIO, FileResult, FileStatus, FixOptions, ProcessResult } from "./types";
export { main } from "./cli";

/**
 * 改写一段源码字符串的便捷函数
 */
export function rewriteSource(
  source: string,
  options: RewriteOptions & { filename?: string } = {},
  registry: FixerRegistry = createDefaultRegistry()
): string {
  const settings = createSettings(options, registry.names());
  return applyFixers(source, settings, options.filename ?? "<string>", registry);
}

export default rewriteSource;

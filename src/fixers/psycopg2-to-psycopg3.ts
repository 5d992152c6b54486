/**
 * psycopg2 的导入改为 psycopg（3.x）
 */

import type { Import, ImportFrom, SyntaxNode } from "../python/ast";
import { astStartOffset } from "../python/ast-utils";
import { findLastToken } from "../python/token-utils";
import type { Token } from "../python/tokens";
import type { Fixer, FixerRegistry, TokenEdit } from "../core/registry";
import type { State } from "../core/shared-context";

export const PSYCOPG2_TO_PSYCOPG3 = "psycopg2_to_psycopg3";

// 旧模块名 -> 新模块名
const MODULE_MAP: ReadonlyMap<string, string> = new Map([["psycopg2", "psycopg"]]);

/**
 * 在语句范围内把第一个名为 name 的 token 替换为 replacement
 */
function replaceModuleName(
  tokens: Token[],
  i: number,
  node: SyntaxNode,
  name: string,
  replacement: string
): void {
  const last = findLastToken(tokens, i, node);
  for (let j = i; j <= last; j++) {
    const token = tokens[j];
    if (token.kind === "NAME" && token.src === name) {
      tokens[j] = { ...token, src: replacement };
      return;
    }
  }
}

function* visitImport(_state: State, node: Import): Generator<TokenEdit> {
  for (const alias of node.names) {
    const replacement = MODULE_MAP.get(alias.name);
    if (replacement !== undefined) {
      const { name } = alias;
      yield [
        astStartOffset(node),
        (tokens, i) => replaceModuleName(tokens, i, node, name, replacement),
      ];
    }
  }
}

function* visitImportFrom(_state: State, node: ImportFrom): Generator<TokenEdit> {
  const { module } = node;
  if (node.level !== 0 || module === null) {
    return;
  }
  const replacement = MODULE_MAP.get(module);
  if (replacement !== undefined) {
    yield [
      astStartOffset(node),
      (tokens, i) => replaceModuleName(tokens, i, node, module, replacement),
    ];
  }
}

export function registerPsycopg2ToPsycopg3(registry: FixerRegistry): Fixer {
  return registry
    .register(PSYCOPG2_TO_PSYCOPG3, { minVersion: [3, 0] })
    .on("Import", visitImport)
    .on("ImportFrom", visitImportFrom);
}

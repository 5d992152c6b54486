/**
 * 删除应用包 __init__.py 中模块级的 `default_app_config = "..."`
 * Django 3.2 起自动发现 AppConfig，该设置已弃用。
 */

import type { Assign, SyntaxNode } from "../python/ast";
import { astStartOffset, isStrConstant } from "../python/ast-utils";
import { eraseNode } from "../python/token-utils";
import type { Fixer, FixerRegistry, TokenEdit } from "../core/registry";
import type { State } from "../core/shared-context";

export const DEFAULT_APP_CONFIG = "default_app_config";

function* visitAssign(
  _state: State,
  node: Assign,
  parents: readonly SyntaxNode[]
): Generator<TokenEdit> {
  if (parents.length !== 1 || parents[0].kind !== "Module" || node.targets.length !== 1) {
    return;
  }
  const [target] = node.targets;
  if (
    target.kind === "Name" &&
    target.id === "default_app_config" &&
    isStrConstant(node.value)
  ) {
    yield [astStartOffset(node), (tokens, i) => eraseNode(tokens, i, node)];
  }
}

export function registerDefaultAppConfig(registry: FixerRegistry): Fixer {
  return registry
    .register(DEFAULT_APP_CONFIG, {
      minVersion: [3, 2],
      condition: (state) => state.looksLikeDunderInitFile,
    })
    .on("Assign", visitAssign);
}

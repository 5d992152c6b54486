/**
 * 删除给函数设置 `allow_tags = True` 的语句
 * Django 2.0 移除了 allow_tags，admin 中需要改用 format_html() / mark_safe()。
 */

import type { Assign } from "../python/ast";
import { astStartOffset } from "../python/ast-utils";
import { eraseNode } from "../python/token-utils";
import type { Fixer, FixerRegistry, TokenEdit } from "../core/registry";
import type { State } from "../core/shared-context";

export const ADMIN_ALLOW_TAGS = "admin_allow_tags";

function importsAdmin(state: State): boolean {
  return (
    state.importedFrom("django.contrib").has("admin") ||
    state.importedFrom("django.contrib.gis").has("admin")
  );
}

function* visitAssign(state: State, node: Assign): Generator<TokenEdit> {
  if (!importsAdmin(state) || node.targets.length !== 1) {
    return;
  }
  const [target] = node.targets;
  const { value } = node;
  if (
    target.kind === "Attribute" &&
    target.attr === "allow_tags" &&
    value.kind === "Constant" &&
    value.value.type === "bool" &&
    value.value.value
  ) {
    yield [astStartOffset(node), (tokens, i) => eraseNode(tokens, i, node)];
  }
}

export function registerAdminAllowTags(registry: FixerRegistry): Fixer {
  return registry
    .register(ADMIN_ALLOW_TAGS, { minVersion: [2, 0] })
    .on("Assign", visitAssign);
}

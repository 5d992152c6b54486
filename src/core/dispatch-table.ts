/**
 * 按当前文件的上下文挑选生效的 fixer，合并为 节点种类 -> 回调列表
 */

import type { NodeKind } from "../python/ast";
import type { FixerRegistry, NodeCallback } from "./registry";
import type { State } from "./shared-context";

export type DispatchTable = ReadonlyMap<NodeKind, readonly NodeCallback[]>;

export function buildDispatchTable(
  registry: FixerRegistry,
  state: State
): DispatchTable {
  const table = new Map<NodeKind, NodeCallback[]>();

  for (const fixer of registry.values()) {
    if (!state.settings.enabledFixers.has(fixer.name) || !fixer.appliesTo(state)) {
      continue;
    }
    for (const [kind, callbacks] of fixer.entries()) {
      const existing = table.get(kind);
      if (existing) {
        existing.push(...callbacks);
      } else {
        table.set(kind, [...callbacks]);
      }
    }
  }

  return table;
}

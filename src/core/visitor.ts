/**
 * 语法树遍历
 * 迭代式先序遍历（显式栈），对每个节点调用分发表中的回调，
 * 收集 位置 -> 改写函数 的映射；同一遍历中记录 django / unittest 的 from 导入。
 */

import type { ImportFrom, Module, SyntaxNode } from "../python/ast";
import { childNodes } from "../python/ast-utils";
import type { OffsetKey } from "../python/tokens";
import { offsetKey } from "../python/tokens";
import type { Settings } from "./config-normalizer";
import type { DispatchTable } from "./dispatch-table";
import { buildDispatchTable } from "./dispatch-table";
import type { FixerRegistry, TokenFunc } from "./registry";
import { State } from "./shared-context";

/**
 * 锚点位置 -> 按收集顺序排列的改写函数
 */
export type EditMap = Map<OffsetKey, TokenFunc[]>;

function isTrackedModule(module: string): boolean {
  return module === "django" || module === "unittest" || module.startsWith("django.");
}

/**
 * 记录绝对导入的 from 导入名称，跳过 `as` 重命名与 `*`
 */
function trackFromImport(state: State, node: ImportFrom): void {
  if (node.level !== 0 || node.module === null || !isTrackedModule(node.module)) {
    return;
  }
  state.recordFromImport(
    node.module,
    node.names
      .filter((alias) => alias.asname === null && alias.name !== "*")
      .map((alias) => alias.name)
  );
}

export function walk(
  tree: Module,
  table: DispatchTable,
  state: State
): EditMap {
  const edits: EditMap = new Map();
  const stack: Array<[SyntaxNode, readonly SyntaxNode[]]> = [[tree, []]];

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const [node, parents] = entry;

    for (const callback of table.get(node.kind) ?? []) {
      for (const [offset, func] of callback(state, node, parents)) {
        const key = offsetKey(offset);
        const queue = edits.get(key);
        if (queue) {
          queue.push(func);
        } else {
          edits.set(key, [func]);
        }
      }
    }

    // 回调执行之后才记录，导入语句自身的回调看不到它导入的名称
    if (node.kind === "ImportFrom") {
      trackFromImport(state, node);
    }

    const subparents = [...parents, node];
    const children = childNodes(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push([children[i], subparents]);
    }
  }

  return edits;
}

/**
 * 为单个文件创建上下文并遍历
 */
export function visit(
  tree: Module,
  registry: FixerRegistry,
  settings: Settings,
  filename: string
): EditMap {
  const state = new State(settings, filename);
  return walk(tree, buildDispatchTable(registry, state), state);
}

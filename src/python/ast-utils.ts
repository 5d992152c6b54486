/**
 * 语法树工具函数
 */

import type { NodeKind, NodeOfKind, SyntaxNode } from "./ast";
import type { Offset } from "./tokens";

/**
 * 判断任意值是否为语法树节点（Offset、ConstantValue 等普通对象没有 kind 字段）
 */
export function isSyntaxNode(value: unknown): value is SyntaxNode {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string"
  );
}

export function isNodeOfKind<K extends NodeKind>(
  node: SyntaxNode,
  kind: K
): node is NodeOfKind<K> {
  return node.kind === kind;
}

/**
 * 按字段声明顺序返回直接子节点
 */
export function childNodes(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  const fields: unknown[] = Object.values(node);
  for (const value of fields) {
    if (isSyntaxNode(value)) {
      children.push(value);
    } else if (Array.isArray(value)) {
      const items: unknown[] = value;
      for (const item of items) {
        if (isSyntaxNode(item)) {
          children.push(item);
        }
      }
    }
  }
  return children;
}

/**
 * 节点在源码中的起始位置，也是该节点改写回调锚定的 token 位置
 */
export function astStartOffset(node: SyntaxNode): Offset {
  return node.start;
}

/**
 * 节点是否为 str 常量（不含 f-string 与 bytes）
 */
export function isStrConstant(node: SyntaxNode | null): boolean {
  return (
    node !== null &&
    node.kind === "Constant" &&
    node.value.type === "str"
  );
}

/**
 * Fixer 注册中心
 * 每个 fixer 有唯一名称、最低目标版本和可选的启用条件，
 * 并按语法节点种类登记回调。
 */

import type { NodeKind, NodeOfKind, SyntaxNode } from "../python/ast";
import { isNodeOfKind } from "../python/ast-utils";
import type { Offset, Token } from "../python/tokens";
import type { TargetVersion } from "./config-normalizer";
import { compareVersions } from "./config-normalizer";
import type { State } from "./shared-context";

/**
 * 改写函数：收到完整 token 列表与锚点 token 的当前下标，原地修改列表
 */
export type TokenFunc = (tokens: Token[], i: number) => void;

/**
 * 回调产出的改写：锚点位置 + 改写函数
 */
export type TokenEdit = readonly [offset: Offset, func: TokenFunc];

/**
 * 节点回调；parents 为从根节点到直接父节点的祖先链
 */
export type NodeCallback<K extends NodeKind = NodeKind> = (
  state: State,
  node: NodeOfKind<K>,
  parents: readonly SyntaxNode[]
) => Iterable<TokenEdit>;

export type FixerCondition = (state: State) => boolean;

export interface FixerOptions {
  minVersion: TargetVersion;
  condition?: FixerCondition;
}

export class FixerRegistryError extends Error {
  readonly code = "FIXER001";

  constructor(message: string) {
    super(message);
    this.name = "FixerRegistryError";
  }
}

export class Fixer {
  private readonly callbacks = new Map<NodeKind, NodeCallback[]>();

  constructor(
    readonly name: string,
    readonly minVersion: TargetVersion,
    readonly condition: FixerCondition | null = null
  ) {}

  /**
   * 为某种节点登记回调，同一种类可登记多个，按登记顺序调用
   */
  on<K extends NodeKind>(kind: K, callback: NodeCallback<K>): this {
    const dispatch: NodeCallback = (state, node, parents) =>
      isNodeOfKind(node, kind) ? callback(state, node, parents) : [];

    const existing = this.callbacks.get(kind);
    if (existing) {
      existing.push(dispatch);
    } else {
      this.callbacks.set(kind, [dispatch]);
    }
    return this;
  }

  /**
   * 目标版本不低于 minVersion 且满足启用条件
   */
  appliesTo(state: State): boolean {
    if (compareVersions(this.minVersion, state.settings.targetVersion) > 0) {
      return false;
    }
    return this.condition === null || this.condition(state);
  }

  entries(): IterableIterator<[NodeKind, readonly NodeCallback[]]> {
    return this.callbacks.entries();
  }
}

export class FixerRegistry {
  private readonly fixers = new Map<string, Fixer>();

  /**
   * @throws FixerRegistryError 名称已被注册
   */
  register(name: string, options: FixerOptions): Fixer {
    if (this.fixers.has(name)) {
      throw new FixerRegistryError(`Fixer '${name}' is already registered`);
    }
    const fixer = new Fixer(name, options.minVersion, options.condition ?? null);
    this.fixers.set(name, fixer);
    return fixer;
  }

  get(name: string): Fixer | undefined {
    return this.fixers.get(name);
  }

  has(name: string): boolean {
    return this.fixers.has(name);
  }

  /**
   * 按名称排序的全部 fixer 名称
   */
  names(): string[] {
    return [...this.fixers.keys()].sort();
  }

  /**
   * 按注册顺序遍历
   */
  values(): IterableIterator<Fixer> {
    return this.fixers.values();
  }

  get size(): number {
    return this.fixers.size;
  }
}

/**
 * 配置规范化模块
 * 统一的配置处理中心，把命令行或 API 传入的原始选项规范化为 Settings
 */

/**
 * Django 版本 (major, minor)
 */
export type TargetVersion = readonly [major: number, minor: number];

/**
 * 支持的目标版本，按从旧到新排列
 */
export const TARGET_VERSIONS: readonly TargetVersion[] = [
  [1, 7],
  [1, 8],
  [1, 9],
  [1, 10],
  [1, 11],
  [2, 0],
  [2, 1],
  [2, 2],
  [3, 0],
  [3, 1],
  [3, 2],
  [4, 0],
  [4, 1],
  [4, 2],
  [5, 0],
  [5, 1],
];

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  TARGET_VERSION: "2.2",
  EXIT_ZERO_EVEN_IF_CHANGED: false,
  // 以 "-" 作为文件名时读标准输入、写标准输出
  STDIN_FILENAME: "-",
} as const;

/**
 * 原始选项，所有字段可选
 */
export interface RewriteOptions {
  targetVersion?: string | TargetVersion;
  only?: readonly string[];
  skip?: readonly string[];
}

/**
 * 规范化后的设置，所有字段都有确定的值
 */
export interface Settings {
  readonly targetVersion: TargetVersion;
  readonly enabledFixers: ReadonlySet<string>;
}

/**
 * 配置错误，code 对应 error-handler 中的错误代码
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly params: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function formatVersion(version: TargetVersion): string {
  return `${version[0]}.${version[1]}`;
}

/**
 * 比较两个版本，a < b 返回负数，相等返回 0
 */
export function compareVersions(a: TargetVersion, b: TargetVersion): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * 解析 "X.Y" 形式的目标版本
 * @throws ConfigError 不在 TARGET_VERSIONS 中
 */
export function parseTargetVersion(value: string): TargetVersion {
  const version = TARGET_VERSIONS.find((v) => formatVersion(v) === value.trim());
  if (!version) {
    const choices = TARGET_VERSIONS.map(formatVersion).join(", ");
    throw new ConfigError(`Unknown target version: '${value}'`, "CONFIG002", [
      value,
      choices,
    ]);
  }
  return version;
}

function normalizeTargetVersion(value: string | TargetVersion | undefined): TargetVersion {
  if (value === undefined) {
    return parseTargetVersion(CONFIG_DEFAULTS.TARGET_VERSION);
  }
  return typeof value === "string" ? parseTargetVersion(value) : parseTargetVersion(formatVersion(value));
}

function checkFixerNames(names: readonly string[], known: ReadonlySet<string>): void {
  for (const name of names) {
    if (!known.has(name)) {
      throw new ConfigError(`Unknown fixer: '${name}'`, "CONFIG003", [`'${name}'`]);
    }
  }
}

/**
 * 规范化选项
 * only 为空或缺省表示启用全部 fixer；skip 在 only 之后生效
 * @param fixerNames 已注册的全部 fixer 名称
 */
export function createSettings(
  options: RewriteOptions,
  fixerNames: Iterable<string>
): Settings {
  const known = new Set(fixerNames);
  const only = options.only ?? [];
  const skip = options.skip ?? [];
  checkFixerNames(only, known);
  checkFixerNames(skip, known);

  const enabledFixers = new Set<string>();
  for (const name of known) {
    if ((only.length === 0 || only.includes(name)) && !skip.includes(name)) {
      enabledFixers.add(name);
    }
  }

  return {
    targetVersion: normalizeTargetVersion(options.targetVersion),
    enabledFixers,
  };
}

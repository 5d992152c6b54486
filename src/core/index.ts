/**
 * 核心模块索引文件
 * 导出核心处理器和相关类型
 */

export { applyFixers } from "./processor";
export { walk, visit } from "./visitor";
export type { EditMap } from "./visitor";
export { applyTokenEdits, normalizeStructuralMarkers } from "./text-patcher";
export { buildDispatchTable } from "./dispatch-table";
export type { DispatchTable } from "./dispatch-table";
export { Fixer, FixerRegistry, FixerRegistryError } from "./registry";
export type {
  FixerCondition,
  FixerOptions,
  NodeCallback,
  TokenEdit,
  TokenFunc,
} from "./registry";
export { State } from "./shared-context";

// 导出配置规范化系统
export {
  CONFIG_DEFAULTS,
  TARGET_VERSIONS,
  ConfigError,
  compareVersions,
  createSettings,
  formatVersion,
  parseTargetVersion,
} from "./config-normalizer";
export type { RewriteOptions, Settings, TargetVersion } from "./config-normalizer";

// 导出错误处理系统
export {
  createRewriteError,
  enhanceError,
  formatError,
  formatErrorForUser,
  logError,
  ErrorCategory,
  ErrorSeverity,
} from "./error-handler";
export type { RewriteError } from "./error-handler";

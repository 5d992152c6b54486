/**
 * Fixer 索引文件
 * 导出所有内置 fixer 并提供默认注册中心
 */

import { FixerRegistry } from "../core/registry";
import { registerAdminAllowTags } from "./admin-allow-tags";
import { registerDefaultAppConfig } from "./default-app-config";
import { registerFormatHtml } from "./format-html";
import { registerPsycopg2ToPsycopg3 } from "./psycopg2-to-psycopg3";

export { ADMIN_ALLOW_TAGS, registerAdminAllowTags } from "./admin-allow-tags";
export { DEFAULT_APP_CONFIG, registerDefaultAppConfig } from "./default-app-config";
export { FORMAT_HTML, registerFormatHtml } from "./format-html";
export { PSYCOPG2_TO_PSYCOPG3, registerPsycopg2ToPsycopg3 } from "./psycopg2-to-psycopg3";

/**
 * 向注册中心登记全部内置 fixer（按名称顺序）
 */
export function registerDefaultFixers(registry: FixerRegistry): FixerRegistry {
  registerAdminAllowTags(registry);
  registerDefaultAppConfig(registry);
  registerFormatHtml(registry);
  registerPsycopg2ToPsycopg3(registry);
  return registry;
}

export function createDefaultRegistry(): FixerRegistry {
  return registerDefaultFixers(new FixerRegistry());
}

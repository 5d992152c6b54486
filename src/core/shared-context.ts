/**
 * 共享上下文
 * 单个文件处理过程中所有 fixer 共享的状态：设置、文件名、已记录的导入
 */

import type { Settings } from "./config-normalizer";

const ADMIN_RE = /(\b|_)admin(\b|_)/;
const COMMANDS_RE = /(^|[\\/])management[\\/]commands[\\/]/;
const DUNDER_INIT_RE = /(^|[\\/])__init__\.py$/;
const MIGRATIONS_RE = /(^|[\\/])migrations([\\/])/;
const SETTINGS_RE = /(\b|_)settings(\b|_)/;
const TEST_RE = /(\b|_)tests?(\b|_)/;
const MODELS_RE = /(^|[\\/])models([\\/]|\.py)/;

const EMPTY: ReadonlySet<string> = new Set();

export class State {
  /**
   * 模块名 -> 通过 `from 模块 import 名称` 导入的名称
   * 遍历过程中逐步填充，只包含已经访问过的导入语句
   */
  private readonly fromImports = new Map<string, Set<string>>();

  // 根据文件名推断的文件类型
  readonly looksLikeAdminFile: boolean;
  readonly looksLikeCommandFile: boolean;
  readonly looksLikeDunderInitFile: boolean;
  readonly looksLikeMigrationsFile: boolean;
  readonly looksLikeSettingsFile: boolean;
  readonly looksLikeTestFile: boolean;
  readonly looksLikeModelsFile: boolean;

  constructor(
    readonly settings: Settings,
    readonly filename: string
  ) {
    this.looksLikeAdminFile = ADMIN_RE.test(filename);
    this.looksLikeCommandFile = COMMANDS_RE.test(filename);
    this.looksLikeDunderInitFile = DUNDER_INIT_RE.test(filename);
    this.looksLikeMigrationsFile = MIGRATIONS_RE.test(filename);
    this.looksLikeSettingsFile = SETTINGS_RE.test(filename);
    this.looksLikeTestFile = TEST_RE.test(filename);
    this.looksLikeModelsFile = MODELS_RE.test(filename);
  }

  /**
   * 目前为止从 module 导入的名称；未导入过返回空集合
   */
  importedFrom(module: string): ReadonlySet<string> {
    return this.fromImports.get(module) ?? EMPTY;
  }

  recordFromImport(module: string, names: Iterable<string>): void {
    let imported = this.fromImports.get(module);
    if (!imported) {
      imported = new Set();
      this.fromImports.set(module, imported);
    }
    for (const name of names) {
      imported.add(name);
    }
  }
}

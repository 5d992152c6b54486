/**
 * 测试辅助工具
 * 为测试用例提供便利的改写函数与临时文件
 */
import * as fs from "fs";
import * as path from "path";
import { tmpdir } from "os";
import crypto from "crypto";
import { createSettings } from "../src/core/config-normalizer";
import type { RewriteOptions, Settings } from "../src/core/config-normalizer";
import { applyFixers } from "../src/core/processor";
import type { FixerRegistry } from "../src/core/registry";
import { createDefaultRegistry } from "../src/fixers";
import type { FileIO } from "../src/types";

/**
 * 按选项生成 Settings，fixer 名称取自注册中心
 */
export const settingsFor = (
  options: RewriteOptions = {},
  registry: FixerRegistry = createDefaultRegistry()
): Settings => createSettings(options, registry.names());

/**
 * 用内置 fixer 改写一段源码
 */
export const rewrite = (
  source: string,
  targetVersion = "5.1",
  filename = "example.py"
): string => {
  const registry = createDefaultRegistry();
  return applyFixers(source, settingsFor({ targetVersion }, registry), filename, registry);
};

const tempDirs: string[] = [];

export function createTempDir(): string {
  const uniqueId = `${Date.now()}-${crypto.randomBytes(6).toString("hex")}`;
  const dir = path.join(tmpdir(), `django-rewrite-${uniqueId}`);
  fs.mkdirSync(dir, { recursive: true });
  tempDirs.push(dir);
  return dir;
}

export function createTempFile(
  content: string | Uint8Array,
  name = "example.py",
  dir: string = createTempDir()
): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

/**
 * 在 afterEach 中调用
 */
export function cleanupTempFiles(): void {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

/**
 * 内存中的标准输入输出
 */
export function createMemoryIO(
  stdin: string | Uint8Array = ""
): FileIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    readStdin: () => (typeof stdin === "string" ? Buffer.from(stdin, "utf8") : stdin),
    writeStdout: (text) => {
      stdout.push(text);
    },
    writeErr: (text) => {
      stderr.push(text);
    },
  };
}

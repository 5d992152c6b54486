/**
 * 文件处理
 * 读取（或从标准输入读取）源码，严格按 UTF-8 解码，应用 fixer，有变化时写回
 */

import fs from "fs";
import { glob, hasMagic } from "glob";
import type { FixerRegistry } from "./core/registry";
import type { Settings } from "./core/config-normalizer";
import { CONFIG_DEFAULTS, createSettings } from "./core/config-normalizer";
import { createRewriteError, enhanceError, logError } from "./core/error-handler";
import type { RewriteError } from "./core/error-handler";
import { applyFixers } from "./core/processor";
import { createDefaultRegistry } from "./fixers";
import type { FileIO, FileResult, FixOptions, ProcessResult } from "./types";

export const defaultFileIO: FileIO = {
  readStdin: () => fs.readFileSync(0),
  writeStdout: (text) => {
    process.stdout.write(text);
  },
  writeErr: (text) => {
    process.stderr.write(text);
  },
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 严格 UTF-8 解码，保留 BOM；字节非法时返回 null
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

/**
 * 展开含通配符的文件名（排序）；没有匹配时保留原样，交给读取阶段报错
 * 磁盘上存在的文件名按字面处理，例如 `a[1].py`
 */
export async function expandFilenames(filenames: readonly string[]): Promise<string[]> {
  const expanded: string[] = [];
  for (const filename of filenames) {
    if (
      filename === CONFIG_DEFAULTS.STDIN_FILENAME ||
      !hasMagic(filename) ||
      fs.existsSync(filename)
    ) {
      expanded.push(filename);
      continue;
    }
    const matches = await glob(filename, { nodir: true });
    if (matches.length === 0) {
      expanded.push(filename);
    } else {
      expanded.push(...matches.sort());
    }
  }
  return expanded;
}

function failed(
  filename: string,
  status: FileResult["status"],
  error: RewriteError
): FileResult {
  return { filename, status, exitCode: 1, error };
}

/**
 * 处理单个文件，"-" 表示标准输入（结果写到标准输出）
 */
export function fixFile(
  filename: string,
  settings: Settings,
  registry: FixerRegistry,
  options: { exitZeroEvenIfChanged?: boolean; io?: FileIO } = {}
): FileResult {
  const io = options.io ?? defaultFileIO;
  const report = (text: string) => io.writeErr(text);
  const isStdin = filename === CONFIG_DEFAULTS.STDIN_FILENAME;

  let bytes: Uint8Array;
  try {
    bytes = isStdin ? io.readStdin() : fs.readFileSync(filename);
  } catch (error) {
    const readError = enhanceError(toError(error), filename);
    logError(readError, report);
    return failed(filename, "unreadable", readError);
  }

  const original = decodeUtf8(bytes);
  if (original === null) {
    const decodeError = createRewriteError("DECODE001", [filename], {
      filePath: filename,
    });
    logError(decodeError, report, { brief: true });
    return failed(filename, "non-utf-8", decodeError);
  }

  const fixed = applyFixers(original, settings, filename, registry);
  const changed = fixed !== original;

  if (isStdin) {
    io.writeStdout(fixed);
  } else if (changed) {
    report(`Rewriting ${filename}\n`);
    try {
      fs.writeFileSync(filename, fixed, "utf8");
    } catch (error) {
      const writeError = createRewriteError("FILE002", [filename], {
        filePath: filename,
        originalError: toError(error),
      });
      logError(writeError, report);
      return failed(filename, "unwritable", writeError);
    }
  }

  return {
    filename,
    status: changed ? "rewritten" : "unchanged",
    exitCode: changed && !options.exitZeroEvenIfChanged ? 1 : 0,
  };
}

/**
 * 处理一组文件，返回汇总的退出码与错误
 * @throws ConfigError 目标版本或 fixer 名称无效（在处理任何文件之前）
 */
export async function processFiles(
  filenames: readonly string[],
  options: FixOptions = {},
  registry: FixerRegistry = createDefaultRegistry(),
  io: FileIO = defaultFileIO
): Promise<ProcessResult> {
  const settings = createSettings(options, registry.names());
  const expanded = await expandFilenames(filenames);

  const files = expanded.map((filename) =>
    fixFile(filename, settings, registry, {
      exitZeroEvenIfChanged: options.exitZeroEvenIfChanged ?? CONFIG_DEFAULTS.EXIT_ZERO_EVEN_IF_CHANGED,
      io,
    })
  );

  const errors: RewriteError[] = [];
  for (const file of files) {
    if (file.error) errors.push(file.error);
  }

  return {
    exitCode: files.some((file) => file.exitCode !== 0) ? 1 : 0,
    files,
    errors,
  };
}

#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import {
  CONFIG_DEFAULTS,
  TARGET_VERSIONS,
  formatVersion,
} from "./core/config-normalizer";
import { enhanceError, formatErrorForUser } from "./core/error-handler";
import type { FixerRegistry } from "./core/registry";
import { createDefaultRegistry } from "./fixers";
import { defaultFileIO, processFiles } from "./processFiles";
import type { FileIO } from "./types";

export interface CliIO extends FileIO {
  writeOut(text: string): void;
}

interface CliOptions {
  targetVersion: string;
  exitZeroEvenIfChanged: boolean;
  only: string[];
  skip: string[];
  listFixers?: boolean;
}

export const defaultCliIO: CliIO = {
  ...defaultFileIO,
  writeOut: (text) => {
    process.stdout.write(text);
  },
};

/**
 * 创建命令行程序，--only / --skip 的名称在解析阶段校验
 */
export function createProgram(registry: FixerRegistry): Command {
  const collectFixer = (value: string, previous: string[]): string[] => {
    if (!registry.has(value)) {
      throw new InvalidArgumentError(`Unknown fixer: '${value}'`);
    }
    return [...previous, value];
  };

  return new Command()
    .name("django-rewrite")
    .description("Rewrite deprecated Django API usage in Python source files")
    .version("1.0.0")
    .argument(
      "[filenames...]",
      "files or glob patterns to rewrite; names that exist on disk are taken literally ('-' reads stdin and writes stdout)"
    )
    .addOption(
      new Option("--target-version <version>", "the version of Django to target")
        .choices(TARGET_VERSIONS.map(formatVersion))
        .default(CONFIG_DEFAULTS.TARGET_VERSION)
    )
    .option(
      "--exit-zero-even-if-changed",
      "exit with a zero return code even if files have changed",
      CONFIG_DEFAULTS.EXIT_ZERO_EVEN_IF_CHANGED
    )
    .option("--only <name>", "run only the selected fixers (repeatable)", collectFixer, [])
    .option("--skip <name>", "skip the selected fixers (repeatable)", collectFixer, [])
    .option("--list-fixers", "list all fixer names and exit");
}

/**
 * 命令行入口，返回进程退出码
 */
export async function main(
  argv: readonly string[] = process.argv.slice(2),
  io: CliIO = defaultCliIO,
  registry: FixerRegistry = createDefaultRegistry()
): Promise<number> {
  const program = createProgram(registry)
    .exitOverride()
    .configureOutput({ writeOut: io.writeOut, writeErr: io.writeErr });

  let exitCode = 0;
  program.action(async (filenames: string[]) => {
    const options = program.opts<CliOptions>();

    if (options.listFixers) {
      io.writeOut(registry.names().map((name) => `${name}\n`).join(""));
      return;
    }
    if (filenames.length === 0) {
      program.error("error: missing required argument 'filenames'");
    }

    const result = await processFiles(
      filenames,
      {
        targetVersion: options.targetVersion,
        only: options.only,
        skip: options.skip,
        exitZeroEvenIfChanged: options.exitZeroEvenIfChanged,
      },
      registry,
      io
    );
    exitCode = result.exitCode;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const rewriteError = enhanceError(error instanceof Error ? error : new Error(String(error)));
    io.writeErr(`${formatErrorForUser(rewriteError)}\n`);
    return 1;
  }
  return exitCode;
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}

import type { RewriteOptions } from "./core/config-normalizer";
import type { RewriteError } from "./core/error-handler";

/**
 * Configuration options for processing files.
 * 文件处理的配置选项。
 */
export interface FixOptions extends RewriteOptions {
  /**
   * Exit with status 0 even when files were rewritten.
   * 即使有文件被改写也以 0 退出。
   */
  exitZeroEvenIfChanged?: boolean;
}

/**
 * 标准输入输出，测试中可替换
 */
export interface FileIO {
  readStdin(): Uint8Array;
  writeStdout(text: string): void;
  /** 诊断信息：改写提示与逐文件错误 */
  writeErr(text: string): void;
}

export type FileStatus =
  | "unchanged"
  | "rewritten"
  | "non-utf-8"
  | "unreadable"
  | "unwritable";

/**
 * 单个文件的处理结果
 */
export interface FileResult {
  filename: string;
  status: FileStatus;
  /** 该文件对进程退出码的贡献 */
  exitCode: 0 | 1;
  error?: RewriteError;
}

export interface ProcessResult {
  exitCode: 0 | 1;
  files: FileResult[];
  errors: RewriteError[];
}

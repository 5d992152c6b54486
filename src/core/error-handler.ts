/**
 * 错误处理
 * 错误代码表、错误对象的生成与格式化
 */

import { ConfigError } from "./config-normalizer";
import { FixerRegistryError } from "./registry";

/**
 * 错误所属的处理阶段
 */
export enum ErrorCategory {
  CONFIG = "CONFIG",
  DECODING = "DECODING",
  FILE_OPERATION = "FILE_OPERATION",
  FIXER = "FIXER",
  UNKNOWN = "UNKNOWN",
}

/**
 * ERROR: 当前文件失败，退出码为 1
 * FATAL: 整个运行中止
 */
export enum ErrorSeverity {
  ERROR = "ERROR",
  FATAL = "FATAL",
}

export interface RewriteError {
  /** 例如 CONFIG002、DECODE001 */
  code: string;
  category: ErrorCategory;
  message: string;
  details?: string;
  filePath?: string;
  severity: ErrorSeverity;
  suggestion?: string;
  originalError?: Error;
}

interface ErrorDefinition {
  category: ErrorCategory;
  severity: ErrorSeverity;
  template: string;
  hint?: string;
}

// 错误代码表
const ERROR_CODES: Record<string, ErrorDefinition> = {
  // 配置错误
  CONFIG002: {
    category: ErrorCategory.CONFIG,
    template: "Unknown target version: {0}",
    severity: ErrorSeverity.FATAL,
    hint: "Choose one of: {1}",
  },
  CONFIG003: {
    category: ErrorCategory.CONFIG,
    template: "Unknown fixer: {0}",
    severity: ErrorSeverity.FATAL,
    hint: "Run with --list-fixers to see the available names",
  },

  // 解码错误
  DECODE001: {
    category: ErrorCategory.DECODING,
    template: "{0} is non-utf-8 (not supported)",
    severity: ErrorSeverity.ERROR,
  },

  // 文件操作错误
  FILE001: {
    category: ErrorCategory.FILE_OPERATION,
    template: "Could not read file: {0}",
    severity: ErrorSeverity.ERROR,
    hint: "Check that the file exists and is readable",
  },
  FILE002: {
    category: ErrorCategory.FILE_OPERATION,
    template: "Could not write file: {0}",
    severity: ErrorSeverity.ERROR,
    hint: "Check that the file is writable",
  },

  // fixer 错误
  FIXER001: {
    category: ErrorCategory.FIXER,
    template: "Fixer registration failed: {0}",
    severity: ErrorSeverity.FATAL,
  },

  // 通用错误
  GENERAL001: {
    category: ErrorCategory.UNKNOWN,
    template: "Unexpected error: {0}",
    severity: ErrorSeverity.FATAL,
  },
};

/**
 * 按错误代码生成错误对象，{n} 由 params[n] 填充
 */
export function createRewriteError(
  errorCode: string,
  params: string[] = [],
  options: { filePath?: string; originalError?: Error } = {}
): RewriteError {
  const code = errorCode in ERROR_CODES ? errorCode : "GENERAL001";
  const { category, severity, template, hint } = ERROR_CODES[code];
  const fill = (text: string) =>
    text.replace(/\{(\d+)\}/g, (placeholder, index: string) => params[Number(index)] ?? placeholder);

  const cause = options.originalError;

  return {
    code,
    category,
    message: fill(template),
    details: cause?.message,
    filePath: options.filePath,
    severity,
    suggestion: hint === undefined ? undefined : fill(hint),
    originalError: cause,
  };
}

/**
 * 格式化错误为完整的诊断信息
 */
export function formatError(error: RewriteError): string {
  const lines = [`[${error.code}] ${error.message}`];

  if (error.filePath) {
    lines.push(`File: ${error.filePath}`);
  }
  if (error.details && error.details !== error.message) {
    lines.push(`Details: ${error.details}`);
  }
  if (error.suggestion) {
    lines.push(`Suggestion: ${error.suggestion}`);
  }

  return lines.join("\n");
}

/**
 * 把错误写到诊断输出
 * brief 为 true 时只输出一行消息（逐文件诊断用）
 */
export function logError(
  error: RewriteError,
  write: (text: string) => void,
  options: { brief?: boolean } = {}
): void {
  const output = options.brief ? error.message : formatError(error);
  write(`${output}\n`);
}

/**
 * 命令行使用的简短格式
 */
export function formatErrorForUser(error: RewriteError): string {
  let message = `error[${error.code}]: ${error.message}`;

  if (error.filePath) {
    message += `\n  at ${error.filePath}`;
  }

  if (error.suggestion) {
    message += `\n  hint: ${error.suggestion}`;
  }

  return message;
}

function errnoCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/**
 * 根据错误类型推断错误代码，返回统一的错误对象
 */
export function enhanceError(error: Error, filePath?: string): RewriteError {
  const params = [filePath ?? error.message];

  if (error instanceof ConfigError) {
    return createRewriteError(error.code, error.params, { originalError: error });
  }
  if (error instanceof FixerRegistryError) {
    return createRewriteError("FIXER001", [error.message], { originalError: error });
  }

  const code = errnoCode(error);
  if (code === "ENOENT" || code === "EACCES" || code === "EISDIR") {
    return createRewriteError("FILE001", params, { filePath, originalError: error });
  }

  return createRewriteError("GENERAL001", [error.message], {
    filePath,
    originalError: error,
  });
}

/**
 * Python 源码解析相关错误类型
 */

export class PythonSyntaxError extends Error {
  constructor(
    public readonly reason: string,
    public readonly code: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(line !== undefined ? `${reason} (${line}:${column ?? 0})` : reason);
    this.name = "PythonSyntaxError";
  }
}

/**
 * 词法阶段失败：未闭合的字符串、括号不匹配、缩进错误等
 */
export class TokenizeError extends PythonSyntaxError {
  constructor(message: string, line?: number, column?: number) {
    super(message, "PYTHON_TOKENIZE_ERROR", line, column);
    this.name = "TokenizeError";
  }
}

/**
 * 语法阶段失败：不是合法的（或不受支持的）Python 语法
 */
export class ParseError extends PythonSyntaxError {
  constructor(message: string, line?: number, column?: number) {
    super(message, "PYTHON_PARSE_ERROR", line, column);
    this.name = "ParseError";
  }
}

/**
 * 词法分析测试
 */
import { expect, test, describe } from "vitest";
import { tokenize, serialize } from "../../src/python/tokenizer";
import { TokenizeError } from "../../src/python/errors";
import { tokenEnd } from "../../src/python/tokens";

const kinds = (source: string) => tokenize(source).map((token) => token.kind);

describe("tokenizer", () => {
  describe("还原源码", () => {
    test("拼接全部 token 得到原文", () => {
      const source = [
        "# comment",
        "import os",
        "",
        "class A(object):",
        "    def f(self, x=1):",
        "        return (x +",
        "                2)",
        "",
        "    y = '''multi",
        "line'''",
        "z = f\"{a}\" \\",
        "    + b'bytes'  # trailing",
        "",
      ].join("\n");
      expect(serialize(tokenize(source))).toBe(source);
    });

    test("CRLF 与无结尾换行", () => {
      const source = "x = 1\r\ny = [\r\n  2,\r\n]";
      const tokens = tokenize(source);
      expect(serialize(tokens)).toBe(source);
      expect(tokens[5]).toEqual({ kind: "NEWLINE", src: "\r\n", line: 1, col: 5 });
      expect(tokens[6]).toEqual({ kind: "NAME", src: "y", line: 2, col: 0 });
    });

    test("BOM 作为独立的空白 token 保留", () => {
      const tokens = tokenize("\ufeffx = 1\n");
      expect(tokens[0]).toEqual({ kind: "UNIMPORTANT_WS", src: "\ufeff", line: 1, col: 0 });
      expect(serialize(tokens)).toBe("\ufeffx = 1\n");
    });

    test("空源码只有 ENDMARKER", () => {
      expect(tokenize("")).toEqual([{ kind: "ENDMARKER", src: "", line: 1, col: 0 }]);
    });
  });

  describe("token 种类与位置", () => {
    test("缩进块", () => {
      expect(kinds("if x:\n    pass\n")).toEqual([
        "NAME",
        "UNIMPORTANT_WS",
        "NAME",
        "OP",
        "NEWLINE",
        "INDENT",
        "NAME",
        "NEWLINE",
        "DEDENT",
        "ENDMARKER",
      ]);
    });

    test("INDENT 的 src 是缩进空白", () => {
      const tokens = tokenize("if x:\n    pass\n");
      expect(tokens[5]).toEqual({ kind: "INDENT", src: "    ", line: 2, col: 0 });
      expect(tokens[6]).toEqual({ kind: "NAME", src: "pass", line: 2, col: 4 });
    });

    test("DEDENT 排在该行缩进空白之前", () => {
      const tokens = tokenize("if a:\n    if b:\n        pass\n    else:\n        pass\n");
      const index = tokens.findIndex((token) => token.src === "else");
      expect(tokens[index - 1]).toEqual({ kind: "UNIMPORTANT_WS", src: "    ", line: 4, col: 0 });
      expect(tokens[index - 2]).toEqual({ kind: "DEDENT", src: "", line: 4, col: 4 });
      expect(tokens[index].col).toBe(4);
    });

    test("文件末尾缺少换行时补一个空 NEWLINE", () => {
      expect(tokenize("x").map((token) => [token.kind, token.src])).toEqual([
        ["NAME", "x"],
        ["NEWLINE", ""],
        ["ENDMARKER", ""],
      ]);
    });

    test("括号内换行是 NL，空行与注释行不产生缩进", () => {
      expect(kinds("f(\n  1)\n\n  # note\n")).toEqual([
        "NAME",
        "OP",
        "NL",
        "UNIMPORTANT_WS",
        "NUMBER",
        "OP",
        "NEWLINE",
        "NL",
        "UNIMPORTANT_WS",
        "COMMENT",
        "NL",
        "ENDMARKER",
      ]);
    });

    test("字符串前缀、数字与多字符运算符", () => {
      const tokens = tokenize("a **= rb'x' + 0x_1F + 1_000.5e-3j ... :=\n");
      const significant = tokens
        .filter((token) => token.kind !== "UNIMPORTANT_WS")
        .map((token) => [token.kind, token.src]);
      expect(significant).toEqual([
        ["NAME", "a"],
        ["OP", "**="],
        ["STRING", "rb'x'"],
        ["OP", "+"],
        ["NUMBER", "0x_1F"],
        ["OP", "+"],
        ["NUMBER", "1_000.5e-3j"],
        ["OP", "..."],
        ["OP", ":="],
        ["NEWLINE", "\n"],
        ["ENDMARKER", ""],
      ]);
    });

    test("续行符", () => {
      const tokens = tokenize("x = 1 + \\\n    2\n");
      expect(tokens.map((token) => token.kind)).toEqual([
        "NAME",
        "UNIMPORTANT_WS",
        "OP",
        "UNIMPORTANT_WS",
        "NUMBER",
        "UNIMPORTANT_WS",
        "OP",
        "UNIMPORTANT_WS",
        "ESCAPED_NL",
        "UNIMPORTANT_WS",
        "NUMBER",
        "NEWLINE",
        "ENDMARKER",
      ]);
      expect(tokens[10]).toEqual({ kind: "NUMBER", src: "2", line: 2, col: 4 });
    });

    test.each([
      ['x = f"{"a"}" + y\n', 'f"{"a"}"'],
      ['x = f"{f"{x}"}"\n', 'f"{f"{x}"}"'],
      ["x = f\"{x:'>10}\"\n", "f\"{x:'>10}\""],
      ['x = f"{{literal}}"\n', 'f"{{literal}}"'],
      ["x = f'{d[\"k\"]!r:>{width}}'\n", "f'{d[\"k\"]!r:>{width}}'"],
    ])("f-string 替换字段中的引号：%s", (source, literal) => {
      const strings = tokenize(source).filter((token) => token.kind === "STRING");
      expect(strings.map((token) => token.src)).toEqual([literal]);
    });

    test("多行字符串的结束位置", () => {
      const [, , , , string] = tokenize("x = '''a\nbc'''\n");
      expect(string.kind).toBe("STRING");
      expect(tokenEnd(string)).toEqual({ line: 2, col: 5 });
    });
  });

  describe("错误", () => {
    test.each([
      ["x = 'abc\n", "unterminated string literal"],
      ["x = '''abc\n", "unterminated triple-quoted string literal"],
      ["foo(\n", "EOF in multi-line statement"],
      ["x)\n", "unmatched ')'"],
      ["if x:\n        a\n    b\n", "unindent does not match any outer indentation level"],
      ["a $ b\n", "invalid character '$'"],
      ["x = 1 \\", "unexpected character after line continuation character"],
    ])("%j", (source, reason) => {
      expect(() => tokenize(source)).toThrow(TokenizeError);
      expect(() => tokenize(source)).toThrow(reason);
    });

    test("错误携带位置", () => {
      try {
        tokenize("a = 1\nb = 'x\n");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TokenizeError);
        if (error instanceof TokenizeError) {
          expect(error.line).toBe(2);
          expect(error.column).toBe(4);
          expect(error.message).toBe("unterminated string literal (2:4)");
        }
      }
    });
  });
});

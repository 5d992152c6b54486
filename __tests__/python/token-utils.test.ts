/**
 * token 查找与编辑工具测试
 */
import { expect, test, describe } from "vitest";
import { tokenize, serialize } from "../../src/python/tokenizer";
import { parse } from "../../src/python/parser";
import type { Stmt } from "../../src/python/ast";
import {
  aloneOnLine,
  eraseNode,
  find,
  findLastToken,
  insert,
} from "../../src/python/token-utils";

function indexAt(source: string, line: number, col: number): number {
  return tokenize(source).findIndex((token) => token.line === line && token.col === col);
}

/**
 * 删除 pick 选中的语句，返回改写后的源码
 */
function erase(source: string, pick: (body: readonly Stmt[]) => Stmt): string {
  const statement = pick(parse(source).body);
  const tokens = tokenize(source);
  const i = tokens.findIndex(
    (token) => token.line === statement.start.line && token.col === statement.start.col
  );
  eraseNode(tokens, i, statement);
  return serialize(tokens);
}

describe("find", () => {
  test("从下标向后查找", () => {
    const tokens = tokenize("a.b(c)\n");
    expect(find(tokens, 0, "OP", "(")).toBe(3);
    expect(find(tokens, 0, "NAME")).toBe(0);
    expect(find(tokens, 1, "NAME")).toBe(2);
  });

  test("找不到时抛出 RangeError", () => {
    const tokens = tokenize("a\n");
    expect(() => find(tokens, 0, "OP", ")")).toThrow(RangeError);
  });
});

describe("findLastToken", () => {
  test("单行节点", () => {
    const source = "x = f(a)  # c\n";
    const [statement] = parse(source).body;
    const tokens = tokenize(source);
    expect(tokens[findLastToken(tokens, 0, statement)]).toMatchObject({ kind: "OP", src: ")" });
  });

  test("跨行节点", () => {
    const source = "x = f(\n    a,\n)\ny = 1\n";
    const [statement] = parse(source).body;
    const tokens = tokenize(source);
    expect(tokens[findLastToken(tokens, 0, statement)]).toMatchObject({
      kind: "OP",
      src: ")",
      line: 3,
      col: 0,
    });
  });
});

describe("aloneOnLine", () => {
  test("缩进后独占一行的右括号", () => {
    const source = "f(\n    g(\n        a,\n    )\n)\n";
    const tokens = tokenize(source);
    const close = indexAt(source, 4, 4);
    expect(aloneOnLine(tokens, close, close)).toBe(true);
  });

  test("与其他 token 同行", () => {
    const source = "f(\n    a)\n";
    const tokens = tokenize(source);
    const close = indexAt(source, 2, 5);
    expect(aloneOnLine(tokens, close, close)).toBe(false);
  });
});

describe("insert", () => {
  test("插入合成 token", () => {
    const tokens = tokenize("f(a)\n");
    insert(tokens, 3, ", b");
    expect(tokens[3]).toEqual({ kind: "CODE", src: ", b" });
    expect(serialize(tokens)).toBe("f(a, b)\n");
  });
});

describe("eraseNode", () => {
  test("独占一行时连同缩进、行尾注释与换行删除", () => {
    const source = "if x:\n    a = 1  # note\n    b = 2\n";
    expect(erase(source, (body) => {
      const [statement] = body;
      if (statement.kind !== "If") throw new Error("expected if");
      return statement.body[0];
    })).toBe("if x:\n    b = 2\n");
  });

  test("DEDENT 之后的语句", () => {
    const source = "if x:\n    a = 1\nb = 2\nc = 3\n";
    expect(erase(source, (body) => body[1])).toBe("if x:\n    a = 1\nc = 3\n");
  });

  test("分号前的语句连同分号删除", () => {
    expect(erase("a = 1; b = 2\n", (body) => body[0])).toBe("b = 2\n");
  });

  test("分号后的语句连同分号删除", () => {
    expect(erase("a = 1; b = 2\n", (body) => body[1])).toBe("a = 1\n");
    expect(erase("a = 1; b = 2; c = 3\n", (body) => body[1])).toBe("a = 1; c = 3\n");
  });

  test("文件唯一的语句", () => {
    expect(erase("a = 1", (body) => body[0])).toBe("");
  });
});

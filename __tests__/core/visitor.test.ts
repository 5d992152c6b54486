/**
 * 语法树遍历测试
 * 先序顺序、祖先链、from 导入的记录时机
 */
import { expect, test, describe } from "vitest";
import { parse } from "../../src/python/parser";
import { FixerRegistry } from "../../src/core/registry";
import type { TokenFunc } from "../../src/core/registry";
import type { NodeKind } from "../../src/python/ast";
import { buildDispatchTable } from "../../src/core/dispatch-table";
import { State } from "../../src/core/shared-context";
import { visit, walk } from "../../src/core/visitor";
import { settingsFor } from "../test-helpers";

const noopEdit: TokenFunc = () => undefined;

function recordVisits(source: string, kinds: readonly NodeKind[]): string[][] {
  const registry = new FixerRegistry();
  const fixer = registry.register("recorder", { minVersion: [1, 7] });
  const visits: string[][] = [];
  for (const kind of kinds) {
    fixer.on(kind, (_state, node, parents) => {
      visits.push([node.kind, ...parents.map((parent) => parent.kind)]);
      return [];
    });
  }
  visit(parse(source), registry, settingsFor({}, registry), "example.py");
  return visits;
}

describe("walk", () => {
  test("先序遍历，子节点按字段顺序", () => {
    const visits = recordVisits("x = f(1)\n", ["Module", "Assign", "Name", "Call", "Constant"]);
    expect(visits.map(([kind]) => kind)).toEqual([
      "Module",
      "Assign",
      "Name",
      "Call",
      "Name",
      "Constant",
    ]);
  });

  test("parents 为根到直接父节点的链", () => {
    const visits = recordVisits("x = f(1)\n", ["Name"]);
    expect(visits).toEqual([
      ["Name", "Module", "Assign"],
      ["Name", "Module", "Assign", "Call"],
    ]);
  });

  test("兄弟语句按源码顺序访问", () => {
    const visits = recordVisits("a = 1\nif b:\n    c = 2\nd = 3\n", ["Assign"]);
    expect(visits).toEqual([
      ["Assign", "Module"],
      ["Assign", "Module", "If"],
      ["Assign", "Module"],
    ]);
  });

  test("收集的改写按位置分组，同一位置按产生顺序排列", () => {
    const registry = new FixerRegistry();
    const first: TokenFunc = () => undefined;
    const second: TokenFunc = () => undefined;
    registry.register("one", { minVersion: [1, 7] }).on("Assign", function* (_state, node) {
      yield [node.start, first];
    });
    registry.register("two", { minVersion: [1, 7] }).on("Assign", function* (_state, node) {
      yield [node.start, second];
      yield [node.value.start, noopEdit];
    });
    const edits = visit(parse("x = 1\n"), registry, settingsFor({}, registry), "example.py");
    expect([...edits.keys()]).toEqual(["1:0", "1:4"]);
    expect(edits.get("1:0")).toEqual([first, second]);
    expect(edits.get("1:4")).toEqual([noopEdit]);
  });
});

describe("from 导入记录", () => {
  test("导入语句自身的回调看不到它导入的名称", () => {
    const registry = new FixerRegistry();
    const seen: string[][] = [];
    registry.register("imports", { minVersion: [1, 7] }).on("ImportFrom", (state) => {
      seen.push([...state.importedFrom("django.utils.html")]);
      return [];
    });
    const tree = parse(
      "from django.utils.html import format_html, escape as esc\n" +
        "from django.utils.html import strip_tags\n"
    );
    const state = new State(settingsFor({}, registry), "example.py");
    walk(tree, buildDispatchTable(registry, state), state);

    expect(seen).toEqual([[], ["format_html"]]);
    expect([...state.importedFrom("django.utils.html")]).toEqual(["format_html", "strip_tags"]);
  });

  test("只记录 django、django.* 与 unittest 的绝对导入", () => {
    const registry = new FixerRegistry();
    const state = new State(settingsFor({}, registry), "example.py");
    const tree = parse(
      [
        "from django import forms",
        "from unittest import mock",
        "from djangox import y",
        "from .django import z",
        "from django.db import *",
        "import django.conf",
        "def f():",
        "    from django.db import models",
        "",
      ].join("\n")
    );
    walk(tree, buildDispatchTable(registry, state), state);

    expect([...state.importedFrom("django")]).toEqual(["forms"]);
    expect([...state.importedFrom("unittest")]).toEqual(["mock"]);
    expect([...state.importedFrom("django.db")]).toEqual(["models"]);
    expect(state.importedFrom("djangox").size).toBe(0);
    expect(state.importedFrom("django.conf").size).toBe(0);
  });
});

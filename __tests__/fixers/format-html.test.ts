/**
 * format_html 测试
 */
import { expect, test, describe } from "vitest";
import { rewrite } from "../test-helpers";

const IMPORT = "from django.utils.html import format_html\n";

const check = (source: string, expected: string) => {
  expect(rewrite(IMPORT + source, "5.0")).toBe(IMPORT + expected);
};

const noop = (source: string, targetVersion = "5.0") => {
  expect(rewrite(source, targetVersion)).toBe(source);
};

describe("format_html", () => {
  describe("不改写", () => {
    test("目标版本低于 5.0", () => {
      noop(`${IMPORT}format_html("{}".format(a))\n`, "4.2");
    });

    test("没有从 django.utils.html 导入", () => {
      noop('format_html("{}".format(a))\n');
      noop('from myapp.html import format_html\nformat_html("{}".format(a))\n');
      noop('from django.utils import html\nhtml.format_html("{}".format(a))\n');
    });

    test("已经传入参数", () => {
      noop(`${IMPORT}format_html("{} {}".format(a), b)\n`);
      noop(`${IMPORT}format_html("{}", a)\n`);
      noop(`${IMPORT}format_html("{}".format(a), extra=b)\n`);
    });

    test("模板不是字符串字面量", () => {
      noop(`${IMPORT}format_html(template.format(a))\n`);
      noop(`${IMPORT}format_html(f"{a}".format(b))\n`);
      noop(`${IMPORT}format_html(b"{}".format(a))\n`);
    });

    test("不是 format 调用", () => {
      noop(`${IMPORT}format_html("{}".join(a))\n`);
    });
  });

  describe("改写", () => {
    test("单个参数", () => {
      check('html = format_html("Hello, {}!".format(name))\n', 'html = format_html("Hello, {}!", name)\n');
    });

    test("多个参数与关键字参数", () => {
      check(
        "format_html('<a href=\"{}\">{x}</a>'.format(url, x=text))\n",
        "format_html('<a href=\"{}\">{x}</a>', url, x=text)\n"
      );
    });

    test("参数中含有括号", () => {
      check(
        'format_html("{}".format(escape(get(a))))\n',
        'format_html("{}", escape(get(a)))\n'
      );
    });

    test("隐式拼接的模板", () => {
      check(
        'format_html("<b>{}</b>" "<i>{}</i>".format(a, b))\n',
        'format_html("<b>{}</b>" "<i>{}</i>", a, b)\n'
      );
    });

    test("右括号独占一行时整行删除", () => {
      check(
        [
          "html = format_html(",
          "    \"<a href='{}'>{}</a>\".format(",
          "        url,",
          "        text,",
          "    )",
          ")",
          "",
        ].join("\n"),
        [
          "html = format_html(",
          "    \"<a href='{}'>{}</a>\", ",
          "        url,",
          "        text,",
          ")",
          "",
        ].join("\n")
      );
    });

    test("format_html 嵌套在另一个 format_html 的参数中", () => {
      check(
        'format_html("{}".format(format_html("{}".format(y))))\n',
        'format_html("{}", format_html("{}", y))\n'
      );
    });

    test("match 语句与 f-string 中的调用", () => {
      check(
        [
          "def render(kind, name):",
          '    label = f"{"a"}"',
          "    match kind:",
          '        case "a":',
          '            return format_html("<b>{}</b>".format(name))',
          "",
        ].join("\n"),
        [
          "def render(kind, name):",
          '    label = f"{"a"}"',
          "    match kind:",
          '        case "a":',
          '            return format_html("<b>{}</b>", name)',
          "",
        ].join("\n")
      );
    });

    test("嵌套在其他表达式中", () => {
      check(
        "return_value = [format_html('{}'.format(a)) for a in items]\n",
        "return_value = [format_html('{}', a) for a in items]\n"
      );
    });
  });
});

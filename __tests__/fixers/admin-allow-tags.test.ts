/**
 * admin_allow_tags 测试
 */
import { expect, test, describe } from "vitest";
import { rewrite } from "../test-helpers";

const check = (source: string, expected: string, targetVersion = "2.0") => {
  expect(rewrite(source, targetVersion)).toBe(expected);
};

const noop = (source: string, targetVersion = "2.0") => {
  expect(rewrite(source, targetVersion)).toBe(source);
};

describe("admin_allow_tags", () => {
  describe("不改写", () => {
    test("目标版本低于 2.0", () => {
      noop("from django.contrib import admin\nf.allow_tags = True\n", "1.11");
    });

    test("没有导入 admin", () => {
      noop("f.allow_tags = True\n");
    });

    test("以别名导入 admin", () => {
      noop("from django.contrib import admin as dj_admin\nf.allow_tags = True\n");
    });

    test("导入出现在赋值之后", () => {
      noop("f.allow_tags = True\nfrom django.contrib import admin\n");
    });

    test("值不是 True", () => {
      noop("from django.contrib import admin\nf.allow_tags = False\n");
      noop("from django.contrib import admin\nf.allow_tags = 1\n");
    });

    test("其他属性或多个目标", () => {
      noop("from django.contrib import admin\nf.short_description = True\n");
      noop("from django.contrib import admin\nf.allow_tags = g.allow_tags = True\n");
      noop("from django.contrib import admin\nallow_tags = True\n");
    });
  });

  describe("改写", () => {
    test("类体中的赋值", () => {
      check(
        "from django.contrib import admin\nclass A:\n    f.allow_tags = True\n",
        "from django.contrib import admin\nclass A:\n"
      );
    });

    test("从 django.contrib.gis 导入", () => {
      check(
        "from django.contrib.gis import admin\nf.allow_tags = True\n",
        "from django.contrib.gis import admin\n"
      );
    });

    test("方法定义之后的赋值", () => {
      check(
        [
          "from django.contrib import admin",
          "",
          "class BookAdmin(admin.ModelAdmin):",
          "    def is_new(self, obj):",
          "        return obj.new",
          "    is_new.allow_tags = True",
          '    list_display = ["is_new"]',
          "",
        ].join("\n"),
        [
          "from django.contrib import admin",
          "",
          "class BookAdmin(admin.ModelAdmin):",
          "    def is_new(self, obj):",
          "        return obj.new",
          '    list_display = ["is_new"]',
          "",
        ].join("\n")
      );
    });

    test("行尾注释一起删除", () => {
      check(
        "from django.contrib import admin\nf.allow_tags = True  # legacy\nx = 1\n",
        "from django.contrib import admin\nx = 1\n"
      );
    });

    test("与其他语句共用一行", () => {
      check(
        "from django.contrib import admin\nx = 1; f.allow_tags = True\n",
        "from django.contrib import admin\nx = 1\n"
      );
      check(
        "from django.contrib import admin\nf.allow_tags = True; x = 1\n",
        "from django.contrib import admin\nx = 1\n"
      );
    });

    test("同一导入语句中的多个名称", () => {
      check(
        "from django.contrib import messages, admin\nf.allow_tags = True\n",
        "from django.contrib import messages, admin\n"
      );
    });
  });
});

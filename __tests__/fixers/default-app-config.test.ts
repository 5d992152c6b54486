/**
 * default_app_config 测试
 */
import { expect, test, describe } from "vitest";
import { rewrite } from "../test-helpers";

const INIT = "myapp/__init__.py";

describe("default_app_config", () => {
  test("删除模块级赋值", () => {
    expect(rewrite('default_app_config = "myapp.apps.MyAppConfig"\n', "3.2", INIT)).toBe("");
  });

  test("保留其余内容", () => {
    expect(
      rewrite(
        "from django.apps import AppConfig\n\ndefault_app_config = 'x.apps.C'\n\nVERSION = 1\n",
        "3.2",
        INIT
      )
    ).toBe("from django.apps import AppConfig\n\n\nVERSION = 1\n");
  });

  test("Windows 路径", () => {
    expect(rewrite("default_app_config = 'a.apps.A'\n", "4.0", "myapp\\__init__.py")).toBe("");
  });

  describe("不改写", () => {
    test("不是 __init__.py", () => {
      const source = "default_app_config = 'myapp.apps.MyAppConfig'\n";
      expect(rewrite(source, "3.2", "myapp/apps.py")).toBe(source);
      expect(rewrite(source, "3.2", "myapp/not__init__.py")).toBe(source);
    });

    test("目标版本低于 3.2", () => {
      const source = "default_app_config = 'myapp.apps.MyAppConfig'\n";
      expect(rewrite(source, "3.1", INIT)).toBe(source);
    });

    test("不在模块顶层", () => {
      const source = "def f():\n    default_app_config = 'x'\n";
      expect(rewrite(source, "3.2", INIT)).toBe(source);
    });

    test("值不是字符串", () => {
      const source = "default_app_config = get_config()\n";
      expect(rewrite(source, "3.2", INIT)).toBe(source);
      const fString = "default_app_config = f'{name}.apps.C'\n";
      expect(rewrite(fString, "3.2", INIT)).toBe(fString);
    });
  });
});

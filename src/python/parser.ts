/**
 * Python 语法分析
 * tree-sitter-python 产出具体语法树，这里将其转换为与 Python ast 模块一致的结构。
 *
 * 节点位置与 CPython 一致：括号不计入表达式自身的范围，
 * 但计入外层节点的范围（括号表达式在转换时被展开）。
 * 位置换算与 tokenizer 使用同一套行号与 UTF-16 列号。
 */

import Parser from "tree-sitter";
import Python from "tree-sitter-python";
import type {
  Alias,
  Arg,
  Arguments,
  BinaryOperator,
  BoolOperator,
  CompareOperator,
  Comprehension,
  ConstantValue,
  ExceptHandler,
  Expr,
  ExprContext,
  Keyword,
  MatchCase,
  Module,
  Name,
  Stmt,
  UnaryOperator,
  WithItem,
} from "./ast";
import { ParseError } from "./errors";
import type { Offset } from "./tokens";

type TSNode = Parser.SyntaxNode;

// 可以出现在任意位置的附加节点
const EXTRAS = new Set(["comment", "line_continuation"]);

const BINARY_OPERATORS = new Map<string, BinaryOperator>([
  ["+", "Add"], ["-", "Sub"], ["*", "Mult"], ["@", "MatMult"],
  ["/", "Div"], ["%", "Mod"], ["**", "Pow"], ["<<", "LShift"],
  [">>", "RShift"], ["|", "BitOr"], ["^", "BitXor"], ["&", "BitAnd"],
  ["//", "FloorDiv"],
]);

const AUGMENTED_ASSIGN = new Map<string, BinaryOperator>(
  [...BINARY_OPERATORS].map(([op, name]) => [`${op}=`, name])
);

const COMPARE_OPERATORS = new Map<string, CompareOperator>([
  ["==", "Eq"], ["!=", "NotEq"], ["<", "Lt"], ["<=", "LtE"], [">", "Gt"],
  [">=", "GtE"], ["is", "Is"], ["is not", "IsNot"], ["in", "In"], ["not in", "NotIn"],
]);

// 比较运算符可能由两个关键字组成（not in / is not）
const COMPARE_WORDS = new Set(["==", "!=", "<", "<=", ">", ">=", "<>", "is", "in", "not", "not in", "is not"]);

const UNARY_OPERATORS = new Map<string, UnaryOperator>([
  ["+", "UAdd"], ["-", "USub"], ["~", "Invert"],
]);

let sharedParser: Parser | null = null;

function pythonParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    sharedParser.setLanguage(Python);
  }
  return sharedParser;
}

function named(node: TSNode): TSNode[] {
  return node.namedChildren.filter((child) => !EXTRAS.has(child.type));
}

function hasToken(node: TSNode, type: string): boolean {
  return node.children.some((child) => child.type === type);
}

function blockOf(node: TSNode): TSNode | null {
  return named(node).find((child) => child.type === "block") ?? null;
}

function numberValue(src: string): ConstantValue {
  if (/[jJ]$/.test(src)) {
    return { type: "complex", src };
  }
  if (!/^0[xXoObB]/.test(src) && /[.eE]/.test(src)) {
    return { type: "float", src };
  }
  return { type: "int", src };
}

function stringPrefix(src: string): string {
  const match = /^[A-Za-z]*/.exec(src);
  return match ? match[0].toLowerCase() : "";
}

/**
 * 第一个缺失节点（tree-sitter 错误恢复时插入的零宽节点）
 */
function findMissing(node: TSNode): TSNode | null {
  for (const child of node.children) {
    if (child.startIndex === child.endIndex && child.childCount === 0) {
      return child;
    }
    const found = findMissing(child);
    if (found) return found;
  }
  return null;
}

class TreeConverter {
  private readonly lineStarts: number[] = [0];
  /** 去掉 BOM 后的文本相对原文的偏移 */
  private readonly shift: number;

  constructor(
    source: string,
    private readonly text: string
  ) {
    this.shift = source.length - text.length;
    for (let i = 0; i < source.length; i++) {
      const c = source[i];
      if (c === "\n" || (c === "\r" && source[i + 1] !== "\n")) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  module(root: TSNode): Module {
    this.checkErrors(root);
    return {
      kind: "Module",
      body: this.statements(root),
      start: { line: 1, col: 0 },
      end: this.offsetAt(root.endIndex),
    };
  }

  // -------------------------------------------------------------------------
  // 位置
  // -------------------------------------------------------------------------

  private offsetAt(index: number): Offset {
    const absolute = index + this.shift;
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= absolute) low = mid;
      else high = mid - 1;
    }
    return { line: low + 1, col: absolute - this.lineStarts[low] };
  }

  private span(node: TSNode): { start: Offset; end: Offset } {
    return { start: this.offsetAt(node.startIndex), end: this.offsetAt(node.endIndex) };
  }

  private between(first: TSNode, last: TSNode): { start: Offset; end: Offset } {
    return { start: this.offsetAt(first.startIndex), end: this.offsetAt(last.endIndex) };
  }

  private endOfBody(body: readonly Stmt[], node: TSNode): Offset {
    const last = body[body.length - 1];
    return last ? last.end : this.offsetAt(node.endIndex);
  }

  private fail(message: string, node: TSNode): never {
    const { line, col } = this.offsetAt(node.startIndex);
    throw new ParseError(message, line, col);
  }

  private checkErrors(root: TSNode): void {
    const [error] = root.descendantsOfType("ERROR");
    if (error) {
      this.fail("invalid syntax", error);
    }
    if (/\(MISSING\b/.test(root.toString())) {
      this.fail("invalid syntax", findMissing(root) ?? root);
    }
  }

  private field(node: TSNode, name: string): TSNode {
    const child = node.childForFieldName(name);
    if (!child) {
      this.fail(`expected ${name}`, node);
    }
    return child;
  }

  // -------------------------------------------------------------------------
  // 语句
  // -------------------------------------------------------------------------

  private statements(node: TSNode): Stmt[] {
    return named(node).map((child) => this.statement(child));
  }

  private body(node: TSNode): Stmt[] {
    const block = blockOf(node);
    if (!block) {
      this.fail("expected an indented block", node);
    }
    return this.statements(block);
  }

  private statement(node: TSNode): Stmt {
    const { start, end } = this.span(node);
    switch (node.type) {
      case "expression_statement":
        return this.expressionStatement(node);
      case "return_statement": {
        const [value] = named(node);
        return { kind: "Return", value: value ? this.exprList(value) : null, start, end };
      }
      case "delete_statement": {
        const [target] = named(node);
        const targets =
          target.type === "expression_list" ? named(target) : [target];
        return {
          kind: "Delete",
          targets: targets.map((item) => this.target(item, "Del")),
          start,
          end,
        };
      }
      case "raise_statement": {
        const cause = node.childForFieldName("cause");
        const exc = named(node).find((child) => child.startIndex !== cause?.startIndex);
        return {
          kind: "Raise",
          exc: exc ? this.exprList(exc) : null,
          cause: cause ? this.expr(cause) : null,
          start,
          end,
        };
      }
      case "pass_statement":
        return { kind: "Pass", start, end };
      case "break_statement":
        return { kind: "Break", start, end };
      case "continue_statement":
        return { kind: "Continue", start, end };
      case "global_statement":
      case "nonlocal_statement":
        return {
          kind: node.type === "global_statement" ? "Global" : "Nonlocal",
          names: named(node).map((child) => child.text),
          start,
          end,
        };
      case "assert_statement": {
        const [test, msg] = named(node);
        return {
          kind: "Assert",
          test: this.expr(test),
          msg: msg ? this.expr(msg) : null,
          start,
          end,
        };
      }
      case "import_statement":
        return {
          kind: "Import",
          names: node.childrenForFieldName("name").map((child) => this.alias(child)),
          start,
          end,
        };
      case "import_from_statement":
      case "future_import_statement":
        return this.importFrom(node);
      case "if_statement":
        return this.ifStatement(node);
      case "for_statement": {
        const body = this.body(node);
        const orelse = this.elseBody(node);
        return {
          kind: hasToken(node, "async") ? "AsyncFor" : "For",
          target: this.target(this.field(node, "left"), "Store"),
          iter: this.exprList(this.field(node, "right")),
          body,
          orelse,
          start,
          end: this.endOfBody(orelse.length ? orelse : body, node),
        };
      }
      case "while_statement": {
        const test = this.expr(this.field(node, "condition"));
        const body = this.body(node);
        const orelse = this.elseBody(node);
        return {
          kind: "While",
          test,
          body,
          orelse,
          start,
          end: this.endOfBody(orelse.length ? orelse : body, node),
        };
      }
      case "try_statement":
        return this.tryStatement(node);
      case "with_statement": {
        const clause = named(node).find((child) => child.type === "with_clause");
        if (!clause) {
          this.fail("expected with items", node);
        }
        const items = named(clause).flatMap((item) => this.withItems(item));
        const body = this.body(node);
        return {
          kind: hasToken(node, "async") ? "AsyncWith" : "With",
          items,
          body,
          start,
          end: this.endOfBody(body, node),
        };
      }
      case "function_definition":
      case "class_definition":
        return this.definition(node, []);
      case "decorated_definition": {
        const decorators = named(node)
          .filter((child) => child.type === "decorator")
          .map((decorator) => this.expr(named(decorator)[0]));
        return this.definition(this.field(node, "definition"), decorators);
      }
      case "match_statement":
        return this.matchStatement(node);
      case "type_alias_statement": {
        const [left, right] = named(node);
        const inner = named(left)[0] ?? left;
        const nameNode = inner.type === "generic_type" ? named(inner)[0] : inner;
        return {
          kind: "TypeAlias",
          name: { kind: "Name", id: nameNode.text, ctx: "Store", ...this.span(nameNode) },
          value: this.typeExpr(right),
          start,
          end,
        };
      }
      case "print_statement":
      case "exec_statement":
        return this.fail(`unsupported Python 2 ${node.type.replace("_", " ")}`, node);
      default:
        this.fail(`unsupported syntax: ${node.type}`, node);
    }
  }

  private expressionStatement(node: TSNode): Stmt {
    const { start, end } = this.span(node);
    const children = named(node);
    const [first] = children;

    if (children.length === 1 && !hasToken(node, ",")) {
      if (first.type === "assignment") {
        return this.assignment(first, start, end);
      }
      if (first.type === "augmented_assignment") {
        const operator = this.field(first, "operator").type;
        const op = AUGMENTED_ASSIGN.get(operator);
        if (!op) {
          this.fail(`unknown operator '${operator}'`, first);
        }
        return {
          kind: "AugAssign",
          target: this.target(this.field(first, "left"), "Store"),
          op,
          value: this.rightHandSide(this.field(first, "right")),
          start,
          end,
        };
      }
      return { kind: "Expr", value: this.expr(first), start, end };
    }

    const last = children[children.length - 1];
    return {
      kind: "Expr",
      value: {
        kind: "Tuple",
        elts: children.map((child) => this.element(child)),
        ctx: "Load",
        ...this.between(first, last),
      },
      start,
      end,
    };
  }

  /**
   * `a = b = c` 在具体语法树中是嵌套的 assignment，这里展开为多个 target
   */
  private assignment(node: TSNode, start: Offset, end: Offset): Stmt {
    const left = this.field(node, "left");
    const annotation = node.childForFieldName("type");
    const right = node.childForFieldName("right");

    if (annotation) {
      return {
        kind: "AnnAssign",
        target: this.target(left, "Store"),
        annotation: this.typeExpr(annotation),
        value: right ? this.rightHandSide(right) : null,
        simple: left.type === "identifier" || left.type === "keyword_identifier",
        start,
        end,
      };
    }

    const targets = [this.target(left, "Store")];
    let value = right;
    while (value && value.type === "assignment" && !value.childForFieldName("type")) {
      targets.push(this.target(this.field(value, "left"), "Store"));
      value = value.childForFieldName("right");
    }
    if (!value) {
      this.fail("expected a value", node);
    }
    return { kind: "Assign", targets, value: this.rightHandSide(value), start, end };
  }

  private rightHandSide(node: TSNode): Expr {
    if (node.type === "assignment" || node.type === "augmented_assignment") {
      this.fail("invalid syntax", node);
    }
    return this.exprList(node);
  }

  private alias(node: TSNode): Alias {
    if (node.type === "aliased_import") {
      return {
        kind: "alias",
        name: this.dottedName(this.field(node, "name")),
        asname: this.field(node, "alias").text,
        ...this.span(node),
      };
    }
    return { kind: "alias", name: this.dottedName(node), asname: null, ...this.span(node) };
  }

  private dottedName(node: TSNode): string {
    return named(node)
      .map((part) => part.text)
      .join(".");
  }

  private importFrom(node: TSNode): Stmt {
    let module: string | null = "__future__";
    let level = 0;

    const moduleName = node.childForFieldName("module_name");
    if (moduleName?.type === "relative_import") {
      const prefix = named(moduleName).find((child) => child.type === "import_prefix");
      const dotted = named(moduleName).find((child) => child.type === "dotted_name");
      level = prefix ? prefix.text.replace(/[^.]/g, "").length : 0;
      module = dotted ? this.dottedName(dotted) : null;
    } else if (moduleName) {
      module = this.dottedName(moduleName);
    }

    const wildcard = named(node).find((child) => child.type === "wildcard_import");
    const names: Alias[] = wildcard
      ? [{ kind: "alias", name: "*", asname: null, ...this.span(wildcard) }]
      : node.childrenForFieldName("name").map((child) => this.alias(child));

    return { kind: "ImportFrom", module, names, level, ...this.span(node) };
  }

  /**
   * if / elif 链，elif 转换为 orelse 中嵌套的 If
   */
  private ifStatement(node: TSNode): Stmt {
    const alternatives = node.childrenForFieldName("alternative");
    let orelse: Stmt[] = [];
    for (let i = alternatives.length - 1; i >= 0; i--) {
      const clause = alternatives[i];
      if (clause.type === "else_clause") {
        orelse = this.body(clause);
        continue;
      }
      const body = this.body(clause);
      orelse = [
        {
          kind: "If",
          test: this.expr(this.field(clause, "condition")),
          body,
          orelse,
          start: this.offsetAt(clause.startIndex),
          end: this.endOfBody(orelse.length ? orelse : body, clause),
        },
      ];
    }

    const body = this.body(node);
    return {
      kind: "If",
      test: this.expr(this.field(node, "condition")),
      body,
      orelse,
      start: this.offsetAt(node.startIndex),
      end: this.endOfBody(orelse.length ? orelse : body, node),
    };
  }

  private elseBody(node: TSNode): Stmt[] {
    const clause = named(node).find((child) => child.type === "else_clause");
    return clause ? this.body(clause) : [];
  }

  private tryStatement(node: TSNode): Stmt {
    const clauses = named(node);
    const handlers = clauses
      .filter((child) => child.type === "except_clause" || child.type === "except_group_clause")
      .map((clause) => this.exceptHandler(clause));
    const finallyClause = clauses.find((child) => child.type === "finally_clause");
    const body = this.body(node);
    const orelse = this.elseBody(node);
    const finalbody = finallyClause ? this.body(finallyClause) : [];

    const lastBody = [finalbody, orelse, handlers.length ? [] : body].find((stmts) => stmts.length);
    const lastHandler = handlers[handlers.length - 1];
    return {
      kind: clauses.some((child) => child.type === "except_group_clause") ? "TryStar" : "Try",
      body,
      handlers,
      orelse,
      finalbody,
      start: this.offsetAt(node.startIndex),
      end: lastBody
        ? this.endOfBody(lastBody, node)
        : lastHandler?.end ?? this.offsetAt(node.endIndex),
    };
  }

  private exceptHandler(node: TSNode): ExceptHandler {
    const [first, second] = named(node).filter((child) => child.type !== "block");
    let type: Expr | null = null;
    let name: string | null = null;
    if (first?.type === "as_pattern") {
      type = this.expr(named(first)[0]);
      name = (first.childForFieldName("alias") ?? named(first)[1]).text;
    } else if (first) {
      type = this.expr(first);
      name = second ? second.text : null;
    }
    const body = this.body(node);
    return {
      kind: "ExceptHandler",
      type,
      name,
      body,
      start: this.offsetAt(node.startIndex),
      end: this.endOfBody(body, node),
    };
  }

  /**
   * `with (a as b, c):` 可能被识别为含 as 模式的元组，这里统一展开为多个 withitem
   */
  private withItems(item: TSNode): WithItem[] {
    const value = item.childForFieldName("value") ?? named(item)[0];
    if (value.type === "tuple" && named(value).some((child) => child.type === "as_pattern")) {
      return named(value).map((child) => this.withItem(child, child));
    }
    return [this.withItem(item, value)];
  }

  private withItem(item: TSNode, value: TSNode): WithItem {
    if (value.type === "as_pattern") {
      const target = value.childForFieldName("alias") ?? named(value)[1];
      return {
        kind: "withitem",
        contextExpr: this.expr(named(value)[0]),
        optionalVars: this.withContext(this.asTarget(target), "Store", target),
        ...this.span(item),
      };
    }
    return { kind: "withitem", contextExpr: this.expr(value), optionalVars: null, ...this.span(item) };
  }

  private asTarget(node: TSNode): Expr {
    const inner = named(node);
    if (inner.length === 1) {
      return this.expr(inner[0]);
    }
    if (inner.length === 0) {
      return { kind: "Name", id: node.text, ctx: "Load", ...this.span(node) };
    }
    return {
      kind: "Tuple",
      elts: inner.map((child) => this.expr(child)),
      ctx: "Load",
      ...this.span(node),
    };
  }

  private definition(node: TSNode, decoratorList: Expr[]): Stmt {
    const start = this.offsetAt(node.startIndex);
    const name = this.field(node, "name").text;

    if (node.type === "class_definition") {
      const superclasses = node.childForFieldName("superclasses");
      const { args: bases, keywords } = superclasses
        ? this.callArguments(superclasses)
        : { args: [], keywords: [] };
      const body = this.body(node);
      return {
        kind: "ClassDef",
        name,
        bases,
        keywords,
        body,
        decoratorList,
        start,
        end: this.endOfBody(body, node),
      };
    }

    const args = this.parameters(this.field(node, "parameters"));
    const body = this.body(node);
    const returnType = node.childForFieldName("return_type");
    return {
      kind: hasToken(node, "async") ? "AsyncFunctionDef" : "FunctionDef",
      name,
      args,
      body,
      decoratorList,
      returns: returnType ? this.typeExpr(returnType) : null,
      start,
      end: this.endOfBody(body, node),
    };
  }

  private matchStatement(node: TSNode): Stmt {
    const block = blockOf(node);
    const subjects = node.childrenForFieldName("subject");
    const [first] = subjects;
    if (!first || !block) {
      this.fail("invalid match statement", node);
    }
    const last = subjects[subjects.length - 1];
    const subject: Expr =
      subjects.length === 1 && !hasToken(node, ",")
        ? this.expr(first)
        : {
            kind: "Tuple",
            elts: subjects.map((child) => this.element(child)),
            ctx: "Load",
            ...this.between(first, last),
          };

    const cases = named(block)
      .filter((child) => child.type === "case_clause")
      .map((clause) => this.matchCase(clause));
    const lastCase = cases[cases.length - 1];
    return {
      kind: "Match",
      subject,
      cases,
      start: this.offsetAt(node.startIndex),
      end: lastCase ? lastCase.end : this.offsetAt(node.endIndex),
    };
  }

  private matchCase(node: TSNode): MatchCase {
    const children = named(node);
    const patterns = children.filter(
      (child) => child.type !== "if_clause" && child.type !== "block"
    );
    const guard = children.find((child) => child.type === "if_clause");
    const [first] = patterns;
    if (!first) {
      this.fail("expected a case pattern", node);
    }
    const last = patterns[patterns.length - 1];
    const body = this.body(node);
    return {
      kind: "match_case",
      pattern: this.text.slice(first.startIndex, last.endIndex),
      guard: guard ? this.expr(named(guard)[0]) : null,
      body,
      start: this.offsetAt(node.startIndex),
      end: this.endOfBody(body, node),
    };
  }

  // -------------------------------------------------------------------------
  // 参数
  // -------------------------------------------------------------------------

  private parameters(node: TSNode | null, owner?: TSNode): Arguments {
    const posonlyargs: Arg[] = [];
    const args: Arg[] = [];
    const kwonlyargs: Arg[] = [];
    const kwDefaults: (Expr | null)[] = [];
    const defaults: Expr[] = [];
    let vararg: Arg | null = null;
    let kwarg: Arg | null = null;
    let keywordOnly = false;

    const add = (arg: Arg, value: Expr | null) => {
      if (keywordOnly) {
        kwonlyargs.push(arg);
        kwDefaults.push(value);
      } else {
        args.push(arg);
        if (value) defaults.push(value);
      }
    };

    for (const param of node ? named(node) : []) {
      switch (param.type) {
        case "identifier":
          add(this.arg(param, null), null);
          break;
        case "default_parameter":
          add(this.arg(this.field(param, "name"), null), this.expr(this.field(param, "value")));
          break;
        case "typed_default_parameter":
          add(
            this.arg(this.field(param, "name"), param.childForFieldName("type")),
            this.expr(this.field(param, "value"))
          );
          break;
        case "typed_parameter": {
          const [inner] = named(param);
          const annotation = param.childForFieldName("type");
          if (inner.type === "list_splat_pattern") {
            vararg = this.arg(named(inner)[0], annotation);
            keywordOnly = true;
          } else if (inner.type === "dictionary_splat_pattern") {
            kwarg = this.arg(named(inner)[0], annotation);
          } else {
            add(this.arg(inner, annotation), null);
          }
          break;
        }
        case "list_splat_pattern":
          vararg = this.arg(named(param)[0], null);
          keywordOnly = true;
          break;
        case "dictionary_splat_pattern":
          kwarg = this.arg(named(param)[0], null);
          break;
        case "keyword_separator":
          keywordOnly = true;
          break;
        case "positional_separator":
          posonlyargs.push(...args.splice(0));
          break;
        default:
          this.fail(`unsupported parameter: ${param.type}`, param);
      }
    }

    const spanNode = node ?? owner;
    return {
      kind: "arguments",
      posonlyargs,
      args,
      vararg,
      kwonlyargs,
      kwDefaults,
      kwarg,
      defaults,
      ...(spanNode ? this.span(spanNode) : { start: { line: 1, col: 0 }, end: { line: 1, col: 0 } }),
    };
  }

  private arg(nameNode: TSNode, annotation: TSNode | null): Arg {
    if (nameNode.type !== "identifier" && nameNode.type !== "keyword_identifier") {
      this.fail("invalid parameter", nameNode);
    }
    return {
      kind: "arg",
      arg: nameNode.text,
      annotation: annotation ? this.typeExpr(annotation) : null,
      ...this.between(nameNode, annotation ?? nameNode),
    };
  }

  private callArguments(node: TSNode): { args: Expr[]; keywords: Keyword[] } {
    const args: Expr[] = [];
    const keywords: Keyword[] = [];
    for (const child of named(node)) {
      switch (child.type) {
        case "keyword_argument":
          keywords.push({
            kind: "keyword",
            arg: this.field(child, "name").text,
            value: this.expr(this.field(child, "value")),
            ...this.span(child),
          });
          break;
        case "dictionary_splat":
          keywords.push({
            kind: "keyword",
            arg: null,
            value: this.expr(named(child)[0]),
            ...this.span(child),
          });
          break;
        default:
          args.push(this.element(child));
      }
    }
    return { args, keywords };
  }

  // -------------------------------------------------------------------------
  // 表达式
  // -------------------------------------------------------------------------

  /**
   * 允许不带括号元组的位置（return、for ... in、赋值右侧等）
   */
  private exprList(node: TSNode): Expr {
    if (node.type === "expression_list" || node.type === "pattern_list") {
      return {
        kind: "Tuple",
        elts: named(node).map((child) => this.element(child)),
        ctx: "Load",
        ...this.span(node),
      };
    }
    return this.expr(node);
  }

  /**
   * 元组、列表、集合与调用参数中的元素，`*x` 为 Starred
   */
  private element(node: TSNode): Expr {
    if (node.type === "parenthesized_list_splat") {
      this.fail("unsupported syntax: parenthesized starred expression", node);
    }
    return this.exprList(node);
  }

  private target(node: TSNode, ctx: ExprContext): Expr {
    return this.withContext(this.exprList(node), ctx, node);
  }

  private withContext(expr: Expr, ctx: ExprContext, node: TSNode): Expr {
    switch (expr.kind) {
      case "Name":
      case "Attribute":
      case "Subscript":
        return { ...expr, ctx };
      case "List":
      case "Tuple":
        return { ...expr, elts: expr.elts.map((elt) => this.withContext(elt, ctx, node)), ctx };
      case "Starred":
        return { ...expr, value: this.withContext(expr.value, ctx, node), ctx };
      default:
        this.fail(`cannot assign to ${expr.kind}`, node);
    }
  }

  private expr(node: TSNode): Expr {
    const span = this.span(node);
    switch (node.type) {
      case "identifier":
      case "keyword_identifier":
        return { kind: "Name", id: node.text, ctx: "Load", ...span };
      case "integer":
      case "float":
        return { kind: "Constant", value: numberValue(node.text), ...span };
      case "true":
      case "false":
        return { kind: "Constant", value: { type: "bool", value: node.type === "true" }, ...span };
      case "none":
        return { kind: "Constant", value: { type: "None" }, ...span };
      case "ellipsis":
        return { kind: "Constant", value: { type: "Ellipsis" }, ...span };
      case "string":
        return this.strings(node, [node]);
      case "concatenated_string":
        return this.strings(
          node,
          named(node).filter((child) => child.type === "string")
        );
      case "parenthesized_expression":
        return this.expr(named(node)[0]);
      case "attribute":
        return {
          kind: "Attribute",
          value: this.expr(this.field(node, "object")),
          attr: this.field(node, "attribute").text,
          ctx: "Load",
          ...span,
        };
      case "call": {
        const argumentNode = this.field(node, "arguments");
        const func = this.expr(this.field(node, "function"));
        const { args, keywords } =
          argumentNode.type === "generator_expression"
            ? { args: [this.expr(argumentNode)], keywords: [] }
            : this.callArguments(argumentNode);
        return { kind: "Call", func, args, keywords, ...span };
      }
      case "subscript":
        return this.subscript(node);
      case "list_splat":
      case "list_splat_pattern":
        return { kind: "Starred", value: this.expr(named(node)[0]), ctx: "Load", ...span };
      case "tuple":
      case "tuple_pattern":
      case "expression_list":
      case "pattern_list":
        return {
          kind: "Tuple",
          elts: named(node).map((child) => this.element(child)),
          ctx: "Load",
          ...span,
        };
      case "list":
      case "list_pattern":
        return {
          kind: "List",
          elts: named(node).map((child) => this.element(child)),
          ctx: "Load",
          ...span,
        };
      case "set":
        return { kind: "Set", elts: named(node).map((child) => this.element(child)), ...span };
      case "dictionary": {
        const keys: (Expr | null)[] = [];
        const values: Expr[] = [];
        for (const item of named(node)) {
          if (item.type === "pair") {
            keys.push(this.expr(this.field(item, "key")));
            values.push(this.expr(this.field(item, "value")));
          } else {
            keys.push(null);
            values.push(this.expr(named(item)[0]));
          }
        }
        return { kind: "Dict", keys, values, ...span };
      }
      case "list_comprehension":
      case "set_comprehension":
      case "generator_expression": {
        const kind =
          node.type === "list_comprehension"
            ? "ListComp"
            : node.type === "set_comprehension"
              ? "SetComp"
              : "GeneratorExp";
        return {
          kind,
          elt: this.expr(this.field(node, "body")),
          generators: this.comprehensions(node),
          ...span,
        };
      }
      case "dictionary_comprehension": {
        const pair = this.field(node, "body");
        return {
          kind: "DictComp",
          key: this.expr(this.field(pair, "key")),
          value: this.expr(this.field(pair, "value")),
          generators: this.comprehensions(node),
          ...span,
        };
      }
      case "binary_operator": {
        const operator = this.field(node, "operator").type;
        const op = BINARY_OPERATORS.get(operator);
        if (!op) {
          this.fail(`unknown operator '${operator}'`, node);
        }
        return {
          kind: "BinOp",
          left: this.expr(this.field(node, "left")),
          op,
          right: this.expr(this.field(node, "right")),
          ...span,
        };
      }
      case "unary_operator": {
        const operator = this.field(node, "operator").type;
        const op = UNARY_OPERATORS.get(operator);
        if (!op) {
          this.fail(`unknown operator '${operator}'`, node);
        }
        return { kind: "UnaryOp", op, operand: this.expr(this.field(node, "argument")), ...span };
      }
      case "not_operator":
        return {
          kind: "UnaryOp",
          op: "Not",
          operand: this.expr(this.field(node, "argument")),
          ...span,
        };
      case "boolean_operator": {
        const op: BoolOperator = this.field(node, "operator").type === "and" ? "And" : "Or";
        return { kind: "BoolOp", op, values: this.boolValues(node, op), ...span };
      }
      case "comparison_operator":
        return this.comparison(node);
      case "lambda":
        return {
          kind: "Lambda",
          args: this.parameters(node.childForFieldName("parameters"), node),
          body: this.expr(this.field(node, "body")),
          ...span,
        };
      case "conditional_expression": {
        const [body, test, orelse] = named(node);
        return {
          kind: "IfExp",
          test: this.expr(test),
          body: this.expr(body),
          orelse: this.expr(orelse),
          ...span,
        };
      }
      case "named_expression": {
        const nameNode = this.field(node, "name");
        const target: Name = { kind: "Name", id: nameNode.text, ctx: "Store", ...this.span(nameNode) };
        return { kind: "NamedExpr", target, value: this.expr(this.field(node, "value")), ...span };
      }
      case "await":
        return { kind: "Await", value: this.expr(named(node)[0]), ...span };
      case "yield": {
        const [value] = named(node);
        if (hasToken(node, "from")) {
          return { kind: "YieldFrom", value: this.expr(value), ...span };
        }
        return { kind: "Yield", value: value ? this.exprList(value) : null, ...span };
      }
      case "type":
        return this.typeExpr(node);
      default:
        this.fail(`unsupported syntax: ${node.type}`, node);
    }
  }

  /**
   * 相邻字面量隐式拼接；含 f 前缀时为 JoinedStr
   */
  private strings(node: TSNode, pieces: TSNode[]): Expr {
    const parts = pieces.map((piece) => piece.text);
    const prefixes = parts.map(stringPrefix);
    const bytes = prefixes.filter((prefix) => prefix.includes("b")).length;
    if (bytes !== 0 && bytes !== prefixes.length) {
      this.fail("cannot mix bytes and nonbytes literals", node);
    }
    const span = this.span(node);
    if (prefixes.some((prefix) => prefix.includes("f"))) {
      return { kind: "JoinedStr", parts, ...span };
    }
    return { kind: "Constant", value: { type: bytes ? "bytes" : "str", parts }, ...span };
  }

  private subscript(node: TSNode): Expr {
    const value = this.expr(this.field(node, "value"));
    const items = node.childrenForFieldName("subscript");
    const [first] = items;
    if (!first) {
      this.fail("expected a subscript", node);
    }
    const last = items[items.length - 1];
    const slice: Expr =
      items.length === 1 && !hasToken(node, ",")
        ? this.sliceItem(first)
        : {
            kind: "Tuple",
            elts: items.map((item) => this.sliceItem(item)),
            ctx: "Load",
            ...this.between(first, last),
          };
    return { kind: "Subscript", value, slice, ctx: "Load", ...this.span(node) };
  }

  private sliceItem(node: TSNode): Expr {
    if (node.type !== "slice") {
      return this.expr(node);
    }
    const bounds: (Expr | null)[] = [null, null, null];
    let colons = 0;
    for (const child of node.children) {
      if (child.type === ":") {
        colons++;
      } else if (!EXTRAS.has(child.type)) {
        bounds[colons] = this.expr(child);
      }
    }
    const [lower, upper, step] = bounds;
    return { kind: "Slice", lower, upper, step, ...this.span(node) };
  }

  private comprehensions(node: TSNode): Comprehension[] {
    const generators: { clause: TSNode; ifs: Expr[] }[] = [];
    for (const clause of named(node)) {
      if (clause.type === "for_in_clause") {
        generators.push({ clause, ifs: [] });
      } else if (clause.type === "if_clause") {
        const current = generators[generators.length - 1];
        if (!current) {
          this.fail("invalid comprehension", clause);
        }
        current.ifs.push(this.expr(named(clause)[0]));
      }
    }
    return generators.map(({ clause, ifs }) => {
      const iters = clause.childrenForFieldName("right");
      const [first] = iters;
      if (!first) {
        this.fail("expected an iterable", clause);
      }
      const iter: Expr =
        iters.length === 1
          ? this.expr(first)
          : {
              kind: "Tuple",
              elts: iters.map((item) => this.element(item)),
              ctx: "Load",
              ...this.between(first, iters[iters.length - 1]),
            };
      return {
        kind: "comprehension",
        target: this.target(this.field(clause, "left"), "Store"),
        iter,
        ifs,
        isAsync: hasToken(clause, "async"),
        ...this.span(clause),
      };
    });
  }

  /**
   * `a or b or c` 在具体语法树中左结合嵌套，CPython 合并为一个 BoolOp
   */
  private boolValues(node: TSNode, op: BoolOperator): Expr[] {
    const left = this.field(node, "left");
    const right = this.expr(this.field(node, "right"));
    const sameOperator =
      left.type === "boolean_operator" &&
      (this.field(left, "operator").type === "and") === (op === "And");
    return sameOperator ? [...this.boolValues(left, op), right] : [this.expr(left), right];
  }

  private comparison(node: TSNode): Expr {
    const operands: Expr[] = [];
    const ops: CompareOperator[] = [];
    let pending: string[] = [];

    for (const child of node.children) {
      if (EXTRAS.has(child.type)) continue;
      if (COMPARE_WORDS.has(child.type)) {
        pending.push(child.type);
        continue;
      }
      if (operands.length > 0) {
        const word = pending.join(" ");
        const op = COMPARE_OPERATORS.get(word);
        if (!op) {
          this.fail(`unsupported comparison operator '${word}'`, child);
        }
        ops.push(op);
        pending = [];
      }
      operands.push(this.expr(child));
    }

    const [left, ...comparators] = operands;
    return { kind: "Compare", left, ops, comparators, ...this.span(node) };
  }

  /**
   * 注解位置的类型表达式（tree-sitter 对 `list[int]`、`int | None` 等有专门节点）
   */
  private typeExpr(node: TSNode): Expr {
    const span = this.span(node);
    switch (node.type) {
      case "type":
        return this.typeExpr(named(node)[0]);
      case "generic_type": {
        const [base, parameters] = named(node);
        const items = named(parameters);
        const [first] = items;
        if (!first) {
          this.fail("expected a type parameter", parameters);
        }
        const slice: Expr =
          items.length === 1
            ? this.typeExpr(first)
            : {
                kind: "Tuple",
                elts: items.map((item) => this.typeExpr(item)),
                ctx: "Load",
                ...this.between(first, items[items.length - 1]),
              };
        return { kind: "Subscript", value: this.typeExpr(base), slice, ctx: "Load", ...span };
      }
      case "union_type": {
        const [left, right] = named(node);
        return { kind: "BinOp", left: this.typeExpr(left), op: "BitOr", right: this.typeExpr(right), ...span };
      }
      case "member_type": {
        const [value, attr] = named(node);
        return { kind: "Attribute", value: this.typeExpr(value), attr: attr.text, ctx: "Load", ...span };
      }
      case "splat_type":
        return { kind: "Starred", value: this.typeExpr(named(node)[0]), ctx: "Load", ...span };
      default:
        return this.expr(node);
    }
  }
}

/**
 * 将源码解析为语法树
 * @throws ParseError 源码不是合法（或不受支持）的 Python 语法
 */
export function parse(source: string): Module {
  const text = source.startsWith("\ufeff") ? source.slice(1) : source;
  const tree = pythonParser().parse(text, undefined, {
    bufferSize: Math.max(32 * 1024, text.length * 2),
  });
  return new TreeConverter(source, text).module(tree.rootNode);
}

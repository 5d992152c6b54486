/**
 * Python 语法树节点定义
 * 节点结构对应 Python ast 模块；字段声明顺序即子节点遍历顺序。
 * 函数与类的类型参数（PEP 695）不出现在树中。
 * 运算符与表达式上下文（Load/Store/Del）以字符串字段表示，不是节点。
 */

import type { Offset } from "./tokens";

interface NodeBase {
  readonly start: Offset;
  readonly end: Offset;
}

export type ExprContext = "Load" | "Store" | "Del";

export type BoolOperator = "And" | "Or";

export type BinaryOperator =
  | "Add"
  | "Sub"
  | "Mult"
  | "MatMult"
  | "Div"
  | "Mod"
  | "Pow"
  | "LShift"
  | "RShift"
  | "BitOr"
  | "BitXor"
  | "BitAnd"
  | "FloorDiv";

export type UnaryOperator = "Invert" | "Not" | "UAdd" | "USub";

export type CompareOperator =
  | "Eq"
  | "NotEq"
  | "Lt"
  | "LtE"
  | "Gt"
  | "GtE"
  | "Is"
  | "IsNot"
  | "In"
  | "NotIn";

/**
 * 常量值；字符串保留每个相邻字面量的源码（隐式拼接），数字保留源码原文
 */
export type ConstantValue =
  | { readonly type: "str" | "bytes"; readonly parts: readonly string[] }
  | { readonly type: "int" | "float" | "complex"; readonly src: string }
  | { readonly type: "bool"; readonly value: boolean }
  | { readonly type: "None" }
  | { readonly type: "Ellipsis" };

// ---------------------------------------------------------------------------
// 辅助节点
// ---------------------------------------------------------------------------

export interface Arg extends NodeBase {
  readonly kind: "arg";
  readonly arg: string;
  readonly annotation: Expr | null;
}

export interface Arguments extends NodeBase {
  readonly kind: "arguments";
  readonly posonlyargs: readonly Arg[];
  readonly args: readonly Arg[];
  readonly vararg: Arg | null;
  readonly kwonlyargs: readonly Arg[];
  readonly kwDefaults: readonly (Expr | null)[];
  readonly kwarg: Arg | null;
  readonly defaults: readonly Expr[];
}

export interface Keyword extends NodeBase {
  readonly kind: "keyword";
  /** `**kwargs` 形式时为 null */
  readonly arg: string | null;
  readonly value: Expr;
}

export interface Alias extends NodeBase {
  readonly kind: "alias";
  readonly name: string;
  readonly asname: string | null;
}

export interface WithItem extends NodeBase {
  readonly kind: "withitem";
  readonly contextExpr: Expr;
  readonly optionalVars: Expr | null;
}

export interface Comprehension extends NodeBase {
  readonly kind: "comprehension";
  readonly target: Expr;
  readonly iter: Expr;
  readonly ifs: readonly Expr[];
  readonly isAsync: boolean;
}

/**
 * match 语句的一个分支；case 模式不展开，只保留源码
 */
export interface MatchCase extends NodeBase {
  readonly kind: "match_case";
  readonly pattern: string;
  readonly guard: Expr | null;
  readonly body: readonly Stmt[];
}

export interface ExceptHandler extends NodeBase {
  readonly kind: "ExceptHandler";
  readonly type: Expr | null;
  readonly name: string | null;
  readonly body: readonly Stmt[];
}

// ---------------------------------------------------------------------------
// 语句
// ---------------------------------------------------------------------------

export interface Module extends NodeBase {
  readonly kind: "Module";
  readonly body: readonly Stmt[];
}

export interface FunctionDef extends NodeBase {
  readonly kind: "FunctionDef" | "AsyncFunctionDef";
  readonly name: string;
  readonly args: Arguments;
  readonly body: readonly Stmt[];
  readonly decoratorList: readonly Expr[];
  readonly returns: Expr | null;
}

export interface ClassDef extends NodeBase {
  readonly kind: "ClassDef";
  readonly name: string;
  readonly bases: readonly Expr[];
  readonly keywords: readonly Keyword[];
  readonly body: readonly Stmt[];
  readonly decoratorList: readonly Expr[];
}

export interface Return extends NodeBase {
  readonly kind: "Return";
  readonly value: Expr | null;
}

export interface Delete extends NodeBase {
  readonly kind: "Delete";
  readonly targets: readonly Expr[];
}

export interface Assign extends NodeBase {
  readonly kind: "Assign";
  readonly targets: readonly Expr[];
  readonly value: Expr;
}

export interface AugAssign extends NodeBase {
  readonly kind: "AugAssign";
  readonly target: Expr;
  readonly op: BinaryOperator;
  readonly value: Expr;
}

export interface AnnAssign extends NodeBase {
  readonly kind: "AnnAssign";
  readonly target: Expr;
  readonly annotation: Expr;
  readonly value: Expr | null;
  readonly simple: boolean;
}

export interface For extends NodeBase {
  readonly kind: "For" | "AsyncFor";
  readonly target: Expr;
  readonly iter: Expr;
  readonly body: readonly Stmt[];
  readonly orelse: readonly Stmt[];
}

export interface While extends NodeBase {
  readonly kind: "While";
  readonly test: Expr;
  readonly body: readonly Stmt[];
  readonly orelse: readonly Stmt[];
}

export interface If extends NodeBase {
  readonly kind: "If";
  readonly test: Expr;
  readonly body: readonly Stmt[];
  readonly orelse: readonly Stmt[];
}

export interface With extends NodeBase {
  readonly kind: "With" | "AsyncWith";
  readonly items: readonly WithItem[];
  readonly body: readonly Stmt[];
}

export interface Raise extends NodeBase {
  readonly kind: "Raise";
  readonly exc: Expr | null;
  readonly cause: Expr | null;
}

export interface Try extends NodeBase {
  readonly kind: "Try" | "TryStar";
  readonly body: readonly Stmt[];
  readonly handlers: readonly ExceptHandler[];
  readonly orelse: readonly Stmt[];
  readonly finalbody: readonly Stmt[];
}

export interface Match extends NodeBase {
  readonly kind: "Match";
  readonly subject: Expr;
  readonly cases: readonly MatchCase[];
}

/**
 * `type X = ...`，类型参数不保留
 */
export interface TypeAlias extends NodeBase {
  readonly kind: "TypeAlias";
  readonly name: Name;
  readonly value: Expr;
}

export interface Assert extends NodeBase {
  readonly kind: "Assert";
  readonly test: Expr;
  readonly msg: Expr | null;
}

export interface Import extends NodeBase {
  readonly kind: "Import";
  readonly names: readonly Alias[];
}

export interface ImportFrom extends NodeBase {
  readonly kind: "ImportFrom";
  readonly module: string | null;
  readonly names: readonly Alias[];
  /** 相对导入的点数，绝对导入为 0 */
  readonly level: number;
}

export interface Global extends NodeBase {
  readonly kind: "Global" | "Nonlocal";
  readonly names: readonly string[];
}

export interface ExprStmt extends NodeBase {
  readonly kind: "Expr";
  readonly value: Expr;
}

export interface SimpleStmt extends NodeBase {
  readonly kind: "Pass" | "Break" | "Continue";
}

export type Stmt =
  | FunctionDef
  | ClassDef
  | Return
  | Delete
  | Assign
  | AugAssign
  | AnnAssign
  | For
  | While
  | If
  | With
  | Raise
  | Try
  | Match
  | TypeAlias
  | Assert
  | Import
  | ImportFrom
  | Global
  | ExprStmt
  | SimpleStmt;

// ---------------------------------------------------------------------------
// 表达式
// ---------------------------------------------------------------------------

export interface BoolOp extends NodeBase {
  readonly kind: "BoolOp";
  readonly op: BoolOperator;
  readonly values: readonly Expr[];
}

export interface NamedExpr extends NodeBase {
  readonly kind: "NamedExpr";
  readonly target: Name;
  readonly value: Expr;
}

export interface BinOp extends NodeBase {
  readonly kind: "BinOp";
  readonly left: Expr;
  readonly op: BinaryOperator;
  readonly right: Expr;
}

export interface UnaryOp extends NodeBase {
  readonly kind: "UnaryOp";
  readonly op: UnaryOperator;
  readonly operand: Expr;
}

export interface Lambda extends NodeBase {
  readonly kind: "Lambda";
  readonly args: Arguments;
  readonly body: Expr;
}

export interface IfExp extends NodeBase {
  readonly kind: "IfExp";
  readonly test: Expr;
  readonly body: Expr;
  readonly orelse: Expr;
}

export interface Dict extends NodeBase {
  readonly kind: "Dict";
  /** `**mapping` 展开时对应位置为 null */
  readonly keys: readonly (Expr | null)[];
  readonly values: readonly Expr[];
}

export interface SetExpr extends NodeBase {
  readonly kind: "Set";
  readonly elts: readonly Expr[];
}

export interface ListComp extends NodeBase {
  readonly kind: "ListComp" | "SetComp" | "GeneratorExp";
  readonly elt: Expr;
  readonly generators: readonly Comprehension[];
}

export interface DictComp extends NodeBase {
  readonly kind: "DictComp";
  readonly key: Expr;
  readonly value: Expr;
  readonly generators: readonly Comprehension[];
}

export interface Await extends NodeBase {
  readonly kind: "Await";
  readonly value: Expr;
}

export interface Yield extends NodeBase {
  readonly kind: "Yield";
  readonly value: Expr | null;
}

export interface YieldFrom extends NodeBase {
  readonly kind: "YieldFrom";
  readonly value: Expr;
}

export interface Compare extends NodeBase {
  readonly kind: "Compare";
  readonly left: Expr;
  readonly ops: readonly CompareOperator[];
  readonly comparators: readonly Expr[];
}

export interface Call extends NodeBase {
  readonly kind: "Call";
  readonly func: Expr;
  readonly args: readonly Expr[];
  readonly keywords: readonly Keyword[];
}

/**
 * f-string；内部表达式不展开，只保留源码
 */
export interface JoinedStr extends NodeBase {
  readonly kind: "JoinedStr";
  readonly parts: readonly string[];
}

export interface Constant extends NodeBase {
  readonly kind: "Constant";
  readonly value: ConstantValue;
}

export interface Attribute extends NodeBase {
  readonly kind: "Attribute";
  readonly value: Expr;
  readonly attr: string;
  readonly ctx: ExprContext;
}

export interface Subscript extends NodeBase {
  readonly kind: "Subscript";
  readonly value: Expr;
  readonly slice: Expr;
  readonly ctx: ExprContext;
}

export interface Starred extends NodeBase {
  readonly kind: "Starred";
  readonly value: Expr;
  readonly ctx: ExprContext;
}

export interface Name extends NodeBase {
  readonly kind: "Name";
  readonly id: string;
  readonly ctx: ExprContext;
}

export interface ListExpr extends NodeBase {
  readonly kind: "List" | "Tuple";
  readonly elts: readonly Expr[];
  readonly ctx: ExprContext;
}

export interface Slice extends NodeBase {
  readonly kind: "Slice";
  readonly lower: Expr | null;
  readonly upper: Expr | null;
  readonly step: Expr | null;
}

export type Expr =
  | BoolOp
  | NamedExpr
  | BinOp
  | UnaryOp
  | Lambda
  | IfExp
  | Dict
  | SetExpr
  | ListComp
  | DictComp
  | Await
  | Yield
  | YieldFrom
  | Compare
  | Call
  | JoinedStr
  | Constant
  | Attribute
  | Subscript
  | Starred
  | Name
  | ListExpr
  | Slice;

export type SyntaxNode =
  | Module
  | Stmt
  | Expr
  | Arg
  | Arguments
  | Keyword
  | Alias
  | WithItem
  | Comprehension
  | MatchCase
  | ExceptHandler;

export type NodeKind = SyntaxNode["kind"];

/**
 * 按 kind 收窄节点类型（FunctionDef / AsyncFunctionDef 等共用接口的种类同样适用）
 */
export type NodeOfKind<K extends NodeKind> = SyntaxNode & { readonly kind: K };

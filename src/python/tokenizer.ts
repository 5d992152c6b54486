/**
 * Python 词法分析器
 * 产出完整覆盖源码的 token 流：空白、注释、续行、缩进都保留为独立 token，
 * 改写只修改 token 列表，未被改写的部分原样输出。
 */

import { TokenizeError } from "./errors";
import type { SourceToken, Token, TokenKind } from "./tokens";
import { tokensToSrc } from "./tokens";

const NAME_RE = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;

const DIGITS = String.raw`\d(?:_?\d)*`;
const NUMBER_RE = new RegExp(
  [
    String.raw`0[xX](?:_?[0-9a-fA-F])+`,
    String.raw`0[bB](?:_?[01])+`,
    String.raw`0[oO](?:_?[0-7])+`,
    String.raw`(?:(?:${DIGITS})?\.${DIGITS}|${DIGITS}\.|${DIGITS})(?:[eE][+-]?${DIGITS})?[jJ]?`,
  ].join("|"),
  "y"
);

const STRING_PREFIXES = new Set(["r", "u", "b", "br", "rb", "f", "fr", "rf"]);

const OPERATORS_3 = new Set(["**=", "//=", ">>=", "<<=", "..."]);
const OPERATORS_2 = new Set([
  "!=", "%=", "&=", "**", "*=", "+=", "-=", "->", "//", "/=", ":=",
  "<<", "<=", "==", ">=", ">>", "@=", "^=", "|=",
]);
const OPERATORS_1 = new Set([..."%&()*+,-./:;<=>@[]^{|}~"]);

const OPENING = new Set(["(", "[", "{"]);
const CLOSING = new Set([")", "]", "}"]);

function isNewlineChar(ch: string | undefined): boolean {
  return ch === "\n" || ch === "\r";
}

function isWhitespaceChar(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\f";
}

/** f-string 中尚未闭合的替换字段 */
interface FormatField {
  brackets: number;
  /** 已进入 `:` 之后的格式说明部分 */
  spec: boolean;
}

class Tokenizer {
  private pos = 0;
  private line = 1;
  private lineStart = 0;
  private depth = 0;
  private atLineStart = true;
  private continued = false;
  private lineHasCode = false;
  private readonly indents: number[] = [0];
  private readonly tokens: SourceToken[] = [];

  constructor(private readonly source: string) {}

  run(): SourceToken[] {
    const { source } = this;

    if (source.startsWith("\ufeff")) {
      this.push("UNIMPORTANT_WS", "\ufeff");
    }

    while (this.pos < source.length) {
      if (this.atLineStart) {
        this.atLineStart = false;
        if (this.continued) {
          this.continued = false;
        } else if (this.depth === 0) {
          this.indentation();
          continue;
        }
      }

      const ch = source[this.pos];

      if (isWhitespaceChar(ch)) {
        let end = this.pos;
        while (isWhitespaceChar(source[end])) end++;
        this.push("UNIMPORTANT_WS", source.slice(this.pos, end));
      } else if (ch === "#") {
        let end = this.pos;
        while (end < source.length && !isNewlineChar(source[end])) end++;
        this.push("COMMENT", source.slice(this.pos, end));
      } else if (isNewlineChar(ch)) {
        const src = this.newlineAt(this.pos);
        const kind: TokenKind =
          this.depth > 0 || !this.lineHasCode ? "NL" : "NEWLINE";
        this.push(kind, src);
        if (kind === "NEWLINE") {
          this.lineHasCode = false;
        }
        this.atLineStart = true;
      } else if (ch === "\\") {
        const newline = this.newlineAt(this.pos + 1);
        if (!newline) {
          this.fail("unexpected character after line continuation character");
        }
        this.push("ESCAPED_NL", "\\" + newline);
        this.continued = true;
        this.atLineStart = true;
      } else if (ch === '"' || ch === "'") {
        this.string(this.pos);
      } else if (/\d/.test(ch) || (ch === "." && /\d/.test(source[this.pos + 1] ?? ""))) {
        this.number();
      } else if (!this.name()) {
        this.operator();
      }
    }

    this.finish();
    return this.tokens;
  }

  private get col(): number {
    return this.pos - this.lineStart;
  }

  private fail(message: string): never {
    throw new TokenizeError(message, this.line, this.col);
  }

  /**
   * 追加 token 并推进位置，token 内部的换行同步更新行号
   */
  private push(kind: TokenKind, src: string): void {
    this.tokens.push({ kind, src, line: this.line, col: this.col });
    if (kind === "NAME" || kind === "NUMBER" || kind === "STRING" || kind === "OP") {
      this.lineHasCode = true;
    }

    const start = this.pos;
    this.pos += src.length;
    for (let i = start; i < this.pos; i++) {
      const c = this.source[i];
      if (c === "\n" || (c === "\r" && this.source[i + 1] !== "\n")) {
        this.line++;
        this.lineStart = i + 1;
      }
    }
  }

  private newlineAt(index: number): string {
    if (this.source.startsWith("\r\n", index)) return "\r\n";
    const ch = this.source[index];
    return isNewlineChar(ch) ? ch : "";
  }

  /**
   * 处理逻辑行开头的缩进：产生 INDENT / DEDENT，
   * DEDENT 排在该行缩进空白之前
   */
  private indentation(): void {
    const { source } = this;
    let end = this.pos;
    let width = 0;
    while (isWhitespaceChar(source[end])) {
      const c = source[end];
      if (c === " ") width++;
      else if (c === "\t") width = (Math.floor(width / 8) + 1) * 8;
      else width = 0;
      end++;
    }
    const ws = source.slice(this.pos, end);
    const next = source[end];

    // 空行与纯注释行不影响缩进
    if (next === undefined || isNewlineChar(next) || next === "#") {
      if (ws) this.push("UNIMPORTANT_WS", ws);
      return;
    }

    const top = this.indents[this.indents.length - 1];
    if (width > top) {
      this.indents.push(width);
      this.push("INDENT", ws);
      return;
    }

    if (width < top) {
      while (width < this.indents[this.indents.length - 1]) {
        this.indents.pop();
        this.tokens.push({
          kind: "DEDENT",
          src: "",
          line: this.line,
          col: ws.length,
        });
      }
      if (width !== this.indents[this.indents.length - 1]) {
        this.pos = end;
        this.fail("unindent does not match any outer indentation level");
      }
    }

    if (ws) this.push("UNIMPORTANT_WS", ws);
  }

  private name(): boolean {
    NAME_RE.lastIndex = this.pos;
    const match = NAME_RE.exec(this.source);
    if (!match) {
      return false;
    }
    const word = match[0];
    const after = this.source[this.pos + word.length];
    if (
      (after === '"' || after === "'") &&
      STRING_PREFIXES.has(word.toLowerCase())
    ) {
      this.string(this.pos + word.length);
    } else {
      this.push("NAME", word);
    }
    return true;
  }

  /**
   * 扫描字符串字面量，quoteAt 为引号位置（前缀位于 this.pos 与 quoteAt 之间）
   */
  private string(quoteAt: number): void {
    const prefix = this.source.slice(this.pos, quoteAt).toLowerCase();
    const end = this.stringEnd(quoteAt, prefix.includes("f"));
    this.push("STRING", this.source.slice(this.pos, end));
  }

  /**
   * 字符串字面量的结束位置
   * f-string 的替换字段是表达式，其中可以嵌套任意引号的字符串（PEP 701）
   */
  private stringEnd(quoteAt: number, formatted: boolean): number {
    const { source } = this;
    const quote = source[quoteAt];
    const triple = source.startsWith(quote.repeat(3), quoteAt);
    const closing = triple ? quote.repeat(3) : quote;
    const fields: FormatField[] = [];
    let i = quoteAt + closing.length;

    for (;;) {
      if (i >= source.length) {
        this.fail(
          triple
            ? "unterminated triple-quoted string literal"
            : "unterminated string literal"
        );
      }
      const c = source[i];
      const field = fields[fields.length - 1];

      if (field && !field.spec) {
        i = this.fieldStep(i, fields, field);
        continue;
      }

      if (c === "\\") {
        i += source.startsWith("\r\n", i + 1) ? 3 : 2;
        continue;
      }
      if (!triple && isNewlineChar(c)) {
        this.fail("unterminated string literal");
      }
      if (source.startsWith(closing, i)) {
        return i + closing.length;
      }
      if (formatted && c === "{") {
        if (!field && source[i + 1] === "{") {
          i += 2;
        } else {
          fields.push({ brackets: 0, spec: false });
          i++;
        }
        continue;
      }
      if (formatted && c === "}") {
        if (field) {
          fields.pop();
        } else if (source[i + 1] === "}") {
          i++;
        }
      }
      i++;
    }
  }

  /**
   * 替换字段表达式部分的一步扫描，返回下一个位置
   */
  private fieldStep(i: number, fields: FormatField[], field: FormatField): number {
    const { source } = this;
    const c = source[i];

    if (c === '"' || c === "'") {
      return this.stringEnd(i, false);
    }
    NAME_RE.lastIndex = i;
    const word = NAME_RE.exec(source);
    if (word && word.index === i) {
      const after = i + word[0].length;
      const prefix = word[0].toLowerCase();
      if ((source[after] === '"' || source[after] === "'") && STRING_PREFIXES.has(prefix)) {
        return this.stringEnd(after, prefix.includes("f"));
      }
      return after;
    }

    switch (c) {
      case "(":
      case "[":
      case "{":
        field.brackets++;
        break;
      case ")":
      case "]":
        field.brackets--;
        break;
      case "}":
        if (field.brackets > 0) {
          field.brackets--;
        } else {
          fields.pop();
        }
        break;
      case ":":
        if (field.brackets === 0) {
          field.spec = true;
        }
        break;
      case "#":
        while (i < source.length && !isNewlineChar(source[i])) i++;
        return i;
    }
    return i + 1;
  }

  private number(): void {
    NUMBER_RE.lastIndex = this.pos;
    const match = NUMBER_RE.exec(this.source);
    if (!match) {
      this.fail("invalid number literal");
    }
    this.push("NUMBER", match[0]);
  }

  private operator(): void {
    const { source, pos } = this;
    let op = "";
    if (OPERATORS_3.has(source.slice(pos, pos + 3))) {
      op = source.slice(pos, pos + 3);
    } else if (OPERATORS_2.has(source.slice(pos, pos + 2))) {
      op = source.slice(pos, pos + 2);
    } else if (OPERATORS_1.has(source[pos])) {
      op = source[pos];
    } else {
      this.fail(`invalid character '${source[pos]}'`);
    }

    if (OPENING.has(op)) {
      this.depth++;
    } else if (CLOSING.has(op)) {
      if (this.depth === 0) {
        this.fail(`unmatched '${op}'`);
      }
      this.depth--;
    }
    this.push("OP", op);
  }

  private finish(): void {
    if (this.continued) {
      this.fail("unexpected EOF after line continuation character");
    }
    if (this.depth > 0) {
      this.fail("EOF in multi-line statement");
    }
    if (this.lineHasCode) {
      this.push("NEWLINE", "");
    }
    while (this.indents.length > 1) {
      this.indents.pop();
      this.push("DEDENT", "");
    }
    this.push("ENDMARKER", "");
  }
}

/**
 * 将源码切分为 token 序列
 * @throws TokenizeError 源码存在无法切分的结构
 */
export function tokenize(source: string): SourceToken[] {
  return new Tokenizer(source).run();
}

/**
 * 序列化：任何 token 序列（改写前后）都能还原为文本
 */
export function serialize(tokens: readonly Token[]): string {
  return tokensToSrc(tokens);
}

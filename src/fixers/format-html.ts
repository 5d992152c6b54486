/**
 * format_html("...".format(...)) 改为把参数直接交给 format_html
 * Django 5.0 起不带参数调用 format_html 已弃用。
 *
 *   format_html("Hello, {}!".format(name))
 *   -> format_html("Hello, {}!", name)
 */

import type { Call, SyntaxNode } from "../python/ast";
import { astStartOffset, isStrConstant } from "../python/ast-utils";
import { aloneOnLine, find, findLastToken, insert } from "../python/token-utils";
import type { Token } from "../python/tokens";
import type { Fixer, FixerRegistry, TokenEdit } from "../core/registry";
import type { State } from "../core/shared-context";

export const FORMAT_HTML = "format_html";

function* visitCall(state: State, node: Call): Generator<TokenEdit> {
  if (
    !state.importedFrom("django.utils.html").has("format_html") ||
    node.func.kind !== "Name" ||
    node.func.id !== "format_html" ||
    node.args.length !== 1 ||
    node.keywords.length !== 0
  ) {
    return;
  }

  const [strFormat] = node.args;
  if (
    strFormat.kind === "Call" &&
    strFormat.func.kind === "Attribute" &&
    strFormat.func.attr === "format" &&
    isStrConstant(strFormat.func.value)
  ) {
    yield [astStartOffset(node), (tokens, i) => rewriteStrFormat(tokens, i, strFormat)];
  }
}

/**
 * 删除 `.format(` 与对应的 `)`，在原位置插入 `, `
 */
function rewriteStrFormat(tokens: Token[], i: number, strFormat: SyntaxNode): void {
  const openStart = find(tokens, i, "OP", ".");
  const openEnd = find(tokens, openStart, "OP", "(");

  let closeStart = findLastToken(tokens, openEnd, strFormat);
  let closeEnd = closeStart;
  // 右括号单独成行时整行删除
  if (aloneOnLine(tokens, closeStart, closeEnd)) {
    closeStart -= 1;
    closeEnd += 1;
  }

  tokens.splice(closeStart, closeEnd + 1 - closeStart);
  tokens.splice(openStart, openEnd + 1 - openStart);
  insert(tokens, openStart, ", ");
}

export function registerFormatHtml(registry: FixerRegistry): Fixer {
  return registry
    .register(FORMAT_HTML, { minVersion: [5, 0] })
    .on("Call", visitCall);
}

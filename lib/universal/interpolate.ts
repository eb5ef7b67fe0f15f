// interpolate.ts
//
// Small, eval-free `${ expr }` interpolation.
//
// An expression is either a call with literal arguments, `name("a", 1, true)`,
// or a bare dotted path, `server.hosts.1`, handed to `resolvePath`. Calls may
// nest: `upper(get("a.b"))`. Nothing else is evaluated.

import * as z from "zod";

export type InterpolationFunction = (...args: unknown[]) => unknown;

export type InterpolationFunctionRegistry = Record<
  string,
  InterpolationFunction
>;

export type MissingValueStrategy = "leave" | "empty" | "throw";

export const interpolateOptionsSchema = z.object({
  functions: z.record(z.string(), z.custom<InterpolationFunction>(
    (value) => typeof value === "function",
    "expected a function",
  )).default({}),
  /** Bare paths; defaults to calling the registered `get` function. */
  resolvePath: z.custom<(path: readonly string[]) => unknown>(
    (value) => typeof value === "function",
    "expected a function",
  ).optional(),
  /** What to do when an expression yields `undefined` or `null`. */
  missing: z.enum(["leave", "empty", "throw"]).default("leave"),
  render: z.custom<(value: unknown) => string>(
    (value) => typeof value === "function",
    "expected a function",
  ).optional(),
});

export type InterpolateOptions = z.input<typeof interpolateOptionsSchema>;

/* -------------------------------------------------------------------------- */
/* Expressions                                                                */
/* -------------------------------------------------------------------------- */

type Expr =
  | { type: "literal"; value: string | number | boolean | null }
  | { type: "path"; parts: string[] }
  | { type: "call"; name: string; args: Expr[] };

function lex(text: string): string[] {
  const tokens: string[] = [];
  const reIdent = /^[A-Za-z_][A-Za-z0-9_-]*/;
  const reNum = /^-?[0-9]+(?:\.[0-9]+)?/;

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let value = "";
      i++;
      while (i < text.length && text[i] !== ch) {
        if (text[i] === "\\" && i + 1 < text.length) i++;
        value += text[i];
        i++;
      }
      i++;
      tokens.push(`"${value}`);
      continue;
    }

    const rest = text.slice(i);
    const match = reIdent.exec(rest) ?? reNum.exec(rest);
    const token = match ? match[0] : ch;
    tokens.push(token);
    i += token.length;
  }
  return tokens;
}

function parseExpression(text: string): Expr {
  const tokens = lex(text);
  let pos = 0;
  const peek = (): string | undefined => tokens[pos];

  const parse = (): Expr => {
    const token = tokens[pos++];
    if (token === undefined) throw new Error("Empty expression");

    if (token.startsWith('"')) return { type: "literal", value: token.slice(1) };
    if (token === "true" || token === "false") {
      return { type: "literal", value: token === "true" };
    }
    if (token === "null") return { type: "literal", value: null };
    if (/^-?[0-9]/.test(token) && peek() !== ".") {
      return { type: "literal", value: Number(token) };
    }

    if (peek() === "(") {
      pos++;
      const args: Expr[] = [];
      while (peek() !== ")") {
        args.push(parse());
        if (peek() !== ",") break;
        pos++;
      }
      if (peek() !== ")") throw new Error("Expected ')' at end of arguments");
      pos++;
      return { type: "call", name: token, args };
    }

    // path: segments are identifiers, integers or `*`
    const parts = token.split(".");
    while (peek() === ".") {
      pos++;
      const segment = tokens[pos++];
      if (segment === undefined || segment.startsWith('"')) {
        throw new Error(`Expected path segment after '.'`);
      }
      parts.push(...segment.split("."));
    }
    return { type: "path", parts };
  };

  const expr = parse();
  if (pos < tokens.length) {
    throw new Error(`Unexpected token '${peek()}' after expression`);
  }
  return expr;
}

/* -------------------------------------------------------------------------- */
/* Template scanning                                                          */
/* -------------------------------------------------------------------------- */

type TemplatePart =
  | { kind: "literal"; text: string }
  | { kind: "expr"; exprText: string; source: string };

function scanTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const start = template.indexOf("${", cursor);
    if (start < 0) break;

    let end = start + 2;
    let quote: string | undefined;
    for (; end < template.length; end++) {
      const ch = template[end];
      if (quote) {
        if (ch === "\\") end++;
        else if (ch === quote) quote = undefined;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === "}") {
        break;
      }
    }
    if (end >= template.length) break;

    if (start > cursor) {
      parts.push({ kind: "literal", text: template.slice(cursor, start) });
    }
    parts.push({
      kind: "expr",
      exprText: template.slice(start + 2, end).trim(),
      source: template.slice(start, end + 1),
    });
    cursor = end + 1;
  }

  if (cursor < template.length) {
    parts.push({ kind: "literal", text: template.slice(cursor) });
  }
  return parts;
}

/* -------------------------------------------------------------------------- */
/* Rendering                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Replace every `${ expr }` in `template`. Unknown functions and parse errors
 * throw; missing values follow `missing`.
 */
export function interpolate(
  template: string,
  options: InterpolateOptions = {},
): string {
  const { functions, missing, render = String, ...rest } =
    interpolateOptionsSchema.parse(options);
  const resolvePath = rest.resolvePath ??
    ((path: readonly string[]) => functions.get?.(path.join(".")));

  const evaluate = (expr: Expr): unknown => {
    switch (expr.type) {
      case "literal":
        return expr.value;
      case "path":
        return resolvePath(expr.parts);
      case "call": {
        const fn = Object.hasOwn(functions, expr.name)
          ? functions[expr.name]
          : undefined;
        if (!fn) throw new Error(`Unknown function '${expr.name}'`);
        return fn(...expr.args.map(evaluate));
      }
    }
  };

  return scanTemplate(template).map((part) => {
    if (part.kind === "literal") return part.text;

    const value = evaluate(parseExpression(part.exprText));
    if (value !== undefined && value !== null) return render(value);
    switch (missing) {
      case "leave":
        return part.source;
      case "empty":
        return "";
      case "throw":
        throw new Error(`Missing value for '${part.exprText}'`);
    }
  }).join("");
}

// template.ts
//
// Exposes a node's read operations as interpolation functions:
//
//   renderWithNode('${ get("url.base") }/${ user.id }', root)

import { getMap, getNodes, getValues } from "./accessors.ts";
import type { KeyPart } from "./key-spec.ts";
import { Node } from "./node.ts";
import { Reply } from "./reply.ts";
import { isValue, stringValue } from "./value.ts";
import {
  interpolate,
  type InterpolateOptions,
  type InterpolationFunctionRegistry,
} from "../universal/interpolate.ts";

function keyParts(args: readonly unknown[]): KeyPart[] {
  return args.map((arg) =>
    typeof arg === "string" || typeof arg === "number" ||
      typeof arg === "boolean"
      ? arg
      : String(arg)
  );
}

/** `get`, `getnodes`, `getvalues`, `getmap` and `getsettings` bound to `node`. */
export function templateFuncs(node: Node): InterpolationFunctionRegistry {
  return {
    get: (...keys) => node.get(...keyParts(keys)),
    getnodes: (...keys) => getNodes(node, ...keyParts(keys)),
    getvalues: (...keys) => getValues(node, ...keyParts(keys)),
    getmap: (...keys) => getMap(node, ...keyParts(keys)),
    getsettings: (...keys) => node.settings(...keyParts(keys)),
  };
}

/** Text form of whatever a template function returned. */
export function renderTemplateValue(value: unknown): string {
  if (value instanceof Reply) return JSON.stringify(value.toJSON());
  if (Array.isArray(value)) {
    return value.map((item) => renderTemplateValue(item)).join(",");
  }
  if (isValue(value)) return stringValue(value);
  if (value instanceof Node) return value.toString();
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Interpolate `template` against `node`. Bare paths read through `get`;
 * caller-supplied functions take precedence over the node's.
 */
export function renderWithNode(
  template: string,
  node: Node,
  options: Omit<InterpolateOptions, "resolvePath"> = {},
): string {
  return interpolate(template, {
    ...options,
    functions: { ...templateFuncs(node), ...options.functions },
    resolvePath: (path) => node.get(...path),
    render: options.render ?? renderTemplateValue,
  });
}

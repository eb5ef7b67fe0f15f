// serialize.ts
//
// JSON adapter and human-readable dumps.
//
// A node with children serializes as an array when it is flagged
// `ForceArray`, or when every child key is an integer and it is not flagged
// `ForceMap`; otherwise as an object. Both follow `childKeys` order;
// `marshalJSON` writes objects itself since plain objects hoist integer-like
// keys.

import { isValid } from "date-fns";
import * as z from "zod";
import { errorMessage, LoadError } from "./errors.ts";
import { NodeFlag } from "./flags.ts";
import type { Node } from "./node.ts";
import { Duration, isList, stringValue, type Value } from "./value.ts";

export type JsonValue =
  | null
  | string
  | number
  | boolean
  | JsonValue[]
  | { [key: string]: JsonValue };

/* -------------------------------------------------------------------------- */
/* Encoding                                                                   */
/* -------------------------------------------------------------------------- */

type Shape = "value" | "array" | "object";

function shapeOf(node: Node): Shape {
  const forceArray = node.hasFlag(NodeFlag.ForceArray);
  const forceMap = node.hasFlag(NodeFlag.ForceMap);
  if (node.isLeaf() && !forceArray && !forceMap) return "value";
  if (forceArray || (!forceMap && node.hasOnlyIntegerKeys())) return "array";
  return "object";
}

export function valueToJSON(value: Value | undefined): JsonValue {
  if (value === undefined) return null;
  if (value instanceof Duration) return value.toString();
  if (value instanceof Date) return isValid(value) ? value.toISOString() : null;
  if (isList(value)) return value.map(valueToJSON);
  if (typeof value === "number" && !Number.isFinite(value)) return null;
  return value;
}

/**
 * Plain JSON-compatible form of `node`. Objects built here are subject to the
 * usual property ordering of JavaScript objects; use `marshalJSON` when the
 * child order matters.
 */
export function toJSONValue(node: Node): JsonValue {
  switch (shapeOf(node)) {
    case "value":
      return valueToJSON(node.value);
    case "array":
      return node.childNodes.map(toJSONValue);
    case "object": {
      const object: { [key: string]: JsonValue } = {};
      for (const child of node.childNodes) {
        object[child.key] = toJSONValue(child);
      }
      return object;
    }
  }
}

/** Serialize `node` and its descendants, keeping child order. */
export function marshalJSON(node: Node): string {
  switch (shapeOf(node)) {
    case "value":
      return JSON.stringify(valueToJSON(node.value));
    case "array":
      return `[${node.childNodes.map(marshalJSON).join(",")}]`;
    case "object":
      return `{${
        node.childNodes
          .map((child) => `${JSON.stringify(child.key)}:${marshalJSON(child)}`)
          .join(",")
      }}`;
  }
}

/* -------------------------------------------------------------------------- */
/* Decoding                                                                   */
/* -------------------------------------------------------------------------- */

const jsonDocumentSchema = z.record(z.string(), z.unknown());

/**
 * Merge a JSON document into `node`. The document must be an object; nested
 * objects become nodes, arrays become `1..n` keyed nodes and `null` leaves
 * create valueless nodes. Keys containing dots are split into paths.
 *
 * Children are added in `JSON.parse` property order, which puts integer-like
 * keys first: `{"b":1,"2":2}` loads as `childKeys` `["2", "b"]`, so a mixed
 * object does not round-trip through `marshalJSON` in its original order.
 */
export function unmarshalJSON(node: Node, text: string): Node {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new LoadError(`invalid JSON: ${errorMessage(error)}`, {}, error);
  }

  const document = jsonDocumentSchema.safeParse(parsed);
  if (!document.success) {
    throw new LoadError(
      "invalid JSON: top-level value must be an object",
      {},
      document.error,
    );
  }

  const assign = (path: readonly string[], value: unknown) => {
    if (Array.isArray(value)) {
      value.forEach((item, i) => assign([...path, String(i + 1)], item));
    } else if (typeof value === "object" && value !== null) {
      for (const [key, item] of Object.entries(value)) {
        assign([...path, key], item);
      }
    } else if (
      typeof value === "string" || typeof value === "number" ||
      typeof value === "boolean"
    ) {
      node.setKey(path.join("."), value);
    } else {
      node.setKey(path.join("."));
    }
  };

  for (const [key, value] of Object.entries(document.data)) {
    assign([key], value);
  }
  return node;
}

/* -------------------------------------------------------------------------- */
/* Dump                                                                       */
/* -------------------------------------------------------------------------- */

/**
 * Short form renders the subtree on one line, `{a={b=1},c=2}`. Long form
 * writes one `path=value` line per leaf, paths taken from the scope root.
 */
export function dump(node: Node, short: boolean): string {
  const out: string[] = [];

  const write = (current: Node, depth: number) => {
    if (short && depth > 0) {
      out.push(`${current.key}=`);
      if (current.value !== undefined) out.push(stringValue(current.value));
    }
    if (!current.isLeaf()) {
      if (short && depth > 0) out.push("{");
      current.childNodes.forEach((child, i) => {
        if (short && i > 0) out.push(",");
        write(child, depth + 1);
      });
      if (short && depth > 0) out.push("}");
    } else if (!short) {
      out.push(`${current.path().join(".")}=${stringValue(current.value)}\n`);
    }
  };

  if (short) out.push("{");
  write(node, 0);
  if (short) out.push("}");
  return out.join("");
}

// node-list.ts
//
// Helpers over the node arrays returned by `getNodes`.

import { ConversionError } from "./errors.ts";
import type { Node } from "./node.ts";
import {
  boolCoercer,
  coerce,
  type Coercer,
  Duration,
  durationCoercer,
  floatCoercer,
  intCoercer,
  stringCoercer,
  type Value,
  valuesEqual,
} from "./value.ts";

/**
 * Replace the value of every node whose key is one of `keys` (every node when
 * `keys` is empty) with `convert(node)`. Mutates in place and returns `nodes`.
 */
export function convertValues(
  nodes: Node[],
  convert: (node: Node) => Value | undefined,
  ...keys: string[]
): Node[] {
  for (const node of nodes) {
    if (keys.length === 0 || keys.includes(node.key)) {
      node.value = convert(node);
    }
  }
  return nodes;
}

/** Coerce values in place; values that do not convert become `zero`. */
export function valuesTo<T extends Value>(
  nodes: Node[],
  coercer: Coercer<T>,
  zero: T,
  ...keys: string[]
): Node[] {
  return convertValues(nodes, (node) => {
    const result = coerce(coercer, node.value);
    return result instanceof ConversionError ? zero : result;
  }, ...keys);
}

export const valuesToString = (nodes: Node[], ...keys: string[]) =>
  valuesTo(nodes, stringCoercer, "", ...keys);
export const valuesToInt = (nodes: Node[], ...keys: string[]) =>
  valuesTo(nodes, intCoercer, 0, ...keys);
export const valuesToFloat = (nodes: Node[], ...keys: string[]) =>
  valuesTo(nodes, floatCoercer, 0, ...keys);
export const valuesToBool = (nodes: Node[], ...keys: string[]) =>
  valuesTo(nodes, boolCoercer, false, ...keys);
export const valuesToDuration = (nodes: Node[], ...keys: string[]) =>
  valuesTo(nodes, durationCoercer, Duration.ZERO, ...keys);

export function mapNodes<T>(nodes: readonly Node[], fn: (node: Node) => T): T[] {
  return nodes.map((node) => fn(node));
}

export function filterNodes(
  nodes: readonly Node[],
  predicate: (node: Node) => boolean,
): Node[] {
  return nodes.filter((node) => predicate(node));
}

export function filterByValue(
  nodes: readonly Node[],
  value: Value | undefined,
): Node[] {
  return filterNodes(nodes, (node) => valuesEqual(node.value, value));
}

export function firstNode(nodes: readonly Node[]): Node | undefined {
  return nodes.length > 0 ? nodes[0] : undefined;
}

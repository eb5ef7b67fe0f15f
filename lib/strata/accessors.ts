// accessors.ts
//
// Typed reads over the resolver. Every getter comes in four flavours that
// differ only in how they report a missing node or an unconvertible value:
//
//   tryGet*   returns `T | NotFoundError | ConversionError`
//   get*Default   returns the caller's fallback
//   get*      returns the type's zero value
//   mustGet*  throws `MissingKeyError`
//
// Coercers are Zod schemas (see `value.ts`), so `tryGetAs(node, z.enum([...]),
// "mode")` works the same way as the built-in typed getters.

import {
  ConversionError,
  MissingKeyError,
  NotFoundError,
} from "./errors.ts";
import { type KeyPart, parseKeys, WILDCARD } from "./key-spec.ts";
import type { Node } from "./node.ts";
import { findFirst, resolveNodes } from "./resolve.ts";
import {
  boolCoercer,
  coerce,
  type Coercer,
  Duration,
  durationCoercer,
  floatCoercer,
  intCoercer,
  stringCoercer,
  stringValue,
  timeCoercer,
  type Value,
} from "./value.ts";

export type TryResult<T> = T | NotFoundError | ConversionError;

/* -------------------------------------------------------------------------- */
/* try                                                                        */
/* -------------------------------------------------------------------------- */

export function tryGetNode(
  node: Node | undefined,
  ...keys: KeyPart[]
): Node | NotFoundError {
  const spec = parseKeys(keys);
  return findFirst(node, spec) ?? new NotFoundError(spec);
}

export function tryGet(
  node: Node | undefined,
  ...keys: KeyPart[]
): Value | undefined | NotFoundError {
  const found = tryGetNode(node, ...keys);
  return found instanceof NotFoundError ? found : found.value;
}

export function tryGetAs<T>(
  node: Node | undefined,
  coercer: Coercer<T>,
  ...keys: KeyPart[]
): TryResult<T> {
  const found = tryGetNode(node, ...keys);
  return found instanceof NotFoundError ? found : coerce(coercer, found.value);
}

export const tryGetString = (node: Node | undefined, ...keys: KeyPart[]) =>
  tryGetAs(node, stringCoercer, ...keys);
export const tryGetInt = (node: Node | undefined, ...keys: KeyPart[]) =>
  tryGetAs(node, intCoercer, ...keys);
export const tryGetFloat = (node: Node | undefined, ...keys: KeyPart[]) =>
  tryGetAs(node, floatCoercer, ...keys);
export const tryGetBool = (node: Node | undefined, ...keys: KeyPart[]) =>
  tryGetAs(node, boolCoercer, ...keys);
export const tryGetDuration = (node: Node | undefined, ...keys: KeyPart[]) =>
  tryGetAs(node, durationCoercer, ...keys);
export const tryGetTime = (node: Node | undefined, ...keys: KeyPart[]) =>
  tryGetAs(node, timeCoercer, ...keys);

function isFailure<T>(
  result: TryResult<T>,
): result is NotFoundError | ConversionError {
  return result instanceof NotFoundError || result instanceof ConversionError;
}

/* -------------------------------------------------------------------------- */
/* default                                                                    */
/* -------------------------------------------------------------------------- */

export function getNodeDefault(
  node: Node | undefined,
  fallback: Node | undefined,
  ...keys: KeyPart[]
): Node | undefined {
  return findFirst(node, parseKeys(keys)) ?? fallback;
}

/** The value at `keys`; `fallback` only when no node matches. */
export function getDefault(
  node: Node | undefined,
  fallback: Value | undefined,
  ...keys: KeyPart[]
): Value | undefined {
  const found = findFirst(node, parseKeys(keys));
  return found ? found.value : fallback;
}

export function getAsDefault<T>(
  node: Node | undefined,
  coercer: Coercer<T>,
  fallback: T,
  ...keys: KeyPart[]
): T {
  const result = tryGetAs(node, coercer, ...keys);
  return isFailure(result) ? fallback : result;
}

export const getStringDefault = (
  node: Node | undefined,
  fallback: string,
  ...keys: KeyPart[]
) => getAsDefault(node, stringCoercer, fallback, ...keys);
export const getIntDefault = (
  node: Node | undefined,
  fallback: number,
  ...keys: KeyPart[]
) => getAsDefault(node, intCoercer, fallback, ...keys);
export const getFloatDefault = (
  node: Node | undefined,
  fallback: number,
  ...keys: KeyPart[]
) => getAsDefault(node, floatCoercer, fallback, ...keys);
export const getBoolDefault = (
  node: Node | undefined,
  fallback: boolean,
  ...keys: KeyPart[]
) => getAsDefault(node, boolCoercer, fallback, ...keys);
export const getDurationDefault = (
  node: Node | undefined,
  fallback: Duration,
  ...keys: KeyPart[]
) => getAsDefault(node, durationCoercer, fallback, ...keys);
export const getTimeDefault = (
  node: Node | undefined,
  fallback: Date,
  ...keys: KeyPart[]
) => getAsDefault(node, timeCoercer, fallback, ...keys);

/* -------------------------------------------------------------------------- */
/* zero                                                                       */
/* -------------------------------------------------------------------------- */

export function getNode(
  node: Node | undefined,
  ...keys: KeyPart[]
): Node | undefined {
  return findFirst(node, parseKeys(keys));
}

export function get(
  node: Node | undefined,
  ...keys: KeyPart[]
): Value | undefined {
  return findFirst(node, parseKeys(keys))?.value;
}

export const getString = (node: Node | undefined, ...keys: KeyPart[]) =>
  getAsDefault(node, stringCoercer, "", ...keys);
export const getInt = (node: Node | undefined, ...keys: KeyPart[]) =>
  getAsDefault(node, intCoercer, 0, ...keys);
export const getFloat = (node: Node | undefined, ...keys: KeyPart[]) =>
  getAsDefault(node, floatCoercer, 0, ...keys);
export const getBool = (node: Node | undefined, ...keys: KeyPart[]) =>
  getAsDefault(node, boolCoercer, false, ...keys);
export const getDuration = (node: Node | undefined, ...keys: KeyPart[]) =>
  getAsDefault(node, durationCoercer, Duration.ZERO, ...keys);
/** Falls back to the epoch. */
export const getTime = (node: Node | undefined, ...keys: KeyPart[]) =>
  getAsDefault(node, timeCoercer, new Date(0), ...keys);

/* -------------------------------------------------------------------------- */
/* must                                                                       */
/* -------------------------------------------------------------------------- */

export function mustGetNode(node: Node | undefined, ...keys: KeyPart[]): Node {
  const found = tryGetNode(node, ...keys);
  if (found instanceof NotFoundError) {
    throw new MissingKeyError(found.keys, found);
  }
  return found;
}

export function mustGet(
  node: Node | undefined,
  ...keys: KeyPart[]
): Value | undefined {
  return mustGetNode(node, ...keys).value;
}

export function mustGetAs<T>(
  node: Node | undefined,
  coercer: Coercer<T>,
  ...keys: KeyPart[]
): T {
  const result = tryGetAs(node, coercer, ...keys);
  if (isFailure(result)) throw new MissingKeyError(parseKeys(keys), result);
  return result;
}

export const mustGetString = (node: Node | undefined, ...keys: KeyPart[]) =>
  mustGetAs(node, stringCoercer, ...keys);
export const mustGetInt = (node: Node | undefined, ...keys: KeyPart[]) =>
  mustGetAs(node, intCoercer, ...keys);
export const mustGetFloat = (node: Node | undefined, ...keys: KeyPart[]) =>
  mustGetAs(node, floatCoercer, ...keys);
export const mustGetBool = (node: Node | undefined, ...keys: KeyPart[]) =>
  mustGetAs(node, boolCoercer, ...keys);
export const mustGetDuration = (node: Node | undefined, ...keys: KeyPart[]) =>
  mustGetAs(node, durationCoercer, ...keys);
export const mustGetTime = (node: Node | undefined, ...keys: KeyPart[]) =>
  mustGetAs(node, timeCoercer, ...keys);

/* -------------------------------------------------------------------------- */
/* Collections                                                                */
/* -------------------------------------------------------------------------- */

export function getNodes(node: Node | undefined, ...keys: KeyPart[]): Node[] {
  return resolveNodes(node, parseKeys(keys));
}

/** Values of the matching leaves; interior nodes are skipped. */
export function getValues(
  node: Node | undefined,
  ...keys: KeyPart[]
): (Value | undefined)[] {
  return getNodes(node, ...keys)
    .filter((found) => found.isLeaf())
    .map((found) => found.value);
}

export function getStringValues(
  node: Node | undefined,
  ...keys: KeyPart[]
): string[] {
  return getNodes(node, ...keys).map((found) => stringValue(found.value));
}

/**
 * Key/value pairs for a spec like `*.*.common.region.*.name`: each entry is
 * keyed by the node matched at the last `*`, valued by what the rest of the
 * spec finds under it. Entries whose remainder is missing are skipped, and
 * a key matched in a nearer scope shadows the same key further up. No keys
 * at all means `*`.
 */
export function getMap(
  node: Node | undefined,
  ...keys: KeyPart[]
): Record<string, Value | undefined> {
  const spec = keys.length === 0 ? [WILDCARD] : parseKeys(keys);
  const split = Math.max(spec.lastIndexOf(WILDCARD), 0) + 1;
  const head = spec.slice(0, split);
  const tail = spec.slice(split);

  const result: Record<string, Value | undefined> = {};
  for (const keyed of resolveNodes(node, head)) {
    const found = tail.length > 0 ? findFirst(keyed, tail) : keyed;
    if (found && !Object.hasOwn(result, keyed.key)) {
      result[keyed.key] = found.value;
    }
  }
  return result;
}

export function getStringMap(
  node: Node | undefined,
  ...keys: KeyPart[]
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(getMap(node, ...keys))) {
    result[key] = stringValue(value);
  }
  return result;
}

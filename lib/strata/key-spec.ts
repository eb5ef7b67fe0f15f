// key-spec.ts
//
// A key spec is the flat, ordered list of segments a lookup walks through.
// Callers may pass any mix of strings and numbers; dotted strings are split.

export type KeyPart = string | number | boolean;

/** The segment that matches every child at its level. */
export const WILDCARD = "*";

/**
 * Flatten heterogeneous key parts into string segments, splitting embedded
 * dots: `parseKeys(["a.b", 1, 3.5])` → `["a", "b", "1", "3", "5"]`.
 */
export function parseKeys(parts: readonly KeyPart[]): string[] {
  const spec: string[] = [];
  for (const part of parts) {
    for (const segment of String(part).split(".")) spec.push(segment);
  }
  return spec;
}

export function isWildcardSpec(segments: readonly string[]): boolean {
  return segments.length > 0 && segments[segments.length - 1] === WILDCARD;
}

export function keySpecText(segments: readonly string[]): string {
  return segments.join(".");
}

// text-utils.ts
//
// Escape-aware string splitting. A separator immediately preceded by the
// escape sequence is not a split point, and `escape + sep` collapses to `sep`
// in the returned parts.

/**
 * Index of the first `sep` in `s` that is not preceded by `escape`, or -1.
 */
export function indexEscaped(s: string, sep: string, escape: string): number {
  let offset = 0;
  let rest = s;
  for (;;) {
    const index = rest.indexOf(sep);
    if (index === -1) return -1;
    if (
      escape === "" || index < escape.length ||
      rest.slice(index - escape.length, index) !== escape
    ) {
      return offset + index;
    }
    const skip = index + sep.length;
    rest = rest.slice(skip);
    offset += skip;
  }
}

/**
 * Split `s` into at most `n` parts on unescaped `sep` (`n === -1` means no
 * limit, `n === 0` returns no parts). An empty string yields `[""]`.
 */
export function splitNEscaped(
  s: string,
  sep: string,
  escape: string,
  n: number,
): string[] {
  const parts: string[] = [];
  if (n === 0) return parts;

  const escapedSep = escape + sep;
  const unescape = (part: string) =>
    escape === "" ? part : part.split(escapedSep).join(sep);

  let remaining = n;
  let rest = s;
  while ((remaining === -1 || remaining > 1) && rest !== "") {
    const index = indexEscaped(rest, sep, escape);
    if (index < 0) break;
    parts.push(unescape(rest.slice(0, index)));
    rest = rest.slice(index + sep.length);
    if (remaining > 0) remaining--;
  }
  parts.push(unescape(rest));
  return parts;
}

export function splitEscaped(s: string, sep: string, escape: string): string[] {
  return splitNEscaped(s, sep, escape, -1);
}

// settings.ts
//
// Settings groups are evaluated like a switch statement. Every immediate
// child of a group is a case, tried in order:
//
//   settings.1.default=label:Zip code
//   settings.1.continue=1
//   settings.2.keys.1=category
//   settings.2.keys.2=type
//   settings.2.3041.s.value=suffix:(of house)
//   settings.3.keys.1=?pickup_location
//   settings.3.true.value=suffix:(of pick-up location)
//
// A `default` case always matches. A `keys` case reads each listed key from
// the evaluation node (`?name` probes presence instead, as `true`/`false`),
// appends `value`, and looks that path up under the case. The first match
// ends the group unless the case carries a truthy `continue`.

import { isWildcardSpec, type KeyPart, parseKeys } from "./key-spec.ts";
import type { Node } from "./node.ts";
import { Reply } from "./reply.ts";
import { findFirst, resolveNodes } from "./resolve.ts";
import { parseBoolText, stringValue } from "./value.ts";
import { splitEscaped, splitNEscaped } from "../universal/text-utils.ts";

const ESCAPE = "\\";
const DEFAULT_SUBKEY = "value";

/**
 * Evaluate every settings group matched by `keys` against `node`. When the
 * spec ends in `*`, sub-keys are prefixed with the group's key
 * (`value` → `<group>`, `max` → `<group>_max`).
 */
export function evaluateSettings(
  node: Node | undefined,
  keys: readonly KeyPart[],
): Reply {
  const reply = new Reply();
  if (!node || keys.length === 0) return reply;

  const spec = parseKeys(keys);
  const usePrefix = isWildcardSpec(spec);

  for (const group of resolveNodes(node, spec)) {
    const prefix = usePrefix ? group.key : undefined;
    for (const caseNode of group.childNodes) {
      const payload = matchCase(node, caseNode);
      if (payload === undefined) continue;
      addPayload(reply, payload, prefix);
      if (!isTruthy(caseNode.child("continue"))) break;
    }
  }
  return reply;
}

/** The payload of a matching case, or `undefined` when it does not match. */
function matchCase(context: Node, caseNode: Node): string | undefined {
  const defaultNode = caseNode.child("default");
  if (defaultNode) return stringValue(defaultNode.value);

  const keysNode = caseNode.child("keys");
  if (!keysNode) return undefined;

  const probes: string[] = [];
  for (const wanted of keysNode.childNodes) {
    const name = stringValue(wanted.value);
    if (name.startsWith("?")) {
      const present = findFirst(context, parseKeys([name.slice(1)]));
      probes.push(present ? "true" : "false");
    } else {
      probes.push(stringValue(findFirst(context, parseKeys([name]))?.value));
    }
  }
  probes.push(DEFAULT_SUBKEY);

  const valueNode = findFirst(caseNode, parseKeys(probes));
  return valueNode ? stringValue(valueNode.value) : undefined;
}

function addPayload(reply: Reply, payload: string, prefix?: string) {
  for (const part of splitEscaped(payload, ",", ESCAPE)) {
    const pair = splitNEscaped(part, ":", ESCAPE, 2);
    const [subKey, subValue] = pair.length === 2
      ? [pair[0], pair[1]]
      : [DEFAULT_SUBKEY, pair[0]];
    if (prefix === undefined) reply.add(subKey, subValue);
    else if (subKey === DEFAULT_SUBKEY) reply.add(prefix, subValue);
    else reply.add(`${prefix}_${subKey}`, subValue);
  }
}

function isTruthy(node: Node | undefined): boolean {
  return node !== undefined && parseBoolText(stringValue(node.value)) === true;
}

// node.ts
//
// The tree vertex. A node owns its children exclusively (keyed map plus an
// insertion-ordered key list) and keeps a non-owning link back up the tree.
// That link is either structural (a parent in the same tree) or, for a scope
// root, the root of the tree this scope inherits unset keys from.

import { NodeFlag } from "./flags.ts";
import { type KeyPart, parseKeys } from "./key-spec.ts";
import type { Reply } from "./reply.ts";
import { findFirst, resolveNodes } from "./resolve.ts";
import { dump } from "./serialize.ts";
import { evaluateSettings } from "./settings.ts";
import type { Value } from "./value.ts";

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ParentLink =
  | { readonly nature: "detached" }
  | { readonly nature: "child"; readonly parent: Node }
  | { readonly nature: "scope"; readonly inherits?: Node };

/** Flat key/value pairs; keys may be dotted paths. */
export type Args = Readonly<Record<string, Value | undefined>>;

const DETACHED: ParentLink = Object.freeze({ nature: "detached" });

interface NodeSnapshot {
  readonly key: string;
  readonly value: Value | undefined;
  readonly children: readonly NodeSnapshot[];
}

function snapshotOf(node: Node): NodeSnapshot {
  return {
    key: node.key,
    value: node.value,
    children: node.childNodes.map(snapshotOf),
  };
}

const INT_KEY_RE = /^[+-]?\d+$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function integerKey(key: string): bigint | undefined {
  if (!INT_KEY_RE.test(key)) return undefined;
  const n = BigInt(key);
  return n < INT64_MIN || n > INT64_MAX ? undefined : n;
}

/* -------------------------------------------------------------------------- */
/* Node                                                                       */
/* -------------------------------------------------------------------------- */

export class Node {
  value: Value | undefined;
  flags: number = NodeFlag.None;

  private nodeKey: string;
  private link: ParentLink = DETACHED;
  private readonly childMap = new Map<string, Node>();
  private readonly childOrder: string[] = [];

  constructor(key = "", value?: Value) {
    this.nodeKey = key;
    this.value = value;
  }

  /** A new, empty scope root that inherits from nothing. */
  static root(): Node {
    const root = new Node("");
    root.link = { nature: "scope" };
    return root;
  }

  static fromArgs(args: Args): Node {
    return Node.root().mergeArgs(args);
  }

  /* ---------------------------------------------------------------------- */
  /* Accessors                                                              */
  /* ---------------------------------------------------------------------- */

  get key(): string {
    return this.nodeKey;
  }

  get parentLink(): ParentLink {
    return this.link;
  }

  /** Structural parent, if any. Scope roots never have one. */
  get parent(): Node | undefined {
    return this.link.nature === "child" ? this.link.parent : undefined;
  }

  get isRoot(): boolean {
    return this.link.nature === "scope";
  }

  /** The root of the tree this scope inherits from (scope roots only). */
  get scopeParent(): Node | undefined {
    return this.link.nature === "scope" ? this.link.inherits : undefined;
  }

  /** Child keys in iteration order. */
  get childKeys(): readonly string[] {
    return this.childOrder;
  }

  get childNodes(): Node[] {
    return this.childOrder.map((key) => this.childMap.get(key)).filter(
      (child): child is Node => child !== undefined,
    );
  }

  get size(): number {
    return this.childOrder.length;
  }

  child(key: string): Node | undefined {
    return this.childMap.get(key);
  }

  hasFlag(flag: NodeFlag): boolean {
    return (this.flags & flag) !== 0;
  }

  isLeaf(): boolean {
    return this.childOrder.length === 0;
  }

  /** True when every child key is a 64-bit integer (vacuously for leaves). */
  hasOnlyIntegerKeys(): boolean {
    return this.childOrder.every((key) => integerKey(key) !== undefined);
  }

  /** Climb structural parents up to the scope root (or topmost node). */
  getRoot(): Node {
    let node: Node = this;
    while (node.link.nature === "child") node = node.link.parent;
    return node;
  }

  /** Structural hops to the root; a scope root is always at depth 0. */
  depth(): number {
    let depth = 0;
    for (let n: Node = this; n.link.nature === "child"; n = n.link.parent) {
      depth++;
    }
    return depth;
  }

  /** Keys from the root (exclusive) down to this node, empty keys skipped. */
  path(): string[] {
    const path: string[] = [];
    for (let n: Node = this; n.link.nature === "child"; n = n.link.parent) {
      if (n.nodeKey !== "") path.push(n.nodeKey);
    }
    return path.reverse();
  }

  /* ---------------------------------------------------------------------- */
  /* Scopes                                                                 */
  /* ---------------------------------------------------------------------- */

  /**
   * Stack a new, empty scope on top of this node's tree. When called on an
   * interior node, `args` are set under the same path in the new scope.
   */
  with(...args: readonly Args[]): Node {
    const root = this.getRoot();
    const scope = new Node("");
    scope.link = { nature: "scope", inherits: root };

    const target = root === this ? scope : scope.descend(this.path());
    for (const arg of args) target.mergeArgs(arg);
    return scope;
  }

  /* ---------------------------------------------------------------------- */
  /* Structural mutation                                                    */
  /* ---------------------------------------------------------------------- */

  /**
   * Move `child` under this node at `child.key`, releasing it from its
   * previous parent and discarding any sibling already at that key.
   */
  adopt(child: Node): Node {
    for (let n: Node | undefined = this; n; n = n.parent) {
      if (n === child) {
        throw new RangeError(`cannot adopt "${child.key}" into its own subtree`);
      }
    }

    child.parent?.detachChild(child.nodeKey);
    if (this.childMap.has(child.nodeKey)) this.detachChild(child.nodeKey);

    this.childMap.set(child.nodeKey, child);
    this.childOrder.push(child.nodeKey);
    child.link = { nature: "child", parent: this };
    return child;
  }

  /**
   * Detach the node at `keys` and return it intact, or `undefined` when any
   * segment along the way is missing.
   */
  unset(...keys: KeyPart[]): Node | undefined {
    const segments = parseKeys(keys);
    if (segments.length === 0) return undefined;

    let owner: Node | undefined = this;
    for (const segment of segments.slice(0, -1)) {
      owner = owner.childMap.get(segment);
      if (!owner) return undefined;
    }
    return owner.detachChild(segments[segments.length - 1]);
  }

  /** Release this node from its structural parent. */
  detach(): Node {
    this.parent?.detachChild(this.nodeKey);
    return this;
  }

  /** Change the key, re-adopting under the same parent (appended last). */
  rename(newKey: string): Node {
    const parent = this.parent;
    if (parent) {
      parent.detachChild(this.nodeKey);
      this.nodeKey = newKey;
      parent.adopt(this);
    }
    return this;
  }

  /**
   * Deep-copy `original` under this node at `original.key`. Values are
   * overwritten unconditionally; existing children `original` does not
   * mention are kept. The source subtree is captured before anything is
   * written, so merging a node into itself or a descendant terminates.
   * Returns the destination node.
   */
  merge(original: Node | undefined): Node | undefined {
    if (!original) return undefined;
    return this.mergeSnapshot(snapshotOf(original));
  }

  /**
   * Order children numerically when every key is an integer, otherwise
   * lexicographically. Equal keys (`1`, `01`) keep their relative order.
   */
  sort(): void {
    const numeric = this.childOrder.map(integerKey);
    if (numeric.every((n) => n !== undefined)) {
      const rank = new Map(
        this.childOrder.map((key, i): [string, bigint] => [
          key,
          numeric[i] ?? 0n,
        ]),
      );
      this.childOrder.sort((a, b) => {
        const ra = rank.get(a) ?? 0n;
        const rb = rank.get(b) ?? 0n;
        return ra < rb ? -1 : ra > rb ? 1 : 0;
      });
    } else {
      this.childOrder.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
  }

  sortRecursively(): void {
    this.sort();
    for (const child of this.childMap.values()) {
      if (!child.isLeaf()) child.sortRecursively();
    }
  }

  /* ---------------------------------------------------------------------- */
  /* Setting values                                                         */
  /* ---------------------------------------------------------------------- */

  /**
   * Create-or-update the node at `keys`, creating intermediate nodes. An
   * `undefined` value leaves an existing value untouched.
   */
  set(keys: readonly KeyPart[], value?: Value): Node | undefined {
    const segments = parseKeys(keys);
    if (segments.length === 0) return undefined;
    const node = this.descend(segments);
    if (value !== undefined) node.value = value;
    return node;
  }

  setKey(key: string, value?: Value): Node {
    const node = this.descend(parseKeys([key]));
    if (value !== undefined) node.value = value;
    return node;
  }

  addNode(...keys: KeyPart[]): Node | undefined {
    return this.set(keys);
  }

  mergeArgs(args: Args): this {
    for (const [key, value] of Object.entries(args)) this.setKey(key, value);
    return this;
  }

  /** Append a child keyed by the next unused integer. */
  push(): Node {
    for (let id = this.childOrder.length + 1;; id++) {
      const key = String(id);
      if (!this.childMap.has(key)) return this.setKey(key);
    }
  }

  pushValues(...values: Value[]): this {
    for (const value of values) this.push().value = value;
    return this;
  }

  /**
   * First call sets the value at `key`; later calls turn that node into a
   * list (`1`, `2`, ...) and append. Returns the node holding `value`.
   */
  fillKey(key: string, value: Value): Node {
    const node = this.descend(parseKeys([key]));
    let target: Node | undefined;
    if (node.isLeaf()) {
      if (node.value === undefined) {
        target = node;
      } else {
        node.push().value = node.value;
        node.value = undefined;
      }
    }
    target ??= node.push();
    target.value = value;
    return target;
  }

  /* ---------------------------------------------------------------------- */
  /* Lookups                                                                */
  /* ---------------------------------------------------------------------- */

  getNodes(...keys: KeyPart[]): Node[] {
    return resolveNodes(this, parseKeys(keys));
  }

  getNode(...keys: KeyPart[]): Node | undefined {
    return findFirst(this, parseKeys(keys));
  }

  get(...keys: KeyPart[]): Value | undefined {
    return this.getNode(...keys)?.value;
  }

  settings(...keys: KeyPart[]): Reply {
    return evaluateSettings(this, keys);
  }

  toString(): string {
    return dump(this, true);
  }

  /* ---------------------------------------------------------------------- */
  /* Internals                                                              */
  /* ---------------------------------------------------------------------- */

  private mergeSnapshot(source: NodeSnapshot): Node {
    let target = this.childMap.get(source.key);
    if (!target) {
      target = this.adopt(new Node(source.key));
      this.sort();
    }
    target.value = source.value;

    for (const child of source.children) target.mergeSnapshot(child);
    return target;
  }

  private descend(segments: readonly string[]): Node {
    let node: Node = this;
    for (const segment of segments) {
      node = node.childMap.get(segment) ?? node.adopt(new Node(segment));
    }
    return node;
  }

  private detachChild(key: string): Node | undefined {
    const child = this.childMap.get(key);
    if (!child) return undefined;
    this.childMap.delete(key);
    const index = this.childOrder.indexOf(key);
    if (index >= 0) this.childOrder.splice(index, 1);
    child.link = DETACHED;
    return child;
  }
}

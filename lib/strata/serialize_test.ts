import { describe, expect, it } from "vitest";
import { LoadError } from "./errors.ts";
import { NodeFlag } from "./flags.ts";
import { Node } from "./node.ts";
import {
  dump,
  marshalJSON,
  toJSONValue,
  unmarshalJSON,
  valueToJSON,
} from "./serialize.ts";
import { Duration } from "./value.ts";

function fruitTree(): Node {
  const root = Node.root();
  root.setKey("simple.int", 1);
  root.setKey("simple.bool", true);
  root.setKey("normal.array.1", "A");
  root.setKey("normal.array.100", "B");
  root.setKey("normal.array.020", "C");
  root.setKey("normal.map.1", "apples");
  root.setKey("normal.map.100", "oranges");
  root.setKey("normal.map.twenty", "pears");
  root.setKey("forced.map.1", "A");
  root.setKey("forced.map.100", "B");
  root.setKey("forced.map.020", "C");
  root.setKey("forced.array.1", "apples");
  root.setKey("forced.array.100", "oranges");
  root.setKey("forced.array.twenty", "pears");
  return root;
}

describe("marshalJSON", () => {
  it("keeps child order and turns integer keys into arrays", () => {
    expect(marshalJSON(fruitTree())).toBe(
      '{"simple":{"int":1,"bool":true},' +
        '"normal":{"array":["A","B","C"],' +
        '"map":{"1":"apples","100":"oranges","twenty":"pears"}},' +
        '"forced":{"map":["A","B","C"],' +
        '"array":{"1":"apples","100":"oranges","twenty":"pears"}}}',
    );
  });

  it("follows the sorted order", () => {
    const root = fruitTree();
    root.sortRecursively();
    expect(marshalJSON(root)).toBe(
      '{"forced":{"array":{"1":"apples","100":"oranges","twenty":"pears"},' +
        '"map":["A","C","B"]},' +
        '"normal":{"array":["A","C","B"],' +
        '"map":{"1":"apples","100":"oranges","twenty":"pears"}},' +
        '"simple":{"bool":true,"int":1}}',
    );
  });

  it("honours ForceMap and ForceArray", () => {
    const root = fruitTree();
    root.sortRecursively();
    const map = root.getNode("forced.map");
    const array = root.getNode("forced.array");
    if (map) map.flags = NodeFlag.ForceMap;
    if (array) array.flags = NodeFlag.ForceArray;

    expect(marshalJSON(root)).toBe(
      '{"forced":{"array":["apples","oranges","pears"],' +
        '"map":{"1":"A","020":"C","100":"B"}},' +
        '"normal":{"array":["A","C","B"],' +
        '"map":{"1":"apples","100":"oranges","twenty":"pears"}},' +
        '"simple":{"bool":true,"int":1}}',
    );
  });

  it("writes flagged empty nodes as empty containers", () => {
    const root = Node.root();
    root.setKey("empty.array").flags = NodeFlag.ForceArray;
    root.setKey("empty.map").flags = NodeFlag.ForceMap;
    root.setKey("empty.value");
    expect(marshalJSON(root)).toBe(
      '{"empty":{"array":[],"map":{},"value":null}}',
    );
  });

  it("encodes structured values as strings", () => {
    const root = Node.fromArgs({
      d: Duration.of({ minutes: 2 }),
      t: new Date(Date.UTC(1979, 11, 7)),
      l: [1, "two"],
    });
    expect(marshalJSON(root)).toBe(
      '{"d":"2m0s","t":"1979-12-07T00:00:00.000Z","l":[1,"two"]}',
    );
  });
});

describe("toJSONValue", () => {
  it("builds plain JSON data", () => {
    const root = fruitTree();
    root.sortRecursively();
    expect(toJSONValue(root)).toEqual({
      forced: {
        array: { "1": "apples", "100": "oranges", twenty: "pears" },
        map: ["A", "C", "B"],
      },
      normal: {
        array: ["A", "C", "B"],
        map: { "1": "apples", "100": "oranges", twenty: "pears" },
      },
      simple: { bool: true, int: 1 },
    });
  });

  it("maps values without a JSON form to null", () => {
    expect(valueToJSON(undefined)).toBeNull();
    expect(valueToJSON(Number.NaN)).toBeNull();
    expect(valueToJSON(new Date(Number.NaN))).toBeNull();
    expect(valueToJSON([Duration.ZERO, Infinity])).toEqual(["0s", null]);
  });
});

describe("unmarshalJSON", () => {
  it("merges objects, turns arrays into numbered keys", () => {
    const root = unmarshalJSON(
      Node.root(),
      '{"a":1,"b":"lolcats","c":{"d":3.1415},"d":[1,2,3],' +
        '"e":[1,"two",3.0,true]}',
    );
    root.sortRecursively();
    expect(root.toString()).toBe(
      "{a=1,b=lolcats,c={d=3.1415},d={1=1,2=2,3=3},e={1=1,2=two,3=3,4=true}}",
    );
    expect(root.get("c.d")).toBe(3.1415);
    expect(root.get("e.4")).toBe(true);
  });

  it("splits dotted keys and keeps nulls as valueless nodes", () => {
    const root = unmarshalJSON(Node.root(), '{"n":null,"x.y":2}');
    expect(root.toString()).toBe("{n=,x={y=2}}");
    expect(root.getNode("n")?.value).toBeUndefined();
  });

  it("merges into existing content", () => {
    const root = Node.fromArgs({ keep: "me", "x.y": 1 });
    unmarshalJSON(root, '{"x":{"z":2}}');
    expect(root.toString()).toBe("{keep=me,x={y=1,z=2}}");
  });

  it("adds integer-like keys ahead of the others", () => {
    const root = unmarshalJSON(Node.root(), '{"b":1,"2":2}');
    expect(root.childKeys).toEqual(["2", "b"]);
    expect(marshalJSON(root)).toBe('{"2":2,"b":1}');
  });

  it("rejects invalid documents", () => {
    expect(() => unmarshalJSON(Node.root(), "[1]")).toThrow(
      "invalid JSON: top-level value must be an object",
    );
    expect(() => unmarshalJSON(Node.root(), "{")).toThrow(LoadError);
    expect(() => unmarshalJSON(Node.root(), "{")).toThrow(/^invalid JSON: /);
  });
});

describe("dump", () => {
  const root = Node.fromArgs({ "a.b": "1", "a.c": "x", d: 2 });

  it("writes the short form on one line", () => {
    expect(dump(root, true)).toBe("{a={b=1,c=x},d=2}");
    expect(dump(Node.fromArgs({ a: 1, "a.b": 2 }), true)).toBe("{a=1{b=2}}");
  });

  it("writes one line per leaf in the long form", () => {
    expect(dump(root, false)).toBe("a.b=1\na.c=x\nd=2\n");
    const a = root.getNode("a");
    expect(a && dump(a, true)).toBe("{b=1,c=x}");
    expect(a && dump(a, false)).toBe("a.b=1\na.c=x\n");
  });
});

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConversionError, LoadError } from "./errors.ts";
import {
  loadConf,
  memoryConfSource,
  mergeFile,
  mergeText,
  parseTypedValue,
} from "./load.ts";
import {
  textInfoLoadEventBus,
  verboseInfoLoadEventBus,
} from "./load-events.ts";
import { Node } from "./node.ts";
import { Duration } from "./value.ts";

const DEC_7_1979 = new Date(Date.UTC(1979, 11, 7));

const niceFiles = {
  "main.conf": "a=2\n  b.c=3\ninclude other.conf\n",
  "other.conf": "\n\n  # comment\n  a=3\n",
};

describe("parseTypedValue", () => {
  it("converts scalars and lists", () => {
    expect(parseTypedValue("", " raw ")).toBe(" raw ");
    expect(parseTypedValue("int", "12")).toBe(12);
    expect(parseTypedValue("[]string", "a\\,b,c")).toEqual(["a,b", "c"]);
    expect(parseTypedValue("[]int", "1,2,3")).toEqual([1, 2, 3]);
  });

  it("reports the item that failed", () => {
    const result = parseTypedValue("[]int", "1,x");
    expect(result).toBeInstanceOf(ConversionError);
    if (result instanceof ConversionError) {
      expect(result.message).toBe('cannot convert "x" to int');
    }

    const unknown = parseTypedValue("color", "red");
    expect(unknown).toBeInstanceOf(ConversionError);
    if (unknown instanceof ConversionError) {
      expect(unknown.message).toBe('bad type: "color"');
    }
  });
});

describe("mergeText", () => {
  it("merges entries over existing values", () => {
    const root = Node.fromArgs({ a: "2", "b.c": "3" });
    mergeText(root, "\n  a=8\n  b.d=4\n");
    expect(root.toString()).toBe("{a=8,b={c=3,d=4}}");
  });

  it("stops on bad lines only when asked", () => {
    const root = Node.root();
    expect(() => mergeText(root, "bad syntax", { stopOnErrors: true }))
      .toThrow('line 1: bad format: "bad syntax"');

    const { bus, lines } = textInfoLoadEventBus({ style: "plain" });
    mergeText(root, "x=1\noops\n", { bus });
    expect(root.get("x")).toBe("1");
    expect(lines).toEqual([
      "[entry] x at=1",
      '[skip] bad-format 2 "oops"',
    ]);
  });

  it("always rejects values that do not match their type", () => {
    expect(() => mergeText(Node.root(), "n:int=abc"))
      .toThrow('line 1: cannot convert "abc" to int');
  });
});

describe("mergeFile", () => {
  it("reports a missing file", async () => {
    await expect(
      mergeFile(Node.root(), "missing-file", { source: memoryConfSource({}) }),
    ).rejects.toThrow("file does not exist");
  });

  it("wraps include failures with the including line", async () => {
    const source = memoryConfSource({
      "main.conf": "include missing-file.conf",
    });
    await expect(mergeFile(Node.root(), "main.conf", { source })).rejects
      .toThrow(
        'main.conf:1: including "missing-file.conf": file does not exist',
      );
    await expect(mergeFile(Node.root(), "main.conf", { source })).rejects
      .toBeInstanceOf(LoadError);
  });

  it("applies includes in place so later files win", async () => {
    const root = Node.root();
    await mergeFile(root, "main.conf", { source: memoryConfSource(niceFiles) });
    expect(root.toString()).toBe("{a=3,b={c=3}}");
  });

  it("resolves includes beside the including file", async () => {
    const source = memoryConfSource({
      "conf/main.conf": "include common.conf\ninclude /etc/shared.conf\n",
      "conf/common.conf": "z=1",
      "/etc/shared.conf": "w=2",
    });
    const root = await mergeFile(Node.root(), "conf/main.conf", { source });
    expect(root.toString()).toBe("{z=1,w=2}");
  });

  it("reads each file once", async () => {
    const source = memoryConfSource({
      "a.conf": "x=1\ninclude b.conf\n",
      "b.conf": "include a.conf\ny=2\n",
    });
    const { bus, lines } = textInfoLoadEventBus({ style: "plain" });
    const root = await mergeFile(Node.root(), "a.conf", { source, bus });
    expect(root.toString()).toBe("{x=1,y=2}");
    expect(lines).toContain("[skip] already-loaded a.conf");
  });

  it("parses typed values", async () => {
    const source = memoryConfSource({
      "main.conf": [
        "v.s:string=a",
        "v.i:int=1",
        "v.f:float=3.14",
        "v.b:bool=true",
        "v.d:duration=1h",
        "v.t:time=1979-12-07",
        "a.s:[]string=a,b,c",
        "a.i:[]int=1,2,3",
        "a.f:[]float=3.14,3.15,3.16",
        "a.b:[]bool=1,t,true,on,0,f,false,off",
        "a.d:[]duration=1h,1m,3d,1h2m3s",
        "a.t:[]time=1979-12-07T00:00:00Z,Fri Dec  7 00:00:00 1979," +
        "Friday\\, 07-Dec-79 00:00:00 UTC,Fri\\, 07 Dec 1979 00:00:00 +0000," +
        "1979-12-07 00:00:00,1979-12-07",
      ].join("\n"),
    });
    const root = await loadConf("main.conf", { source });

    expect(root.get("v.s")).toBe("a");
    expect(root.get("v.i")).toBe(1);
    expect(root.get("v.f")).toBe(3.14);
    expect(root.get("v.b")).toBe(true);
    expect(root.get("v.d")).toEqual(Duration.of({ hours: 1 }));
    expect(root.get("v.t")).toEqual(DEC_7_1979);
    expect(root.get("a.s")).toEqual(["a", "b", "c"]);
    expect(root.get("a.i")).toEqual([1, 2, 3]);
    expect(root.get("a.f")).toEqual([3.14, 3.15, 3.16]);
    expect(root.get("a.b")).toEqual([
      true,
      true,
      true,
      true,
      false,
      false,
      false,
      false,
    ]);
    expect(root.get("a.d")).toEqual([
      Duration.of({ hours: 1 }),
      Duration.of({ minutes: 1 }),
      Duration.of({ days: 3 }),
      Duration.of({ hours: 1, minutes: 2, seconds: 3 }),
    ]);
    expect(root.get("a.t")).toEqual(Array(6).fill(DEC_7_1979));
  });

  it("keeps what was merged before a failure", async () => {
    const source = memoryConfSource({ "main.conf": "ok=1\nbad line\n" });
    const { bus, lines } = textInfoLoadEventBus({ style: "plain" });
    const root = Node.root();

    await expect(mergeFile(root, "main.conf", { source, bus })).rejects
      .toThrow('main.conf:2: bad format: "bad line"');
    expect(root.get("ok")).toBe("1");
    expect(lines).toEqual([
      "[load] main.conf abs=/main.conf depth=0",
      "[entry] ok at=main.conf:1",
      '[error] main.conf:2: bad format: "bad line" at=main.conf',
    ]);
  });

  it("narrates a load on the text bus", async () => {
    const { bus, lines } = textInfoLoadEventBus({ style: "plain" });
    await mergeFile(Node.root(), "main.conf", {
      source: memoryConfSource(niceFiles),
      bus,
    });
    expect(lines).toEqual([
      "[load] main.conf abs=/main.conf depth=0",
      "[entry] a at=main.conf:1",
      "[entry] b.c at=main.conf:2",
      "[load] include other.conf from=main.conf:3",
      "[load] other.conf abs=/other.conf depth=1",
      "[entry] a at=other.conf:4",
    ]);

    const rich = textInfoLoadEventBus({ style: "rich" });
    await mergeFile(Node.root(), "other.conf", {
      source: memoryConfSource(niceFiles),
      bus: rich.bus,
    });
    expect(rich.lines).toEqual([
      "[load] 📄 other.conf abs=/other.conf depth=0",
      "[entry] • a at=other.conf:4",
    ]);
  });
});

describe("loadConf", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a fresh scope root", async () => {
    const root = await loadConf("main.conf", {
      source: memoryConfSource(niceFiles),
    });
    expect(root.isRoot).toBe(true);
    expect(root.get("b.c")).toBe("3");
  });

  it("names the file it could not load", async () => {
    await expect(loadConf("nope.conf", { source: memoryConfSource({}) }))
      .rejects.toThrow(
        "Could not load configuration from nope.conf: file does not exist",
      );
  });

  it("reads from disk by default", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "strata-"));
    try {
      await mkdir(path.join(dir, "conf.d"));
      await writeFile(
        path.join(dir, "app.conf"),
        "name=app\ninclude conf.d/port.conf\n",
      );
      await writeFile(path.join(dir, "conf.d", "port.conf"), "port:int=8080\n");

      const info = vi.spyOn(console, "info").mockImplementation(() => {});
      const root = await loadConf(path.join(dir, "app.conf"), {
        bus: verboseInfoLoadEventBus({ style: "plain" }),
      });
      expect(root.toString()).toBe("{name=app,port=8080}");
      expect(info).toHaveBeenCalledTimes(3);
      expect(info).toHaveBeenNthCalledWith(
        2,
        `[load] include ${path.join(dir, "conf.d", "port.conf")} from=${
          path.join(dir, "app.conf")
        }:2`,
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

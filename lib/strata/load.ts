// load.ts
//
// Line-oriented configuration text:
//
//   # comments and blank lines are ignored
//   include common.conf          (files only, relative to the including file)
//   server.port:int = 8080
//   server.hosts:[]string = a.example,b.example
//   server.banner = Hello\, world
//
// Types are `string` (the default), `int`, `float`, `bool`, `duration`,
// `date` and `time`, each optionally prefixed with `[]` for a comma separated
// list; `\,` keeps a comma inside a list item. Keys and values are trimmed.

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as z from "zod";
import { ConversionError, errorMessage, LoadError } from "./errors.ts";
import type { LoadEventBus } from "./load-events.ts";
import { Node } from "./node.ts";
import {
  parseBoolText,
  parseDurationText,
  parseFloatText,
  parseIntText,
  parseTimeText,
  type Scalar,
  type Value,
} from "./value.ts";
import { splitEscaped } from "../universal/text-utils.ts";

const IGNORE_RE = /^\s*(#.*)?$/;
const INCLUDE_RE = /^\s*include ([^\s]+)\s*$/;
const ENTRY_RE =
  /^\s*([^=\s][^=]*?)(?::((?:\[\])?(?:string|int|float|bool|duration|date|time)))?\s*=\s*(.*?)\s*$/;

/* -------------------------------------------------------------------------- */
/* Typed values                                                               */
/* -------------------------------------------------------------------------- */

const SCALAR_PARSERS: Readonly<
  Record<string, (text: string) => Scalar | undefined>
> = Object.freeze({
  string: (text: string) => text,
  int: parseIntText,
  float: parseFloatText,
  bool: parseBoolText,
  duration: parseDurationText,
  date: parseTimeText,
  time: parseTimeText,
});

/**
 * Convert the raw text of an entry to the value its declared type asks for.
 * An empty type means `string`.
 */
export function parseTypedValue(
  type: string,
  raw: string,
): Value | ConversionError {
  const list = type.startsWith("[]");
  const scalarType = (list ? type.slice(2) : type) || "string";
  const parser = SCALAR_PARSERS[scalarType];
  if (!parser) return new ConversionError(type, raw, `bad type: "${type}"`);

  const parseOne = (text: string) =>
    parser(text) ?? new ConversionError(scalarType, text);

  if (!list) return parseOne(raw);

  const values: Scalar[] = [];
  for (const item of splitEscaped(raw, ",", "\\")) {
    const parsed = parseOne(item);
    if (parsed instanceof ConversionError) return parsed;
    values.push(parsed);
  }
  return values;
}

interface Entry {
  readonly key: string;
  readonly type: string;
  readonly raw: string;
}

function parseEntry(line: string): Entry | undefined {
  const match = ENTRY_RE.exec(line);
  if (!match) return undefined;
  return { key: match[1], type: match[2] ?? "", raw: match[3] };
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/* -------------------------------------------------------------------------- */
/* Text                                                                       */
/* -------------------------------------------------------------------------- */

export const mergeTextOptionsSchema = z.object({
  /** Throw on the first unrecognized line instead of skipping it. */
  stopOnErrors: z.boolean().default(false),
  bus: z.custom<LoadEventBus>(isLoadEventBus, "expected an event bus")
    .optional(),
});

export type MergeTextOptions = z.input<typeof mergeTextOptionsSchema>;

/**
 * Merge `key[:type]=value` lines into `node`. A value that does not convert
 * to its declared type always throws; other unrecognized lines throw only
 * with `stopOnErrors`. Includes are not followed here (see `mergeFile`).
 */
export function mergeText(
  node: Node,
  text: string,
  options: MergeTextOptions = {},
): Node {
  const { stopOnErrors, bus } = mergeTextOptionsSchema.parse(options);

  splitLines(text).forEach((line, index) => {
    const lineNumber = index + 1;
    if (IGNORE_RE.test(line)) return;

    const entry = parseEntry(line);
    if (entry) {
      const value = parseTypedValue(entry.type, entry.raw);
      if (value instanceof ConversionError) {
        const error = new LoadError(
          `line ${lineNumber}: ${value.message}`,
          { line: lineNumber },
          value,
        );
        bus?.emit("load:error", { line: lineNumber, error });
        throw error;
      }
      node.setKey(entry.key, value);
      bus?.emit("load:entry", {
        line: lineNumber,
        key: entry.key,
        type: entry.type,
      });
      return;
    }

    if (stopOnErrors) {
      const error = new LoadError(
        `line ${lineNumber}: bad format: "${line}"`,
        { line: lineNumber },
      );
      bus?.emit("load:error", { line: lineNumber, error });
      throw error;
    }
    bus?.emit("load:skip", {
      line: lineNumber,
      reason: "bad-format",
      text: line,
    });
  });

  return node;
}

/* -------------------------------------------------------------------------- */
/* Files                                                                      */
/* -------------------------------------------------------------------------- */

/** Where `mergeFile` reads from; swap it out to load from memory. */
export interface ConfSource {
  /** Identity of a file for include-cycle detection. */
  absolute(file: string): string;
  readText(file: string): Promise<string>;
}

export const diskConfSource: ConfSource = {
  absolute: (file) => path.resolve(file),
  readText: (file) => readFile(file, "utf8"),
};

/** An in-memory file set keyed by normalized relative path. */
export function memoryConfSource(
  files: Readonly<Record<string, string>>,
): ConfSource {
  return {
    absolute: (file) => path.posix.resolve("/", file),
    readText: async (file) => {
      const key = path.posix.normalize(file);
      if (!Object.hasOwn(files, key)) throw new Error("file does not exist");
      return files[key];
    },
  };
}

function isConfSource(value: unknown): value is ConfSource {
  return typeof value === "object" && value !== null &&
    "absolute" in value && typeof value.absolute === "function" &&
    "readText" in value && typeof value.readText === "function";
}

function isLoadEventBus(value: unknown): value is LoadEventBus {
  return typeof value === "object" && value !== null &&
    "emit" in value && typeof value.emit === "function" &&
    "on" in value && typeof value.on === "function";
}

export const loadOptionsSchema = z.object({
  source: z.custom<ConfSource>(isConfSource, "expected a ConfSource")
    .optional(),
  bus: z.custom<LoadEventBus>(isLoadEventBus, "expected an event bus")
    .optional(),
});

export type LoadOptions = z.input<typeof loadOptionsSchema>;

/**
 * Load `filename` and everything it includes into `node`. Each file is read
 * at most once, so include cycles end quietly. Loading is not atomic: on
 * failure `node` keeps the entries merged so far.
 */
export async function mergeFile(
  node: Node,
  filename: string,
  options: LoadOptions = {},
): Promise<Node> {
  const { source = diskConfSource, bus } = loadOptionsSchema.parse(options);
  const seen = new Set<string>();

  const loadFile = async (file: string, depth: number): Promise<void> => {
    const absolute = source.absolute(file);
    if (seen.has(absolute)) {
      bus?.emit("load:skip", { file, reason: "already-loaded" });
      return;
    }
    seen.add(absolute);

    const text = await source.readText(file);
    bus?.emit("load:file", { file, absolute, depth });

    const lines = splitLines(text);
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      const lineNumber = index + 1;
      if (IGNORE_RE.test(line)) continue;

      const include = INCLUDE_RE.exec(line);
      if (include) {
        const target = path.isAbsolute(include[1])
          ? include[1]
          : path.join(path.dirname(file), include[1]);
        bus?.emit("load:include", { file, line: lineNumber, include: target });
        try {
          await loadFile(target, depth + 1);
        } catch (error) {
          throw new LoadError(
            `${file}:${lineNumber}: including "${target}": ${
              errorMessage(error)
            }`,
            { file, line: lineNumber },
            error,
          );
        }
        continue;
      }

      const entry = parseEntry(line);
      if (!entry) {
        throw new LoadError(
          `${file}:${lineNumber}: bad format: "${line}"`,
          { file, line: lineNumber },
        );
      }
      const value = parseTypedValue(entry.type, entry.raw);
      if (value instanceof ConversionError) {
        throw new LoadError(
          `${file}:${lineNumber}: ${value.message}`,
          { file, line: lineNumber },
          value,
        );
      }
      node.setKey(entry.key, value);
      bus?.emit("load:entry", {
        file,
        line: lineNumber,
        key: entry.key,
        type: entry.type,
      });
    }
  };

  try {
    await loadFile(filename, 0);
  } catch (error) {
    bus?.emit("load:error", { file: filename, error });
    throw error;
  }
  return node;
}

/** A fresh root holding `filename` and its includes. */
export async function loadConf(
  filename: string,
  options: LoadOptions = {},
): Promise<Node> {
  const root = Node.root();
  try {
    await mergeFile(root, filename, options);
  } catch (error) {
    throw new LoadError(
      `Could not load configuration from ${filename}: ${errorMessage(error)}`,
      { file: filename },
      error,
    );
  }
  return root;
}

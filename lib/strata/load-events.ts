// load-events.ts
//
// Loader diagnostics travel over a typed event bus. Callers that want to see
// what a load did pass one of the buses built here (or their own) as
// `mergeFile(node, file, { bus })`.

import pc from "picocolors";
import { type EventBus, eventBus } from "../universal/event-bus.ts";
import { errorMessage } from "./errors.ts";

const { bold, cyan, dim, green, magenta, red, yellow } = pc;

export type LoadBusEvents = {
  "load:file": { file: string; absolute: string; depth: number };
  "load:include": { file: string; line: number; include: string };
  "load:entry": { file?: string; line: number; key: string; type: string };
  "load:skip": {
    file?: string;
    line?: number;
    reason: "already-loaded" | "bad-format";
    text?: string;
  };
  "load:error": { file?: string; line?: number; error: unknown };
};

export type LoadEventBus = EventBus<LoadBusEvents>;

export type LoadLogStyle = "plain" | "rich";

const E = {
  page: "📄",
  link: "🔗",
  dot: "•",
  skip: "⏭️",
  boom: "💥",
} as const;

const where = (file: string | undefined, line: number | undefined) =>
  [file, line].filter((part) => part !== undefined).join(":");

/**
 * Create a console-logging bus for loader events.
 *
 * - style: "rich" → emoji + ANSI colors
 * - style: "plain" → no emoji, no colors
 *
 * Entries are only logged when `entries` is set.
 */
export function verboseInfoLoadEventBus(init: {
  readonly style: LoadLogStyle;
  readonly entries?: boolean;
}): LoadEventBus {
  const fancy = init.style === "rich";
  const bus = eventBus<LoadBusEvents>();

  const c = {
    tag: (s: string) => (fancy ? bold(magenta(s)) : s),
    path: (s: string) => (fancy ? bold(cyan(s)) : s),
    ok: (s: string) => (fancy ? green(s) : s),
    warn: (s: string) => (fancy ? yellow(s) : s),
    err: (s: string) => (fancy ? red(s) : s),
    faint: (s: string) => (fancy ? dim(s) : s),
  };
  const em = (emoji: string, s: string) => (fancy ? `${emoji} ${s}` : s);

  bus.on("load:file", ({ file, absolute, depth }) => {
    console.info(
      `${c.tag("[load]")} ${em(E.page, c.path(file))} ` +
        c.faint(`abs=${absolute} depth=${depth}`),
    );
  });

  bus.on("load:include", ({ file, line, include }) => {
    console.info(
      `${c.tag("[load]")} ${em(E.link, "include")} ${c.path(include)} ` +
        c.faint(`from=${where(file, line)}`),
    );
  });

  if (init.entries) {
    bus.on("load:entry", ({ file, line, key, type }) => {
      console.info(
        `${c.tag("[load]")} ${em(E.dot, c.ok(key))}` +
          c.faint(`${type ? `:${type}` : ""} at=${where(file, line)}`),
      );
    });
  }

  bus.on("load:skip", ({ file, line, reason, text }) => {
    console.warn(
      `${c.tag("[load]")} ${em(E.skip, c.warn(reason))} ${where(file, line)}` +
        (text === undefined ? "" : ` ${c.faint(JSON.stringify(text))}`),
    );
  });

  bus.on("load:error", ({ file, line, error }) => {
    console.error(
      `${c.tag("[load]")} ${em(E.boom, c.err(errorMessage(error)))} ` +
        c.faint(where(file, line)),
    );
  });

  return bus;
}

/**
 * Create a text-logging bus for loader events. Every event (entries
 * included) appends one line to the returned `lines` array.
 *
 * - style: "rich"  → includes emojis, no ANSI colors
 * - style: "plain" → no emojis
 *
 * Example:
 *   const { bus, lines } = textInfoLoadEventBus({ style: "plain" });
 *   await mergeFile(root, "app.conf", { bus });
 *   // lines: ["[load] app.conf abs=/srv/app.conf depth=0", ...]
 */
export function textInfoLoadEventBus(init: { readonly style: LoadLogStyle }) {
  const fancy = init.style === "rich";
  const bus = eventBus<LoadBusEvents>();
  const lines: string[] = [];

  const em = (emoji: string, s: string) => (fancy ? `${emoji} ${s}` : s);
  const tag = (s: string) => `[${s}]`;

  bus.on("load:file", ({ file, absolute, depth }) => {
    lines.push(
      `${tag("load")} ${em(E.page, file)} abs=${absolute} depth=${depth}`,
    );
  });

  bus.on("load:include", ({ file, line, include }) => {
    lines.push(
      `${tag("load")} ${em(E.link, "include")} ${include} from=${
        where(file, line)
      }`,
    );
  });

  bus.on("load:entry", ({ file, line, key, type }) => {
    lines.push(
      `${tag("entry")} ${em(E.dot, key)}${type ? `:${type}` : ""} at=${
        where(file, line)
      }`,
    );
  });

  bus.on("load:skip", ({ file, line, reason, text }) => {
    lines.push(
      `${tag("skip")} ${em(E.skip, reason)} ${where(file, line)}${
        text === undefined ? "" : ` ${JSON.stringify(text)}`
      }`,
    );
  });

  bus.on("load:error", ({ file, line, error }) => {
    const at = where(file, line);
    lines.push(
      `${tag("error")} ${em(E.boom, errorMessage(error))}${
        at ? ` at=${at}` : ""
      }`,
    );
  });

  return { bus, lines };
}

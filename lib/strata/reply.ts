// reply.ts
//
// Ordered multi-valued map produced by settings evaluation: the same key may
// collect values from several matching cases.

import { parseBoolText, parseIntText } from "./value.ts";

export class Reply {
  private readonly entries = new Map<string, string[]>();

  static from(record: Readonly<Record<string, readonly string[]>>): Reply {
    const reply = new Reply();
    for (const [key, values] of Object.entries(record)) {
      reply.set(key, ...values);
    }
    return reply;
  }

  /** Replace all values for `key`. */
  set(key: string, ...values: string[]): this {
    this.entries.set(key, [...values]);
    return this;
  }

  /** Append values for `key`. */
  add(key: string, ...values: string[]): this {
    const existing = this.entries.get(key);
    if (existing) existing.push(...values);
    else this.entries.set(key, [...values]);
    return this;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  values(key: string): readonly string[] {
    return this.entries.get(key) ?? [];
  }

  /** First value for `key`, or `""`. */
  get(key: string): string {
    return this.entries.get(key)?.[0] ?? "";
  }

  /** First value for `key` as an integer, or `0`. */
  getInt(key: string): number {
    return parseIntText(this.get(key)) ?? 0;
  }

  /** First value for `key` as a boolean; only `1|t|true|on` are true. */
  getBool(key: string): boolean {
    return parseBoolText(this.get(key)) === true;
  }

  toJSON(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [key, values] of this.entries) record[key] = [...values];
    return record;
  }
}

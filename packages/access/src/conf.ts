/**
 * Key-value configuration
 *
 * Reads `key=value` lines (from text, a file, or the process environment)
 * used to parameterize pipelines, e.g. a cutoff or an input path. Values are
 * converted by the type of the default passed to `get()`.
 *
 * @example
 * ```typescript
 * const conf = KeyValueConf.parse("# cuts\nminPt=20\nverbose=yes\n");
 * conf.get("minPt", 10);      // 20
 * conf.get("verbose", false); // true
 * conf.get("label", "none");  // "none"
 * ```
 */

import * as fs from "fs";
import { ConfigError } from "@lazyview/core";
import { convert } from "./convert.js";
import { log } from "./log.js";

export type ConfValue = string | number | boolean;

export class KeyValueConf {
  /** Pairs read from text, or the environment variables read so far */
  private readonly store: Map<string, string>;

  private constructor(
    store: Map<string, string>,
    private readonly env?: NodeJS.ProcessEnv,
  ) {
    this.store = store;
  }

  /**
   * Parse `key=value` lines. Blank lines and lines starting with `#` are
   * ignored; the value is everything after the first `=`.
   */
  static parse(text: string): KeyValueConf {
    const store = new Map<string, string>();
    for (const line of text.split(/\r?\n/)) {
      if (line === "" || line.startsWith("#")) continue;
      const eq = line.indexOf("=");
      if (eq < 0) {
        throw new ConfigError(line, "missing_separator", `Missing = in config line: ${line}`);
      }
      const key = line.slice(0, eq);
      if (store.has(key)) {
        throw new ConfigError(key, "duplicate_key", `Key ${key} present twice in config`);
      }
      store.set(key, line.slice(eq + 1));
    }
    return new KeyValueConf(store);
  }

  static fromFile(path: string): KeyValueConf {
    let text: string;
    try {
      text = fs.readFileSync(path, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(path, "unreadable_file", `Can't read config file ${path}: ${reason}`);
    }
    const conf = KeyValueConf.parse(text);
    log.debug(`loaded ${conf.store.size} keys from ${path}`);
    return conf;
  }

  /** Look keys up in the environment; every key found is remembered. */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): KeyValueConf {
    return new KeyValueConf(new Map(), env);
  }

  has(key: string): boolean {
    if (this.env) return this.env[key] !== undefined;
    return this.store.has(key);
  }

  /**
   * The value under `key` converted to the type of `fallback`, or `fallback`
   * when the key is absent.
   *
   * @throws ConfigError when the value can't be converted
   */
  get(key: string, fallback: string): string;
  get(key: string, fallback: number): number;
  get(key: string, fallback: boolean): boolean;
  get(key: string, fallback: ConfValue): ConfValue {
    const raw = this.lookup(key);
    if (raw === undefined) return fallback;
    if (typeof fallback === "string") return raw;
    if (typeof fallback === "boolean") return convert(raw, "boolean") ?? false;
    const value = convert(raw, "number");
    if (value === undefined) {
      throw new ConfigError(key, "invalid_value", `Value "${raw}" of ${key} is not a number`);
    }
    return value;
  }

  /** Stored pairs (read pairs for the environment), in insertion order */
  entries(): [string, string][] {
    return [...this.store.entries()];
  }

  /**
   * Stored pairs merged with `extra` (which wins on conflicts), sorted by key,
   * for recording next to results.
   */
  toMetadata(extra: Readonly<Record<string, string>> = {}): [string, string][] {
    const merged = new Map(this.store);
    for (const [key, value] of Object.entries(extra)) merged.set(key, value);
    return [...merged.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private lookup(key: string): string | undefined {
    if (!this.env) return this.store.get(key);
    const value = this.env[key];
    if (value !== undefined) this.store.set(key, value);
    return value;
  }
}

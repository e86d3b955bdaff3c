/**
 * CSV line-record reader
 *
 * One record per line, fields split on a single delimiter, no quoting. The
 * layout comes either from a header line or from a static list of columns.
 * A `CsvAccess` is a row cursor: it points at one record at a time and can be
 * presented as a lazy view of itself with `rows()`.
 *
 * @example
 * ```typescript
 * const csv = new CsvAccess("x,y\n1,2\n3,4\n");
 * csv.rows().map((row) => row.get("y", "number")).takeWhile(() => true).toArray();
 * // [2, 4]
 *
 * const fixed = new CsvAccess("1;a;b;2\n", {
 *   delimiter: ";",
 *   columns: [column("first"), skip(2), column("last")],
 * });
 * fixed.get("last", "int"); // 2
 * ```
 */

import * as fs from "fs";
import { accessView, type LazyView, type RowCursor } from "@lazyview/views";
import { convert, type ValueKind, type ValueKinds } from "./convert.js";
import { log } from "./log.js";

// ============================================================================
// Layout
// ============================================================================

export type CsvColumn =
  | { readonly kind: "column"; readonly name: string }
  | { readonly kind: "skip"; readonly fields: number };

/** A named field */
export function column(name: string): CsvColumn {
  return { kind: "column", name };
}

/** `fields` consecutive fields that are not read */
export function skip(fields: number = 1): CsvColumn {
  return { kind: "skip", fields };
}

export interface CsvOptions {
  /** Field delimiter, `,` by default */
  delimiter?: string;
  /** Static layout. Without it the first line is read as a header. */
  columns?: readonly CsvColumn[];
}

interface Layout {
  /** Column names in declaration order */
  readonly names: readonly string[];
  /** Field position of each named column */
  readonly positions: readonly number[];
}

function staticLayout(columns: readonly CsvColumn[]): Layout {
  const names: string[] = [];
  const positions: number[] = [];
  let field = 0;
  for (const item of columns) {
    if (item.kind === "skip") {
      field += item.fields;
      continue;
    }
    names.push(item.name);
    positions.push(field++);
  }
  return { names, positions };
}

function headerLayout(header: string, delimiter: string): Layout {
  const names = header.split(delimiter);
  return { names, positions: names.map((_, i) => i) };
}

// ============================================================================
// Reader
// ============================================================================

export class CsvAccess implements RowCursor {
  private readonly lines: readonly string[];
  private readonly delimiter: string;
  private readonly layout: Layout;
  private readonly byName = new Map<string, number>();
  private line = 0;
  private fields: readonly string[] = [];

  constructor(text: string, options: CsvOptions = {}) {
    this.delimiter = options.delimiter ?? ",";
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

    if (options.columns) {
      this.layout = staticLayout(options.columns);
    } else {
      this.layout = headerLayout(lines.shift() ?? "", this.delimiter);
    }
    this.layout.names.forEach((name, i) => {
      if (!this.byName.has(name)) this.byName.set(name, i);
    });

    this.lines = lines;
    this.load();
  }

  /** Read a whole file */
  static fromFile(path: string, options: CsvOptions = {}): CsvAccess {
    const access = new CsvAccess(fs.readFileSync(path, "utf8"), options);
    log.debug(`loaded ${access.lines.length} records from ${path}`);
    return access;
  }

  /** Column names, in layout order */
  get columns(): readonly string[] {
    return this.layout.names;
  }

  valid(): boolean {
    return this.line < this.lines.length;
  }

  advance(): void {
    this.line++;
    this.load();
  }

  /**
   * Field of the current record, by column name or by position among the
   * named columns, converted to `kind`. `undefined` for an unknown column, a
   * missing field or a failed conversion.
   */
  get<K extends ValueKind>(columnRef: string | number, kind: K): ValueKinds[K] | undefined {
    const index = typeof columnRef === "number" ? columnRef : this.byName.get(columnRef);
    if (index === undefined || index < 0 || index >= this.layout.positions.length) {
      return undefined;
    }
    const text = this.fields[this.layout.positions[index]];
    return text === undefined ? undefined : convert(text, kind);
  }

  /** This reader as a view of its records, from the current one on */
  rows(): LazyView<this, false, false> {
    return accessView(this);
  }

  private load(): void {
    this.fields = this.valid() ? this.lines[this.line].split(this.delimiter) : [];
  }
}

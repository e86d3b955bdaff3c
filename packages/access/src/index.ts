/**
 * @lazyview/access — Data sources and sinks around lazy views
 *
 * - `CsvAccess`: CSV line records as a row cursor, viewable with `rows()`
 * - `KeyValueConf`: `key=value` configuration from text, files or the environment
 * - `fill()`: push a finite view into a numeric sink
 */

export { CsvAccess, column, skip, type CsvColumn, type CsvOptions } from "./csv.js";
export { KeyValueConf, type ConfValue } from "./conf.js";
export { fill, type Fillable, type FillValue, type FillElement } from "./fill.js";
export { convert, converters, type ValueKind, type ValueKinds } from "./convert.js";

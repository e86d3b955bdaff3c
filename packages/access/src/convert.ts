/**
 * Text-to-value conversion shared by the CSV reader and the key-value
 * configuration.
 */

export interface ValueKinds {
  string: string;
  number: number;
  int: number;
  boolean: boolean;
}

export type ValueKind = keyof ValueKinds;

const TRUE_WORDS: ReadonlySet<string> = new Set(["1", "true", "True", "TRUE", "yes", "YES"]);

/**
 * One converter per kind. `undefined` means the text does not hold a value of
 * that kind; booleans never fail, anything not spelled as true is false.
 */
export const converters: { readonly [K in ValueKind]: (text: string) => ValueKinds[K] | undefined } = {
  string: (text) => text,
  number: (text) => {
    const trimmed = text.trim();
    if (trimmed === "") return undefined;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
  },
  int: (text) => {
    // leading integer, trailing garbage ignored
    const value = parseInt(text, 10);
    return Number.isNaN(value) ? undefined : value;
  },
  boolean: (text) => TRUE_WORDS.has(text),
};

export function convert<K extends ValueKind>(text: string, kind: K): ValueKinds[K] | undefined {
  return converters[kind](text);
}
